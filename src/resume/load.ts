import { readFile } from 'node:fs/promises';
import { parse, YAMLParseError } from 'yaml';
import { IOError, SchemaError, toError } from '../lib/errors.js';
import { validateResume, type ResumeRecord } from './schema.js';

/**
 * Parses YAML (or JSON, which YAML accepts) into a validated record.
 * Syntax errors are reported as SchemaError at the document root.
 */
export function loadResumeText(source: string): ResumeRecord {
  let value: unknown;
  try {
    value = parse(source);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new SchemaError([{ path: '(root)', message: err.message }]);
    }
    throw toError(err);
  }

  const result = validateResume(value);
  if (!result.success) throw result.error;
  return result.data;
}

export async function loadResumeFile(filePath: string): Promise<ResumeRecord> {
  let source: string;
  try {
    source = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new IOError(filePath, err, 'read');
  }
  return loadResumeText(source);
}
