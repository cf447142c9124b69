import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { DEFAULT_RENDER_CONFIG, type RenderConfig } from '../lib/config.js';
import { ConversionError, toError } from '../lib/errors.js';
import { createRenderLogger } from '../lib/logger.js';
import { assemble } from './assembler.js';
import { LibreOfficeConverter, type DocumentConverter, type FixedLayoutFormat } from './converter.js';
import type { DocumentTree } from './document-tree.js';
import { buildResumeFilename } from './filename.js';
import { validateResume, type ResumeRecord } from './schema.js';
import { serializeDocument } from './serializer.js';
import { createStyleRegistry } from './styles.js';

// ---------------------------------------------------------------------------
// Preflight
// ---------------------------------------------------------------------------

/**
 * Non-fatal content checks run after validation. The document is still
 * rendered; the warnings travel back with the result.
 */
export function preflightCheck(record: ResumeRecord): string[] {
  const warnings: string[] = [];
  const info = record.personal_info;

  if (!info.name.trim()) {
    warnings.push('Missing name: the document header and filename will be generic');
  }
  if (!info.email.trim() && !info.phone.trim()) {
    warnings.push('No email or phone in personal info');
  }
  if (record.experience.length === 0) {
    warnings.push('No experience entries: the Work Experience heading will be empty');
  }

  return warnings;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export type OutputTarget =
  /** Exact destination of the .docx file. */
  | { outputPath: string }
  /** Directory; the filename is derived from the person's name. */
  | { outputDir: string };

export type GenerateOptions = OutputTarget & {
  /** Overrides `config.convertToPdf` for this call. */
  convertToPdf?: boolean;
  config?: Partial<RenderConfig>;
  converter?: DocumentConverter;
  extraSkills?: readonly string[];
  renderId?: string;
};

export type ConversionOutcome =
  | { ok: true; format: FixedLayoutFormat; path: string }
  | { ok: false; format: FixedLayoutFormat; error: ConversionError };

export interface GenerateResult {
  documentPath: string;
  warnings: string[];
  tree: DocumentTree;
  /** Present only when conversion was requested. */
  conversion?: ConversionOutcome;
}

function resolveDestination(options: GenerateOptions, record: ResumeRecord): string {
  if ('outputPath' in options) return options.outputPath;
  return path.join(options.outputDir, buildResumeFilename(record.personal_info.name));
}

async function convertDocument(
  converter: DocumentConverter,
  documentPath: string,
  format: FixedLayoutFormat,
): Promise<ConversionOutcome> {
  try {
    return { ok: true, format, path: await converter.convert(documentPath, format) };
  } catch (err) {
    const error =
      err instanceof ConversionError ? err : new ConversionError(documentPath, format, toError(err).message, err);
    return { ok: false, format, error };
  }
}

/**
 * Validates `input`, renders it and writes the .docx, then optionally converts
 * it to PDF.
 *
 * Throws SchemaError before anything is written, and IOError when the document
 * cannot be written. A failed conversion does not throw: the .docx is already
 * in place and the failure is returned in `conversion`.
 */
export async function generateResume(input: unknown, options: GenerateOptions): Promise<GenerateResult> {
  const config: RenderConfig = { ...DEFAULT_RENDER_CONFIG, ...options.config };
  const log = createRenderLogger(options.renderId ?? randomUUID());

  const validation = validateResume(input);
  if (!validation.success) {
    log.warn({ issues: validation.error.issues }, 'Resume record failed validation');
    throw validation.error;
  }
  const record = validation.data;

  const warnings = preflightCheck(record);
  if (warnings.length > 0) {
    log.warn({ warnings }, 'Preflight warnings');
  }

  const tree = assemble(record, createStyleRegistry(), {
    extraSkills: options.extraSkills,
    creator: config.documentCreator,
  });

  const documentPath = await serializeDocument(tree, resolveDestination(options, record));
  log.info({ documentPath, blocks: tree.blocks.length }, 'Resume document generated');

  if (!(options.convertToPdf ?? config.convertToPdf)) {
    return { documentPath, warnings, tree };
  }

  const converter =
    options.converter ??
    new LibreOfficeConverter({ binary: config.converterBinary, timeoutMs: config.conversionTimeoutMs });
  const conversion = await convertDocument(converter, documentPath, 'pdf');
  if (conversion.ok) {
    log.info({ pdfPath: conversion.path }, 'Resume converted to PDF');
  } else {
    log.warn({ err: conversion.error.message, documentPath }, 'PDF conversion failed; .docx is still available');
  }

  return { documentPath, warnings, tree, conversion };
}
