import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import JSZip from 'jszip';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IOError } from '../lib/errors.js';
import { assemble } from '../resume/assembler.js';
import type { DocumentTree } from '../resume/document-tree.js';
import { validateResume } from '../resume/schema.js';
import { renderToBuffer, serializeDocument } from '../resume/serializer.js';
import { createStyleRegistry } from '../resume/styles.js';
import { fullInput, scenarioInput } from './fixtures.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'resume-serializer-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function treeOf(input: unknown): DocumentTree {
  const result = validateResume(input);
  if (!result.success) throw result.error;
  return assemble(result.data, createStyleRegistry());
}

async function partOf(buffer: Buffer, name: string): Promise<string> {
  const zip = await JSZip.loadAsync(buffer);
  const part = zip.file(name);
  if (!part) throw new Error(`missing ${name}`);
  return part.async('string');
}

// Core properties carry creation and modification times.
const TIMESTAMPED_PART = 'docProps/core.xml';

/** Every file in the package except the timestamped one, keyed by name. */
async function stablePartsOf(buffer: Buffer): Promise<Record<string, string>> {
  const zip = await JSZip.loadAsync(buffer);
  const parts: Record<string, string> = {};
  for (const entry of Object.values(zip.files)) {
    if (entry.dir || entry.name === TIMESTAMPED_PART) continue;
    parts[entry.name] = await entry.async('string');
  }
  return parts;
}

describe('serializeDocument', () => {
  it('writes a .docx package at the destination', async () => {
    const destination = path.join(dir, 'cv.docx');
    const written = await serializeDocument(treeOf(scenarioInput()), destination);

    expect(written).toBe(destination);
    const bytes = await readFile(destination);
    expect(bytes.subarray(0, 2).toString('latin1')).toBe('PK');

    const xml = await partOf(bytes, 'word/document.xml');
    expect(xml).toContain('Did thing');
    expect(xml).toContain('Jan 2020 - Present');
    expect(xml).toContain('<w:pBdr>');
    expect(xml).toContain('<w:tab/>');
  });

  it('registers the four resume styles', async () => {
    const styles = await partOf(await renderToBuffer(treeOf(scenarioInput())), 'word/styles.xml');
    for (const id of ['ResumeHeading', 'ResumeSubheading', 'ResumeBody', 'ResumeBullet']) {
      expect(styles).toContain(`w:styleId="${id}"`);
    }
  });

  it('leaves no temporary file behind', async () => {
    await serializeDocument(treeOf(scenarioInput()), path.join(dir, 'cv.docx'));
    expect(await readdir(dir)).toEqual(['cv.docx']);
  });

  it('creates missing parent directories', async () => {
    const destination = path.join(dir, 'nested', 'deeper', 'cv.docx');
    await serializeDocument(treeOf(scenarioInput()), destination);
    expect(await readdir(path.join(dir, 'nested', 'deeper'))).toEqual(['cv.docx']);
  });

  it('raises IOError and writes nothing when the path is unusable', async () => {
    await writeFile(path.join(dir, 'blocker'), 'not a directory');
    const destination = path.join(dir, 'blocker', 'cv.docx');

    const error = await serializeDocument(treeOf(scenarioInput()), destination).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(IOError);
    expect(error).toMatchObject({ code: 'IO_FAILED', path: destination });
    expect(await readdir(dir)).toEqual(['blocker']);
  });

  it('produces identical parts for the same tree', async () => {
    const tree = treeOf(fullInput());
    const first = await stablePartsOf(await renderToBuffer(tree));
    const second = await stablePartsOf(await renderToBuffer(tree));
    expect(Object.keys(first)).toContain('word/document.xml');
    expect(Object.keys(first)).toContain('word/styles.xml');
    expect(second).toEqual(first);
  });

  it('produces identical parts for equal records', async () => {
    const first = await stablePartsOf(await renderToBuffer(treeOf(fullInput())));
    const second = await stablePartsOf(await renderToBuffer(treeOf(fullInput())));
    expect(second).toEqual(first);
  });
});
