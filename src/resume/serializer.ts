import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  AlignmentType,
  BorderStyle,
  Document,
  Packer,
  Paragraph,
  Tab,
  TabStopType,
  TextRun,
  type IParagraphStyleOptions,
} from 'docx';
import { IOError, toError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import type { Alignment, Block, DocumentTree, InlineNode, ParagraphBlock } from './document-tree.js';
import type { StyleDefinition, StyleName, StyleRegistry } from './styles.js';

// ---------------------------------------------------------------------------
// Unit conversion (docx measures in twips and half-points)
// ---------------------------------------------------------------------------

const inchesToTwips = (inches: number): number => Math.round(inches * 1440);
const pointsToTwips = (points: number): number => Math.round(points * 20);
const pointsToHalfPoints = (points: number): number => Math.round(points * 2);
const lineToTwips = (multiple: number): number => Math.round(multiple * 240);

const ALIGNMENT = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  right: AlignmentType.RIGHT,
  justify: AlignmentType.JUSTIFIED,
} as const satisfies Record<Alignment, unknown>;

const STYLE_ORDER: readonly StyleName[] = ['heading', 'subheading', 'body', 'bullet'];

// ---------------------------------------------------------------------------
// Lowering
// ---------------------------------------------------------------------------

function hangingIndent(def: StyleDefinition) {
  return { left: inchesToTwips(def.leftIndent), hanging: inchesToTwips(def.hangingIndent) };
}

function paragraphStyle(def: StyleDefinition): IParagraphStyleOptions {
  return {
    id: def.id,
    name: def.displayName,
    basedOn: 'Normal',
    next: 'Normal',
    quickFormat: true,
    paragraph: {
      spacing: {
        before: pointsToTwips(def.spaceBefore),
        after: pointsToTwips(def.spaceAfter),
        line: lineToTwips(def.lineSpacing),
      },
      ...(def.leftIndent > 0 || def.hangingIndent > 0 ? { indent: hangingIndent(def) } : {}),
    },
    run: { font: def.typeface, size: pointsToHalfPoints(def.pointSize), bold: def.bold },
  };
}

function lowerRun(run: InlineNode): TextRun {
  if (run.kind === 'tab') {
    return new TextRun({ children: [new Tab()] });
  }
  return run.bold ? new TextRun({ text: run.text, bold: true }) : new TextRun({ text: run.text });
}

function lowerParagraph(block: ParagraphBlock, registry: StyleRegistry): Paragraph {
  const def = registry.styles[block.style];
  const rule = registry.headingRule;
  return new Paragraph({
    style: def.id,
    alignment: ALIGNMENT[block.alignment],
    children: block.runs.map(lowerRun),
    ...(block.bottomBorder
      ? {
          border: {
            bottom: { style: BorderStyle.SINGLE, size: rule.size, space: rule.space, color: rule.color },
          },
        }
      : {}),
    ...(block.tabStops.length > 0
      ? {
          tabStops: block.tabStops.map((stop) => ({
            type: TabStopType.RIGHT,
            position: inchesToTwips(stop.position),
          })),
        }
      : {}),
    // Direct indent overrides the bullet numbering's own indentation.
    ...(block.bullet ? { bullet: { level: 0 }, indent: hangingIndent(registry.styles.bullet) } : {}),
  });
}

function lowerBlock(block: Readonly<Block>, registry: StyleRegistry): Paragraph {
  if (block.kind === 'paragraph') return lowerParagraph(block, registry);
  if (block.variant === 'compact') {
    const spacer = registry.compactSpacer;
    return new Paragraph({
      style: registry.styles.body.id,
      spacing: { before: 0, after: pointsToTwips(spacer.spaceAfter), line: lineToTwips(spacer.lineSpacing) },
      children: [],
    });
  }
  return new Paragraph({ style: registry.styles.body.id, children: [] });
}

/**
 * Lowers a document tree into a `docx` Document. Identical trees give
 * identical document bodies.
 */
export function toDocxDocument(tree: DocumentTree): Document {
  const { registry, metadata } = tree;
  const { page } = registry;
  return new Document({
    title: metadata.title,
    creator: metadata.creator,
    description: metadata.description,
    styles: {
      paragraphStyles: STYLE_ORDER.map((name) => paragraphStyle(registry.styles[name])),
    },
    sections: [
      {
        properties: {
          page: {
            size: { width: inchesToTwips(page.width), height: inchesToTwips(page.height) },
            margin: {
              top: inchesToTwips(page.margins.top),
              right: inchesToTwips(page.margins.right),
              bottom: inchesToTwips(page.margins.bottom),
              left: inchesToTwips(page.margins.left),
            },
          },
        },
        children: tree.blocks.map((block) => lowerBlock(block, registry)),
      },
    ],
  });
}

export async function renderToBuffer(tree: DocumentTree): Promise<Buffer> {
  return Packer.toBuffer(toDocxDocument(tree));
}

// ---------------------------------------------------------------------------
// Atomic write
// ---------------------------------------------------------------------------

/**
 * Writes the tree as a .docx file. The bytes go to a temporary sibling first
 * and are renamed into place, so the destination is either complete or absent.
 */
export async function serializeDocument(tree: DocumentTree, destinationPath: string): Promise<string> {
  const target = path.resolve(destinationPath);
  const buffer = await renderToBuffer(tree);
  const tempPath = `${target}.${randomUUID()}.tmp`;

  try {
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(tempPath, buffer);
    await rename(tempPath, target);
  } catch (err) {
    await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
      logger.warn({ tempPath, err: toError(cleanupErr).message }, 'Failed to remove temporary document');
    });
    throw new IOError(target, err);
  }

  logger.debug({ path: target, bytes: buffer.length }, 'Document written');
  return target;
}
