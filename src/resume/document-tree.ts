/**
 * In-memory document model produced by the assembler.
 *
 * Blocks are plain typed records; nothing here knows about the `docx` package.
 * The serializer alone lowers a tree into the word-processing format.
 */

import { freezeDeep, type StyleName, type StyleRegistry } from './styles.js';

export type Alignment = 'left' | 'center' | 'right' | 'justify';

export interface TextRunNode {
  kind: 'text';
  text: string;
  bold?: boolean;
}

/** Advances to the paragraph's next tab stop. */
export interface TabRunNode {
  kind: 'tab';
}

export type InlineNode = TextRunNode | TabRunNode;

export interface TabStop {
  alignment: 'right';
  /** Inches from the left margin. */
  position: number;
}

export interface ParagraphBlock {
  kind: 'paragraph';
  style: StyleName;
  alignment: Alignment;
  runs: InlineNode[];
  /** Full-width rule drawn as a paragraph border, so it survives conversion. */
  bottomBorder: boolean;
  /** Rendered as a list item with the bullet style's hanging indent. */
  bullet: boolean;
  tabStops: TabStop[];
}

export interface SpacerBlock {
  kind: 'spacer';
  variant: 'standard' | 'compact';
}

export type Block = ParagraphBlock | SpacerBlock;

export interface DocumentMetadata {
  title: string;
  creator: string;
  description: string;
}

export interface DocumentTree {
  readonly blocks: readonly Readonly<Block>[];
  readonly registry: StyleRegistry;
  readonly metadata: Readonly<DocumentMetadata>;
}

export interface ParagraphInit {
  alignment?: Alignment;
  bottomBorder?: boolean;
  bullet?: boolean;
  tabStops?: TabStop[];
}

export function text(value: string, bold?: boolean): TextRunNode {
  return bold ? { kind: 'text', text: value, bold: true } : { kind: 'text', text: value };
}

export const TAB: TabRunNode = Object.freeze({ kind: 'tab' });

/**
 * Append-only builder owned by one render pass. Once `finish` is called the
 * builder refuses further writes and the returned tree is deeply frozen.
 */
export class DocumentBuilder {
  private readonly blocks: Block[] = [];
  private finished = false;

  constructor(readonly registry: StyleRegistry) {}

  paragraph(style: StyleName, runs: InlineNode[], init: ParagraphInit = {}): this {
    return this.append({
      kind: 'paragraph',
      style,
      alignment: init.alignment ?? 'left',
      runs: runs.map((run) => ({ ...run })),
      bottomBorder: init.bottomBorder ?? false,
      bullet: init.bullet ?? false,
      tabStops: (init.tabStops ?? []).map((stop) => ({ ...stop })),
    });
  }

  spacer(variant: SpacerBlock['variant'] = 'standard'): this {
    return this.append({ kind: 'spacer', variant });
  }

  finish(metadata: DocumentMetadata): DocumentTree {
    this.finished = true;
    return freezeDeep({
      blocks: this.blocks,
      registry: this.registry,
      metadata: { ...metadata },
    });
  }

  private append(block: Block): this {
    if (this.finished) {
      throw new Error('Document tree is already finished');
    }
    this.blocks.push(block);
    return this;
  }
}

/** Concatenated text of a paragraph, with tabs as `\t`. */
export function paragraphText(block: ParagraphBlock): string {
  return block.runs.map((run) => (run.kind === 'tab' ? '\t' : run.text)).join('');
}
