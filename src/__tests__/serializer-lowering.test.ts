/**
 * Unit tests for the docx lowering in serializer.ts
 *
 * The `docx` library is mocked so the options handed to Paragraph, TextRun
 * and Document can be inspected directly. Tests verify:
 *   - heading paragraphs carry a bottom border, subheadings do not
 *   - dated subheadings get one right tab stop at 8640 twips (6 in)
 *   - bullets get numbering plus the registry's hanging indent
 *   - the style table and page setup come from the registry
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { createdParagraphs, createdTextRuns, createdDocuments } = vi.hoisted(() => {
  interface CapturedPara {
    style?: string;
    alignment?: string;
    children?: unknown[];
    border?: unknown;
    tabStops?: unknown;
    bullet?: { level: number };
    indent?: unknown;
    spacing?: unknown;
    [key: string]: unknown;
  }
  interface CapturedRun {
    text?: string;
    bold?: boolean;
    children?: unknown[];
    [key: string]: unknown;
  }

  const createdParagraphs: CapturedPara[] = [];
  const createdTextRuns: CapturedRun[] = [];
  const createdDocuments: Record<string, unknown>[] = [];
  return { createdParagraphs, createdTextRuns, createdDocuments };
});

vi.mock('docx', () => {
  function Paragraph(opts: Record<string, unknown>) {
    createdParagraphs.push({ ...opts });
    return opts;
  }
  function TextRun(opts: Record<string, unknown>) {
    createdTextRuns.push({ ...opts });
    return opts;
  }
  function Tab() {
    return { tab: true };
  }
  function Document(opts: Record<string, unknown>) {
    createdDocuments.push(opts);
    return opts;
  }
  const Packer = {
    toBuffer: vi.fn(async () => Buffer.from('docx')),
  };

  return {
    AlignmentType: { LEFT: 'LEFT', CENTER: 'CENTER', RIGHT: 'RIGHT', JUSTIFIED: 'JUSTIFIED' },
    BorderStyle: { SINGLE: 'SINGLE' },
    TabStopType: { RIGHT: 'RIGHT' },
    Document,
    Packer,
    Paragraph,
    Tab,
    TextRun,
  };
});

import { assemble } from '../resume/assembler.js';
import { validateResume } from '../resume/schema.js';
import { toDocxDocument } from '../resume/serializer.js';
import { createStyleRegistry } from '../resume/styles.js';
import { scenarioInput } from './fixtures.js';

beforeEach(() => {
  createdParagraphs.length = 0;
  createdTextRuns.length = 0;
  createdDocuments.length = 0;
});

function lowerScenario(extraSkills?: string[]) {
  const result = validateResume(scenarioInput());
  if (!result.success) throw result.error;
  toDocxDocument(assemble(result.data, createStyleRegistry(), { extraSkills }));
}

describe('toDocxDocument', () => {
  it('creates one paragraph per block', () => {
    lowerScenario();
    expect(createdParagraphs).toHaveLength(10);
  });

  it('draws a single rule under section headings only', () => {
    lowerScenario();
    const bordered = createdParagraphs.filter((p) => p.border !== undefined);
    expect(bordered).toHaveLength(2);
    for (const p of bordered) {
      expect(p.style).toBe('ResumeHeading');
      expect(p.border).toEqual({ bottom: { style: 'SINGLE', size: 6, space: 1, color: 'auto' } });
    }
    // The name line shares the heading style but has no rule.
    expect(createdParagraphs[0]).toMatchObject({ style: 'ResumeHeading', alignment: 'CENTER' });
    expect(createdParagraphs[0].border).toBeUndefined();
  });

  it('right-aligns dates with a tab stop at six inches', () => {
    lowerScenario();
    const subheading = createdParagraphs.find((p) => p.style === 'ResumeSubheading');
    expect(subheading?.tabStops).toEqual([{ type: 'RIGHT', position: 8640 }]);
    expect(subheading?.children).toEqual([{ text: 'X, Y' }, { children: [{ tab: true }] }, { text: 'Jan 2020 - Present' }]);
  });

  it('lowers bullets with numbering and a hanging indent', () => {
    lowerScenario(['GraphQL']);
    const bullets = createdParagraphs.filter((p) => p.style === 'ResumeBullet');
    expect(bullets).toHaveLength(2);
    for (const p of bullets) {
      expect(p.bullet).toEqual({ level: 0 });
      expect(p.indent).toEqual({ left: 432, hanging: 216 });
      expect(p.alignment).toBe('JUSTIFIED');
    }
  });

  it('marks bold runs and leaves plain runs unbolded', () => {
    lowerScenario();
    expect(createdTextRuns).toContainEqual({ text: 'Eng', bold: true });
    expect(createdTextRuns).toContainEqual({ text: 'Did thing' });
  });

  it('gives compact spacers reduced spacing', () => {
    lowerScenario();
    const last = createdParagraphs[createdParagraphs.length - 1];
    expect(last).toEqual({
      style: 'ResumeBody',
      spacing: { before: 0, after: 40, line: 120 },
      children: [],
    });
  });

  it('builds the style table and page setup from the registry', () => {
    lowerScenario();
    expect(createdDocuments).toHaveLength(1);
    const doc = createdDocuments[0];
    expect(doc).toMatchObject({
      title: 'A B Resume',
      creator: 'Resume Renderer',
      description: 'Resume for A B',
      styles: {
        paragraphStyles: [
          { id: 'ResumeHeading', run: { font: 'Calibri', size: 24, bold: true } },
          { id: 'ResumeSubheading', run: { font: 'Calibri', size: 20, bold: true } },
          { id: 'ResumeBody', run: { font: 'Calibri', size: 20, bold: false } },
          {
            id: 'ResumeBullet',
            run: { font: 'Calibri', size: 19, bold: false },
            paragraph: { indent: { left: 432, hanging: 216 } },
          },
        ],
      },
      sections: [
        {
          properties: {
            page: {
              size: { width: 12240, height: 15840 },
              margin: { top: 1080, right: 1440, bottom: 1080, left: 1440 },
            },
          },
        },
      ],
    });
  });
});
