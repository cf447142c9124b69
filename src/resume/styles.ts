// ---------------------------------------------------------------------------
// Style registry: the fixed catalogue of named paragraph styles
// ---------------------------------------------------------------------------

export type StyleName = 'heading' | 'subheading' | 'body' | 'bullet';

export interface StyleDefinition {
  /** Style id written into the document's style table. */
  readonly id: string;
  readonly displayName: string;
  readonly typeface: string;
  readonly pointSize: number;
  readonly bold: boolean;
  /** Points. */
  readonly spaceBefore: number;
  /** Points. */
  readonly spaceAfter: number;
  /** Multiple of single line spacing. */
  readonly lineSpacing: number;
  /** Inches. */
  readonly leftIndent: number;
  /** Inches the first line hangs to the left of `leftIndent`. */
  readonly hangingIndent: number;
}

export interface PageLayout {
  /** Inches. */
  readonly width: number;
  readonly height: number;
  readonly margins: {
    readonly top: number;
    readonly bottom: number;
    readonly left: number;
    readonly right: number;
  };
}

export interface RuleLine {
  /** Eighths of a point. */
  readonly size: number;
  /** Points between the text and the line. */
  readonly space: number;
  readonly color: string;
}

export interface SpacerDefinition {
  readonly spaceAfter: number;
  readonly lineSpacing: number;
}

export interface StyleRegistry {
  readonly styles: Readonly<Record<StyleName, StyleDefinition>>;
  /** Right-aligned tab stop for date columns, inches from the left margin. */
  readonly dateTabStop: number;
  readonly headingRule: RuleLine;
  readonly page: PageLayout;
  readonly compactSpacer: SpacerDefinition;
}

const TYPEFACE = 'Calibri';

const STYLES: Record<StyleName, StyleDefinition> = {
  heading: {
    id: 'ResumeHeading',
    displayName: 'Resume Heading',
    typeface: TYPEFACE,
    pointSize: 12,
    bold: true,
    spaceBefore: 0,
    spaceAfter: 0,
    lineSpacing: 1,
    leftIndent: 0,
    hangingIndent: 0,
  },
  subheading: {
    id: 'ResumeSubheading',
    displayName: 'Resume Subheading',
    typeface: TYPEFACE,
    pointSize: 10,
    bold: true,
    spaceBefore: 0,
    spaceAfter: 0,
    lineSpacing: 1,
    leftIndent: 0,
    hangingIndent: 0,
  },
  body: {
    id: 'ResumeBody',
    displayName: 'Resume Body',
    typeface: TYPEFACE,
    pointSize: 10,
    bold: false,
    spaceBefore: 0,
    spaceAfter: 0,
    lineSpacing: 1,
    leftIndent: 0,
    hangingIndent: 0,
  },
  bullet: {
    id: 'ResumeBullet',
    displayName: 'Resume Bullet',
    typeface: TYPEFACE,
    pointSize: 9.5,
    bold: false,
    spaceBefore: 0,
    spaceAfter: 0,
    lineSpacing: 1,
    leftIndent: 0.3,
    hangingIndent: 0.15,
  },
};

export function freezeDeep<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      freezeDeep(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Builds the registry. Every call returns an equal, deeply frozen value, so
 * two render passes can never disagree on formatting.
 */
export function createStyleRegistry(): StyleRegistry {
  return freezeDeep({
    styles: {
      heading: { ...STYLES.heading },
      subheading: { ...STYLES.subheading },
      body: { ...STYLES.body },
      bullet: { ...STYLES.bullet },
    },
    dateTabStop: 6,
    headingRule: { size: 6, space: 1, color: 'auto' },
    // US Letter
    page: {
      width: 8.5,
      height: 11,
      margins: { top: 0.75, bottom: 0.75, left: 1, right: 1 },
    },
    compactSpacer: { spaceAfter: 2, lineSpacing: 0.5 },
  });
}

export function getStyle(registry: StyleRegistry, name: StyleName): StyleDefinition {
  return registry.styles[name];
}
