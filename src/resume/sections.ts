import { TAB, text, type DocumentBuilder, type InlineNode } from './document-tree.js';
import type {
  EducationEntry,
  ExperienceEntry,
  ExtracurricularEntry,
  PersonalInfo,
  ProjectEntry,
  Skills,
} from './schema.js';
import type { StyleRegistry } from './styles.js';

// ---------------------------------------------------------------------------
// Render context
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /** Skills surfaced by the optimiser, listed after the categories. */
  extraSkills?: readonly string[];
}

export interface RenderContext {
  readonly styles: StyleRegistry;
  readonly options: Readonly<RenderOptions>;
}

export type SectionRenderer<S> = (builder: DocumentBuilder, section: S, ctx: RenderContext) => void;

export const SECTION_TITLES = {
  experience: 'Work Experience',
  education: 'Education',
  skills: 'Skills',
  certifications: 'Certifications',
  extracurriculars: 'Extracurricular Activities',
  projects: 'Projects',
} as const;

// ---------------------------------------------------------------------------
// Shared paragraph shapes
// ---------------------------------------------------------------------------

export function sectionHeading(builder: DocumentBuilder, title: string): void {
  builder.paragraph('heading', [text(title)], { bottomBorder: true });
}

/** Left text with the dates pushed to the registry's right-aligned tab stop. */
function datedSubheading(builder: DocumentBuilder, left: string, dates: string, ctx: RenderContext): void {
  builder.paragraph('subheading', [text(left), TAB, text(dates)], {
    tabStops: [{ alignment: 'right', position: ctx.styles.dateTabStop }],
  });
}

function bullet(builder: DocumentBuilder, value: string): void {
  builder.paragraph('bullet', [text(value)], { alignment: 'justify', bullet: true });
}

function bullets(builder: DocumentBuilder, values: readonly string[]): void {
  for (const value of values) bullet(builder, value);
}

function labelled(builder: DocumentBuilder, label: string, value: string): void {
  const runs: InlineNode[] = [text(label, true), text(value)];
  builder.paragraph('body', runs);
}

// ---------------------------------------------------------------------------
// Section renderers
// ---------------------------------------------------------------------------

export const renderIdentity: SectionRenderer<PersonalInfo> = (builder, info) => {
  const centered = { alignment: 'center' } as const;
  if (info.name) builder.paragraph('heading', [text(info.name)], centered);

  const lines: string[] = [];
  if (info.phone) lines.push(info.phone);
  if (info.location) lines.push(info.location);
  if (info.email) lines.push(`Email: ${info.email}`);
  if (info.linkedin) lines.push(`LinkedIn: ${info.linkedin}`);
  if (info.github) lines.push(`GitHub: ${info.github}`);
  if (info.visa_status) lines.push(info.visa_status);

  for (const line of lines) {
    builder.paragraph('body', [text(line)], centered);
  }
};

export const renderExperience: SectionRenderer<readonly ExperienceEntry[]> = (builder, entries, ctx) => {
  sectionHeading(builder, SECTION_TITLES.experience);
  for (const entry of entries) {
    datedSubheading(builder, `${entry.company}, ${entry.location}`, entry.dates, ctx);
    builder.paragraph('body', [text(entry.title, true)]);
    bullets(builder, entry.bullet_points);
  }
};

export const renderEducation: SectionRenderer<readonly EducationEntry[]> = (builder, entries, ctx) => {
  sectionHeading(builder, SECTION_TITLES.education);
  for (const entry of entries) {
    datedSubheading(builder, `${entry.institution} | ${entry.degree}`, entry.dates, ctx);
    if (entry.cgpa) {
      builder.paragraph('body', [text(`CGPA: ${entry.cgpa}`)]);
    }
  }
};

export const renderSkills: SectionRenderer<Skills> = (builder, skills, ctx) => {
  sectionHeading(builder, SECTION_TITLES.skills);
  // An empty category still prints its label.
  for (const category of skills.categories) {
    labelled(builder, `${category.name}: `, category.items.join(', '));
  }

  const extra = ctx.options.extraSkills ?? [];
  if (extra.length > 0) {
    builder.paragraph('body', [text('Additional Relevant Skills:')]);
    bullets(builder, extra);
  }
};

export const renderCertifications: SectionRenderer<readonly string[]> = (builder, certifications) => {
  sectionHeading(builder, SECTION_TITLES.certifications);
  bullets(builder, certifications);
};

export const renderExtracurriculars: SectionRenderer<readonly ExtracurricularEntry[]> = (
  builder,
  entries,
  ctx,
) => {
  sectionHeading(builder, SECTION_TITLES.extracurriculars);
  for (const entry of entries) {
    datedSubheading(builder, `${entry.organization} | ${entry.position}`, entry.dates, ctx);
    bullets(builder, entry.bullet_points);
  }
};

export const renderProjects: SectionRenderer<readonly ProjectEntry[]> = (builder, projects) => {
  sectionHeading(builder, SECTION_TITLES.projects);
  for (const project of projects) {
    builder.paragraph('subheading', [text(project.name)]);
    if (project.tech_stack.length > 0) {
      builder.paragraph('body', [text(`Tech Stack: ${project.tech_stack.join(', ')}`)]);
    }
    bullets(builder, project.bullet_points);
  }
};
