import { DEFAULT_RENDER_CONFIG } from '../lib/config.js';
import { DocumentBuilder, type DocumentMetadata, type DocumentTree } from './document-tree.js';
import type { ResumeRecord } from './schema.js';
import {
  renderCertifications,
  renderEducation,
  renderExperience,
  renderExtracurriculars,
  renderIdentity,
  renderProjects,
  renderSkills,
  type RenderContext,
  type RenderOptions,
} from './sections.js';
import type { StyleRegistry } from './styles.js';

export interface AssembleOptions extends RenderOptions {
  /** Written into the document's core properties. */
  creator?: string;
}

type SectionStep = (builder: DocumentBuilder, record: ResumeRecord, ctx: RenderContext) => void;

// Experience and Skills anchor the document and are always emitted; the
// remaining sections disappear entirely when empty.
const SECTION_ORDER: readonly SectionStep[] = [
  (builder, record, ctx) => {
    renderExperience(builder, record.experience, ctx);
    builder.spacer();
  },
  (builder, record, ctx) => {
    if (record.education.length === 0) return;
    renderEducation(builder, record.education, ctx);
    builder.spacer();
  },
  (builder, record, ctx) => {
    renderSkills(builder, record.skills, ctx);
    builder.spacer('compact');
  },
  (builder, record, ctx) => {
    if (record.certifications.length === 0) return;
    renderCertifications(builder, record.certifications, ctx);
    builder.spacer('compact');
  },
  (builder, record, ctx) => {
    if (record.extracurriculars.length === 0) return;
    renderExtracurriculars(builder, record.extracurriculars, ctx);
    builder.spacer();
  },
  (builder, record, ctx) => {
    if (record.projects.length === 0) return;
    renderProjects(builder, record.projects, ctx);
    builder.spacer();
  },
];

function documentMetadata(record: ResumeRecord, creator: string): DocumentMetadata {
  const name = record.personal_info.name;
  return {
    title: name ? `${name} Resume` : 'Resume',
    creator,
    description: name ? `Resume for ${name}` : 'Resume',
  };
}

/**
 * Renders a validated record into a frozen document tree. Sections run in a
 * fixed order and entries keep their input order.
 */
export function assemble(
  record: ResumeRecord,
  styles: StyleRegistry,
  options: AssembleOptions = {},
): DocumentTree {
  const ctx: RenderContext = {
    styles,
    options: Object.freeze({ extraSkills: [...(options.extraSkills ?? [])] }),
  };
  const builder = new DocumentBuilder(styles);

  renderIdentity(builder, record.personal_info, ctx);
  builder.spacer();

  for (const step of SECTION_ORDER) {
    step(builder, record, ctx);
  }

  return builder.finish(documentMetadata(record, options.creator ?? DEFAULT_RENDER_CONFIG.documentCreator));
}
