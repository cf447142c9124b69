export { assemble, type AssembleOptions } from './resume/assembler.js';
export {
  LibreOfficeConverter,
  derivedOutputPath,
  type CommandRunner,
  type DocumentConverter,
  type FixedLayoutFormat,
  type LibreOfficeConverterOptions,
} from './resume/converter.js';
export {
  DocumentBuilder,
  paragraphText,
  type Alignment,
  type Block,
  type DocumentMetadata,
  type DocumentTree,
  type InlineNode,
  type ParagraphBlock,
  type SpacerBlock,
  type TabStop,
} from './resume/document-tree.js';
export { buildResumeFilename } from './resume/filename.js';
export {
  generateResume,
  preflightCheck,
  type ConversionOutcome,
  type GenerateOptions,
  type GenerateResult,
  type OutputTarget,
} from './resume/generate.js';
export { loadResumeFile, loadResumeText } from './resume/load.js';
export {
  ResumeRecordSchema,
  validateResume,
  type EducationEntry,
  type ExperienceEntry,
  type ExtracurricularEntry,
  type PersonalInfo,
  type ProjectEntry,
  type ResumeRecord,
  type ResumeValidationResult,
  type SkillCategory,
  type Skills,
} from './resume/schema.js';
export { SECTION_TITLES, type RenderOptions } from './resume/sections.js';
export { renderToBuffer, serializeDocument, toDocxDocument } from './resume/serializer.js';
export {
  createStyleRegistry,
  getStyle,
  type StyleDefinition,
  type StyleName,
  type StyleRegistry,
} from './resume/styles.js';
export { DEFAULT_RENDER_CONFIG, loadRenderConfig, type RenderConfig } from './lib/config.js';
export {
  ConversionError,
  IOError,
  RenderError,
  SchemaError,
  type RenderErrorCode,
  type SchemaIssue,
} from './lib/errors.js';
