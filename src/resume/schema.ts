/**
 * Canonical résumé record schema.
 *
 * Permissive on omission, strict on type: an absent or null key takes its
 * empty default, while a value of the wrong type fails validation. Text is
 * kept exactly as supplied.
 */

import { z } from 'zod';
import type { SchemaError } from '../lib/errors.js';
import { validateWith } from '../lib/validate.js';

/** Replaces an absent or null value with `fallback` before `schema` runs. */
function orDefault<T extends z.ZodTypeAny>(schema: T, fallback: () => unknown) {
  return z.preprocess((value) => (value === undefined || value === null ? fallback() : value), schema);
}

const text = () => orDefault(z.string(), () => '');

const optionalText = () =>
  z.preprocess((value) => (value === null ? undefined : value), z.string().optional());

// YAML reads `dates: 2021`, `cgpa: 8.7` or `phone: 5550100` as numbers.
const numericText = z.union([z.string(), z.number()]).transform((value) => String(value));

const textList = () => orDefault(z.array(z.string()), () => []);

// ─── Sections ──────────────────────────────────────────────────────────

export const PersonalInfoSchema = z.object({
  name: text(),
  phone: orDefault(numericText, () => ''),
  email: text(),
  location: text(),
  linkedin: optionalText(),
  github: optionalText(),
  visa_status: optionalText(),
});

export const ExperienceEntrySchema = z.object({
  company: text(),
  location: text(),
  dates: orDefault(numericText, () => ''),
  title: text(),
  bullet_points: textList(),
});

export const EducationEntrySchema = z.object({
  institution: text(),
  degree: text(),
  cgpa: z.preprocess((value) => (value === null ? undefined : value), numericText.optional()),
  dates: orDefault(numericText, () => ''),
});

export const SkillCategorySchema = z.object({
  name: z.string(),
  items: z.array(z.string()),
});

export const SkillsSchema = z.preprocess(
  (value) => {
    if (value === undefined || value === null) return { categories: [] };
    // A bare list of categories is accepted as shorthand.
    if (Array.isArray(value)) return { categories: value };
    return value;
  },
  z
    .object({
      categories: orDefault(z.array(SkillCategorySchema), () => []),
    })
    .strict(),
);

export const ExtracurricularEntrySchema = z.object({
  organization: text(),
  position: text(),
  dates: orDefault(numericText, () => ''),
  bullet_points: textList(),
});

export const ProjectEntrySchema = z.object({
  name: text(),
  tech_stack: textList(),
  bullet_points: textList(),
});

// ─── Record ────────────────────────────────────────────────────────────

export const ResumeRecordSchema = z.object({
  personal_info: orDefault(PersonalInfoSchema, () => ({})),
  experience: orDefault(z.array(ExperienceEntrySchema), () => []),
  education: orDefault(z.array(EducationEntrySchema), () => []),
  skills: SkillsSchema,
  certifications: textList(),
  extracurriculars: orDefault(z.array(ExtracurricularEntrySchema), () => []),
  projects: orDefault(z.array(ProjectEntrySchema), () => []),
});

export type PersonalInfo = z.infer<typeof PersonalInfoSchema>;
export type ExperienceEntry = z.infer<typeof ExperienceEntrySchema>;
export type EducationEntry = z.infer<typeof EducationEntrySchema>;
export type SkillCategory = z.infer<typeof SkillCategorySchema>;
export type Skills = z.infer<typeof SkillsSchema>;
export type ExtracurricularEntry = z.infer<typeof ExtracurricularEntrySchema>;
export type ProjectEntry = z.infer<typeof ProjectEntrySchema>;
export type ResumeRecord = z.infer<typeof ResumeRecordSchema>;

export type ResumeValidationResult =
  | { success: true; data: ResumeRecord }
  | { success: false; error: SchemaError };

/**
 * Validates an externally supplied value. All-or-nothing: either a fully typed
 * record or a SchemaError naming every offending path.
 */
export function validateResume(input: unknown): ResumeValidationResult {
  return validateWith(ResumeRecordSchema, input);
}
