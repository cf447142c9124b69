// Control, zero-width and bidi marks are dropped before the name is split.
const INVISIBLE_RE = /[\u0000-\u001f\u007f\u200b-\u200f\u202a-\u202e\u2066-\u2069\ufeff]/g;

const MAX_STEM_CHARS = 80;

/** `"Zoë O'Brien"` → `Zoë_O_Brien`: letters and digits of each word, underscore-joined. */
function nameStem(name: string): string {
  const stem = name
    .normalize('NFKC')
    .replace(INVISIBLE_RE, '')
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean)
    .join('_');
  return stem.slice(0, MAX_STEM_CHARS).replace(/_+$/, '');
}

/**
 * Basename of the written document, e.g. `Jane_Doe_Resume.docx`, or
 * `Resume.docx` when the name has no usable characters. A converted copy
 * takes the same stem through `derivedOutputPath`.
 */
export function buildResumeFilename(name: string): string {
  const stem = nameStem(name);
  return stem ? `${stem}_Resume.docx` : 'Resume.docx';
}
