export interface RenderConfig {
  /** Executable used for fixed-layout conversion. */
  converterBinary: string;
  conversionTimeoutMs: number;
  /** Written into the document's core properties. */
  documentCreator: string;
  convertToPdf: boolean;
}

export const DEFAULT_RENDER_CONFIG: Readonly<RenderConfig> = Object.freeze({
  converterBinary: 'soffice',
  conversionTimeoutMs: 60_000,
  documentCreator: 'Resume Renderer',
  convertToPdf: false,
});

type Env = Record<string, string | undefined>;

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  return raw === '1' || raw.toLowerCase() === 'true';
}

function nonEmpty(raw: string | undefined, fallback: string): string {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
}

/**
 * Builds a render configuration from environment variables.
 *
 * The render core never reads the environment itself; the surrounding service
 * calls this once and passes the result down.
 */
export function loadRenderConfig(env: Env = process.env): Readonly<RenderConfig> {
  return Object.freeze({
    converterBinary: nonEmpty(env.RESUME_CONVERTER_BIN, DEFAULT_RENDER_CONFIG.converterBinary),
    conversionTimeoutMs: parsePositiveInt(
      env.RESUME_CONVERSION_TIMEOUT_MS,
      DEFAULT_RENDER_CONFIG.conversionTimeoutMs,
    ),
    documentCreator: nonEmpty(env.RESUME_DOCUMENT_CREATOR, DEFAULT_RENDER_CONFIG.documentCreator),
    convertToPdf: parseBool(env.RESUME_CONVERT_PDF, DEFAULT_RENDER_CONFIG.convertToPdf),
  });
}
