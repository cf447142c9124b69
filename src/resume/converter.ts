import { execFile } from 'node:child_process';
import { access, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { promisify } from 'node:util';
import { DEFAULT_RENDER_CONFIG } from '../lib/config.js';
import { ConversionError, toError } from '../lib/errors.js';

export type FixedLayoutFormat = 'pdf';

/**
 * Turns a written .docx into a fixed-layout file next to it. Resolves with the
 * new file's path; rejects with ConversionError.
 */
export interface DocumentConverter {
  convert(sourcePath: string, format: FixedLayoutFormat): Promise<string>;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: { timeout: number },
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

const runCommand: CommandRunner = (file, args, options) =>
  execFileAsync(file, args, { timeout: options.timeout, encoding: 'utf8' });

/** `/out/cv.docx` → `/out/cv.pdf` */
export function derivedOutputPath(sourcePath: string, format: FixedLayoutFormat): string {
  const parsed = path.parse(sourcePath);
  return path.join(parsed.dir, `${parsed.name}.${format}`);
}

function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'killed' in err && err.killed === true;
}

export interface LibreOfficeConverterOptions {
  binary?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

/**
 * Converts through a headless LibreOffice process. The process is killed when
 * it outlives the timeout. Each call runs against its own throwaway user
 * profile; concurrent runs sharing one profile block or fail each other.
 */
export class LibreOfficeConverter implements DocumentConverter {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: LibreOfficeConverterOptions = {}) {
    this.binary = options.binary ?? DEFAULT_RENDER_CONFIG.converterBinary;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RENDER_CONFIG.conversionTimeoutMs;
    this.run = options.run ?? runCommand;
  }

  async convert(sourcePath: string, format: FixedLayoutFormat): Promise<string> {
    const profileDir = await mkdtemp(path.join(tmpdir(), 'resume-lo-profile-')).catch((err: unknown) => {
      const reason = `could not create a profile directory: ${toError(err).message}`;
      throw new ConversionError(sourcePath, format, reason, err);
    });
    try {
      return await this.convertWithProfile(sourcePath, format, profileDir);
    } finally {
      await rm(profileDir, { recursive: true, force: true });
    }
  }

  private async convertWithProfile(
    sourcePath: string,
    format: FixedLayoutFormat,
    profileDir: string,
  ): Promise<string> {
    const outputPath = derivedOutputPath(sourcePath, format);
    const args = [
      `-env:UserInstallation=${pathToFileURL(profileDir).href}`,
      '--headless',
      '--convert-to',
      format,
      '--outdir',
      path.dirname(sourcePath),
      sourcePath,
    ];

    try {
      await this.run(this.binary, args, { timeout: this.timeoutMs });
    } catch (err) {
      if (isTimeout(err)) {
        throw new ConversionError(sourcePath, format, `timed out after ${this.timeoutMs}ms`, err);
      }
      throw new ConversionError(sourcePath, format, toError(err).message, err);
    }

    try {
      await access(outputPath);
    } catch (err) {
      throw new ConversionError(sourcePath, format, `converter produced no file at ${outputPath}`, err);
    }
    return outputPath;
  }
}
