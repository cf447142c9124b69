/**
 * Error types raised by the render pipeline.
 *
 * Every error carries a stable `code` and a `context` record so callers can
 * branch on the kind of failure and report which field or path was involved.
 */

export type RenderErrorCode = 'SCHEMA_INVALID' | 'IO_FAILED' | 'CONVERSION_FAILED';

export class RenderError extends Error {
  public readonly code: RenderErrorCode;
  public readonly context: Readonly<Record<string, unknown>>;

  constructor(
    code: RenderErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RenderError';
    this.code = code;
    this.context = context;
  }
}

export interface SchemaIssue {
  /** Dotted path to the offending value, `(root)` for the record itself. */
  path: string;
  message: string;
}

export class SchemaError extends RenderError {
  public readonly issues: readonly SchemaIssue[];

  constructor(issues: SchemaIssue[]) {
    super('SCHEMA_INVALID', formatIssues(issues), { issueCount: issues.length });
    this.name = 'SchemaError';
    this.issues = issues;
  }
}

export class IOError extends RenderError {
  public readonly path: string;

  constructor(path: string, cause: unknown, operation: 'read' | 'write' = 'write') {
    super('IO_FAILED', `Failed to ${operation} ${path}: ${toError(cause).message}`, { path, operation }, { cause });
    this.name = 'IOError';
    this.path = path;
  }
}

export class ConversionError extends RenderError {
  public readonly sourcePath: string;
  public readonly format: string;

  constructor(sourcePath: string, format: string, reason: string, cause?: unknown) {
    super(
      'CONVERSION_FAILED',
      `Failed to convert ${sourcePath} to ${format}: ${reason}`,
      { sourcePath, format },
      cause === undefined ? undefined : { cause },
    );
    this.name = 'ConversionError';
    this.sourcePath = sourcePath;
    this.format = format;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function formatIssues(issues: SchemaIssue[]): string {
  if (issues.length === 0) return 'Resume record is invalid';
  return `Resume record is invalid: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`;
}
