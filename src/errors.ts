export type MappingErrorCode = 'INVALID_CONFIGURATION' | 'UNSUPPORTED_TYPE' | 'VALIDATION';

/** One field-level decode failure. `path` uses external (wire) keys and list indexes. */
export interface FieldIssue {
  path: Array<string | number>;
  message: string;
}

export class MappingError extends Error {
  code: MappingErrorCode;
  details?: unknown;

  constructor(code: MappingErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MappingError';
    this.code = code;
    this.details = details;
  }
}

/** Contradictory or unusable serializer setup. Always raised at construction. */
export class InvalidConfigurationError extends MappingError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super('INVALID_CONFIGURATION', message, details, options);
    this.name = 'InvalidConfigurationError';
  }
}

export class UnsupportedTypeError extends InvalidConfigurationError {
  readonly kind: string;

  constructor(kind: string, path: string) {
    super(`Unsupported attribute type "${kind}" for ${path}`, { kind, path });
    this.code = 'UNSUPPORTED_TYPE';
    this.name = 'UnsupportedTypeError';
    this.kind = kind;
  }
}

export class ValidationError extends MappingError {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    super('VALIDATION', formatIssues(issues), { issues });
    this.name = 'ValidationError';
    this.issues = issues;
  }

  /** Issue messages grouped by dotted path; the root is keyed `_root`. */
  flatten(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const issue of this.issues) {
      const key = formatPath(issue.path);
      (out[key] ??= []).push(issue.message);
    }
    return out;
  }
}

export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.length ? path.join('.') : '_root';
}

function formatIssues(issues: FieldIssue[]): string {
  if (!issues.length) return 'Validation failed';
  return `Validation failed: ${issues.map((i) => `${formatPath(i.path)}: ${i.message}`).join('; ')}`;
}

export function isMappingError(e: unknown): e is MappingError {
  return e instanceof MappingError;
}

export function toMappingError(e: unknown): MappingError {
  if (e instanceof MappingError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new InvalidConfigurationError(message, undefined, { cause: e });
}
