// ==========================================
// ERROR TAXONOMY
// ==========================================

export type ErrorContext = Record<string, unknown>;

export class MapEngineError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MapEngineError';
    this.context = context;
  }
}

export type InputIssue = {
  /** 1-based row (line number for JSONL input) */
  row: number;
  id?: string;
  reason: string;
};

export class InputValidationError extends MapEngineError {
  readonly issues: InputIssue[];

  constructor(issues: InputIssue[], context: ErrorContext = {}) {
    const preview = issues
      .slice(0, 10)
      .map((issue) => `row ${issue.row}${issue.id ? ` (${issue.id})` : ''}: ${issue.reason}`)
      .join('; ');
    const more = issues.length > 10 ? ` (+${issues.length - 10} more)` : '';
    super(`Invalid input: ${preview}${more}`, { ...context, issueCount: issues.length });
    this.name = 'InputValidationError';
    this.issues = issues;
  }
}

export class ConfigurationError extends MapEngineError {
  readonly issues: string[];

  constructor(issues: string[], context: ErrorContext = {}) {
    super(`Invalid configuration: ${issues.join('; ')}`, context);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class SerializationError extends MapEngineError {
  readonly path: string;
  readonly attempts: number;

  constructor(path: string, attempts: number, cause: unknown, context: ErrorContext = {}) {
    super(`Failed to write ${path} after ${attempts} attempt(s)`, { ...context, path, attempts }, { cause });
    this.name = 'SerializationError';
    this.path = path;
    this.attempts = attempts;
  }
}

export type DegenerateKind = 'empty' | 'single-point' | 'zero-extent-axis';

/**
 * Not thrown: degenerate inputs still produce a valid (empty or trivial) map.
 */
export class DegenerateInputWarning {
  readonly name = 'DegenerateInputWarning';
  readonly kind: DegenerateKind;
  readonly message: string;
  readonly context: ErrorContext;

  constructor(kind: DegenerateKind, message: string, context: ErrorContext = {}) {
    this.kind = kind;
    this.message = message;
    this.context = context;
  }
}

// ==========================================
// FORMATTING
// ==========================================

const DEBUG_ERRORS =
  process.env.DEBUG_ERRORS === '1' ||
  process.env.DEBUG_ERRORS === 'true' ||
  process.env.DEBUG_ERRORS === 'yes';

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function readErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [];
    parts.push(`${error.name || 'Error'}: ${error.message || String(error)}`);
    const code = readErrorCode(error);
    if (code) parts.push(`code=${code}`);
    if (error instanceof MapEngineError && Object.keys(error.context).length > 0) {
      parts.push(`context=${safeStringify(error.context)}`);
    }
    if (error.cause !== undefined) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

export function logErrorDetails(prefix: string, error: unknown): void {
  console.warn(prefix + formatError(error));
  if (DEBUG_ERRORS && error instanceof Error && error.stack) {
    console.warn(error.stack);
  }
}
