/**
 * @summary Error classes for every fatal condition of a varscope run.
 *
 * All errors raised by the analysis pipeline derive from VarscopeError so
 * callers can tell a data or configuration problem apart from a bug. Every
 * subclass carries a stable machine-readable code and the context needed to
 * point the operator at the offending line, token or command.
 *
 * Used by:
 * - The record and audit parsers to reject malformed input
 * - The trainer-option interpreter to reject unsupported configurations
 * - The process runner to report failing trainer/auditor invocations
 * - The CLI to print a one-line diagnostic before exiting
 */

// ---------------------------------------------------------------------------
// Base Error
// ---------------------------------------------------------------------------

/**
 * Base class for all varscope errors.
 *
 * Provides a machine-readable code and an optional cause.
 */
export abstract class VarscopeError extends Error {
  /** Machine-readable error code for programmatic handling */
  abstract readonly code: string;

  /** Original error that caused this error, if any */
  override readonly cause?: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;

    // Maintains proper stack trace for where our error was thrown (V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause?.message,
    };
  }
}

// ---------------------------------------------------------------------------
// Input Format Errors
// ---------------------------------------------------------------------------

/**
 * Error thrown when a training corpus line does not follow the
 * `<label>|<namespace>...` grammar.
 */
export class MalformedRecordError extends VarscopeError {
  readonly code = "MALFORMED_RECORD" as const;

  /** The offending line, as read */
  readonly line: string;

  /** 1-based line number in the corpus, when known */
  readonly lineNumber: number | undefined;

  constructor(reason: string, line: string, lineNumber?: number) {
    const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
    super(`Malformed record${where}: ${reason}: ${JSON.stringify(truncate(line))}`);
    this.line = line;
    this.lineNumber = lineNumber;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      line: this.line,
      lineNumber: this.lineNumber,
    };
  }
}

/**
 * Error thrown when the auditor's output breaks the two-lines-per-example
 * protocol or carries a token without four trailing colon fields.
 */
export class AuditProtocolError extends VarscopeError {
  readonly code = "AUDIT_PROTOCOL" as const;

  /** Zero-based probe example index the problem was found in */
  readonly exampleIndex: number;

  /** The offending token, when the problem is token-level */
  readonly token: string | undefined;

  constructor(reason: string, exampleIndex: number, token?: string) {
    const detail = token !== undefined ? `: ${JSON.stringify(truncate(token))}` : "";
    super(`Audit output violates protocol in example ${exampleIndex}: ${reason}${detail}`);
    this.exampleIndex = exampleIndex;
    this.token = token;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      exampleIndex: this.exampleIndex,
      token: this.token,
    };
  }
}

/**
 * Error thrown when the corpus holds no records at all.
 */
export class EmptyCorpusError extends VarscopeError {
  readonly code = "EMPTY_CORPUS" as const;

  constructor(source: string) {
    super(`Corpus has no records: ${source}`);
  }
}

// ---------------------------------------------------------------------------
// External Process Errors
// ---------------------------------------------------------------------------

/**
 * Error thrown when the trainer or auditor process fails.
 *
 * The full command line is echoed so the operator can rerun it by hand.
 */
export class TrainerProcessError extends VarscopeError {
  readonly code = "TRAINER_PROCESS" as const;

  /** The command line that failed */
  readonly command: string;

  /** Exit status, or null when the process could not be started or was killed */
  readonly exitCode: number | null;

  /** Tail of the process' stderr output */
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr = "", cause?: Error) {
    const status = exitCode === null ? "failed to run" : `exited with status ${exitCode}`;
    super(`Command ${status}: ${command}`, cause);
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      command: this.command,
      exitCode: this.exitCode,
      stderr: this.stderr,
    };
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Error thrown for a requested feature varscope does not implement
 * (unsupported multi-class reductions, unknown metric or order selectors).
 */
export class UnsupportedFeatureError extends VarscopeError {
  readonly code = "UNSUPPORTED_FEATURE" as const;

  /** The option or selector that asked for it */
  readonly feature: string;

  constructor(feature: string, message?: string) {
    super(message ?? `Feature not implemented: ${feature}`);
    this.feature = feature;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      feature: this.feature,
    };
  }
}

/**
 * Error thrown for invalid configuration values or option arguments.
 */
export class ConfigurationError extends VarscopeError {
  readonly code = "CONFIGURATION" as const;
}

/**
 * Error thrown when the feature catalog is mutated after finalize().
 */
export class CatalogSealedError extends VarscopeError {
  readonly code = "CATALOG_SEALED" as const;

  constructor(operation: string) {
    super(`Feature catalog is finalized; cannot ${operation}`);
  }
}

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

/**
 * Type guard to check if an error is a VarscopeError.
 */
export function isVarscopeError(error: unknown): error is VarscopeError {
  return error instanceof VarscopeError;
}

function truncate(text: string, max = 120): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
