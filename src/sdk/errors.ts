/**
 * Tessera SDK - Error Types
 *
 * Every error raised at an SDK boundary carries a stable `code` so callers can
 * branch on it without matching message text.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIG_ERROR'
  | 'INTERRUPTED'
  | 'TIMEOUT'
  | 'TOOL_NOT_FOUND'
  | 'INVALID_TOOL_INPUT'
  | 'EXECUTION_ERROR'
  | 'MODEL_ERROR';

/**
 * TesseraError - Base class for SDK errors.
 */
export class TesseraError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when a value supplied at a boundary is outside its allowed set
 * (role, long-term memory mode, tool choice, hook type).
 */
export class ValidationError extends TesseraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VALIDATION_ERROR', message, options);
  }
}

/**
 * Raised by the config loader with every failing field listed.
 */
export class ConfigError extends TesseraError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.issues = issues;
  }
}

/**
 * Raised inside a reply task once its abort signal fires.
 */
export class InterruptedError extends TesseraError {
  constructor(message = 'Operation interrupted') {
    super('INTERRUPTED', message);
  }
}

export class TimeoutError extends TesseraError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised by a model backend on transport or provider failure.
 */
export class ModelError extends TesseraError {
  /** HTTP status, when the provider answered */
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('MODEL_ERROR', message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
