/**
 * Standardized error types for note-recall.
 *
 * All errors extend from RecallError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * Only `RetrievalError` ever reaches the caller of `retrieve()`. Backend and
 * LLM errors are absorbed by the pipeline and surface in diagnostics.
 *
 * ## Usage
 *
 * ```typescript
 * import { BackendError, RetrievalError } from './errors.js';
 *
 * throw new BackendError('FTS index unreachable', 'BACKEND_UNAVAILABLE', err);
 *
 * if (isRetrievalError(err) && err.code === 'ALL_BACKENDS_FAILED') {
 *   // report a retrieval failure, not "no results"
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all note-recall errors.
 *
 * Provides:
 * - `code`: Programmatic error identifier (e.g., 'ALL_BACKENDS_FAILED')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'BackendError')
 */
export class RecallError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    // Capture stack trace (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof RecallError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the storage layer (SQLite, FTS index, vector table).
 *
 * Common codes:
 * - `DB_OPEN_FAILED`: Cannot open the index database
 * - `INDEX_MISSING`: The database has no index tables
 * - `FTS_QUERY_FAILED`: FTS5 query failed (missing table, bad syntax)
 * - `VECTOR_LOAD_FAILED`: Could not load the vector table
 */
export class StorageError extends RecallError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Backend Errors
// ─────────────────────────────────────────────────────────────────────────────

/** Codes a retrieval backend can fail with. */
export type BackendErrorCode = 'BACKEND_UNAVAILABLE' | 'BACKEND_TIMEOUT';

/**
 * A keyword or vector backend could not answer.
 *
 * Absorbed by the orchestrator: the backend contributes an empty list and the
 * failure is recorded in diagnostics.
 */
export class BackendError extends RecallError {
  declare readonly code: BackendErrorCode;

  constructor(message: string, code: BackendErrorCode, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// LLM Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from text-generation and embedding collaborators.
 *
 * Common codes:
 * - `LLM_UNAVAILABLE`: Provider unreachable or returned an HTTP error
 * - `LLM_TIMEOUT`: Call exceeded its timeout
 * - `LLM_BAD_RESPONSE`: Provider answered with an unexpected payload
 * - `EXPANSION_FAILED`: Query expansion could not produce variants
 * - `RERANK_JUDGMENT_FAILED`: A single relevance judgment failed
 */
export class LlmError extends RecallError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/** Codes surfaced to the caller of `retrieve()`. */
export type RetrievalErrorCode = 'INVALID_QUERY' | 'ALL_BACKENDS_FAILED' | 'CANCELLED';

/**
 * Errors surfaced by the retrieval pipeline.
 *
 * - `INVALID_QUERY`: Rejected before any backend call
 * - `ALL_BACKENDS_FAILED`: Every backend call of the request failed
 * - `CANCELLED`: The caller aborted the request
 */
export class RetrievalError extends RecallError {
  declare readonly code: RetrievalErrorCode;

  constructor(message: string, code: RetrievalErrorCode, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `INVALID_VALUE`: A single value is out of range
 */
export class ConfigError extends RecallError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a note-recall error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof RecallError && error.code === code;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
