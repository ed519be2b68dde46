/**
 * Query construction and validation.
 */

import { RETRIEVAL_MODES, type Query, type QueryFilters, type RetrievalMode } from './types.js';
import { RetrievalError } from '../utils/errors.js';

/** Results returned when the caller does not set a limit. */
export const DEFAULT_LIMIT = 10;

/** Mode used when the caller does not set one. */
export const DEFAULT_MODE: RetrievalMode = 'hybrid';

/**
 * Unvalidated query input, as received from a caller.
 */
export interface QueryInput {
  text: string;
  filters?: QueryFilters;
  limit?: number;
  /** Checked against the supported modes */
  mode?: string;
}

export function isRetrievalMode(value: string): value is RetrievalMode {
  return RETRIEVAL_MODES.some((mode) => mode === value);
}

/**
 * List everything wrong with a query input. Empty when valid.
 *
 * Filters are not checked; the backends receive them as given.
 */
export function validateQuery(input: QueryInput): string[] {
  const errors: string[] = [];

  if (typeof input.text !== 'string' || !input.text.trim()) {
    errors.push('text must not be empty');
  }

  if (input.limit !== undefined && (!Number.isInteger(input.limit) || input.limit <= 0)) {
    errors.push('limit must be a positive integer');
  }

  if (input.mode !== undefined && !isRetrievalMode(input.mode)) {
    errors.push(`unsupported mode "${input.mode}" (expected ${RETRIEVAL_MODES.join(', ')})`);
  }

  return errors;
}

/**
 * Build an immutable Query.
 *
 * Text is trimmed; limit defaults to 10 and mode to `hybrid`.
 *
 * @throws RetrievalError with code INVALID_QUERY
 */
export function createQuery(input: QueryInput): Query {
  const errors = validateQuery(input);
  if (errors.length > 0) {
    throw new RetrievalError(`Invalid query: ${errors.join('; ')}`, 'INVALID_QUERY');
  }

  const mode = input.mode !== undefined && isRetrievalMode(input.mode) ? input.mode : DEFAULT_MODE;

  return Object.freeze({
    text: input.text.trim(),
    filters: Object.freeze({ ...input.filters }),
    limit: input.limit ?? DEFAULT_LIMIT,
    mode,
  });
}
