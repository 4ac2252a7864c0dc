/**
 * Error taxonomy
 *
 * Missing datasets are never errors (see availability/). What remains:
 * - InvalidInputError: the caller asked for something malformed -> client error
 * - StoreError and subclasses: a backing store failed -> server error
 */

// =============================================================================
// ERROR TYPES
// =============================================================================

export class InvalidInputError extends Error {
  readonly kind = 'invalid_input' as const;

  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export type StoreKind = 'tabular' | 'graph';

export class StoreError extends Error {
  readonly kind = 'failure' as const;

  constructor(message: string, public readonly store: StoreKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

/** The SQLite store rejected a statement or could not be loaded/saved. */
export class TabularStoreError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'tabular', options);
    this.name = 'TabularStoreError';
  }
}

/** The graph store could not be reached or rejected a query. */
export class GraphUnavailableError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'graph', options);
    this.name = 'GraphUnavailableError';
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isInvalidInput(err: unknown): err is InvalidInputError {
  return err instanceof InvalidInputError;
}

export function isStoreError(err: unknown): err is StoreError {
  return err instanceof StoreError;
}
