/**
 * Domain error kinds for document parsing, catalog access and mapping persistence.
 *
 * MalformedDocument and UnparseableRow are recoverable and are normally reported
 * as document issues (or silently skipped) rather than thrown. The classes below
 * cover the cases that do cross a service boundary.
 */

import { AppError } from './AppError';

export type ErrorKind =
  | 'MalformedDocument'
  | 'UnparseableRow'
  | 'CatalogUnavailable'
  | 'InvalidMatchTarget'
  | 'PersistenceFailure';

export abstract class DomainError extends AppError {
  abstract readonly kind: ErrorKind;
}

/**
 * The document could not be read at all (corrupt file, unsupported content).
 */
export class MalformedDocumentError extends DomainError {
  readonly kind = 'MalformedDocument' as const;

  constructor(message: string) {
    super(message, 422);
  }
}

/**
 * The catalog provider failed or returned an unusable payload.
 */
export class CatalogUnavailableError extends DomainError {
  readonly kind = 'CatalogUnavailable' as const;

  constructor(message = 'Catalog is unavailable', readonly reason?: unknown) {
    super(message, 503);
  }
}

/**
 * A mapping was confirmed against a category or an excluded item.
 */
export class InvalidMatchTargetError extends DomainError {
  readonly kind = 'InvalidMatchTarget' as const;

  constructor(
    message: string,
    readonly itemId: string
  ) {
    super(message, 422);
  }
}

/**
 * Learned-mapping storage could not be read or written.
 * Services log it and carry on as if the cache missed.
 */
export class PersistenceFailureError extends DomainError {
  readonly kind = 'PersistenceFailure' as const;

  constructor(message: string, readonly reason?: unknown) {
    super(message, 500, false);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
