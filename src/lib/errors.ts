export type ValidationErrorKind =
  | 'UnknownProcessor'
  | 'MalformedMapping'
  | 'EntityNotInMetadata'
  | 'SourceUnreachable'
  | 'MalformedXML'
  | 'EmptySource'
  | 'MalformedKwargs';

/**
 * A failed check on an SP or metadata source. Returned as a value by the
 * validation engine after the entry's state has been persisted.
 */
export class ValidationError extends Error {
  constructor(
    public readonly kind: ValidationErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Raised by a repository when a persistent id insert hits a unique index. */
export class AllocationConflictError extends Error {
  constructor(message = 'persistent_id_conflict') {
    super(message);
    this.name = 'AllocationConflictError';
  }
}

export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageError';
  }
}

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

export class ForbiddenError extends HttpError {
  constructor(message: string) {
    super(403, message);
    this.name = 'ForbiddenError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
