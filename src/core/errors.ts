/**
 * Journal error taxonomy
 *
 * Every failure the store reports to callers is a JournalError subclass with
 * a stable `code`. Anything else reaching the CLI is unexpected and aborts
 * the run.
 */

export type JournalErrorCode =
  | 'DUPLICATE_KEY'
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'NOT_AUTHENTICATED';

export class JournalError extends Error {
  readonly code: JournalErrorCode;

  constructor(code: JournalErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Unique constraint violation (handle or address already taken) */
export class DuplicateKeyError extends JournalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DUPLICATE_KEY', message, options);
  }
}

export class NotFoundError extends JournalError {
  readonly entity: string;

  constructor(entity: string, id: number | string, options?: { cause?: unknown }) {
    super('NOT_FOUND', `${entity} not found: ${id}`, options);
    this.entity = entity;
  }
}

export class ValidationError extends JournalError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class NotAuthenticatedError extends JournalError {
  constructor() {
    super('NOT_AUTHENTICATED', 'You must sign in first');
  }
}

export function isJournalError(error: unknown): error is JournalError {
  return error instanceof JournalError;
}
