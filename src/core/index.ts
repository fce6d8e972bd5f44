/**
 * Core Module
 *
 * Exports logging and the error taxonomy shared by every repository.
 */

// Logger
export {
  createLogger,
  createNullLogger,
  type LoggerConfig,
} from './createLogger';

// Errors
export {
  JournalError,
  DuplicateKeyError,
  NotFoundError,
  ValidationError,
  NotAuthenticatedError,
  isJournalError,
  type JournalErrorCode,
} from './errors';
