import Database from 'better-sqlite3';
import { DuplicateKeyError, NotFoundError } from '../core/errors';

/**
 * Map constraint failures from better-sqlite3 onto the journal taxonomy.
 * Anything else is returned unchanged so the caller can rethrow it.
 */
export function translateSqliteError(
  error: unknown,
  context: { entity: string; id?: number | string }
): unknown {
  if (!(error instanceof Database.SqliteError)) {
    return error;
  }

  switch (error.code) {
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY':
      return new DuplicateKeyError(`${context.entity} already exists`, { cause: error });
    case 'SQLITE_CONSTRAINT_FOREIGNKEY':
      return new NotFoundError(context.entity, context.id ?? 'unknown reference', { cause: error });
    default:
      return error;
  }
}
