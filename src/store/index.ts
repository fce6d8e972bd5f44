/**
 * Store Module
 */

export { JournalDatabase, IN_MEMORY } from './JournalDatabase';
export type { JournalDatabaseConfig } from './JournalDatabase';
export { translateSqliteError } from './sqliteErrors';
export { SCHEMA_STATEMENTS, TABLE_NAMES } from './schema';
export type { TableName } from './schema';
