/**
 * JournalDatabase - Owns the SQLite connection for the journal
 *
 * Opened once per process and passed to every repository. The schema is
 * created on open, so a fresh file (or `:memory:`) is ready immediately.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { Logger } from '../types';
import { SCHEMA_STATEMENTS, TABLE_NAMES, TableName } from './schema';

export const IN_MEMORY = ':memory:';

export interface JournalDatabaseConfig {
  /** SQLite file path, or ':memory:' */
  filename: string;
  logger?: Logger;
}

export class JournalDatabase {
  readonly filename: string;
  readonly connection: Database.Database;
  private logger?: Logger;

  constructor(config: JournalDatabaseConfig) {
    this.filename = config.filename;
    this.logger = config.logger;

    this.ensureDirectory();
    this.connection = new Database(config.filename);

    if (config.filename !== IN_MEMORY) {
      this.connection.pragma('journal_mode = WAL');
    }
    this.connection.pragma('foreign_keys = ON');

    this.createTables();
  }

  private ensureDirectory(): void {
    if (this.filename === IN_MEMORY) return;

    const dir = path.dirname(path.resolve(this.filename));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  private createTables(): void {
    for (const statement of SCHEMA_STATEMENTS) {
      this.connection.exec(statement);
    }
    this.logger?.info('Journal tables ready', { filename: this.filename });
  }

  /**
   * Run `fn` inside a single SQLite transaction
   */
  transaction<T>(fn: () => T): T {
    return this.connection.transaction(fn)();
  }

  /**
   * Names of the journal tables present in the file
   */
  listTables(): TableName[] {
    const rows = this.connection
      .prepare<[], { name: string }>(
        `SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name`
      )
      .all();
    const present = new Set(rows.map((r) => r.name));
    return TABLE_NAMES.filter((name) => present.has(name));
  }

  close(): void {
    if (!this.connection.open) return;
    this.connection.close();
    this.logger?.info('Journal database closed', { filename: this.filename });
  }
}

