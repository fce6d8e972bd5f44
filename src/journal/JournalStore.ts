/**
 * JournalStore - One handle over the database and its repositories
 *
 * Callers open a store at process start, pass it where it is needed and
 * close it on exit. There is no module-level connection.
 */

import { Logger } from '../types';
import { JournalDatabase, JournalDatabaseConfig } from '../store/JournalDatabase';
import { UserRepository } from '../users/UserRepository';
import { CircleRepository } from '../circles/CircleRepository';
import { PracticeRepository } from '../practices/PracticeRepository';
import { InsightRepository } from '../insights/InsightRepository';

export class JournalStore {
  readonly db: JournalDatabase;
  readonly users: UserRepository;
  readonly circles: CircleRepository;
  readonly practices: PracticeRepository;
  readonly insights: InsightRepository;

  constructor(db: JournalDatabase, logger?: Logger) {
    this.db = db;
    this.users = new UserRepository(db, logger);
    this.circles = new CircleRepository(db, logger);
    this.practices = new PracticeRepository(db, logger);
    this.insights = new InsightRepository(db, logger);
  }

  close(): void {
    this.db.close();
  }
}

export function openJournalStore(config: JournalDatabaseConfig): JournalStore {
  return new JournalStore(new JournalDatabase(config), config.logger);
}
