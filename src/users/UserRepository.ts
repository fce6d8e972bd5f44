import { JourneyData, JourneySummary, Logger, User } from '../types';
import { NotFoundError, ValidationError } from '../core/errors';
import { JournalDatabase } from '../store/JournalDatabase';
import { translateSqliteError } from '../store/sqliteErrors';

export const DEFAULT_CATEGORY = 'explorer';

interface UserRow {
  id: number;
  handle: string;
  address: string;
  category: string;
  level: number;
  created_at: string;
  journey_data: string;
}

function parseJourneyData(raw: string): JourneyData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }

  const data: JourneyData = {};
  for (const [key, value] of Object.entries(parsed)) {
    data[key] = value;
  }
  if (typeof data.journeyStartedAt !== 'string') {
    delete data.journeyStartedAt;
  }
  return data;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    handle: row.handle,
    address: row.address,
    category: row.category,
    level: row.level,
    createdAt: row.created_at,
    journeyData: parseJourneyData(row.journey_data),
  };
}

/**
 * User Repository
 *
 * Registration, handle lookup, level updates and the journey summary.
 * Authentication is a plain handle lookup; there are no credentials.
 */
export class UserRepository {
  private db: JournalDatabase;
  private logger?: Logger;

  constructor(db: JournalDatabase, logger?: Logger) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Register a new user and return its id
   *
   * @throws DuplicateKeyError when the handle or address is taken
   */
  register(handle: string, address: string, category: string = DEFAULT_CATEGORY): number {
    const trimmedHandle = handle.trim();
    const trimmedAddress = address.trim();
    if (!trimmedHandle || !trimmedAddress) {
      throw new ValidationError('Handle and address are required');
    }

    const now = new Date().toISOString();
    const journeyData: JourneyData = { journeyStartedAt: now };

    try {
      const result = this.db.connection
        .prepare<[string, string, string, string, string]>(
          `INSERT INTO users (handle, address, category, level, created_at, journey_data)
           VALUES (?, ?, ?, 1.0, ?, ?)`
        )
        .run(trimmedHandle, trimmedAddress, category.trim() || DEFAULT_CATEGORY, now, JSON.stringify(journeyData));

      const userId = Number(result.lastInsertRowid);
      this.logger?.info(`User registered: ${trimmedHandle}`, { userId });
      return userId;
    } catch (error) {
      this.logger?.warn(`Registration failed for ${trimmedHandle}`);
      throw translateSqliteError(error, { entity: 'User' });
    }
  }

  /**
   * Look up a user id by handle. Returns null when no such user exists.
   */
  authenticate(handle: string): number | null {
    const row = this.db.connection
      .prepare<[string], { id: number }>('SELECT id FROM users WHERE handle = ?')
      .get(handle.trim());

    if (!row) {
      this.logger?.debug?.(`Unknown handle: ${handle}`);
      return null;
    }
    return row.id;
  }

  getUser(userId: number): User | null {
    const row = this.db.connection
      .prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?')
      .get(userId);
    return row ? toUser(row) : null;
  }

  /**
   * Overwrite the stored level
   *
   * @throws NotFoundError when the user does not exist
   */
  updateLevel(userId: number, newLevel: number): void {
    const result = this.db.connection
      .prepare<[number, number]>('UPDATE users SET level = ? WHERE id = ?')
      .run(newLevel, userId);

    if (result.changes === 0) {
      throw new NotFoundError('User', userId);
    }
    this.logger?.info(`Level updated to ${newLevel}`, { userId });
  }

  /**
   * Merge keys into the user's journey metadata and return the result
   */
  updateJourneyData(userId: number, changes: JourneyData): JourneyData {
    const user = this.getUser(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }

    const merged: JourneyData = { ...user.journeyData, ...changes };
    this.db.connection
      .prepare<[string, number]>('UPDATE users SET journey_data = ? WHERE id = ?')
      .run(JSON.stringify(merged), userId);
    return merged;
  }

  /**
   * Aggregate view of a user's journey. Read-only.
   *
   * @throws NotFoundError when the user does not exist
   */
  getJourneySummary(userId: number): JourneySummary {
    const user = this.getUser(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }

    const count = (table: 'insights' | 'practice_logs'): number => {
      const row = this.db.connection
        .prepare<[number], { total: number }>(
          `SELECT COUNT(*) AS total FROM ${table} WHERE user_id = ?`
        )
        .get(userId);
      return row?.total ?? 0;
    };

    return {
      handle: user.handle,
      category: user.category,
      level: user.level,
      insightCount: count('insights'),
      practiceCount: count('practice_logs'),
      registeredAt: user.createdAt,
    };
  }
}
