import { LogPracticeInput, Logger, NewPractice, Practice, PracticeLog } from '../types';
import { NotFoundError, ValidationError } from '../core/errors';
import { JournalDatabase } from '../store/JournalDatabase';
import { translateSqliteError } from '../store/sqliteErrors';
import { assertValidTargetDuration, computeLevelAfter } from './effect';

export const DEFAULT_TARGET_LEVEL = 1.0;

interface PracticeRow {
  id: number;
  title: string;
  category: string;
  content: string;
  target_duration: number;
  target_level: number;
  created_at: string;
}

interface PracticeLogRow {
  id: number;
  user_id: number;
  practice_id: number;
  actual_duration: number;
  notes: string;
  level_before: number;
  level_after: number;
  logged_at: string;
}

function toPractice(row: PracticeRow): Practice {
  return {
    id: row.id,
    title: row.title,
    category: row.category,
    content: row.content,
    targetDuration: row.target_duration,
    targetLevel: row.target_level,
    createdAt: row.created_at,
  };
}

function toPracticeLog(row: PracticeLogRow): PracticeLog {
  return {
    id: row.id,
    userId: row.user_id,
    practiceId: row.practice_id,
    actualDuration: row.actual_duration,
    notes: row.notes,
    levelBefore: row.level_before,
    levelAfter: row.level_after,
    loggedAt: row.logged_at,
  };
}

/**
 * Practice Repository
 *
 * Practice templates are shared by everyone. Logging a session appends a
 * practice_logs row and moves the user's level in the same transaction.
 */
export class PracticeRepository {
  private db: JournalDatabase;
  private logger?: Logger;

  constructor(db: JournalDatabase, logger?: Logger) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Add a practice template and return its id
   *
   * @throws ValidationError when the target duration is not positive
   */
  addPractice(practice: NewPractice): number {
    if (!practice.title.trim()) {
      throw new ValidationError('Practice title is required');
    }
    assertValidTargetDuration(practice.targetDuration);

    const targetLevel = practice.targetLevel ?? DEFAULT_TARGET_LEVEL;
    const result = this.db.connection
      .prepare<[string, string, string, number, number, string]>(
        `INSERT INTO practices (title, category, content, target_duration, target_level, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        practice.title.trim(),
        practice.category,
        practice.content,
        practice.targetDuration,
        targetLevel,
        new Date().toISOString()
      );

    const practiceId = Number(result.lastInsertRowid);
    this.logger?.info(`Practice added: ${practice.title.trim()}`, { practiceId, targetLevel });
    return practiceId;
  }

  getPractice(practiceId: number): Practice | null {
    const row = this.db.connection
      .prepare<[number], PracticeRow>('SELECT * FROM practices WHERE id = ?')
      .get(practiceId);
    return row ? toPractice(row) : null;
  }

  listPractices(): Practice[] {
    return this.db.connection
      .prepare<[], PracticeRow>('SELECT * FROM practices ORDER BY id')
      .all()
      .map(toPractice);
  }

  /**
   * Record a completed session and return the user's new level
   *
   * @throws NotFoundError when the practice or user does not exist
   * @throws ValidationError when the actual duration is negative
   */
  logPractice(input: LogPracticeInput): number {
    const { userId, practiceId, actualDuration, notes = '' } = input;

    if (!Number.isFinite(actualDuration) || actualDuration < 0) {
      throw new ValidationError(`Actual duration must be zero or more minutes, got ${actualDuration}`);
    }

    const practice = this.getPractice(practiceId);
    if (!practice) {
      this.logger?.warn(`Practice not found: ${practiceId}`, { userId });
      throw new NotFoundError('Practice', practiceId);
    }

    const levelBefore = input.levelBefore ?? this.currentLevel(userId);
    const levelAfter = computeLevelAfter(
      levelBefore,
      practice.targetLevel,
      actualDuration,
      practice.targetDuration
    );

    try {
      this.db.transaction(() => {
        this.db.connection
          .prepare<[number, number, number, string, number, number, string]>(
            `INSERT INTO practice_logs
             (user_id, practice_id, actual_duration, notes, level_before, level_after, logged_at)
             VALUES (?, ?, ?, ?, ?, ?, ?)`
          )
          .run(userId, practiceId, actualDuration, notes, levelBefore, levelAfter, new Date().toISOString());

        this.db.connection
          .prepare<[number, number]>('UPDATE users SET level = ? WHERE id = ?')
          .run(levelAfter, userId);
      });
    } catch (error) {
      throw translateSqliteError(error, { entity: 'User', id: userId });
    }

    this.logger?.info(`Practice logged. New level: ${levelAfter.toFixed(2)}`, {
      userId,
      practiceId,
      levelBefore,
      levelAfter,
    });
    return levelAfter;
  }

  /**
   * A user's practice logs, newest first
   */
  listPracticeLogs(userId: number): PracticeLog[] {
    return this.db.connection
      .prepare<[number], PracticeLogRow>(
        'SELECT * FROM practice_logs WHERE user_id = ? ORDER BY logged_at DESC, id DESC'
      )
      .all(userId)
      .map(toPracticeLog);
  }

  private currentLevel(userId: number): number {
    const row = this.db.connection
      .prepare<[number], { level: number }>('SELECT level FROM users WHERE id = ?')
      .get(userId);
    if (!row) {
      throw new NotFoundError('User', userId);
    }
    return row.level;
  }
}
