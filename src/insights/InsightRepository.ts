import { Insight, InsightOptions, Logger } from '../types';
import { ValidationError } from '../core/errors';
import { JournalDatabase } from '../store/JournalDatabase';
import { translateSqliteError } from '../store/sqliteErrors';

export const DEFAULT_INSIGHT_TYPE = 'insight';

interface InsightRow {
  id: number;
  user_id: number;
  circle_id: number | null;
  title: string;
  content: string;
  insight_type: string;
  is_shared: number;
  created_at: string;
}

function toInsight(row: InsightRow): Insight {
  return {
    id: row.id,
    userId: row.user_id,
    circleId: row.circle_id,
    title: row.title,
    content: row.content,
    type: row.insight_type,
    isShared: row.is_shared === 1,
    createdAt: row.created_at,
  };
}

/**
 * Insight Repository
 *
 * Insights are append-only. A circle-scoped insight is only listed for the
 * circle when it is marked shared.
 */
export class InsightRepository {
  private db: JournalDatabase;
  private logger?: Logger;

  constructor(db: JournalDatabase, logger?: Logger) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Append an insight and return its id
   *
   * @throws NotFoundError when the user (or the given circle) does not exist
   */
  addInsight(
    userId: number,
    title: string,
    content: string,
    type: string = DEFAULT_INSIGHT_TYPE,
    options: InsightOptions = {}
  ): number {
    if (!title.trim()) {
      throw new ValidationError('Insight title is required');
    }

    const circleId = options.circleId ?? null;
    try {
      const result = this.db.connection
        .prepare<[number, number | null, string, string, string, number, string]>(
          `INSERT INTO insights (user_id, circle_id, title, content, insight_type, is_shared, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          userId,
          circleId,
          title.trim(),
          content,
          type.trim() || DEFAULT_INSIGHT_TYPE,
          options.isShared ? 1 : 0,
          new Date().toISOString()
        );

      const insightId = Number(result.lastInsertRowid);
      this.logger?.info(`Insight added: ${title.trim()}`, { userId, insightId, circleId });
      return insightId;
    } catch (error) {
      throw translateSqliteError(error, {
        entity: circleId === null ? 'User' : 'User or circle',
        id: circleId === null ? userId : `${userId}/${circleId}`,
      });
    }
  }

  /**
   * All insights of a user, newest first
   */
  listInsights(userId: number): Insight[] {
    return this.db.connection
      .prepare<[number], InsightRow>(
        'SELECT * FROM insights WHERE user_id = ? ORDER BY created_at DESC, id DESC'
      )
      .all(userId)
      .map(toInsight);
  }

  /**
   * Shared insights posted to a circle, newest first
   */
  listSharedInsights(circleId: number): Insight[] {
    return this.db.connection
      .prepare<[number], InsightRow>(
        `SELECT * FROM insights WHERE circle_id = ? AND is_shared = 1
         ORDER BY created_at DESC, id DESC`
      )
      .all(circleId)
      .map(toInsight);
  }
}
