import { Circle, CircleInfo, CircleMember, Logger, MemberRole } from '../types';
import { NotFoundError, ValidationError } from '../core/errors';
import { JournalDatabase } from '../store/JournalDatabase';
import { translateSqliteError } from '../store/sqliteErrors';

export const DEFAULT_CIRCLE_CATEGORY = 'general';
export const CREATOR_ROLE: MemberRole = 'creator';
export const MEMBER_ROLE: MemberRole = 'member';

interface CircleRow {
  id: number;
  name: string;
  description: string | null;
  category: string;
  collective_intention: string | null;
  admin_user_id: number;
  created_at: string;
}

interface MemberRow {
  circle_id: number;
  user_id: number;
  handle: string;
  level: number;
  role: string;
  joined_at: string;
}

function toCircle(row: CircleRow): Circle {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    category: row.category,
    collectiveIntention: row.collective_intention,
    adminUserId: row.admin_user_id,
    createdAt: row.created_at,
  };
}

/**
 * Round to `decimals` places, ties to the even neighbour (1.125 -> 1.12)
 */
export function roundHalfEven(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  let rounded: number;
  if (fraction > 0.5) {
    rounded = floor + 1;
  } else if (fraction < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }
  return rounded / factor;
}

/**
 * Circle Repository
 *
 * Circles always have at least their creator as a member: the circle row and
 * the creator membership are written in one transaction.
 */
export class CircleRepository {
  private db: JournalDatabase;
  private logger?: Logger;

  constructor(db: JournalDatabase, logger?: Logger) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Create a circle owned by `adminUserId` and return its id
   *
   * @throws NotFoundError when the admin user does not exist
   */
  createCircle(
    name: string,
    description: string,
    adminUserId: number,
    category: string = DEFAULT_CIRCLE_CATEGORY
  ): number {
    if (!name.trim()) {
      throw new ValidationError('Circle name is required');
    }

    let circleId: number;
    try {
      circleId = this.db.transaction(() => {
        const result = this.db.connection
          .prepare<[string, string | null, string, number, string]>(
            `INSERT INTO circles (name, description, category, admin_user_id, created_at)
             VALUES (?, ?, ?, ?, ?)`
          )
          .run(
            name.trim(),
            description.trim() || null,
            category.trim() || DEFAULT_CIRCLE_CATEGORY,
            adminUserId,
            new Date().toISOString()
          );
        const id = Number(result.lastInsertRowid);
        this.upsertMember(id, adminUserId, CREATOR_ROLE);
        return id;
      });
    } catch (error) {
      throw translateSqliteError(error, { entity: 'User', id: adminUserId });
    }

    this.logger?.info(`Circle created: ${name.trim()}`, { circleId, adminUserId });
    return circleId;
  }

  /**
   * Add a member, or change the role of an existing member
   *
   * @throws NotFoundError when the circle or user does not exist
   */
  addMember(circleId: number, userId: number, role: MemberRole = MEMBER_ROLE): void {
    try {
      this.upsertMember(circleId, userId, role);
    } catch (error) {
      throw translateSqliteError(error, { entity: 'Circle or user', id: `${circleId}/${userId}` });
    }
    this.logger?.info(`Member ${userId} added to circle ${circleId}`, { role });
  }

  private upsertMember(circleId: number, userId: number, role: MemberRole): void {
    this.db.connection
      .prepare<[number, number, string, string]>(
        `INSERT INTO circle_members (circle_id, user_id, role, joined_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (circle_id, user_id) DO UPDATE SET role = excluded.role`
      )
      .run(circleId, userId, role, new Date().toISOString());
  }

  /**
   * @throws NotFoundError when the circle does not exist
   */
  setCollectiveIntention(circleId: number, intention: string): void {
    const result = this.db.connection
      .prepare<[string, number]>('UPDATE circles SET collective_intention = ? WHERE id = ?')
      .run(intention, circleId);

    if (result.changes === 0) {
      throw new NotFoundError('Circle', circleId);
    }
    this.logger?.info(`Collective intention set for circle ${circleId}`);
  }

  getCircle(circleId: number): Circle | null {
    const row = this.db.connection
      .prepare<[number], CircleRow>('SELECT * FROM circles WHERE id = ?')
      .get(circleId);
    return row ? toCircle(row) : null;
  }

  /**
   * Circle plus member count and mean member level.
   * Returns null for an unknown circle.
   */
  getCircleInfo(circleId: number): CircleInfo | null {
    const circle = this.getCircle(circleId);
    if (!circle) {
      this.logger?.debug?.(`Circle not found: ${circleId}`);
      return null;
    }

    const stats = this.db.connection
      .prepare<[number], { memberCount: number; averageLevel: number | null }>(
        `SELECT COUNT(*) AS memberCount, AVG(u.level) AS averageLevel
         FROM circle_members cm
         JOIN users u ON cm.user_id = u.id
         WHERE cm.circle_id = ?`
      )
      .get(circleId);

    return {
      ...circle,
      memberCount: stats?.memberCount ?? 0,
      averageLevel: roundHalfEven(stats?.averageLevel ?? 0, 2),
    };
  }

  /**
   * Members of a circle in join order
   */
  listMembers(circleId: number): CircleMember[] {
    return this.db.connection
      .prepare<[number], MemberRow>(
        `SELECT cm.circle_id, cm.user_id, u.handle, u.level, cm.role, cm.joined_at
         FROM circle_members cm
         JOIN users u ON cm.user_id = u.id
         WHERE cm.circle_id = ?
         ORDER BY cm.joined_at, cm.user_id`
      )
      .all(circleId)
      .map((row) => ({
        circleId: row.circle_id,
        userId: row.user_id,
        handle: row.handle,
        level: row.level,
        role: row.role,
        joinedAt: row.joined_at,
      }));
  }
}
