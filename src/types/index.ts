/**
 * Core type definitions for Practice Circles
 */

// ============================================================================
// Users
// ============================================================================

/**
 * Free-form journey metadata stored with each user.
 *
 * `journeyStartedAt` is written on registration. Other keys are kept as-is
 * so callers can attach their own progress markers.
 */
export interface JourneyData {
  /** ISO timestamp of registration */
  journeyStartedAt?: string;
  [key: string]: unknown;
}

export interface User {
  id: number;
  handle: string;
  address: string;
  /** Descriptive category chosen at registration (e.g. 'explorer') */
  category: string;
  /** Consciousness level, starts at 1.0 and is unbounded */
  level: number;
  createdAt: string;
  journeyData: JourneyData;
}

export interface JourneySummary {
  handle: string;
  category: string;
  level: number;
  insightCount: number;
  practiceCount: number;
  registeredAt: string;
}

// ============================================================================
// Circles
// ============================================================================

export type MemberRole = 'creator' | 'member' | (string & {});

export interface Circle {
  id: number;
  name: string;
  description: string | null;
  category: string;
  collectiveIntention: string | null;
  adminUserId: number;
  createdAt: string;
}

export interface CircleInfo extends Circle {
  memberCount: number;
  /** Mean member level rounded to 2 decimals, 0 without members */
  averageLevel: number;
}

export interface CircleMember {
  circleId: number;
  userId: number;
  handle: string;
  level: number;
  role: MemberRole;
  joinedAt: string;
}

// ============================================================================
// Practices
// ============================================================================

export interface Practice {
  id: number;
  title: string;
  category: string;
  content: string;
  /** Target duration in minutes, always > 0 */
  targetDuration: number;
  /** Level factor applied when the practice is logged */
  targetLevel: number;
  createdAt: string;
}

export interface NewPractice {
  title: string;
  category: string;
  content: string;
  targetDuration: number;
  targetLevel?: number;
}

export interface PracticeLog {
  id: number;
  userId: number;
  practiceId: number;
  actualDuration: number;
  notes: string;
  levelBefore: number;
  levelAfter: number;
  loggedAt: string;
}

export interface LogPracticeInput {
  userId: number;
  practiceId: number;
  actualDuration: number;
  notes?: string;
  /** Defaults to the user's stored level */
  levelBefore?: number;
}

// ============================================================================
// Insights
// ============================================================================

export interface Insight {
  id: number;
  userId: number;
  circleId: number | null;
  title: string;
  content: string;
  type: string;
  isShared: boolean;
  createdAt: string;
}

export interface InsightOptions {
  circleId?: number;
  isShared?: boolean;
}

// ============================================================================
// CLI Session
// ============================================================================

export type SessionState =
  | { kind: 'anonymous' }
  | { kind: 'authenticated'; userId: number; handle: string };

// ============================================================================
// Logger Interface
// ============================================================================

export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug?(message: string, meta?: Record<string, unknown>): void;
}
