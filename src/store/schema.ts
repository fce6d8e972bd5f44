/**
 * Table definitions, applied on every open. Each statement is idempotent.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    handle TEXT UNIQUE NOT NULL,
    address TEXT UNIQUE NOT NULL,
    category TEXT NOT NULL DEFAULT 'explorer',
    level REAL NOT NULL DEFAULT 1.0,
    created_at TEXT NOT NULL,
    journey_data TEXT NOT NULL DEFAULT '{}'
  )`,
  `CREATE TABLE IF NOT EXISTS circles (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    description TEXT,
    category TEXT NOT NULL DEFAULT 'general',
    collective_intention TEXT,
    admin_user_id INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    FOREIGN KEY (admin_user_id) REFERENCES users (id)
  )`,
  `CREATE TABLE IF NOT EXISTS circle_members (
    circle_id INTEGER NOT NULL,
    user_id INTEGER NOT NULL,
    role TEXT NOT NULL DEFAULT 'member',
    joined_at TEXT NOT NULL,
    PRIMARY KEY (circle_id, user_id),
    FOREIGN KEY (circle_id) REFERENCES circles (id),
    FOREIGN KEY (user_id) REFERENCES users (id)
  )`,
  `CREATE TABLE IF NOT EXISTS practices (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    category TEXT NOT NULL,
    content TEXT NOT NULL DEFAULT '',
    target_duration REAL NOT NULL,
    target_level REAL NOT NULL DEFAULT 1.0,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS practice_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    practice_id INTEGER NOT NULL,
    actual_duration REAL NOT NULL,
    notes TEXT NOT NULL DEFAULT '',
    level_before REAL NOT NULL,
    level_after REAL NOT NULL,
    logged_at TEXT NOT NULL,
    FOREIGN KEY (user_id) REFERENCES users (id),
    FOREIGN KEY (practice_id) REFERENCES practices (id)
  )`,
  `CREATE TABLE IF NOT EXISTS insights (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    circle_id INTEGER,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    insight_type TEXT NOT NULL DEFAULT 'insight',
    is_shared INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    FOREIGN KEY (user_id) REFERENCES users (id),
    FOREIGN KEY (circle_id) REFERENCES circles (id)
  )`,
];

export const TABLE_NAMES = [
  'users',
  'circles',
  'circle_members',
  'practices',
  'practice_logs',
  'insights',
] as const;

export type TableName = (typeof TABLE_NAMES)[number];
