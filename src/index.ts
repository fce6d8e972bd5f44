/**
 * Practice Circles
 *
 * Users, circles, practice logs and insights on a local SQLite journal.
 *
 * @module practice-circles
 */

// ============================================================================
// Types
// ============================================================================

export * from './types';

// ============================================================================
// Core
// ============================================================================

export {
  createLogger,
  createNullLogger,
  JournalError,
  DuplicateKeyError,
  NotFoundError,
  ValidationError,
  NotAuthenticatedError,
  isJournalError,
} from './core';

export type { LoggerConfig, JournalErrorCode } from './core';

// ============================================================================
// Store
// ============================================================================

export {
  JournalDatabase,
  IN_MEMORY,
  translateSqliteError,
  TABLE_NAMES,
} from './store';

export type { JournalDatabaseConfig, TableName } from './store';

export { JournalStore, openJournalStore } from './journal';

// ============================================================================
// Repositories
// ============================================================================

export { UserRepository, DEFAULT_CATEGORY } from './users';
export { InsightRepository, DEFAULT_INSIGHT_TYPE } from './insights';
export {
  CircleRepository,
  DEFAULT_CIRCLE_CATEGORY,
  CREATOR_ROLE,
  MEMBER_ROLE,
} from './circles';
export {
  PracticeRepository,
  DEFAULT_TARGET_LEVEL,
  computeEffectiveness,
  computeLevelAfter,
  assertValidTargetDuration,
  MAX_EFFECTIVENESS,
  LEVEL_STEP,
} from './practices';

// ============================================================================
// Reporting & CLI
// ============================================================================

export { formatJourneySummary, formatCircleInfo, banner } from './report';
export { runMenu, dispatch, ANONYMOUS, MENU_LINES } from './cli/menu';
export type { Prompter, Printer, MenuContext, CommandResult } from './cli/menu';
export { runDemo, DEMO_PRACTICES } from './cli/demo';
export type { DemoResult } from './cli/demo';
export { createLinePrompter } from './cli/prompter';

// ============================================================================
// Utils
// ============================================================================

export {
  loadEnvConfig,
  getOptionalEnv,
  getBooleanEnv,
  loadAppConfig,
  loadAppConfigFromEnvFile,
  USER_ENV_FILE,
} from './utils';

export type { AppConfig } from './utils';
