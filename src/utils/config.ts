import os from 'os';
import path from 'path';
import { getBooleanEnv, getOptionalEnv, loadEnvConfig } from './env';

export interface AppConfig {
  databasePath: string;
  demoDatabasePath: string;
  logLevel: string;
  logDir: string;
  logToConsole: boolean;
}

/**
 * Read the application config from the environment.
 * Call loadEnvConfig first (or use loadAppConfigFromEnvFile) to pick up .env.
 */
export function loadAppConfig(cwd: string = process.cwd()): AppConfig {
  return {
    databasePath: getOptionalEnv('JOURNAL_DB_PATH', path.join(cwd, 'practice-circles.db')),
    demoDatabasePath: getOptionalEnv('JOURNAL_DEMO_DB_PATH', path.join(cwd, 'practice-circles-demo.db')),
    logLevel: getOptionalEnv('LOG_LEVEL', 'info'),
    logDir: getOptionalEnv('LOG_DIR', path.join(cwd, 'logs')),
    logToConsole: getBooleanEnv('LOG_CONSOLE', false),
  };
}

/** Per-user settings, read after the project's .env */
export const USER_ENV_FILE = path.join(os.homedir(), '.practice-circles.env');

/**
 * Load `<cwd>/.env`, then the per-user file for anything still unset
 * (JOURNAL_ENV_FILE replaces the per-user file and overrides both), and
 * return the config
 */
export function loadAppConfigFromEnvFile(
  cwd: string = process.cwd(),
  userEnvPath: string = USER_ENV_FILE
): AppConfig {
  loadEnvConfig(path.join(cwd, '.env'), userEnvPath);
  return loadAppConfig(cwd);
}
