/**
 * Utils Module
 *
 * Exports environment loading and the application config.
 */

// Environment utilities
export { loadEnvConfig, getOptionalEnv, getBooleanEnv } from './env';

// Application config
export { loadAppConfig, loadAppConfigFromEnvFile, USER_ENV_FILE, type AppConfig } from './config';
