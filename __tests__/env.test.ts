import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadEnvConfig } from '../src/utils/env';
import { loadAppConfig, loadAppConfigFromEnvFile } from '../src/utils/config';

function writeTempEnv(contents: string): string {
  const filePath = path.join(os.tmpdir(), `env-${Date.now()}-${Math.random().toString(16).slice(2)}.env`);
  fs.writeFileSync(filePath, contents, 'utf8');
  return filePath;
}

describe('loadEnvConfig', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('loads global env and fallback when JOURNAL_ENV_FILE is not set', () => {
    const globalPath = writeTempEnv('ALPHA=one\nBETA=two\n');
    const fallbackPath = writeTempEnv('BETA=override\nGAMMA=three\n');

    delete process.env.JOURNAL_ENV_FILE;
    loadEnvConfig(globalPath, fallbackPath);

    expect(process.env.ALPHA).toBe('one');
    expect(process.env.BETA).toBe('two');
    expect(process.env.GAMMA).toBe('three');

    fs.unlinkSync(globalPath);
    fs.unlinkSync(fallbackPath);
  });

  it('uses JOURNAL_ENV_FILE to override values', () => {
    const globalPath = writeTempEnv('ALPHA=one\nBETA=two\n');
    const overridePath = writeTempEnv('BETA=override\nDELTA=four\n');

    process.env.JOURNAL_ENV_FILE = overridePath;
    loadEnvConfig(globalPath);

    expect(process.env.ALPHA).toBe('one');
    expect(process.env.BETA).toBe('override');
    expect(process.env.DELTA).toBe('four');

    fs.unlinkSync(globalPath);
    fs.unlinkSync(overridePath);
  });

  it('skips placeholder values', () => {
    const globalPath = writeTempEnv('JOURNAL_DB_PATH=changeme\nLOG_LEVEL=debug\n');

    delete process.env.JOURNAL_ENV_FILE;
    delete process.env.JOURNAL_DB_PATH;
    delete process.env.LOG_LEVEL;
    loadEnvConfig(globalPath);

    expect(process.env.JOURNAL_DB_PATH).toBeUndefined();
    expect(process.env.LOG_LEVEL).toBe('debug');

    fs.unlinkSync(globalPath);
  });
});

describe('loadAppConfig', () => {
  const originalEnv = { ...process.env };
  const keys = ['JOURNAL_DB_PATH', 'JOURNAL_DEMO_DB_PATH', 'LOG_LEVEL', 'LOG_DIR', 'LOG_CONSOLE'];

  beforeEach(() => {
    for (const key of keys) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('falls back to files under the working directory', () => {
    expect(loadAppConfig('/srv/journal')).toEqual({
      databasePath: path.join('/srv/journal', 'practice-circles.db'),
      demoDatabasePath: path.join('/srv/journal', 'practice-circles-demo.db'),
      logLevel: 'info',
      logDir: path.join('/srv/journal', 'logs'),
      logToConsole: false,
    });
  });

  it('reads overrides from the environment', () => {
    process.env.JOURNAL_DB_PATH = '/data/journal.db';
    process.env.LOG_LEVEL = 'warn';
    process.env.LOG_CONSOLE = 'yes';

    const config = loadAppConfig('/srv/journal');

    expect(config.databasePath).toBe('/data/journal.db');
    expect(config.logLevel).toBe('warn');
    expect(config.logToConsole).toBe(true);
  });

  it('reads the working directory .env before the per-user file', () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'journal-cwd-'));
    fs.writeFileSync(path.join(cwd, '.env'), 'LOG_LEVEL=debug\n', 'utf8');
    const userEnvPath = writeTempEnv('LOG_LEVEL=error\nJOURNAL_DB_PATH=/home/river/journal.db\n');
    delete process.env.JOURNAL_ENV_FILE;

    const config = loadAppConfigFromEnvFile(cwd, userEnvPath);

    expect(config.logLevel).toBe('debug');
    expect(config.databasePath).toBe('/home/river/journal.db');
    expect(config.logDir).toBe(path.join(cwd, 'logs'));

    fs.rmSync(cwd, { recursive: true, force: true });
    fs.unlinkSync(userEnvPath);
  });
});
