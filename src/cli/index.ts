#!/usr/bin/env node
import * as readline from 'readline';
import { createLogger } from '../core/createLogger';
import { openJournalStore } from '../journal/JournalStore';
import { loadAppConfigFromEnvFile } from '../utils/config';
import { runMenu } from './menu';
import { createLinePrompter } from './prompter';

async function main(): Promise<void> {
  const config = loadAppConfigFromEnvFile();
  const logger = createLogger({
    appName: 'practice-circles',
    logDir: config.logDir,
    logLevel: config.logLevel,
    console: config.logToConsole,
  });

  const store = openJournalStore({ filename: config.databasePath, logger });
  // Attach the prompter before any input is read
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const prompt = createLinePrompter(rl, process.stdout);

  try {
    await runMenu({
      store,
      prompt,
      // eslint-disable-next-line no-console
      print: (line) => console.log(line),
    });
  } finally {
    rl.close();
    store.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
}
