import { NewPractice } from '../types';
import { DuplicateKeyError, NotFoundError, createLogger } from '../core';
import { JournalStore, openJournalStore } from '../journal/JournalStore';
import { banner, formatCircleInfo, formatJourneySummary } from '../report/formatReport';
import { loadAppConfigFromEnvFile } from '../utils/config';
import type { Printer } from './menu';

/**
 * Scripted walkthrough: seed practices, register a user, open a circle,
 * log a session, record an insight and print both reports.
 */

export const DEMO_PRACTICES: readonly NewPractice[] = [
  {
    title: 'Breath Meditation',
    category: 'meditation',
    content: 'Sit comfortably and follow your breath...',
    targetDuration: 10,
    targetLevel: 1.5,
  },
  {
    title: 'Collective Awareness',
    category: 'community',
    content: 'Gather with your circle for a guided meditation...',
    targetDuration: 20,
    targetLevel: 2.0,
  },
  {
    title: 'Daily Insight',
    category: 'reflection',
    content: 'Write down three things you noticed today...',
    targetDuration: 5,
    targetLevel: 1.2,
  },
];

export const DEMO_USER = {
  handle: 'sample_explorer',
  address: 'explorer@example.com',
  category: 'explorer',
};

export interface DemoResult {
  userId: number;
  circleId: number;
  practiceIds: number[];
  levelAfter: number;
}

function registerOrSignIn(store: JournalStore, print: Printer): number {
  try {
    const userId = store.users.register(DEMO_USER.handle, DEMO_USER.address, DEMO_USER.category);
    print(`✓ Registered user ${DEMO_USER.handle}`);
    return userId;
  } catch (error) {
    if (!(error instanceof DuplicateKeyError)) {
      throw error;
    }
    const existing = store.users.authenticate(DEMO_USER.handle);
    if (existing === null) {
      // The address belongs to someone else
      throw error;
    }
    print(`✓ ${DEMO_USER.handle} already registered, signed in`);
    return existing;
  }
}

export function runDemo(store: JournalStore, print: Printer): DemoResult {
  for (const bannerLine of banner('Practice Circles - demo run')) {
    print(bannerLine);
  }

  const practiceIds = DEMO_PRACTICES.map((practice) => {
    const id = store.practices.addPractice(practice);
    print(`✓ Practice added: ${practice.title}`);
    return id;
  });

  const userId = registerOrSignIn(store, print);

  const circleId = store.circles.createCircle(
    'First Wisdom Circle',
    'A circle for exploring our nature and growing shared awareness',
    userId,
    'meditation'
  );
  print(`✓ Circle created: First Wisdom Circle (${circleId})`);

  store.circles.setCollectiveIntention(circleId, 'Spreading inner peace and learning together');
  print(`✓ Collective intention set for circle ${circleId}`);

  const levelAfter = store.practices.logPractice({
    userId,
    practiceId: practiceIds[0],
    actualDuration: 15,
    notes: 'A deep session centred on inner silence',
    levelBefore: 1.0,
  });
  print(`✓ Practice logged. New level: ${levelAfter.toFixed(2)}`);

  store.insights.addInsight(
    userId,
    'Finding the inner compass',
    'Today I noticed that my own nature points the way when I stop to listen',
    'discovery'
  );
  print('✓ Insight added: Finding the inner compass');

  print('');
  for (const bannerLine of banner('Results')) {
    print(bannerLine);
  }

  print('');
  print('Journey summary:');
  for (const summaryLine of formatJourneySummary(store.users.getJourneySummary(userId))) {
    print(summaryLine);
  }

  const info = store.circles.getCircleInfo(circleId);
  if (!info) {
    throw new NotFoundError('Circle', circleId);
  }
  print('');
  print('Circle:');
  for (const infoLine of formatCircleInfo(info)) {
    print(infoLine);
  }

  print('');
  for (const bannerLine of banner('Demo complete')) {
    print(bannerLine);
  }

  return { userId, circleId, practiceIds, levelAfter };
}

function main(): void {
  const config = loadAppConfigFromEnvFile();
  const logger = createLogger({
    appName: 'practice-circles-demo',
    logDir: config.logDir,
    logLevel: config.logLevel,
    console: config.logToConsole,
  });

  const store = openJournalStore({ filename: config.demoDatabasePath, logger });
  try {
    // eslint-disable-next-line no-console
    runDemo(store, (line) => console.log(line));
  } finally {
    store.close();
  }
}

if (require.main === module) {
  main();
}
