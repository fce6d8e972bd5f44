import { createNullLogger } from '../src/core/createLogger';
import { JournalStore, openJournalStore } from '../src/journal/JournalStore';
import { IN_MEMORY } from '../src/store/JournalDatabase';

export function openTestStore(): JournalStore {
  return openJournalStore({ filename: IN_MEMORY, logger: createNullLogger() });
}
