/**
 * Journal Module
 *
 * The store handle bundling every repository.
 */

export { JournalStore, openJournalStore } from './JournalStore';
