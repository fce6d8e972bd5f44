import { DuplicateKeyError, NotFoundError, ValidationError } from '../src/core/errors';
import { JournalStore } from '../src/journal/JournalStore';
import { openTestStore } from './helpers';

describe('UserRepository', () => {
  let store: JournalStore;

  beforeEach(() => {
    store = openTestStore();
  });

  afterEach(() => {
    store.close();
    jest.useRealTimers();
  });

  it('registers a user at level 1 with the journey start recorded', () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-03-01T08:00:00Z'));

    const userId = store.users.register('river', 'river@example.com', 'creator');
    const user = store.users.getUser(userId);

    expect(userId).toBe(1);
    expect(user).toEqual({
      id: 1,
      handle: 'river',
      address: 'river@example.com',
      category: 'creator',
      level: 1,
      createdAt: '2024-03-01T08:00:00.000Z',
      journeyData: { journeyStartedAt: '2024-03-01T08:00:00.000Z' },
    });
  });

  it('defaults the category to explorer', () => {
    const userId = store.users.register('stone', 'stone@example.com');
    expect(store.users.getUser(userId)?.category).toBe('explorer');
  });

  it('rejects a duplicate handle and leaves the first user untouched', () => {
    const firstId = store.users.register('river', 'river@example.com', 'creator');

    expect(() => store.users.register('river', 'other@example.com', 'leader')).toThrow(
      DuplicateKeyError
    );

    const first = store.users.getUser(firstId);
    expect(first?.address).toBe('river@example.com');
    expect(first?.category).toBe('creator');
    expect(store.users.authenticate('river')).toBe(firstId);
  });

  it('rejects a duplicate address', () => {
    store.users.register('river', 'shared@example.com');
    expect(() => store.users.register('lake', 'shared@example.com')).toThrow(DuplicateKeyError);
    expect(store.users.authenticate('lake')).toBeNull();
  });

  it('rejects a blank handle', () => {
    expect(() => store.users.register('  ', 'blank@example.com')).toThrow(ValidationError);
  });

  it('authenticates by handle only', () => {
    const userId = store.users.register('river', 'river@example.com');
    expect(store.users.authenticate('river')).toBe(userId);
    expect(store.users.authenticate('nobody')).toBeNull();
  });

  it('overwrites the level', () => {
    const userId = store.users.register('river', 'river@example.com');
    store.users.updateLevel(userId, 3.75);
    expect(store.users.getUser(userId)?.level).toBe(3.75);
  });

  it('fails to update the level of an unknown user', () => {
    expect(() => store.users.updateLevel(42, 2)).toThrow(NotFoundError);
  });

  it('merges journey metadata', () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-03-01T08:00:00Z'));
    const userId = store.users.register('river', 'river@example.com');

    const merged = store.users.updateJourneyData(userId, { milestone: 'first-circle' });

    expect(merged).toEqual({
      journeyStartedAt: '2024-03-01T08:00:00.000Z',
      milestone: 'first-circle',
    });
    expect(store.users.getUser(userId)?.journeyData).toEqual(merged);
  });

  it('counts insights and practice logs in the journey summary', () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-03-01T08:00:00Z'));
    const userId = store.users.register('river', 'river@example.com', 'leader');
    const otherId = store.users.register('lake', 'lake@example.com');
    const practiceId = store.practices.addPractice({
      title: 'Sitting',
      category: 'meditation',
      content: 'Sit still',
      targetDuration: 10,
    });

    store.insights.addInsight(userId, 'One', 'first');
    store.insights.addInsight(userId, 'Two', 'second');
    store.insights.addInsight(otherId, 'Elsewhere', 'not mine');
    store.practices.logPractice({ userId, practiceId, actualDuration: 10 });
    expect(() => store.practices.logPractice({ userId, practiceId: 99, actualDuration: 10 })).toThrow(
      NotFoundError
    );

    expect(store.users.getJourneySummary(userId)).toEqual({
      handle: 'river',
      category: 'leader',
      level: 1.1,
      insightCount: 2,
      practiceCount: 1,
      registeredAt: '2024-03-01T08:00:00.000Z',
    });
  });

  it('fails to summarise an unknown user', () => {
    expect(() => store.users.getJourneySummary(7)).toThrow(NotFoundError);
  });
});
