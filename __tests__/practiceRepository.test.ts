import { NotFoundError, ValidationError } from '../src/core/errors';
import { JournalStore } from '../src/journal/JournalStore';
import { openTestStore } from './helpers';

describe('PracticeRepository', () => {
  let store: JournalStore;
  let userId: number;

  beforeEach(() => {
    store = openTestStore();
    userId = store.users.register('river', 'river@example.com');
  });

  afterEach(() => {
    store.close();
  });

  const addBreathing = (): number =>
    store.practices.addPractice({
      title: 'Breathing',
      category: 'meditation',
      content: 'Follow the breath',
      targetDuration: 10,
      targetLevel: 1.5,
    });

  it('stores a template with a default target level of 1.0', () => {
    const practiceId = store.practices.addPractice({
      title: 'Walking',
      category: 'movement',
      content: 'Walk slowly',
      targetDuration: 20,
    });

    expect(store.practices.getPractice(practiceId)).toMatchObject({
      id: practiceId,
      title: 'Walking',
      category: 'movement',
      content: 'Walk slowly',
      targetDuration: 20,
      targetLevel: 1,
    });
    expect(store.practices.listPractices()).toHaveLength(1);
  });

  it('rejects templates without a positive target duration', () => {
    const base = { title: 'Nothing', category: 'none', content: '' };
    expect(() => store.practices.addPractice({ ...base, targetDuration: 0 })).toThrow(ValidationError);
    expect(() => store.practices.addPractice({ ...base, targetDuration: -1 })).toThrow(ValidationError);
    expect(store.practices.listPractices()).toEqual([]);
  });

  it('logs a session and moves the user level', () => {
    const practiceId = addBreathing();

    const levelAfter = store.practices.logPractice({
      userId,
      practiceId,
      actualDuration: 15,
      notes: 'quiet',
      levelBefore: 1.0,
    });

    expect(levelAfter).toBeCloseTo(1.225, 10);
    expect(store.users.getUser(userId)?.level).toBeCloseTo(1.225, 10);

    const [log] = store.practices.listPracticeLogs(userId);
    expect(log).toMatchObject({
      userId,
      practiceId,
      actualDuration: 15,
      notes: 'quiet',
      levelBefore: 1,
    });
    expect(log.levelAfter).toBeCloseTo(1.225, 10);
  });

  it('caps the gain for sessions far beyond the target', () => {
    const practiceId = addBreathing();
    const long = store.practices.logPractice({ userId, practiceId, actualDuration: 600, levelBefore: 1 });
    const capped = store.practices.logPractice({ userId, practiceId, actualDuration: 15, levelBefore: 1 });
    expect(long).toBe(capped);
  });

  it('starts from the stored level when no level is given', () => {
    const practiceId = store.practices.addPractice({
      title: 'Sitting',
      category: 'meditation',
      content: 'Sit',
      targetDuration: 10,
    });
    store.users.updateLevel(userId, 2);

    const levelAfter = store.practices.logPractice({ userId, practiceId, actualDuration: 10 });

    expect(levelAfter).toBeCloseTo(2.1, 10);
    expect(store.practices.listPracticeLogs(userId)[0].levelBefore).toBe(2);
  });

  it('fails for an unknown practice without touching the user', () => {
    expect(() =>
      store.practices.logPractice({ userId, practiceId: 77, actualDuration: 10, levelBefore: 1 })
    ).toThrow(NotFoundError);
    expect(store.practices.listPracticeLogs(userId)).toEqual([]);
    expect(store.users.getUser(userId)?.level).toBe(1);
  });

  it('fails for an unknown user and writes no log', () => {
    const practiceId = addBreathing();
    expect(() =>
      store.practices.logPractice({ userId: 50, practiceId, actualDuration: 10, levelBefore: 1 })
    ).toThrow(NotFoundError);
    expect(() => store.practices.logPractice({ userId: 50, practiceId, actualDuration: 10 })).toThrow(
      NotFoundError
    );
    expect(store.practices.listPracticeLogs(50)).toEqual([]);
  });

  it('rejects a negative actual duration', () => {
    const practiceId = addBreathing();
    expect(() => store.practices.logPractice({ userId, practiceId, actualDuration: -5 })).toThrow(
      ValidationError
    );
  });

  it('lists logs newest first', () => {
    const practiceId = addBreathing();
    store.practices.logPractice({ userId, practiceId, actualDuration: 5, notes: 'first' });
    store.practices.logPractice({ userId, practiceId, actualDuration: 5, notes: 'second' });

    expect(store.practices.listPracticeLogs(userId).map((l) => l.notes)).toEqual(['second', 'first']);
  });
});
