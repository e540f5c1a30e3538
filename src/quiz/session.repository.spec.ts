import { ConcurrentModificationError, SessionNotFoundError } from './quiz.errors';
import { QuizSession } from './session';
import { InMemorySessionRepository } from './session.repository';

function session(version = 0): QuizSession {
  return {
    id: 'quiz-1',
    mode: 'exam',
    state: 'created',
    questionIds: [1, 2],
    position: 0,
    presentations: {},
    answers: {},
    correctness: {},
    version,
    startedAt: '2026-03-01T09:00:00.000Z',
  };
}

describe('InMemorySessionRepository', () => {
  let now: number;
  let repository: InMemorySessionRepository;

  beforeEach(() => {
    now = 1_000;
    repository = new InMemorySessionRepository({ ttlMs: 60_000, now: () => now });
  });

  it('should store, read and delete sessions', async () => {
    await repository.put('quiz-1', session());

    expect(await repository.get('quiz-1')).toEqual(session());
    expect(await repository.delete('quiz-1')).toBe(true);
    expect(await repository.get('quiz-1')).toBeUndefined();
    expect(await repository.delete('quiz-1')).toBe(false);
  });

  it('should hand out copies', async () => {
    const original = session();
    await repository.put('quiz-1', original);
    original.questionIds.push(3);

    const stored = await repository.get('quiz-1');
    stored?.questionIds.push(4);

    expect((await repository.get('quiz-1'))?.questionIds).toEqual([1, 2]);
  });

  it('should expire sessions after the idle time since the last write', async () => {
    await repository.put('quiz-1', session());

    now += 59_999;
    expect(await repository.get('quiz-1')).toBeDefined();

    await repository.put('quiz-1', session(1), 0);
    now += 59_999;
    expect(await repository.get('quiz-1')).toBeDefined();

    now += 1;
    expect(await repository.get('quiz-1')).toBeUndefined();
  });

  it('should not report an expired session as deleted', async () => {
    await repository.put('quiz-1', session());
    now += 60_000;

    expect(await repository.delete('quiz-1')).toBe(false);
  });

  it('should drop expired sessions when another is written', async () => {
    await repository.put('old', session());
    now += 60_000;
    await repository.put('new', session());

    expect(repository.size).toBe(1);
  });

  it('should accept a write that names the stored version', async () => {
    await repository.put('quiz-1', session(3));
    await repository.put('quiz-1', session(4), 3);

    expect((await repository.get('quiz-1'))?.version).toBe(4);
  });

  it('should reject a write based on a stale version', async () => {
    await repository.put('quiz-1', session(4));

    await expect(repository.put('quiz-1', session(4), 3)).rejects.toThrow(
      new ConcurrentModificationError('quiz-1', 3, 4),
    );
    expect((await repository.get('quiz-1'))?.version).toBe(4);
  });

  it('should keep versions rising when a session is replaced', async () => {
    await repository.put('quiz-1', session(2));
    await repository.put('quiz-1', session());

    expect((await repository.get('quiz-1'))?.version).toBe(3);
    await expect(repository.put('quiz-1', session(1), 0)).rejects.toThrow(
      new ConcurrentModificationError('quiz-1', 0, 3),
    );
  });

  it('should reject a versioned write to a missing session', async () => {
    await expect(repository.put('quiz-1', session(1), 0)).rejects.toThrow(SessionNotFoundError);
  });
});
