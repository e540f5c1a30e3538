import { Test } from '@nestjs/testing';

import { buildStore } from './__fixtures__/questions';
import { QuestionStore } from './question-store';
import { QuizEngine } from './quiz-engine';
import {
  ConcurrentModificationError,
  InvalidConfigurationError,
  SessionNotFinishedError,
  SessionNotFoundError,
} from './quiz.errors';
import { QuizService } from './quiz.service';
import { InMemorySessionRepository, SESSION_REPOSITORY } from './session.repository';

describe('QuizService', () => {
  let service: QuizService;
  let sessions: InMemorySessionRepository;

  beforeEach(async () => {
    const store = buildStore(65);
    sessions = new InMemorySessionRepository({ ttlMs: 60_000 });

    const moduleRef = await Test.createTestingModule({
      providers: [
        QuizService,
        { provide: QuestionStore, useValue: store },
        { provide: QuizEngine, useValue: new QuizEngine(store, { shuffleOptions: false }) },
        { provide: SESSION_REPOSITORY, useValue: sessions },
      ],
    }).compile();

    service = moduleRef.get(QuizService);
  });

  it('should report the number of questions', () => {
    expect(service.totalQuestions()).toBe(65);
  });

  it('should start a quiz under a fresh key', async () => {
    const view = await service.start({ mode: 'exam', range: [1, 3] });

    expect(view.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(view).toMatchObject({
      mode: 'exam',
      state: 'created',
      questionIds: [1, 2, 3],
      progress: { current: 1, total: 3, answered: 0, percentage: 0 },
    });
    expect(await sessions.get(view.sessionId)).toBeDefined();
  });

  it('should replace the session stored under a given key', async () => {
    await service.start({ mode: 'exam', range: [1, 3] }, 'chat-1');
    const view = await service.start({ mode: 'immediate', range: [4, 5] }, 'chat-1');

    expect(view.sessionId).toBe('chat-1');
    expect((await service.current('chat-1')).questionIds).toEqual([4, 5]);
  });

  it('should reject an invalid configuration', async () => {
    await expect(service.start({ mode: 'exam', randomCount: 66 })).rejects.toThrow(InvalidConfigurationError);
  });

  it('should run an exam from start to results', async () => {
    const { sessionId } = await service.start({ mode: 'exam', range: [1, 2] });

    const first = await service.current(sessionId);
    expect(first.question).toMatchObject({ kind: 'single', questionId: 1, selectCount: 1 });

    await service.submit(sessionId, 1, 'B');
    await service.submit(sessionId, 2, 'A');
    await expect(service.results(sessionId)).rejects.toThrow(SessionNotFinishedError);

    const summary = await service.finish(sessionId);
    expect(summary).toMatchObject({ correct: 1, total: 2, scorePercentage: 50 });
    expect(await service.results(sessionId)).toEqual(summary);

    const done = await service.current(sessionId);
    expect(done.state).toBe('completed');
    expect(done.question).toBeUndefined();
  });

  it('should list every question of a session', async () => {
    const { sessionId } = await service.start({ mode: 'exam', range: [5, 6] });

    const questions = await service.questions(sessionId);

    expect(questions.map((question) => question.kind)).toEqual(['multiple', 'hotspot']);
  });

  it('should let only one of two simultaneous submissions through', async () => {
    const { sessionId } = await service.start({ mode: 'exam', range: [1, 2] });

    const results = await Promise.allSettled([
      service.submit(sessionId, 1, 'B'),
      service.submit(sessionId, 1, 'C'),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    const [, second] = results;
    if (second.status !== 'rejected') throw new Error('expected the second submission to fail');
    expect(second.reason).toBeInstanceOf(ConcurrentModificationError);
    expect((await sessions.get(sessionId))?.answers[1]).toEqual({ kind: 'single', choice: 'B' });
  });

  it('should not let an answer to a replaced quiz overwrite its replacement', async () => {
    await service.start({ mode: 'exam', range: [1, 3] }, 'chat');

    const stale = expect(service.submit('chat', 1, 'B')).rejects.toThrow(ConcurrentModificationError);
    await service.start({ mode: 'immediate', range: [10, 12] }, 'chat');

    await stale;
    const stored = await sessions.get('chat');
    expect(stored?.mode).toBe('immediate');
    expect(stored?.questionIds).toEqual([10, 11, 12]);
    expect(stored?.answers).toEqual({});
  });

  it('should fail for unknown or discarded sessions', async () => {
    const { sessionId } = await service.start({ mode: 'immediate', range: [1, 2] });
    await service.discard(sessionId);

    await expect(service.current(sessionId)).rejects.toThrow(SessionNotFoundError);
    await expect(service.discard(sessionId)).rejects.toThrow(SessionNotFoundError);
    await expect(service.submit('missing', 1, 'B')).rejects.toThrow(
      'Quiz session missing was not found or has expired',
    );
  });
});
