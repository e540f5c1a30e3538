import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';

import { PresentedQuestion } from './presentation';
import { QuestionStore } from './question-store';
import {
  FinishOptions,
  QuizEngine,
  ResultSummary,
  SubmissionOutcome,
  parseQuizConfig,
} from './quiz-engine';
import { SessionNotFinishedError, SessionNotFoundError } from './quiz.errors';
import { Progress, QuizMode, QuizSession, SessionState } from './session';
import { SESSION_REPOSITORY, SessionRepository } from './session.repository';

export interface SessionView {
  sessionId: string;
  mode: QuizMode;
  state: SessionState;
  questionIds: number[];
  progress: Progress;
}

export interface CurrentQuestionView extends SessionView {
  /** Absent once every question has an answer. */
  question?: PresentedQuestion;
}

@Injectable()
export class QuizService {
  private readonly logger = new Logger(QuizService.name);

  constructor(
    private readonly store: QuestionStore,
    private readonly engine: QuizEngine,
    @Inject(SESSION_REPOSITORY) private readonly sessions: SessionRepository,
  ) {}

  totalQuestions(): number {
    return this.store.size;
  }

  /**
   * Starts a quiz from a client-supplied configuration. A given `key`
   * replaces whatever session was stored under it.
   */
  async start(rawConfig: unknown, key: string = randomUUID()): Promise<SessionView> {
    const config = parseQuizConfig(rawConfig);
    const session = this.engine.start(config, key);
    await this.sessions.put(key, session);

    this.logger.log(`🚀 Started ${session.mode} quiz ${key} with ${session.questionIds.length} questions`);
    return this.view(session);
  }

  async current(key: string): Promise<CurrentQuestionView> {
    const session = await this.load(key);
    return { ...this.view(session), question: this.engine.currentQuestion(session) };
  }

  async questions(key: string): Promise<PresentedQuestion[]> {
    return this.engine.presentAll(await this.load(key));
  }

  async submit(key: string, questionId: number, answer: unknown): Promise<SubmissionOutcome> {
    const session = await this.load(key);
    const { session: next, outcome } = this.engine.submitAnswer(session, questionId, answer);
    await this.sessions.put(key, next, session.version);

    this.logger.debug(`📝 Quiz ${key}: answer recorded for question ${questionId}`);
    return outcome;
  }

  async finish(key: string, options: FinishOptions = {}): Promise<ResultSummary> {
    const session = await this.load(key);
    const { session: completed, summary } = this.engine.finish(session, options);
    await this.sessions.put(key, completed, session.version);

    this.logger.log(`🏁 Quiz ${key} finished: ${summary.correct}/${summary.total} (${summary.scorePercentage}%)`);
    return summary;
  }

  async results(key: string): Promise<ResultSummary> {
    const session = await this.load(key);
    if (session.state !== 'completed') throw new SessionNotFinishedError();
    return this.engine.summarize(session);
  }

  async discard(key: string): Promise<void> {
    if (!(await this.sessions.delete(key))) throw new SessionNotFoundError(key);
    this.logger.debug(`🗑️ Quiz ${key} discarded`);
  }

  private async load(key: string): Promise<QuizSession> {
    const session = await this.sessions.get(key);
    if (!session) throw new SessionNotFoundError(key);
    return session;
  }

  private view(session: QuizSession): SessionView {
    return {
      sessionId: session.id,
      mode: session.mode,
      state: session.state,
      questionIds: [...session.questionIds],
      progress: this.engine.progress(session),
    };
  }
}
