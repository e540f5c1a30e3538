import { defaultExplanation, evaluatorFor } from './answer-evaluator';
import { Presentation, PresentedQuestion, present, presentQuestion } from './presentation';
import { Answer, Question, QuestionKind } from './question';
import { QuestionStore } from './question-store';
import {
  IncompleteSessionError,
  InvalidConfigurationError,
  QuestionAlreadyAnsweredError,
  SessionCompletedError,
  UnknownQuestionError,
} from './quiz.errors';
import { RandomSource, sample } from './shuffle';
import {
  Progress,
  QUIZ_MODES,
  QuizMode,
  QuizSession,
  firstUnansweredPosition,
  isQuizMode,
  percentage,
  unansweredIds,
} from './session';

export interface QuizConfig {
  mode: QuizMode;
  /** Inclusive question-number range. */
  range?: [number, number];
  randomCount?: number;
  /** Overrides the engine default for this session. */
  shuffleOptions?: boolean;
}

export type SubmissionOutcome =
  | {
      mode: 'immediate';
      questionId: number;
      correct: boolean;
      userAnswer: string;
      correctAnswer: string;
      explanation: string;
      progress: Progress;
    }
  | {
      mode: 'exam';
      questionId: number;
      received: true;
      progress: Progress;
    };

export interface QuestionResult {
  questionId: number;
  prompt: string;
  kind: QuestionKind;
  answered: boolean;
  correct: boolean;
  userAnswer: string;
  correctAnswer: string;
  explanation: string;
}

export interface ReadinessLevel {
  label: string;
  tone: 'success' | 'warning' | 'danger';
}

export interface ResultSummary {
  mode: QuizMode;
  correct: number;
  total: number;
  unanswered: number;
  scorePercentage: number;
  level: ReadinessLevel;
  questions: QuestionResult[];
}

export interface FinishOptions {
  /** Score unanswered exam questions as incorrect instead of rejecting. */
  force?: boolean;
}

export interface QuizEngineOptions {
  random?: RandomSource;
  now?: () => Date;
  shuffleOptions?: boolean;
}

function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isInteger(value) ? value : undefined;
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates the shape of a start request. Bounds against the question bank
 * are checked by {@link QuizEngine.start}.
 */
export function parseQuizConfig(raw: unknown): QuizConfig {
  if (!isRecord(raw)) {
    throw new InvalidConfigurationError('Quiz configuration must be an object');
  }
  if (!isQuizMode(raw.mode)) {
    throw new InvalidConfigurationError(
      `Unknown quiz mode "${String(raw.mode)}"; expected one of ${QUIZ_MODES.join(', ')}`,
    );
  }
  const config: QuizConfig = { mode: raw.mode };

  if (raw.range !== undefined) {
    if (!Array.isArray(raw.range) || raw.range.length !== 2) {
      throw new InvalidConfigurationError('range must be a pair [start, end]');
    }
    const start = toInteger(raw.range[0]);
    const end = toInteger(raw.range[1]);
    if (start === undefined || end === undefined) {
      throw new InvalidConfigurationError('range bounds must be whole numbers');
    }
    config.range = [start, end];
  }

  if (raw.randomCount !== undefined) {
    const count = toInteger(raw.randomCount);
    if (count === undefined) {
      throw new InvalidConfigurationError('randomCount must be a whole number');
    }
    config.randomCount = count;
  }

  if (raw.shuffleOptions !== undefined) {
    if (typeof raw.shuffleOptions !== 'boolean') {
      throw new InvalidConfigurationError('shuffleOptions must be true or false');
    }
    config.shuffleOptions = raw.shuffleOptions;
  }

  return config;
}

export function readinessLevel(scorePercentage: number): ReadinessLevel {
  if (scorePercentage >= 80) return { label: 'Excellent - Ready for the exam', tone: 'success' };
  if (scorePercentage >= 70) return { label: 'Good - Almost ready', tone: 'warning' };
  return { label: 'Needs more study', tone: 'danger' };
}

/**
 * Session state machine over a read-only question bank. Every operation
 * returns a new session value and never touches the one it was given.
 *
 *   created -> in_progress -> completed
 *   created ---------------> completed   (finish without answers)
 */
export class QuizEngine {
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly shuffleOptions: boolean;

  constructor(
    private readonly store: QuestionStore,
    options: QuizEngineOptions = {},
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.shuffleOptions = options.shuffleOptions ?? true;
  }

  start(config: QuizConfig, sessionId: string): QuizSession {
    const questionIds = this.select(config);
    const shuffleOptions = config.shuffleOptions ?? this.shuffleOptions;

    const presentations: Record<number, Presentation> = {};
    for (const id of questionIds) {
      presentations[id] = present(this.question(id), shuffleOptions, this.random);
    }

    return {
      id: sessionId,
      mode: config.mode,
      state: 'created',
      questionIds,
      position: 0,
      presentations,
      answers: {},
      correctness: {},
      version: 0,
      startedAt: this.now().toISOString(),
    };
  }

  submitAnswer(
    session: QuizSession,
    questionId: number,
    raw: unknown,
  ): { session: QuizSession; outcome: SubmissionOutcome } {
    if (session.state === 'completed') throw new SessionCompletedError();
    if (!session.questionIds.includes(questionId)) throw new UnknownQuestionError(questionId);
    if (session.mode === 'immediate' && session.answers[questionId] !== undefined) {
      throw new QuestionAlreadyAnsweredError(questionId);
    }

    const question = this.question(questionId);
    const evaluator = evaluatorFor(question, session.presentations[questionId]);
    const answer = evaluator.parse(raw);
    const correct = evaluator.evaluate(answer);

    const answers = { ...session.answers, [questionId]: answer };
    const next: QuizSession = {
      ...session,
      state: 'in_progress',
      answers,
      correctness: { ...session.correctness, [questionId]: correct },
      position: firstUnansweredPosition({ questionIds: session.questionIds, answers }),
      version: session.version + 1,
    };
    const progress = this.progress(next);

    if (session.mode === 'exam') {
      return { session: next, outcome: { mode: 'exam', questionId, received: true, progress } };
    }
    return {
      session: next,
      outcome: {
        mode: 'immediate',
        questionId,
        correct,
        userAnswer: evaluator.describe(answer),
        correctAnswer: evaluator.describeCorrect(),
        explanation: question.explanation ?? defaultExplanation(question, evaluator),
        progress,
      },
    };
  }

  finish(session: QuizSession, options: FinishOptions = {}): { session: QuizSession; summary: ResultSummary } {
    if (session.state === 'completed') throw new SessionCompletedError();

    const unanswered = unansweredIds(session);
    if (session.mode === 'exam' && unanswered.length > 0 && !options.force) {
      throw new IncompleteSessionError(unanswered);
    }

    // Exam answers may have been replaced since they were first scored.
    const correctness: Record<number, boolean> = {};
    for (const id of session.questionIds) {
      const answer = session.answers[id];
      if (answer !== undefined) correctness[id] = this.evaluate(session, id, answer);
    }

    const completed: QuizSession = {
      ...session,
      state: 'completed',
      correctness,
      version: session.version + 1,
      finishedAt: this.now().toISOString(),
    };
    return { session: completed, summary: this.summarize(completed) };
  }

  progress(session: QuizSession): Progress {
    const total = session.questionIds.length;
    const answered = total - unansweredIds(session).length;
    const progress: Progress = {
      current: Math.min(session.position + 1, total),
      total,
      answered,
      percentage: percentage(answered, total),
    };
    if (session.mode === 'immediate') {
      progress.correct = Object.values(session.correctness).filter(Boolean).length;
    }
    return progress;
  }

  /** The question at the current position, or undefined once all are answered. */
  currentQuestion(session: QuizSession): PresentedQuestion | undefined {
    if (session.position >= session.questionIds.length) return undefined;
    const id = session.questionIds[session.position];
    return presentQuestion(this.question(id), session.presentations[id]);
  }

  presentAll(session: QuizSession): PresentedQuestion[] {
    return session.questionIds.map((id) => presentQuestion(this.question(id), session.presentations[id]));
  }

  summarize(session: QuizSession): ResultSummary {
    const questions = session.questionIds.map((id): QuestionResult => {
      const question = this.question(id);
      const evaluator = evaluatorFor(question, session.presentations[id]);
      const answer = session.answers[id];
      return {
        questionId: id,
        prompt: question.prompt,
        kind: question.kind,
        answered: answer !== undefined,
        correct: session.correctness[id] === true,
        userAnswer: evaluator.describe(answer),
        correctAnswer: evaluator.describeCorrect(),
        explanation: question.explanation ?? defaultExplanation(question, evaluator),
      };
    });

    const total = questions.length;
    const correct = questions.filter((result) => result.correct).length;
    const scorePercentage = percentage(correct, total);
    return {
      mode: session.mode,
      correct,
      total,
      unanswered: questions.filter((result) => !result.answered).length,
      scorePercentage,
      level: readinessLevel(scorePercentage),
      questions,
    };
  }

  private select(config: QuizConfig): number[] {
    if (this.store.size === 0) {
      throw new InvalidConfigurationError('No questions are available');
    }
    if (config.range !== undefined && config.randomCount !== undefined) {
      throw new InvalidConfigurationError('Choose either a range or a random count, not both');
    }

    if (config.range !== undefined) {
      const [start, end] = config.range;
      const last = this.store.maxId;
      if (start < 1 || end < start || end > last) {
        throw new InvalidConfigurationError(`Range ${start}-${end} must lie within 1-${last}`);
      }
      const ids = this.store.idsInRange(start, end);
      if (ids.length === 0) {
        throw new InvalidConfigurationError(`No questions are numbered within ${start}-${end}`);
      }
      return ids;
    }

    const ids = this.store.all().map((question) => question.id);
    if (config.randomCount !== undefined) {
      const count = config.randomCount;
      if (count < 1 || count > ids.length) {
        throw new InvalidConfigurationError(
          `Cannot pick ${count} random questions; between 1 and ${ids.length} are available`,
        );
      }
      return sample(ids, count, this.random);
    }
    return ids;
  }

  private evaluate(session: QuizSession, id: number, answer: Answer): boolean {
    return evaluatorFor(this.question(id), session.presentations[id]).evaluate(answer);
  }

  private question(id: number): Question {
    const question = this.store.get(id);
    if (!question) throw new UnknownQuestionError(id);
    return question;
  }
}
