import { Answer } from './question';
import { Presentation } from './presentation';

export type QuizMode = 'immediate' | 'exam';

export const QUIZ_MODES: readonly QuizMode[] = ['immediate', 'exam'];

export type SessionState = 'created' | 'in_progress' | 'completed';

export interface QuizSession {
  id: string;
  mode: QuizMode;
  state: SessionState;
  questionIds: number[];
  /** Index of the first unanswered question; `questionIds.length` once all are answered. */
  position: number;
  presentations: Record<number, Presentation>;
  answers: Record<number, Answer>;
  correctness: Record<number, boolean>;
  /** Bumped on every change; the repository compares it on write. */
  version: number;
  startedAt: string;
  finishedAt?: string;
}

export interface Progress {
  current: number;
  total: number;
  answered: number;
  percentage: number;
  /** Running score, only reported in immediate mode. */
  correct?: number;
}

export function isQuizMode(value: unknown): value is QuizMode {
  return QUIZ_MODES.some((mode) => mode === value);
}

export function unansweredIds(session: QuizSession): number[] {
  return session.questionIds.filter((id) => session.answers[id] === undefined);
}

export function firstUnansweredPosition(session: Pick<QuizSession, 'questionIds' | 'answers'>): number {
  const index = session.questionIds.findIndex((id) => session.answers[id] === undefined);
  return index === -1 ? session.questionIds.length : index;
}

/** One decimal place, as shown on the results page. */
export function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 1000) / 10;
}
