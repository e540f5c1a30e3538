export type QuizErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'INVALID_ANSWER'
  | 'UNKNOWN_QUESTION'
  | 'SESSION_NOT_FOUND'
  | 'INCOMPLETE_SESSION'
  | 'QUESTION_ALREADY_ANSWERED'
  | 'SESSION_COMPLETED'
  | 'SESSION_NOT_FINISHED'
  | 'CONCURRENT_MODIFICATION';

/**
 * Base class for every rejection the quiz raises. All of them are
 * per-request validation failures; none leaves a session half-updated.
 */
export abstract class QuizError extends Error {
  abstract readonly code: QuizErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends QuizError {
  readonly code = 'INVALID_CONFIGURATION';
}

export class InvalidAnswerError extends QuizError {
  readonly code = 'INVALID_ANSWER';
}

export class UnknownQuestionError extends QuizError {
  readonly code = 'UNKNOWN_QUESTION';

  constructor(public readonly questionId: number) {
    super(`Question ${questionId} is not part of this quiz`);
  }
}

export class SessionNotFoundError extends QuizError {
  readonly code = 'SESSION_NOT_FOUND';

  constructor(public readonly sessionKey: string) {
    super(`Quiz session ${sessionKey} was not found or has expired`);
  }
}

export class IncompleteSessionError extends QuizError {
  readonly code = 'INCOMPLETE_SESSION';

  constructor(public readonly unanswered: number[]) {
    super(
      `${unanswered.length} question(s) still unanswered: ${unanswered.join(', ')}. ` +
        'Answer them or finish with force to score them as incorrect',
    );
  }
}

export class QuestionAlreadyAnsweredError extends QuizError {
  readonly code = 'QUESTION_ALREADY_ANSWERED';

  constructor(public readonly questionId: number) {
    super(`Question ${questionId} has already been answered`);
  }
}

export class SessionCompletedError extends QuizError {
  readonly code = 'SESSION_COMPLETED';

  constructor() {
    super('This quiz has already been finished');
  }
}

export class SessionNotFinishedError extends QuizError {
  readonly code = 'SESSION_NOT_FINISHED';

  constructor() {
    super('Results are available once the quiz is finished');
  }
}

export class ConcurrentModificationError extends QuizError {
  readonly code = 'CONCURRENT_MODIFICATION';

  constructor(
    public readonly sessionKey: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number,
  ) {
    super(
      `Quiz session ${sessionKey} changed while this request was running ` +
        `(expected version ${expectedVersion}, found ${actualVersion})`,
    );
  }
}
