import { ArgumentsHost, Catch, HttpException, HttpStatus } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';

import { QuizError, QuizErrorCode } from './quiz.errors';

const STATUS_BY_CODE: Record<QuizErrorCode, HttpStatus> = {
  INVALID_CONFIGURATION: HttpStatus.BAD_REQUEST,
  INVALID_ANSWER: HttpStatus.BAD_REQUEST,
  UNKNOWN_QUESTION: HttpStatus.NOT_FOUND,
  SESSION_NOT_FOUND: HttpStatus.NOT_FOUND,
  INCOMPLETE_SESSION: HttpStatus.CONFLICT,
  QUESTION_ALREADY_ANSWERED: HttpStatus.CONFLICT,
  SESSION_COMPLETED: HttpStatus.CONFLICT,
  SESSION_NOT_FINISHED: HttpStatus.CONFLICT,
  CONCURRENT_MODIFICATION: HttpStatus.CONFLICT,
};

export function toHttpException(error: QuizError): HttpException {
  const status = STATUS_BY_CODE[error.code];
  return new HttpException({ statusCode: status, error: error.code, message: error.message }, status);
}

/**
 * Turns quiz rejections into HTTP responses; anything else falls through
 * to Nest's default handling.
 */
@Catch(QuizError)
export class QuizErrorFilter extends BaseExceptionFilter {
  catch(exception: QuizError, host: ArgumentsHost): void {
    super.catch(toHttpException(exception), host);
  }
}
