import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';

import { PresentedQuestion } from './presentation';
import { ResultSummary, SubmissionOutcome } from './quiz-engine';
import { InvalidAnswerError } from './quiz.errors';
import { CurrentQuestionView, QuizService, SessionView } from './quiz.service';

export interface QuestionCountResponse {
  total: number;
  status: 'success' | 'error';
  message: string;
}

function field(body: unknown, name: string): unknown {
  return typeof body === 'object' && body !== null ? Reflect.get(body, name) : undefined;
}

function questionIdOf(body: unknown): number {
  const raw = field(body, 'questionId');
  const id = typeof raw === 'string' && /^\d+$/.test(raw.trim()) ? Number(raw) : raw;
  if (typeof id !== 'number' || !Number.isInteger(id)) {
    throw new InvalidAnswerError('questionId must be a whole number');
  }
  return id;
}

@Controller()
export class QuizController {
  constructor(private readonly quizService: QuizService) {}

  @Get('api/questions/count')
  count(): QuestionCountResponse {
    const total = this.quizService.totalQuestions();
    return {
      total,
      status: total > 0 ? 'success' : 'error',
      message: total > 0 ? 'Questions loaded successfully' : 'No questions found',
    };
  }

  @Post('quiz')
  start(@Body() body: unknown): Promise<SessionView> {
    return this.quizService.start(body);
  }

  @Get('quiz/:sessionId')
  current(@Param('sessionId') sessionId: string): Promise<CurrentQuestionView> {
    return this.quizService.current(sessionId);
  }

  @Get('quiz/:sessionId/questions')
  questions(@Param('sessionId') sessionId: string): Promise<PresentedQuestion[]> {
    return this.quizService.questions(sessionId);
  }

  @Post('quiz/:sessionId/answers')
  @HttpCode(HttpStatus.OK)
  async submit(@Param('sessionId') sessionId: string, @Body() body: unknown): Promise<SubmissionOutcome> {
    return this.quizService.submit(sessionId, questionIdOf(body), field(body, 'answer'));
  }

  @Post('quiz/:sessionId/finish')
  @HttpCode(HttpStatus.OK)
  finish(@Param('sessionId') sessionId: string, @Body() body: unknown): Promise<ResultSummary> {
    return this.quizService.finish(sessionId, { force: field(body, 'force') === true });
  }

  @Get('quiz/:sessionId/results')
  results(@Param('sessionId') sessionId: string): Promise<ResultSummary> {
    return this.quizService.results(sessionId);
  }

  @Delete('quiz/:sessionId')
  @HttpCode(HttpStatus.NO_CONTENT)
  discard(@Param('sessionId') sessionId: string): Promise<void> {
    return this.quizService.discard(sessionId);
  }
}
