import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import * as path from 'path';

import { AppSettings } from '../config/configuration';
import { QuestionStore } from './question-store';
import { QuizEngine } from './quiz-engine';
import { QuizErrorFilter } from './quiz-error.filter';
import { QuizController } from './quiz.controller';
import { QuizService } from './quiz.service';
import { InMemorySessionRepository, SESSION_REPOSITORY } from './session.repository';

@Module({
  controllers: [QuizController],
  providers: [
    {
      provide: QuestionStore,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const { questionsFile } = config.getOrThrow<AppSettings>('app');
        return QuestionStore.fromFile(path.resolve(process.cwd(), questionsFile));
      },
    },
    {
      provide: QuizEngine,
      inject: [QuestionStore, ConfigService],
      useFactory: (store: QuestionStore, config: ConfigService) =>
        new QuizEngine(store, { shuffleOptions: config.getOrThrow<AppSettings>('app').shuffleOptions }),
    },
    {
      provide: SESSION_REPOSITORY,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new InMemorySessionRepository({
          ttlMs: config.getOrThrow<AppSettings>('app').sessionTtlMinutes * 60_000,
        }),
    },
    { provide: APP_FILTER, useClass: QuizErrorFilter },
    QuizService,
  ],
  exports: [QuizService],
})
export class QuizModule {}
