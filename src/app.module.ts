import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { BotModule } from './bot/bot.module';
import configuration from './config/configuration';
import { QuizModule } from './quiz/quiz.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, load: [configuration] }), QuizModule, BotModule],
})
export class AppModule {}
