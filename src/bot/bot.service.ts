import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import TelegramBot from 'node-telegram-bot-api';

import { AppSettings } from '../config/configuration';
import { PresentedQuestion } from '../quiz/presentation';
import { QuizConfig, ResultSummary } from '../quiz/quiz-engine';
import { QuizError, SessionNotFoundError } from '../quiz/quiz.errors';
import { CurrentQuestionView, QuizService } from '../quiz/quiz.service';
import { Progress, QuizMode } from '../quiz/session';

/** The part of the Telegram client the bot talks through. */
export type BotClient = Pick<TelegramBot, 'sendMessage'>;

type Selection = Pick<QuizConfig, 'range' | 'randomCount'>;

type ChatSetup = ({ step: 'choosing_mode' } | { step: 'choosing_questions'; mode: QuizMode }) & {
  expiresAt: number;
};

const NO_ACTIVE_QUIZ = '⚠️ No active quiz. Send /start to begin.';

const MODE_BUTTONS: Record<string, QuizMode> = {
  '⚡ Immediate feedback': 'immediate',
  '📝 Exam mode': 'exam',
};

export function sessionKey(chatId: number): string {
  return `telegram:${chatId}`;
}

/** `all`, a random count (`10`) or a question range (`5-20`). */
export function parseSelection(text: string): Selection | undefined {
  const input = text.trim().toLowerCase();
  if (input === 'all') return {};

  const range = /^(\d+)\s*-\s*(\d+)$/.exec(input);
  if (range) return { range: [Number(range[1]), Number(range[2])] };

  if (/^\d+$/.test(input)) return { randomCount: Number(input) };
  return undefined;
}

/**
 * Turns a chat reply into the answer shape the quiz expects: a letter,
 * letters separated by commas or spaces, or one choice number per
 * hotspot item.
 */
export function answerFromText(question: PresentedQuestion, text: string): unknown {
  const parts = text.split(/[\s,]+/).filter((part) => part.length > 0);

  if (question.kind === 'single') return text.trim();
  if (question.kind !== 'hotspot') return parts;

  if (parts.length !== question.slots.length) return undefined;
  const mapping: Record<string, string> = {};
  for (const [index, slot] of question.slots.entries()) {
    const choice = /^\d+$/.test(parts[index]) ? slot.choices[Number(parts[index]) - 1] : undefined;
    if (choice === undefined) return undefined;
    mapping[slot.id] = choice;
  }
  return mapping;
}

export function formatQuestion(question: PresentedQuestion, progress: Progress): string {
  let text = `📝 Question ${progress.current}/${progress.total}\n\n${question.prompt}\n\n`;

  if (question.kind === 'hotspot') {
    for (const slot of question.slots) {
      text += `${slot.label}:\n`;
      slot.choices.forEach((choice, index) => {
        text += `  ${index + 1}) ${choice}\n`;
      });
    }
    return `${text}\n(Reply with one number per item, e.g. ${question.slots.map(() => '1').join(' ')})`;
  }

  for (const option of question.options) text += `${option.label}) ${option.text}\n`;
  if (question.kind === 'multiple') {
    text += `\n(Select ${question.selectCount}: reply like A,C)`;
  }
  return text.trimEnd();
}

export function formatResults(summary: ResultSummary): string {
  let text =
    '🏁 Quiz finished!\n\n' +
    `📊 Score: ${summary.correct}/${summary.total} (${summary.scorePercentage}%)\n` +
    `${summary.level.label}\n`;
  if (summary.unanswered > 0) text += `⏭️ Unanswered: ${summary.unanswered}\n`;
  return `${text}\nSend /start to try again.`;
}

export function formatProgress(progress: Progress): string {
  const answered = `📝 Answered: ${progress.answered} / ${progress.total}`;
  if (progress.correct === undefined) return `📊 Current progress:\n${answered}`;
  return (
    '📊 Current score:\n' +
    `✅ Correct: ${progress.correct}\n` +
    `❌ Incorrect: ${progress.answered - progress.correct}\n` +
    answered
  );
}

@Injectable()
export class BotService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(BotService.name);
  private readonly setups = new Map<number, ChatSetup>();
  private client?: BotClient;
  private polling?: TelegramBot;
  private readonly setupTtlMs: number;

  constructor(
    private readonly quizService: QuizService,
    private readonly config: ConfigService,
  ) {
    this.setupTtlMs = config.getOrThrow<AppSettings>('app').sessionTtlMinutes * 60_000;
  }

  onModuleInit() {
    const { botToken } = this.config.getOrThrow<AppSettings>('app');
    if (!botToken) {
      this.logger.warn('⚠️ BOT_TOKEN is not set, Telegram bot disabled');
      return;
    }

    const bot = new TelegramBot(botToken, { polling: true });
    bot.on('message', (msg) => {
      this.handleMessage(msg).catch((error: unknown) => {
        this.logger.error(`❌ Failed to handle message from ${msg.chat.id}`, error instanceof Error ? error.stack : error);
      });
    });
    bot.on('polling_error', (error) => {
      this.logger.error(`❌ Polling error: ${error.message}`);
    });

    this.polling = bot;
    this.attach(bot);
    this.logger.log('✅ Bot polling started');
  }

  async onModuleDestroy() {
    await this.polling?.stopPolling();
  }

  attach(client: BotClient) {
    this.client = client;
  }

  async handleMessage(msg: TelegramBot.Message): Promise<void> {
    const chatId = msg.chat.id;
    const text = msg.text?.trim();
    if (!text) return;

    this.logger.debug(`📩 Message from ${chatId}: "${text}"`);
    this.dropExpiredSetups();

    try {
      await this.route(chatId, text);
    } catch (error) {
      if (!(error instanceof QuizError)) throw error;
      await this.send(chatId, `❌ ${error.message}`);
    }
  }

  private async route(chatId: number, text: string): Promise<void> {
    const key = sessionKey(chatId);

    if (text === '/start') {
      await this.forget(key);
      this.setups.set(chatId, { step: 'choosing_mode', expiresAt: this.setupExpiry() });
      await this.send(
        chatId,
        '👋 Welcome to the AWS AI Practitioner quiz!\n\n' +
          `📚 ${this.quizService.totalQuestions()} questions are available. Choose a mode:`,
        {
          reply_markup: {
            keyboard: Object.keys(MODE_BUTTONS).map((label) => [{ text: label }]),
            resize_keyboard: true,
            one_time_keyboard: true,
          },
        },
      );
      return;
    }

    if (text === '/score') {
      const view = await this.active(key);
      await this.send(chatId, view ? formatProgress(view.progress) : NO_ACTIVE_QUIZ);
      return;
    }

    if (text === '/finish') {
      this.setups.delete(chatId);
      if (await this.active(key)) {
        await this.finish(chatId, key, true);
      } else {
        await this.send(chatId, NO_ACTIVE_QUIZ);
      }
      return;
    }

    const mode = MODE_BUTTONS[text];
    if (mode) {
      this.setups.set(chatId, { step: 'choosing_questions', mode, expiresAt: this.setupExpiry() });
      await this.send(
        chatId,
        '🔢 Which questions? Send a number for random questions (e.g. 10), ' +
          "a range of question numbers (e.g. 1-20) or 'all'.",
        { reply_markup: { remove_keyboard: true } },
      );
      return;
    }

    const setup = this.setups.get(chatId);
    if (setup?.step === 'choosing_questions') {
      const selection = parseSelection(text);
      if (!selection) {
        await this.send(chatId, "❌ Send a number, a range like 1-20, or 'all'.");
        return;
      }
      const view = await this.quizService.start({ mode: setup.mode, ...selection }, key);
      this.setups.delete(chatId);
      await this.send(chatId, `🚀 Ready! ${view.progress.total} questions selected in ${view.mode} mode.`);
      await this.sendCurrent(chatId, key);
      return;
    }

    await this.answer(chatId, key, text);
  }

  private async answer(chatId: number, key: string, text: string): Promise<void> {
    const view = await this.active(key);
    if (!view) {
      await this.send(chatId, '⚠️ Start a quiz first with /start.');
      return;
    }
    if (!view.question) {
      await this.finish(chatId, key, false);
      return;
    }

    const answer = answerFromText(view.question, text);
    if (answer === undefined) {
      await this.send(chatId, '❌ Please reply with one number per item, separated by spaces.');
      return;
    }

    const outcome = await this.quizService.submit(key, view.question.questionId, answer);
    if (outcome.mode === 'immediate') {
      await this.send(
        chatId,
        outcome.correct
          ? `✅ Correct!\n\n${outcome.explanation}`
          : `❌ Incorrect. Your answer: ${outcome.userAnswer}\n` +
              `✅ Correct answer: ${outcome.correctAnswer}\n\n${outcome.explanation}`,
      );
    } else {
      await this.send(chatId, '📥 Answer saved.');
    }

    if (outcome.progress.answered >= outcome.progress.total) {
      await this.finish(chatId, key, false);
    } else {
      await this.sendCurrent(chatId, key);
    }
  }

  private async sendCurrent(chatId: number, key: string): Promise<void> {
    const view = await this.quizService.current(key);
    if (!view.question) return;

    const options: TelegramBot.SendMessageOptions =
      view.question.kind === 'hotspot'
        ? { reply_markup: { remove_keyboard: true } }
        : {
            reply_markup: {
              keyboard: chunk(view.question.options.map((option) => ({ text: option.label })), 2),
              resize_keyboard: true,
            },
          };
    await this.send(chatId, formatQuestion(view.question, view.progress), options);
  }

  private async finish(chatId: number, key: string, force: boolean): Promise<void> {
    const summary = await this.quizService.finish(key, { force });
    await this.send(chatId, formatResults(summary), { reply_markup: { remove_keyboard: true } });
    await this.forget(key);
  }

  private async active(key: string): Promise<CurrentQuestionView | undefined> {
    try {
      return await this.quizService.current(key);
    } catch (error) {
      if (error instanceof SessionNotFoundError) return undefined;
      throw error;
    }
  }

  private setupExpiry(): number {
    return Date.now() + this.setupTtlMs;
  }

  /** Chats that chose a mode but never picked questions. */
  private dropExpiredSetups(): void {
    const now = Date.now();
    for (const [chatId, setup] of this.setups) {
      if (setup.expiresAt <= now) this.setups.delete(chatId);
    }
  }

  private async forget(key: string): Promise<void> {
    try {
      await this.quizService.discard(key);
    } catch (error) {
      if (!(error instanceof SessionNotFoundError)) throw error;
    }
  }

  private async send(chatId: number, text: string, options?: TelegramBot.SendMessageOptions): Promise<void> {
    if (!this.client) return;
    await this.client.sendMessage(chatId, text, options);
  }
}

function chunk<T>(items: T[], size: number): T[][] {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += size) rows.push(items.slice(i, i + size));
  return rows;
}
