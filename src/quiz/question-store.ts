import { Logger } from '@nestjs/common';
import * as fs from 'fs';

import { HotspotSlot, Question, QuestionOption, slotLabel } from './question';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Converts one record of the bundled data file into a question, or returns
 * the reason it cannot be used.
 */
export function parseQuestionRecord(record: unknown): Question | string {
  if (!isRecord(record)) return 'not an object';

  const id = record.question_number;
  if (typeof id !== 'number' || !Number.isInteger(id) || id < 1) {
    return 'question_number must be a positive integer';
  }
  if (!isNonEmptyString(record.question)) return 'question text is missing';
  if (!isRecord(record.options)) return 'options must be an object';

  const prompt = record.question.trim();
  const explanation = isNonEmptyString(record.explanation) ? record.explanation.trim() : undefined;
  const correct = record.correct_answer;

  if (isRecord(correct)) {
    const slots: HotspotSlot[] = [];
    const mapping: Record<string, string> = {};
    for (const [slotId, choices] of Object.entries(record.options)) {
      if (!Array.isArray(choices) || choices.length < 2 || !choices.every(isNonEmptyString)) {
        return `slot ${slotId} needs at least two choices`;
      }
      const answer = correct[slotId];
      if (typeof answer !== 'string' || !choices.includes(answer)) {
        return `slot ${slotId} has no valid correct choice`;
      }
      slots.push({ id: slotId, label: slotLabel(slotId), choices: [...choices] });
      mapping[slotId] = answer;
    }
    if (slots.length === 0) return 'hotspot question has no slots';
    return { kind: 'hotspot', id, prompt, explanation, slots, correct: mapping };
  }

  const options: QuestionOption[] = [];
  for (const [optionId, text] of Object.entries(record.options)) {
    if (!isNonEmptyString(text)) return `option ${optionId} has no text`;
    options.push({ id: optionId, text: text.trim() });
  }
  if (options.length < 2) return 'needs at least two options';

  if (!Array.isArray(correct) || correct.length === 0 || !correct.every(isNonEmptyString)) {
    return 'correct_answer must be a list of option ids or a slot mapping';
  }
  const correctIds = [...new Set(correct)];
  const unknown = correctIds.find((answer) => !options.some((option) => option.id === answer));
  if (unknown !== undefined) return `correct answer ${unknown} is not an option`;

  if (correctIds.length === 1) {
    return { kind: 'single', id, prompt, explanation, options, correct: correctIds[0] };
  }
  return { kind: 'multiple', id, prompt, explanation, options, correct: correctIds.sort() };
}

/**
 * Read-only question bank, loaded once at startup.
 */
export class QuestionStore {
  private static readonly logger = new Logger(QuestionStore.name);

  private readonly byId: Map<number, Question>;

  constructor(questions: readonly Question[]) {
    const ordered = [...questions].sort((a, b) => a.id - b.id);
    this.byId = new Map(ordered.map((question) => [question.id, question]));
  }

  static fromRecords(records: unknown): QuestionStore {
    const logger = QuestionStore.logger;
    if (!Array.isArray(records)) {
      logger.error('❌ Question data must be a JSON array');
      return new QuestionStore([]);
    }

    const questions: Question[] = [];
    const seen = new Set<number>();
    records.forEach((record: unknown, index) => {
      const parsed = parseQuestionRecord(record);
      if (typeof parsed === 'string') {
        logger.warn(`⚠️ Skipping question at index ${index}: ${parsed}`);
        return;
      }
      if (seen.has(parsed.id)) {
        logger.warn(`⚠️ Skipping duplicate question number ${parsed.id} at index ${index}`);
        return;
      }
      seen.add(parsed.id);
      questions.push(parsed);
    });

    return new QuestionStore(questions);
  }

  /**
   * Loads the bundled data file. A missing or malformed file leaves the
   * store empty; quizzes then refuse to start.
   */
  static fromFile(filePath: string): QuestionStore {
    const logger = QuestionStore.logger;
    logger.log(`📂 Loading questions from: ${filePath}`);

    let records: unknown;
    try {
      records = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`❌ Could not load questions from ${filePath}: ${reason}`);
      return new QuestionStore([]);
    }

    const store = QuestionStore.fromRecords(records);
    logger.log(`✅ Loaded ${store.size} questions`);
    return store;
  }

  get size(): number {
    return this.byId.size;
  }

  /** Highest question number, 0 when empty. */
  get maxId(): number {
    let max = 0;
    for (const id of this.byId.keys()) max = Math.max(max, id);
    return max;
  }

  get(id: number): Question | undefined {
    return this.byId.get(id);
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  /** Questions ordered by number. */
  all(): Question[] {
    return [...this.byId.values()];
  }

  /** Question numbers within [start, end], ascending. */
  idsInRange(start: number, end: number): number[] {
    return this.all()
      .map((question) => question.id)
      .filter((id) => id >= start && id <= end);
  }
}
