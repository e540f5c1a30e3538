import { ChoiceQuestion, HotspotSlot, Question, QuestionKind } from './question';
import { RandomSource, shuffle } from './shuffle';

/**
 * How a question is laid out for one session. Choice questions keep their
 * letter labels in place and permute the texts behind them; hotspot
 * questions permute each slot's choice list.
 */
export type Presentation =
  | { kind: 'choice'; order: string[] }
  | { kind: 'hotspot'; order: Record<string, string[]> };

export interface PresentedOption {
  label: string;
  text: string;
}

export type PresentedQuestion =
  | {
      kind: Extract<QuestionKind, 'single' | 'multiple'>;
      questionId: number;
      prompt: string;
      options: PresentedOption[];
      selectCount: number;
    }
  | {
      kind: 'hotspot';
      questionId: number;
      prompt: string;
      slots: HotspotSlot[];
    };

export function present(question: Question, shuffleOptions: boolean, random: RandomSource): Presentation {
  if (question.kind === 'hotspot') {
    const order: Record<string, string[]> = {};
    for (const slot of question.slots) {
      order[slot.id] = shuffleOptions ? shuffle(slot.choices, random) : [...slot.choices];
    }
    return { kind: 'hotspot', order };
  }

  const ids = question.options.map((option) => option.id);
  return { kind: 'choice', order: shuffleOptions ? shuffle(ids, random) : ids };
}

/**
 * Translates between the labels a user sees and the option ids the
 * question was written with.
 */
export class ChoiceLayout {
  private readonly labels: string[];
  private readonly order: string[];
  private readonly textById: Map<string, string>;

  constructor(question: ChoiceQuestion, presentation?: Presentation) {
    this.labels = question.options.map((option) => option.id);
    this.order =
      presentation?.kind === 'choice' && presentation.order.length === this.labels.length
        ? presentation.order
        : this.labels;
    this.textById = new Map(question.options.map((option) => [option.id, option.text]));
  }

  get options(): PresentedOption[] {
    return this.labels.map((label, index) => ({
      label,
      text: this.textById.get(this.order[index]) ?? '',
    }));
  }

  /** Option id behind a displayed label; case-insensitive. */
  resolve(label: string): string | undefined {
    const wanted = label.trim().toUpperCase();
    const index = this.labels.findIndex((candidate) => candidate.toUpperCase() === wanted);
    return index === -1 ? undefined : this.order[index];
  }

  labelOf(optionId: string): string {
    const index = this.order.indexOf(optionId);
    return index === -1 ? optionId : this.labels[index];
  }

  /** `A) text | C) text`, sorted by displayed label. */
  display(optionIds: readonly string[]): string {
    return optionIds
      .map((id) => ({ label: this.labelOf(id), text: this.textById.get(id) ?? '' }))
      .sort((a, b) => a.label.localeCompare(b.label))
      .map(({ label, text }) => `${label}) ${text}`)
      .join(' | ');
  }
}

export function presentQuestion(question: Question, presentation?: Presentation): PresentedQuestion {
  if (question.kind === 'hotspot') {
    const order = presentation?.kind === 'hotspot' ? presentation.order : {};
    return {
      kind: 'hotspot',
      questionId: question.id,
      prompt: question.prompt,
      slots: question.slots.map((slot) => ({ ...slot, choices: order[slot.id] ?? [...slot.choices] })),
    };
  }

  return {
    kind: question.kind,
    questionId: question.id,
    prompt: question.prompt,
    options: new ChoiceLayout(question, presentation).options,
    selectCount: question.kind === 'multiple' ? question.correct.length : 1,
  };
}
