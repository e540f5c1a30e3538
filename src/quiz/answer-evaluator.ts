import {
  Answer,
  HotspotQuestion,
  MultiSelectQuestion,
  Question,
  QuestionKind,
  SingleSelectQuestion,
} from './question';
import { ChoiceLayout, Presentation } from './presentation';
import { InvalidAnswerError } from './quiz.errors';

const NOT_ANSWERED = 'Not answered';

/**
 * Per-kind answer handling. `parse` takes whatever the client sent (in
 * displayed labels) and returns the canonical answer; `evaluate` and the
 * describe methods only ever see canonical answers.
 */
export interface AnswerEvaluator {
  readonly kind: QuestionKind;
  parse(raw: unknown): Answer;
  evaluate(submitted: Answer): boolean;
  describe(submitted: Answer | undefined): string;
  describeCorrect(): string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class SingleSelectEvaluator implements AnswerEvaluator {
  readonly kind = 'single';
  private readonly layout: ChoiceLayout;

  constructor(private readonly question: SingleSelectQuestion, presentation?: Presentation) {
    this.layout = new ChoiceLayout(question, presentation);
  }

  parse(raw: unknown): Answer {
    const label = Array.isArray(raw) && raw.length === 1 ? raw[0] : raw;
    if (typeof label !== 'string' || label.trim() === '') {
      throw new InvalidAnswerError(`Question ${this.question.id} takes exactly one option`);
    }
    const choice = this.layout.resolve(label);
    if (choice === undefined) {
      throw new InvalidAnswerError(`Question ${this.question.id} has no option "${label.trim()}"`);
    }
    return { kind: 'single', choice };
  }

  evaluate(submitted: Answer): boolean {
    return submitted.kind === 'single' && submitted.choice === this.question.correct;
  }

  describe(submitted: Answer | undefined): string {
    return submitted?.kind === 'single' ? this.layout.display([submitted.choice]) : NOT_ANSWERED;
  }

  describeCorrect(): string {
    return this.layout.display([this.question.correct]);
  }
}

class MultiSelectEvaluator implements AnswerEvaluator {
  readonly kind = 'multiple';
  private readonly layout: ChoiceLayout;

  constructor(private readonly question: MultiSelectQuestion, presentation?: Presentation) {
    this.layout = new ChoiceLayout(question, presentation);
  }

  parse(raw: unknown): Answer {
    const labels = typeof raw === 'string' ? raw.split(',') : raw;
    if (!Array.isArray(labels) || !labels.every((label): label is string => typeof label === 'string')) {
      throw new InvalidAnswerError(`Question ${this.question.id} takes a list of options`);
    }

    const choices = new Set<string>();
    for (const label of labels) {
      if (label.trim() === '') continue;
      const choice = this.layout.resolve(label);
      if (choice === undefined) {
        throw new InvalidAnswerError(`Question ${this.question.id} has no option "${label.trim()}"`);
      }
      choices.add(choice);
    }
    if (choices.size === 0) {
      throw new InvalidAnswerError(`Select at least one option for question ${this.question.id}`);
    }
    return { kind: 'multiple', choices: [...choices].sort() };
  }

  evaluate(submitted: Answer): boolean {
    if (submitted.kind !== 'multiple') return false;
    const chosen = new Set(submitted.choices);
    const correct = new Set(this.question.correct);
    return chosen.size === correct.size && [...chosen].every((choice) => correct.has(choice));
  }

  describe(submitted: Answer | undefined): string {
    return submitted?.kind === 'multiple' ? this.layout.display(submitted.choices) : NOT_ANSWERED;
  }

  describeCorrect(): string {
    return this.layout.display(this.question.correct);
  }
}

class HotspotEvaluator implements AnswerEvaluator {
  readonly kind = 'hotspot';

  constructor(private readonly question: HotspotQuestion) {}

  parse(raw: unknown): Answer {
    if (!isRecord(raw)) {
      throw new InvalidAnswerError(`Question ${this.question.id} takes an object of slot to choice`);
    }

    const mapping: Record<string, string> = {};
    for (const [slotId, value] of Object.entries(raw)) {
      const slot = this.question.slots.find((candidate) => candidate.id === slotId);
      if (!slot) {
        throw new InvalidAnswerError(`Question ${this.question.id} has no slot "${slotId}"`);
      }
      if (value === undefined || value === null || value === '') continue;
      const choice = typeof value === 'string' ? slot.choices.find((c) => c === value.trim()) : undefined;
      if (choice === undefined) {
        throw new InvalidAnswerError(`"${String(value)}" is not a choice for ${slot.label}`);
      }
      mapping[slotId] = choice;
    }
    if (Object.keys(mapping).length === 0) {
      throw new InvalidAnswerError(`Fill in at least one slot for question ${this.question.id}`);
    }
    return { kind: 'hotspot', mapping };
  }

  evaluate(submitted: Answer): boolean {
    if (submitted.kind !== 'hotspot') return false;
    const { mapping } = submitted;
    return this.question.slots.every((slot) => mapping[slot.id] === this.question.correct[slot.id]);
  }

  describe(submitted: Answer | undefined): string {
    if (submitted?.kind !== 'hotspot') return NOT_ANSWERED;
    const { mapping } = submitted;
    return this.question.slots
      .map((slot) => `${slot.label}: ${mapping[slot.id] ?? NOT_ANSWERED}`)
      .join(' | ');
  }

  describeCorrect(): string {
    return this.question.slots.map((slot) => `${slot.label}: ${this.question.correct[slot.id]}`).join(' | ');
  }
}

export function evaluatorFor(question: Question, presentation?: Presentation): AnswerEvaluator {
  switch (question.kind) {
    case 'single':
      return new SingleSelectEvaluator(question, presentation);
    case 'multiple':
      return new MultiSelectEvaluator(question, presentation);
    case 'hotspot':
      return new HotspotEvaluator(question);
  }
}

/** Feedback text for questions that ship without their own explanation. */
export function defaultExplanation(question: Question, evaluator: AnswerEvaluator): string {
  const plural = question.kind === 'single' ? '' : 's';
  return `The correct answer${plural}: ${evaluator.describeCorrect()}`;
}
