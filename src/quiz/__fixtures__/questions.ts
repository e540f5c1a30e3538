import { Question } from '../question';
import { QuestionStore } from '../question-store';

/**
 * Data-file records numbered 1..count. Every fifth question is
 * multi-select (A and C), every sixth otherwise is a hotspot, the rest are
 * single-select with B correct. Odd-numbered questions carry an explanation.
 */
export function questionRecords(count: number): Record<string, unknown>[] {
  return Array.from({ length: count }, (_, index) => {
    const n = index + 1;
    const explanation = n % 2 === 1 ? `Explanation for question ${n}` : undefined;

    if (n % 5 !== 0 && n % 6 === 0) {
      return {
        question_number: n,
        question: `Match the items for question ${n}`,
        options: {
          service: ['Alpha', 'Beta', 'Gamma'],
          model_family: ['Small', 'Large'],
        },
        correct_answer: { service: 'Beta', model_family: 'Large' },
        explanation,
      };
    }

    return {
      question_number: n,
      question: `Question ${n}?`,
      options: {
        A: `Option A of ${n}`,
        B: `Option B of ${n}`,
        C: `Option C of ${n}`,
        D: `Option D of ${n}`,
      },
      correct_answer: n % 5 === 0 ? ['A', 'C'] : ['B'],
      explanation,
    };
  });
}

export function buildStore(count = 65): QuestionStore {
  return QuestionStore.fromRecords(questionRecords(count));
}

/** Answer in displayed labels, valid when options are not shuffled. */
export function correctAnswerFor(question: Question): unknown {
  switch (question.kind) {
    case 'single':
      return question.correct;
    case 'multiple':
      return [...question.correct];
    case 'hotspot':
      return { ...question.correct };
  }
}

export function wrongAnswerFor(question: Question): unknown {
  switch (question.kind) {
    case 'single':
      return question.options.find((option) => option.id !== question.correct)?.id;
    case 'multiple':
      return [question.correct[0]];
    case 'hotspot': {
      const [slot] = question.slots;
      return { [slot.id]: slot.choices.find((choice) => choice !== question.correct[slot.id]) };
    }
  }
}
