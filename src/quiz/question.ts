export type QuestionKind = 'single' | 'multiple' | 'hotspot';

export interface QuestionOption {
  id: string;
  text: string;
}

export interface HotspotSlot {
  id: string;
  label: string;
  choices: string[];
}

interface BaseQuestion {
  /** Question number from the data file. */
  id: number;
  prompt: string;
  explanation?: string;
}

export interface SingleSelectQuestion extends BaseQuestion {
  kind: 'single';
  options: QuestionOption[];
  correct: string;
}

export interface MultiSelectQuestion extends BaseQuestion {
  kind: 'multiple';
  options: QuestionOption[];
  correct: string[];
}

export interface HotspotQuestion extends BaseQuestion {
  kind: 'hotspot';
  slots: HotspotSlot[];
  /** Slot id to the choice that belongs there. */
  correct: Record<string, string>;
}

export type ChoiceQuestion = SingleSelectQuestion | MultiSelectQuestion;

export type Question = ChoiceQuestion | HotspotQuestion;

/**
 * Canonical submitted answers, always expressed in the question's own
 * option ids (never in the shuffled labels shown to the user).
 */
export type Answer =
  | { kind: 'single'; choice: string }
  | { kind: 'multiple'; choices: string[] }
  | { kind: 'hotspot'; mapping: Record<string, string> };

/** `text_generation` -> `Text Generation` */
export function slotLabel(slotId: string): string {
  return slotId
    .replace(/_/g, ' ')
    .split(' ')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
