import { defaultExplanation, evaluatorFor } from './answer-evaluator';
import { ChoiceLayout, Presentation, presentQuestion } from './presentation';
import { HotspotQuestion, MultiSelectQuestion, SingleSelectQuestion } from './question';
import { InvalidAnswerError } from './quiz.errors';

const single: SingleSelectQuestion = {
  kind: 'single',
  id: 1,
  prompt: 'Which service hosts foundation models?',
  options: [
    { id: 'A', text: 'Amazon Bedrock' },
    { id: 'B', text: 'Amazon Polly' },
    { id: 'C', text: 'AWS Glue' },
  ],
  correct: 'A',
};

const multiple: MultiSelectQuestion = {
  kind: 'multiple',
  id: 2,
  prompt: 'Pick two',
  options: [
    { id: 'A', text: 'one' },
    { id: 'B', text: 'two' },
    { id: 'C', text: 'three' },
    { id: 'D', text: 'four' },
  ],
  correct: ['A', 'C'],
};

const hotspot: HotspotQuestion = {
  kind: 'hotspot',
  id: 3,
  prompt: 'Match each need',
  slots: [
    { id: 'speech_to_text', label: 'Speech To Text', choices: ['Amazon Transcribe', 'Amazon Polly'] },
    { id: 'text_to_speech', label: 'Text To Speech', choices: ['Amazon Transcribe', 'Amazon Polly'] },
  ],
  correct: { speech_to_text: 'Amazon Transcribe', text_to_speech: 'Amazon Polly' },
};

describe('AnswerEvaluator', () => {
  describe('single-select', () => {
    const evaluator = evaluatorFor(single);

    it('should accept a label regardless of case and whitespace', () => {
      expect(evaluator.parse(' a ')).toEqual({ kind: 'single', choice: 'A' });
      expect(evaluator.parse(['A'])).toEqual({ kind: 'single', choice: 'A' });
    });

    it('should reject unknown labels and wrong shapes', () => {
      expect(() => evaluator.parse('Z')).toThrow(InvalidAnswerError);
      expect(() => evaluator.parse(['A', 'B'])).toThrow('Question 1 takes exactly one option');
      expect(() => evaluator.parse(undefined)).toThrow(InvalidAnswerError);
    });

    it('should compare with the single correct option', () => {
      expect(evaluator.evaluate({ kind: 'single', choice: 'A' })).toBe(true);
      expect(evaluator.evaluate({ kind: 'single', choice: 'B' })).toBe(false);
      expect(evaluator.evaluate({ kind: 'multiple', choices: ['A'] })).toBe(false);
    });

    it('should describe answers with label and text', () => {
      expect(evaluator.describe({ kind: 'single', choice: 'B' })).toBe('B) Amazon Polly');
      expect(evaluator.describe(undefined)).toBe('Not answered');
      expect(defaultExplanation(single, evaluator)).toBe('The correct answer: A) Amazon Bedrock');
    });
  });

  describe('multi-select', () => {
    const evaluator = evaluatorFor(multiple);

    it('should accept lists and comma-separated labels', () => {
      expect(evaluator.parse(['c', 'A'])).toEqual({ kind: 'multiple', choices: ['A', 'C'] });
      expect(evaluator.parse('C, A, C')).toEqual({ kind: 'multiple', choices: ['A', 'C'] });
    });

    it('should reject empty selections', () => {
      expect(() => evaluator.parse([])).toThrow('Select at least one option for question 2');
      expect(() => evaluator.parse(' , ')).toThrow(InvalidAnswerError);
    });

    it('should require exact set equality', () => {
      expect(evaluator.evaluate({ kind: 'multiple', choices: ['C', 'A'] })).toBe(true);
      expect(evaluator.evaluate({ kind: 'multiple', choices: ['A'] })).toBe(false);
      expect(evaluator.evaluate({ kind: 'multiple', choices: ['A', 'B', 'C'] })).toBe(false);
      expect(evaluator.evaluate({ kind: 'multiple', choices: ['A', 'D'] })).toBe(false);
    });

    it('should describe answers sorted by label', () => {
      expect(evaluator.describe({ kind: 'multiple', choices: ['C', 'A'] })).toBe('A) one | C) three');
      expect(defaultExplanation(multiple, evaluator)).toBe('The correct answers: A) one | C) three');
    });
  });

  describe('hotspot', () => {
    const evaluator = evaluatorFor(hotspot);

    it('should accept a slot to choice mapping, including partial ones', () => {
      expect(evaluator.parse({ speech_to_text: 'Amazon Transcribe' })).toEqual({
        kind: 'hotspot',
        mapping: { speech_to_text: 'Amazon Transcribe' },
      });
    });

    it('should reject unknown slots and choices', () => {
      expect(() => evaluator.parse({ image_labels: 'Amazon Polly' })).toThrow(
        'Question 3 has no slot "image_labels"',
      );
      expect(() => evaluator.parse({ speech_to_text: 'Amazon Lex' })).toThrow(
        '"Amazon Lex" is not a choice for Speech To Text',
      );
      expect(() => evaluator.parse(['Amazon Polly'])).toThrow(InvalidAnswerError);
      expect(() => evaluator.parse({})).toThrow(InvalidAnswerError);
    });

    it('should require every slot to match', () => {
      expect(evaluator.evaluate({ kind: 'hotspot', mapping: { ...hotspot.correct } })).toBe(true);
      expect(evaluator.evaluate({ kind: 'hotspot', mapping: { speech_to_text: 'Amazon Transcribe' } })).toBe(
        false,
      );
    });

    it('should describe each slot', () => {
      expect(evaluator.describe({ kind: 'hotspot', mapping: { speech_to_text: 'Amazon Polly' } })).toBe(
        'Speech To Text: Amazon Polly | Text To Speech: Not answered',
      );
      expect(evaluator.describeCorrect()).toBe(
        'Speech To Text: Amazon Transcribe | Text To Speech: Amazon Polly',
      );
    });
  });

  describe('shuffled options', () => {
    // Label A now shows option C's text, B shows A's, C shows B's.
    const presentation: Presentation = { kind: 'choice', order: ['C', 'A', 'B'] };

    it('should translate displayed labels back to option ids', () => {
      const evaluator = evaluatorFor(single, presentation);
      const answer = evaluator.parse('B');

      expect(answer).toEqual({ kind: 'single', choice: 'A' });
      expect(evaluator.evaluate(answer)).toBe(true);
      expect(evaluator.describe(answer)).toBe('B) Amazon Bedrock');
    });

    it('should lay out options under fixed labels', () => {
      const layout = new ChoiceLayout(single, presentation);

      expect(layout.options).toEqual([
        { label: 'A', text: 'AWS Glue' },
        { label: 'B', text: 'Amazon Bedrock' },
        { label: 'C', text: 'Amazon Polly' },
      ]);
      expect(layout.labelOf('C')).toBe('A');
      expect(layout.resolve('c')).toBe('B');
    });

    it('should present hotspot slots in their shuffled order', () => {
      const view = presentQuestion(hotspot, {
        kind: 'hotspot',
        order: { speech_to_text: ['Amazon Polly', 'Amazon Transcribe'] },
      });

      expect(view).toEqual({
        kind: 'hotspot',
        questionId: 3,
        prompt: 'Match each need',
        slots: [
          { id: 'speech_to_text', label: 'Speech To Text', choices: ['Amazon Polly', 'Amazon Transcribe'] },
          { id: 'text_to_speech', label: 'Text To Speech', choices: ['Amazon Transcribe', 'Amazon Polly'] },
        ],
      });
    });
  });
});
