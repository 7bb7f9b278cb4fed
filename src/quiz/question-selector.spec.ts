import { selectQuestions, shuffle } from './question-selector';
import { EmptyInputError } from './quiz.errors';
import type { QuizQuestion } from './session';

const question = (n: number): QuizQuestion => ({
  text: `Question ${n}`,
  answer: `Answer ${n}`,
  options: [],
});

const texts = (questions: readonly QuizQuestion[]) => questions.map((q) => q.text);

describe('selectQuestions', () => {
  const pool = [1, 2, 3, 4].map(question);

  it('keeps the original order when random order is off', () => {
    const selected = selectQuestions(pool, { randomOrder: false });

    expect(texts(selected)).toEqual(['Question 1', 'Question 2', 'Question 3', 'Question 4']);
    expect(selected).not.toBe(pool);
  });

  it('shuffles a copy using the supplied random source', () => {
    const selected = selectQuestions(pool, { randomOrder: true }, () => 0);

    expect(texts(selected)).toEqual(['Question 2', 'Question 3', 'Question 4', 'Question 1']);
    expect(texts(pool)).toEqual(['Question 1', 'Question 2', 'Question 3', 'Question 4']);
  });

  it('truncates to the requested count', () => {
    expect(texts(selectQuestions(pool, { randomOrder: false, questionCount: 2 }))).toEqual([
      'Question 1',
      'Question 2',
    ]);
  });

  it('caps the count at the number of available questions', () => {
    expect(selectQuestions(pool, { randomOrder: false, questionCount: 10 })).toHaveLength(4);
  });

  it('returns nothing for a count below one', () => {
    expect(selectQuestions(pool, { randomOrder: false, questionCount: 0 })).toEqual([]);
  });

  it('rejects an empty question list', () => {
    expect(() => selectQuestions([], { randomOrder: true })).toThrow(EmptyInputError);
  });

  it('returns a duplicate-free subset of the input for every count', () => {
    let seed = 7;
    const random = () => {
      seed = (seed * 16807) % 2147483647;
      return (seed - 1) / 2147483646;
    };
    const large = Array.from({ length: 25 }, (_, i) => question(i + 1));

    for (let count = 1; count <= 30; count++) {
      const selected = selectQuestions(large, { randomOrder: true, questionCount: count }, random);

      expect(selected).toHaveLength(Math.min(count, large.length));
      expect(new Set(selected).size).toBe(selected.length);
      for (const item of selected) expect(large).toContain(item);
    }
  });
});

describe('shuffle', () => {
  it('leaves the order alone when every draw picks the last slot', () => {
    expect(shuffle(['a', 'b', 'c'], () => 0.999)).toEqual(['a', 'b', 'c']);
  });
});
