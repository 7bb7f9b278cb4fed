import { EmptyInputError } from './quiz.errors';
import type { QuizQuestion, QuizSettings } from './session';

/** Returns a value in [0, 1); `Math.random` by default. */
export type RandomSource = () => number;

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Orders and trims a question set for one session.
 *
 * A `questionCount` below 1 yields an empty list; the caller decides whether
 * that is an error.
 *
 * @throws EmptyInputError when `questions` is empty
 */
export function selectQuestions(
  questions: readonly QuizQuestion[],
  settings: Pick<QuizSettings, 'questionCount' | 'randomOrder'>,
  random: RandomSource = Math.random,
): QuizQuestion[] {
  if (questions.length === 0) {
    throw new EmptyInputError();
  }

  const ordered = settings.randomOrder ? shuffle(questions, random) : [...questions];

  if (settings.questionCount === undefined) {
    return ordered;
  }
  if (settings.questionCount < 1) {
    return [];
  }
  return ordered.slice(0, Math.min(settings.questionCount, ordered.length));
}
