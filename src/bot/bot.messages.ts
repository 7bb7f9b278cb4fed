import { QUESTION_COUNT_LIMITS, TIMER_DURATION_LIMITS } from '../quiz/quiz.constants';
import { describeSettings } from '../quiz/quiz.messages';
import type { QuizSettings, SessionSnapshot } from '../quiz/session';

export interface QuizListing {
  name: string;
  questionCount: number;
}

export const NO_SESSION_MESSAGE = 'ℹ️ No active quiz in this chat. Start one with /quiz <name>.';

export function formatQuizList(quizzes: QuizListing[]): string {
  if (quizzes.length === 0) return '📭 No quizzes are loaded.';
  const lines = quizzes.map(({ name, questionCount }) => `• ${name} (${questionCount} questions)`);
  return `📚 Available quizzes:\n\n${lines.join('\n')}\n\nStart one with /quiz <name>.`;
}

export function formatLoadProblems(loadErrors: string[], sampleActive: boolean): string {
  const lines: string[] = [];
  if (sampleActive) {
    lines.push('ℹ️ No quiz files were loaded, so the built-in sample quiz is offered.');
  }
  if (loadErrors.length > 0) {
    lines.push(`⚠️ Skipped ${loadErrors.length} quiz file(s):`, ...loadErrors.map((error) => `• ${error}`));
  }
  return lines.join('\n');
}

export function formatHelp(quizzes: QuizListing[], settings: QuizSettings): string {
  return [
    '🧠 Quiz bot',
    '',
    'Commands:',
    '/quizzes - list available quizzes',
    '/quiz <name> - start a quiz in this chat',
    '/pause, /resume - pause or resume the running quiz',
    '/stop - stop the running quiz',
    '/status - show progress of the running quiz',
    '/settings - show quiz settings',
    `/set_questions <n|all> - questions per quiz (${QUESTION_COUNT_LIMITS.min}-${QUESTION_COUNT_LIMITS.max})`,
    '/random_order - toggle random question order',
    `/set_timer <seconds> - seconds per question (${TIMER_DURATION_LIMITS.min}-${TIMER_DURATION_LIMITS.max})`,
    '/reset_settings - restore the default settings',
    '',
    `⚙️ Current settings: ${describeSettings(settings)}`,
    '',
    formatQuizList(quizzes),
  ].join('\n');
}

export function formatSettings(settings: QuizSettings): string {
  return [
    '⚙️ Quiz settings',
    '',
    `🔢 Questions per quiz: ${settings.questionCount ?? 'all'}`,
    `🔀 Random order: ${settings.randomOrder ? 'on' : 'off'}`,
    `⏱️ Timer: ${settings.timerDurationSeconds}s per question`,
  ].join('\n');
}

export function formatStarted(snapshot: SessionSnapshot): string {
  return `🚀 Starting "${snapshot.questionSetName}": ${snapshot.total} questions, ${snapshot.settings.timerDurationSeconds}s each.`;
}

export function formatStopped(snapshot: SessionSnapshot): string {
  const current = Math.min(snapshot.cursor + 1, snapshot.total);
  return `⏹️ Quiz "${snapshot.questionSetName}" stopped at question ${current}/${snapshot.total}.`;
}
