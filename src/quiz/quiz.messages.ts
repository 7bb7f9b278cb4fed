import type { QuizQuestion, QuizSettings, SessionSnapshot, SessionState } from './session';

export interface QuestionView {
  question: QuizQuestion;
  /** 1-based. */
  number: number;
  total: number;
  questionSetName: string;
}

const seconds = (n: number) => `${n} second${n === 1 ? '' : 's'}`;

export function formatDuration(totalSeconds: number): string {
  const rounded = Math.max(0, Math.round(totalSeconds));
  const minutes = Math.floor(rounded / 60);
  const rest = rounded % 60;
  return minutes > 0 ? `${minutes}m ${String(rest).padStart(2, '0')}s` : `${rest}s`;
}

export function describeSettings(settings: QuizSettings): string {
  const count = settings.questionCount === undefined ? 'all questions' : `${settings.questionCount} questions`;
  const order = settings.randomOrder ? 'random order' : 'sequential order';
  return `${count}, ${order}, ${settings.timerDurationSeconds}s timer`;
}

function questionBody({ question, number, total, questionSetName }: QuestionView): string {
  let text = `🎯 Question ${number}/${total} · ${questionSetName}\n\n${question.text}`;
  if (question.options.length > 0) {
    text += '\n\n' + question.options.map((option, i) => `${String.fromCharCode(65 + i)}) ${option}`).join('\n');
  }
  return text;
}

function timerLine(remainingSeconds: number): string {
  if (remainingSeconds > 5) return `⏱️ ${seconds(remainingSeconds)} remaining`;
  if (remainingSeconds > 2) return `⚠️ ${seconds(remainingSeconds)} remaining, time is running out!`;
  return `🚨 ${seconds(remainingSeconds)} remaining!`;
}

export function formatQuestion(view: QuestionView, remainingSeconds: number): string {
  return `${questionBody(view)}\n\n${timerLine(remainingSeconds)}`;
}

export function formatTimerFallback(view: QuestionView, durationSeconds: number): string {
  return `${questionBody(view)}\n\n⚠️ Live timer unavailable. The answer will be revealed in ${seconds(durationSeconds)}.`;
}

export function formatReveal(view: QuestionView): string {
  const next =
    view.number >= view.total
      ? '🎉 That was the final question!'
      : `➡️ Question ${view.number + 1} coming up next...`;
  return `⏰ Time's up! Question ${view.number}/${view.total} · ${view.questionSetName}\n\n${view.question.text}\n\n✅ Correct answer: ${view.question.answer}\n\n${next}`;
}

export function formatCompletionSummary(snapshot: SessionSnapshot, finishedAt: Date): string {
  const elapsed = (finishedAt.getTime() - snapshot.startedAt.getTime()) / 1000;
  const average = snapshot.total > 0 ? elapsed / snapshot.total : 0;
  return [
    `🏁 Quiz "${snapshot.questionSetName}" complete!`,
    '',
    `📝 Questions: ${snapshot.total}`,
    `⏱️ Total time: ${formatDuration(elapsed)}`,
    `📊 Average per question: ${formatDuration(average)}`,
    `⚙️ Settings: ${describeSettings(snapshot.settings)}`,
  ].join('\n');
}

const stateLabels: Record<SessionState, string> = {
  inactive: '⏹️ Stopped',
  active: '▶️ Running',
  paused: '⏸️ Paused',
  completed: '🏁 Completed',
};

export function formatStatus(snapshot: SessionSnapshot, state: SessionState, now: Date): string {
  const current = Math.min(snapshot.cursor + 1, snapshot.total);
  return [
    '📊 Quiz status',
    '',
    `📚 Quiz: ${snapshot.questionSetName}`,
    `📍 Progress: question ${current}/${snapshot.total}`,
    `State: ${stateLabels[state]}`,
    `🔀 Order: ${snapshot.settings.randomOrder ? 'random' : 'sequential'}`,
    `⏱️ Timer: ${snapshot.settings.timerDurationSeconds}s per question`,
    `🕒 Elapsed: ${formatDuration((now.getTime() - snapshot.startedAt.getTime()) / 1000)}`,
  ].join('\n');
}

export const TIMER_FATAL_NOTICE = '❌ Timer error occurred. Quiz has been stopped.';
