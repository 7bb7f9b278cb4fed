export const QUIZ_TIMING = Symbol('QUIZ_TIMING');

export interface QuizTimingOptions {
  /** Length of one countdown step. */
  tickMs: number;
  /** Wait between checks while a countdown is paused. */
  pausePollMs: number;
  /** How long `cancelTimer` waits for a countdown to wind down. */
  cancelTimeoutMs: number;
  /** Pause between an answer reveal and the next question. */
  advanceDelayMs: number;
  timerRetryAttempts: number;
  timerRetryBaseMs: number;
  sweepIntervalMs: number;
}

export const DEFAULT_QUIZ_TIMING: QuizTimingOptions = {
  tickMs: 1000,
  pausePollMs: 100,
  cancelTimeoutMs: 2000,
  advanceDelayMs: 250,
  timerRetryAttempts: 3,
  timerRetryBaseMs: 100,
  sweepIntervalMs: 60 * 60 * 1000,
};

/** Per-channel error logs are trimmed to this many entries by the sweep. */
export const MAX_ERROR_LOG_ENTRIES = 10;

export const QUESTION_COUNT_LIMITS = { min: 1, max: 100 } as const;
export const TIMER_DURATION_LIMITS = { min: 5, max: 300 } as const;
