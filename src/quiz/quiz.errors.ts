export type QuizErrorKind =
  | 'configuration'
  | 'not_found'
  | 'conflict'
  | 'timer_subsystem'
  | 'presentation';

/** Root of every error the quiz core reports. */
export abstract class QuizError extends Error {
  abstract readonly kind: QuizErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends QuizError {
  readonly kind = 'configuration';
}

/** The selector was handed an empty question list. */
export class EmptyInputError extends ConfigurationError {
  constructor() {
    super('Cannot select questions from an empty list');
  }
}

export class EmptyQuestionSetError extends ConfigurationError {
  constructor(readonly questionSetName: string) {
    super(`No questions available for "${questionSetName}" after applying settings`);
  }
}

export class NotFoundError extends QuizError {
  readonly kind = 'not_found';
}

export class SessionNotFoundError extends NotFoundError {
  constructor(readonly channelKey: string) {
    super(`No active quiz session for channel ${channelKey}`);
  }
}

export class NoSuchQuestionSetError extends NotFoundError {
  constructor(
    readonly questionSetName: string,
    readonly available: readonly string[],
  ) {
    super(
      available.length > 0
        ? `Quiz "${questionSetName}" not found. Available quizzes: ${available.join(', ')}`
        : `Quiz "${questionSetName}" not found. No quiz files are loaded.`,
    );
  }
}

export class ConflictError extends QuizError {
  readonly kind = 'conflict';
}

export class SessionConflictError extends ConflictError {
  constructor(readonly channelKey: string) {
    super(`A quiz session is already running in channel ${channelKey}`);
  }
}

export class TimerConflictError extends ConflictError {
  constructor(readonly channelKey: string) {
    super(`Unable to clear the existing timer for channel ${channelKey}`);
  }
}

export class TimerSubsystemError extends QuizError {
  readonly kind = 'timer_subsystem';
}

export class TimerStartError extends TimerSubsystemError {
  constructor(
    readonly channelKey: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`Failed to start timer for channel ${channelKey} after ${attempts} attempts`, { cause });
  }
}

/**
 * Raised by a countdown once it has finished when its tick or completion
 * callbacks threw along the way.
 */
export class CountdownCallbackError extends TimerSubsystemError {
  constructor(
    readonly failures: ReadonlyArray<{ phase: 'tick' | 'complete'; error: unknown }>,
  ) {
    super(
      `Countdown callbacks failed ${failures.length} time(s): ${failures
        .map(({ phase, error }) => `${phase}: ${describeError(error)}`)
        .join('; ')}`,
      { cause: failures[0]?.error },
    );
  }
}

export class PresentationError extends QuizError {
  readonly kind = 'presentation';

  constructor(
    message: string,
    readonly retryable: boolean,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export type Result<T, E extends QuizError = QuizError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const fail = <E extends QuizError>(error: E): Result<never, E> => ({ ok: false, error });

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Chat-facing wording for each error kind. */
export function userMessageFor(error: QuizError): string {
  if (error instanceof SessionConflictError) {
    return '❌ A quiz is already running in this chat. Stop it first with /stop.';
  }
  if (error instanceof SessionNotFoundError) {
    return 'ℹ️ No active quiz in this chat. Start one with /quiz <name>.';
  }
  if (error instanceof NoSuchQuestionSetError) {
    return `❌ ${error.message}`;
  }
  if (error instanceof EmptyQuestionSetError) {
    return '❌ No questions are left after applying the current settings. Check /settings.';
  }

  switch (error.kind) {
    case 'configuration':
      return `❌ Invalid settings: ${error.message}`;
    case 'not_found':
      return `ℹ️ ${error.message}`;
    case 'conflict':
      return '❌ The quiz timer is busy. Please stop the quiz and start it again.';
    case 'timer_subsystem':
      return '⚠️ Timer error occurred. The quiz will continue without a live timer.';
    case 'presentation':
      return '⚠️ Could not reach the chat. Please try again in a moment.';
  }
}
