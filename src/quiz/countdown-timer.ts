import { Logger } from '@nestjs/common';
import { delay } from '../common/delay';
import { CountdownCallbackError, describeError } from './quiz.errors';

export type CountdownState = 'idle' | 'running' | 'paused' | 'completed' | 'cancelled';
export type CountdownOutcome = 'completed' | 'cancelled';

export type TickCallback = (remainingSeconds: number) => Promise<void> | void;
export type CompletionCallback = () => Promise<void> | void;

export interface CountdownTimerOptions {
  tickMs: number;
  pausePollMs: number;
  /** Shown in log lines, usually the channel key. */
  label?: string;
}

/**
 * One question's countdown.
 *
 * `run` drives the whole lifecycle and resolves once the countdown has
 * expired or been cancelled. Callback failures never stop the countdown;
 * they are collected and `run` rejects with {@link CountdownCallbackError}
 * after it has finished.
 */
export class CountdownTimer {
  private readonly logger = new Logger(CountdownTimer.name);
  private readonly abort = new AbortController();
  private phase: Exclude<CountdownState, 'paused'> = 'idle';
  private paused = false;
  private cancelled = false;
  private remaining = 0;
  private total = 0;

  constructor(private readonly options: CountdownTimerOptions) {}

  get state(): CountdownState {
    return this.phase === 'running' && this.paused ? 'paused' : this.phase;
  }

  /** Not yet finished: either waiting to run or counting down. */
  get isLive(): boolean {
    return this.phase === 'idle' || this.phase === 'running';
  }

  get remainingSeconds(): number {
    return this.remaining;
  }

  get totalSeconds(): number {
    return this.total;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  async run(
    durationSeconds: number,
    onTick: TickCallback,
    onComplete: CompletionCallback,
  ): Promise<CountdownOutcome> {
    if (this.phase !== 'idle') {
      throw new Error(`Countdown ${this.label} has already been started`);
    }
    if (!Number.isInteger(durationSeconds) || durationSeconds < 0) {
      throw new RangeError(`Countdown duration must be a non-negative integer, got ${durationSeconds}`);
    }

    this.total = durationSeconds;
    this.remaining = durationSeconds;
    this.phase = 'running';
    this.logger.log(`Countdown started for ${this.label}: ${durationSeconds}s`);

    const failures: Array<{ phase: 'tick' | 'complete'; error: unknown }> = [];

    while (this.remaining > 0 && !this.cancelled) {
      if (this.paused) {
        await delay(this.options.pausePollMs, this.abort.signal);
        continue;
      }

      this.logTick();
      try {
        await onTick(this.remaining);
      } catch (error) {
        failures.push({ phase: 'tick', error });
        this.logger.warn(`Tick callback failed for ${this.label}: ${describeError(error)}`);
      }
      if (this.cancelled) break;

      await delay(this.options.tickMs, this.abort.signal);
      if (this.cancelled) break;
      this.remaining -= 1;
    }

    const outcome: CountdownOutcome = this.cancelled ? 'cancelled' : 'completed';
    this.phase = outcome;
    this.logger.log(
      `Countdown ${outcome} for ${this.label} (${this.total - this.remaining}/${this.total}s elapsed)`,
    );

    if (outcome === 'completed') {
      try {
        await onComplete();
      } catch (error) {
        failures.push({ phase: 'complete', error });
        this.logger.error(`Completion callback failed for ${this.label}: ${describeError(error)}`);
      }
    }

    if (failures.length > 0) {
      throw new CountdownCallbackError(failures);
    }
    return outcome;
  }

  pause(): void {
    if (this.paused || !this.isLive) return;
    this.paused = true;
    this.logger.debug(`Countdown paused for ${this.label} at ${this.remaining}s`);
  }

  resume(): void {
    if (!this.paused || !this.isLive) return;
    this.paused = false;
    this.logger.debug(`Countdown resumed for ${this.label} at ${this.remaining}s`);
  }

  /** Stops the countdown; a pending tick or pause wait wakes immediately. */
  cancel(): void {
    if (this.cancelled || !this.isLive) return;
    this.cancelled = true;
    this.abort.abort();
    this.logger.debug(`Countdown cancel requested for ${this.label} (${this.state})`);
  }

  private get label(): string {
    return this.options.label ?? 'anonymous';
  }

  private logTick(): void {
    if (this.remaining % 10 === 0 || this.remaining <= 5) {
      this.logger.debug(`Countdown ${this.label}: ${this.remaining}s of ${this.total}s remaining`);
    }
  }
}
