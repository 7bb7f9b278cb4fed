import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { settlesWithin } from '../common/delay';
import { RetryPolicy } from '../common/retry-policy';
import {
  CountdownTimer,
  type CompletionCallback,
  type CountdownOutcome,
  type CountdownState,
  type TickCallback,
} from './countdown-timer';
import { QUIZ_TIMING, type QuizTimingOptions } from './quiz.constants';
import { TimerConflictError, TimerStartError, describeError } from './quiz.errors';
import type { ChannelKey } from './session';

export interface TimerStatus {
  state: CountdownState;
  remainingSeconds: number;
  totalSeconds: number;
  paused: boolean;
  cancelled: boolean;
}

export interface TimerHandle {
  readonly channelKey: ChannelKey;
  /** Settles with the countdown; rejects with `CountdownCallbackError`. */
  readonly done: Promise<CountdownOutcome>;
  status(): TimerStatus;
  /** Pauses this countdown only. */
  pause(): void;
  /** Cancels this countdown only, even if another one has since replaced it. */
  cancel(): void;
}

export interface StartTimerOptions {
  startPaused?: boolean;
}

interface TimerRecord {
  readonly id: number;
  readonly timer: CountdownTimer;
  /** Resolves once the countdown task has finished, however it ended. */
  settled: Promise<void>;
}

const statusOf = (timer: CountdownTimer): TimerStatus => ({
  state: timer.state,
  remainingSeconds: timer.remainingSeconds,
  totalSeconds: timer.totalSeconds,
  paused: timer.isPaused,
  cancelled: timer.isCancelled,
});

/**
 * Owns at most one live countdown per channel.
 *
 * A record is inserted when a countdown is launched and removed when its task
 * finishes, when it is cancelled, or when a readiness check finds it already
 * finished. `cancelTimer` always leaves the channel ready, evicting the
 * record by force if the countdown does not wind down in time.
 */
@Injectable()
export class TimerRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(TimerRegistry.name);
  private readonly timers = new Map<ChannelKey, TimerRecord>();
  private readonly readinessRetry: RetryPolicy;
  private readonly creationRetry: RetryPolicy;
  private nextId = 1;

  constructor(@Inject(QUIZ_TIMING) private readonly timing: QuizTimingOptions) {
    this.readinessRetry = new RetryPolicy({
      maxAttempts: timing.timerRetryAttempts,
      baseDelayMs: timing.timerRetryBaseMs,
      onRetry: (error, attempt, wait) =>
        this.logger.warn(
          `Timer readiness attempt ${attempt}/${timing.timerRetryAttempts} failed (${describeError(error)}), retrying in ${wait}ms`,
        ),
    });
    this.creationRetry = new RetryPolicy({
      maxAttempts: timing.timerRetryAttempts,
      baseDelayMs: timing.timerRetryBaseMs,
      shouldRetry: (error) => !(error instanceof TimerConflictError || error instanceof RangeError),
      onRetry: (error, attempt, wait) =>
        this.logger.warn(
          `Timer creation attempt ${attempt}/${timing.timerRetryAttempts} failed (${describeError(error)}), retrying in ${wait}ms`,
        ),
    });
  }

  get size(): number {
    return this.timers.size;
  }

  /**
   * True when no live countdown is registered for `key`. A finished record
   * found here is evicted.
   */
  isReady(key: ChannelKey): boolean {
    const record = this.timers.get(key);
    if (!record) return true;
    if (record.timer.isLive) return false;

    this.timers.delete(key);
    this.logger.debug(`Evicted finished timer #${record.id} for channel ${key}`);
    return true;
  }

  /**
   * Registers and launches a countdown. Resolves as soon as the countdown is
   * running; await `handle.done` for its end.
   *
   * @throws TimerConflictError when a live countdown could not be cleared
   * @throws TimerStartError when creation kept failing
   */
  async startTimer(
    key: ChannelKey,
    durationSeconds: number,
    onTick: TickCallback,
    onComplete: CompletionCallback,
    options: StartTimerOptions = {},
  ): Promise<TimerHandle> {
    try {
      await this.readinessRetry.execute(async () => {
        if (this.isReady(key)) return;
        this.logger.warn(`Live timer found for channel ${key} while starting a new one, cancelling it`);
        await this.cancelTimer(key);
        if (!this.isReady(key)) throw new TimerConflictError(key);
      });
    } catch (error) {
      this.logger.error(`Timer readiness failed for channel ${key}: ${describeError(error)}`);
      throw error instanceof TimerConflictError ? error : new TimerConflictError(key);
    }

    let attempts = 0;
    try {
      return await this.creationRetry.execute((attempt) => {
        attempts = attempt;
        return this.launch(key, durationSeconds, onTick, onComplete, options);
      });
    } catch (error) {
      if (error instanceof TimerConflictError) throw error;
      this.logger.error(`Timer creation failed for channel ${key}: ${describeError(error)}`);
      throw new TimerStartError(key, attempts, error);
    }
  }

  /**
   * Cancels the countdown for `key` and waits for it to wind down.
   *
   * @returns false when the countdown had to be evicted by force
   */
  async cancelTimer(key: ChannelKey): Promise<boolean> {
    const record = this.timers.get(key);
    if (!record) return true;

    if (!record.timer.isLive) {
      this.evict(key, record);
      return true;
    }

    const started = Date.now();
    record.timer.cancel();
    const acknowledged = await settlesWithin(record.settled, this.timing.cancelTimeoutMs);
    this.evict(key, record);

    if (acknowledged) {
      this.logger.debug(`Timer #${record.id} for channel ${key} cleaned up in ${Date.now() - started}ms`);
    } else {
      this.logger.warn(
        `Timer #${record.id} for channel ${key} did not acknowledge cancellation within ${this.timing.cancelTimeoutMs}ms, evicted by force`,
      );
    }
    return acknowledged;
  }

  pauseTimer(key: ChannelKey): boolean {
    const record = this.timers.get(key);
    if (!record) return false;
    record.timer.pause();
    return true;
  }

  resumeTimer(key: ChannelKey): boolean {
    const record = this.timers.get(key);
    if (!record) return false;
    record.timer.resume();
    return true;
  }

  getTimerStatus(key: ChannelKey): TimerStatus | undefined {
    const record = this.timers.get(key);
    return record ? statusOf(record.timer) : undefined;
  }

  createCountdown(key: ChannelKey): CountdownTimer {
    return new CountdownTimer({
      tickMs: this.timing.tickMs,
      pausePollMs: this.timing.pausePollMs,
      label: key,
    });
  }

  async onModuleDestroy(): Promise<void> {
    await Promise.all([...this.timers.keys()].map((key) => this.cancelTimer(key)));
  }

  private launch(
    key: ChannelKey,
    durationSeconds: number,
    onTick: TickCallback,
    onComplete: CompletionCallback,
    options: StartTimerOptions,
  ): TimerHandle {
    if (!Number.isInteger(durationSeconds) || durationSeconds < 1) {
      throw new RangeError(`Timer duration must be a positive integer, got ${durationSeconds}`);
    }
    if (!this.isReady(key)) throw new TimerConflictError(key);

    const timer = this.createCountdown(key);
    const record: TimerRecord = {
      id: this.nextId++,
      timer,
      settled: Promise.resolve(),
    };
    this.timers.set(key, record);

    try {
      if (options.startPaused) timer.pause();
      const done = timer.run(durationSeconds, onTick, onComplete).finally(() => this.evict(key, record));
      record.settled = done.then(
        (outcome) => {
          this.logger.debug(`Timer #${record.id} for channel ${key} finished: ${outcome}`);
        },
        (error: unknown) => {
          this.logger.warn(`Timer #${record.id} for channel ${key} finished with errors: ${describeError(error)}`);
        },
      );

      this.logger.log(`Timer #${record.id} started for channel ${key}: ${durationSeconds}s`);
      return {
        channelKey: key,
        done,
        status: () => statusOf(timer),
        pause: () => timer.pause(),
        cancel: () => timer.cancel(),
      };
    } catch (error) {
      this.evict(key, record);
      throw error;
    }
  }

  /** Removes `record` only if it is still the one registered for `key`. */
  private evict(key: ChannelKey, record: TimerRecord): void {
    if (this.timers.get(key) === record) {
      this.timers.delete(key);
    }
  }
}
