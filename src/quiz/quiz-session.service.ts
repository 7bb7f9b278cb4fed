import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';

import { delay } from '../common/delay';
import { RetryPolicy } from '../common/retry-policy';
import type { CountdownOutcome } from './countdown-timer';
import { PRESENTATION_CHANNEL, type MessageHandle, type PresentationChannel } from './presentation.channel';
import { selectQuestions } from './question-selector';
import { MAX_ERROR_LOG_ENTRIES, QUIZ_TIMING, type QuizTimingOptions } from './quiz.constants';
import {
  ConfigurationError,
  EmptyQuestionSetError,
  NoSuchQuestionSetError,
  QuizError,
  SessionConflictError,
  SessionNotFoundError,
  TimerConflictError,
  TimerStartError,
  describeError,
  fail,
  ok,
  type QuizErrorKind,
  type Result,
} from './quiz.errors';
import {
  TIMER_FATAL_NOTICE,
  formatCompletionSummary,
  formatQuestion,
  formatReveal,
  formatTimerFallback,
  type QuestionView,
} from './quiz.messages';
import { QuizService } from './quiz.service';
import {
  SessionRegistry,
  copySettings,
  snapshotOf,
  type ChannelKey,
  type QuizQuestion,
  type QuizSession,
  type QuizSettings,
  type SessionSnapshot,
  type SessionState,
} from './session';
import { SettingsService } from './settings.service';
import { TimerRegistry, type TimerHandle } from './timer-registry.service';

/** How a run of the question loop ended. */
export type PresentationOutcome = 'not_applicable' | 'completed' | 'stopped' | 'suspended' | 'failed';

/** Result of presenting one question up to the point the next may start. */
type StepOutcome = 'advance' | 'complete' | 'stopped' | 'failed';

export interface PauseOutcome {
  alreadyPaused: boolean;
  snapshot: SessionSnapshot;
}

export interface ResumeOutcome {
  notPaused: boolean;
  snapshot: SessionSnapshot;
}

export interface ErrorLogEntry {
  at: Date;
  operation: string;
  kind: QuizErrorKind | 'unexpected';
  message: string;
}

export interface ErrorSummary {
  channelKey: ChannelKey;
  total: number;
  byOperation: Record<string, number>;
  recent: ErrorLogEntry[];
}

export interface SweepReport {
  removedSessions: number;
  expiredCompletions: number;
  trimmedLogs: number;
  droppedLogs: number;
}

interface CompletionRecord {
  snapshot: SessionSnapshot;
  finishedAt: Date;
}

function settingsProblem(settings: QuizSettings): string | undefined {
  if (!Number.isInteger(settings.timerDurationSeconds) || settings.timerDurationSeconds < 1) {
    return `Timer duration must be a positive whole number of seconds, got ${settings.timerDurationSeconds}`;
  }
  if (settings.questionCount !== undefined && !Number.isInteger(settings.questionCount)) {
    return `Question count must be a whole number, got ${settings.questionCount}`;
  }
  return undefined;
}

/**
 * Runs one quiz session per channel.
 *
 * Every session mutation happens synchronously between awaits, and every
 * resumption point re-checks that the session is still the current, active
 * one for its channel before touching it. A stop therefore takes effect at
 * the next resumption point of whatever is in flight.
 */
@Injectable()
export class QuizSessionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(QuizSessionService.name);
  private readonly sessions = new SessionRegistry();
  private readonly completed = new Map<ChannelKey, CompletionRecord>();
  private readonly errorLogs = new Map<ChannelKey, ErrorLogEntry[]>();
  private readonly readinessRetry: RetryPolicy;
  private sweepHandle?: NodeJS.Timeout;

  constructor(
    private readonly quizzes: QuizService,
    private readonly settings: SettingsService,
    private readonly timers: TimerRegistry,
    @Inject(PRESENTATION_CHANNEL) private readonly channel: PresentationChannel,
    @Inject(QUIZ_TIMING) private readonly timing: QuizTimingOptions,
  ) {
    this.readinessRetry = new RetryPolicy({
      maxAttempts: timing.timerRetryAttempts,
      baseDelayMs: timing.timerRetryBaseMs,
      onRetry: (error, attempt, wait) =>
        this.logger.warn(`Timer still busy after reveal (attempt ${attempt}): ${describeError(error)}, retrying in ${wait}ms`),
    });
  }

  onModuleInit(): void {
    this.sweepHandle = setInterval(() => this.sweep(), this.timing.sweepIntervalMs);
    this.sweepHandle.unref();
  }

  async onModuleDestroy(): Promise<void> {
    if (this.sweepHandle) clearInterval(this.sweepHandle);
    await Promise.all(this.sessions.values().map((session) => this.stopSession(session.channelKey)));
  }

  // --- control operations ---

  startSession(
    key: ChannelKey,
    questionSetName: string,
    explicitSettings?: QuizSettings,
  ): Result<SessionSnapshot> {
    const existing = this.sessions.get(key);
    if (existing?.active) {
      return fail(new SessionConflictError(key));
    }
    if (existing) {
      this.sessions.remove(existing);
      existing.lifetime.abort();
      this.logger.debug(`Cleared inactive session in channel ${key}`);
    }

    const available = this.quizzes.getQuestions(questionSetName);
    if (!available) {
      return fail(new NoSuchQuestionSetError(questionSetName, this.quizzes.listNames()));
    }

    let settings: QuizSettings;
    if (explicitSettings) {
      const problem = settingsProblem(explicitSettings);
      if (problem) return fail(new ConfigurationError(problem));
      settings = copySettings(explicitSettings);
    } else {
      settings = this.settings.getQuizSettings();
    }

    let questions: QuizQuestion[];
    try {
      questions = selectQuestions(available, settings);
    } catch (error) {
      if (error instanceof QuizError) return fail(error);
      throw error;
    }
    if (questions.length === 0) {
      return fail(new EmptyQuestionSetError(questionSetName));
    }

    const session: QuizSession = {
      channelKey: key,
      questionSetName,
      questions: Object.freeze(questions),
      cursor: 0,
      active: true,
      paused: false,
      settings,
      startedAt: new Date(),
      lifetime: new AbortController(),
      presenting: false,
      // No loop runs until presentCurrentQuestion; a resume before then starts one.
      suspended: true,
    };
    this.sessions.add(session);
    this.completed.delete(key);

    this.logger.log(
      `Session started in channel ${key}: "${questionSetName}", ${questions.length} questions, ${settings.timerDurationSeconds}s each`,
    );
    return ok(snapshotOf(session));
  }

  /**
   * Presents questions until the session completes, stops, fails or is paused
   * between questions. Resolves once the loop has ended.
   */
  async presentCurrentQuestion(key: ChannelKey): Promise<PresentationOutcome> {
    const session = this.sessions.get(key);
    if (!session || !session.active || session.paused || session.presenting) {
      return 'not_applicable';
    }
    return this.runQuestionLoop(session);
  }

  pauseSession(key: ChannelKey): Result<PauseOutcome, SessionNotFoundError> {
    const session = this.sessions.get(key);
    if (!session || !session.active) {
      return fail(new SessionNotFoundError(key));
    }
    if (session.paused) {
      return ok({ alreadyPaused: true, snapshot: snapshotOf(session) });
    }

    session.paused = true;
    if (!this.timers.pauseTimer(key)) {
      this.logger.debug(`No running timer to pause in channel ${key}`);
    }
    this.logger.log(`Session paused in channel ${key} at question ${session.cursor + 1}`);
    return ok({ alreadyPaused: false, snapshot: snapshotOf(session) });
  }

  resumeSession(key: ChannelKey): Result<ResumeOutcome, SessionNotFoundError> {
    const session = this.sessions.get(key);
    if (!session || !session.active) {
      return fail(new SessionNotFoundError(key));
    }
    if (!session.paused) {
      return ok({ notPaused: true, snapshot: snapshotOf(session) });
    }

    session.paused = false;
    if (!this.timers.resumeTimer(key)) {
      this.logger.debug(`No timer to resume in channel ${key}`);
    }
    this.logger.log(`Session resumed in channel ${key} at question ${session.cursor + 1}`);

    if (session.suspended && !session.presenting) {
      this.relaunch(session);
    }
    return ok({ notPaused: false, snapshot: snapshotOf(session) });
  }

  /** Returns the session as it stood when the stop was requested. */
  async stopSession(key: ChannelKey): Promise<Result<SessionSnapshot, SessionNotFoundError>> {
    const session = this.sessions.get(key);
    if (!session) {
      return fail(new SessionNotFoundError(key));
    }

    const snapshot = snapshotOf(session);
    this.deactivate(session);

    const clean = await this.timers.cancelTimer(key);
    if (!clean) {
      this.logger.warn(`Timer for channel ${key} had to be evicted while stopping`);
    }
    this.logger.log(`Session stopped in channel ${key} at question ${snapshot.cursor + 1}/${snapshot.total}`);
    return ok(snapshot);
  }

  // --- queries ---

  getProgress(key: ChannelKey): SessionSnapshot | undefined {
    const session = this.sessions.get(key);
    return session ? snapshotOf(session) : undefined;
  }

  getSessionState(key: ChannelKey): SessionState {
    const session = this.sessions.get(key);
    if (session) {
      if (!session.active) return 'inactive';
      return session.paused ? 'paused' : 'active';
    }
    return this.completed.has(key) ? 'completed' : 'inactive';
  }

  /** Snapshot of the last session that ran to completion in `key`. */
  getLastCompleted(key: ChannelKey): SessionSnapshot | undefined {
    return this.completed.get(key)?.snapshot;
  }

  listActiveSessions(): SessionSnapshot[] {
    return this.sessions
      .values()
      .filter((session) => session.active)
      .map(snapshotOf);
  }

  getErrorSummary(key: ChannelKey): ErrorSummary {
    const entries = this.errorLogs.get(key) ?? [];
    const byOperation: Record<string, number> = {};
    for (const entry of entries) {
      byOperation[entry.operation] = (byOperation[entry.operation] ?? 0) + 1;
    }
    return { channelKey: key, total: entries.length, byOperation, recent: entries.slice(-3) };
  }

  /**
   * Drops inactive sessions, and completion records and error logs of idle
   * channels once they are older than one sweep interval. Remaining error
   * logs are trimmed to the last {@link MAX_ERROR_LOG_ENTRIES} entries.
   */
  sweep(): SweepReport {
    const cutoff = Date.now() - this.timing.sweepIntervalMs;

    let removedSessions = 0;
    for (const session of this.sessions.values()) {
      if (!session.active && this.sessions.remove(session)) {
        session.lifetime.abort();
        removedSessions++;
      }
    }

    let expiredCompletions = 0;
    for (const [key, record] of this.completed) {
      if (record.finishedAt.getTime() <= cutoff) {
        this.completed.delete(key);
        expiredCompletions++;
      }
    }

    let trimmedLogs = 0;
    let droppedLogs = 0;
    for (const [key, entries] of this.errorLogs) {
      const latest = entries.at(-1);
      if (!this.sessions.get(key) && (!latest || latest.at.getTime() <= cutoff)) {
        this.errorLogs.delete(key);
        droppedLogs++;
      } else if (entries.length > MAX_ERROR_LOG_ENTRIES) {
        this.errorLogs.set(key, entries.slice(-MAX_ERROR_LOG_ENTRIES));
        trimmedLogs++;
      }
    }

    const report = { removedSessions, expiredCompletions, trimmedLogs, droppedLogs };
    if (Object.values(report).some((count) => count > 0)) {
      this.logger.log(
        `Sweep removed ${removedSessions} inactive session(s) and ${expiredCompletions} completion record(s), ` +
          `trimmed ${trimmedLogs} and dropped ${droppedLogs} error log(s)`,
      );
    }
    return report;
  }

  // --- question loop ---

  private async runQuestionLoop(session: QuizSession): Promise<PresentationOutcome> {
    session.presenting = true;
    session.suspended = false;
    try {
      for (;;) {
        if (!this.sessions.isCurrent(session)) return 'stopped';
        if (session.paused) {
          session.suspended = true;
          this.logger.log(`Session in channel ${session.channelKey} paused between questions`);
          return 'suspended';
        }

        const step = await this.presentQuestion(session);
        if (step !== 'advance') {
          return step === 'complete' ? 'completed' : step;
        }
      }
    } finally {
      session.presenting = false;
    }
  }

  private relaunch(session: QuizSession): void {
    void this.runQuestionLoop(session).then(
      (outcome) => this.logger.debug(`Resumed question loop in channel ${session.channelKey} ended: ${outcome}`),
      async (error: unknown) => {
        this.recordError(session.channelKey, 'resume_loop', error);
        await this.forceStop(session);
      },
    );
  }

  private async presentQuestion(session: QuizSession): Promise<StepOutcome> {
    const key = session.channelKey;
    const index = session.cursor;
    const view = this.viewOf(session, index);
    const duration = session.settings.timerDurationSeconds;

    let message: MessageHandle;
    try {
      message = await this.channel.send(key, formatQuestion(view, duration));
    } catch (error) {
      this.recordError(key, 'send_question', error);
      await this.forceStop(session);
      return 'failed';
    }
    if (!this.sessions.isCurrent(session)) return 'stopped';

    const step: { outcome?: StepOutcome } = {};
    let timer: TimerHandle;
    try {
      timer = await this.timers.startTimer(
        key,
        duration,
        async (remaining) => {
          // The question was sent with the full duration already shown.
          if (remaining === duration) return;
          await this.editMessage(session, message, formatQuestion(view, remaining), 'update_timer');
        },
        async () => {
          step.outcome = await this.revealAndAdvance(session, index, message);
        },
        { startPaused: session.paused },
      );
    } catch (error) {
      this.recordError(key, 'start_timer', error);
      if (error instanceof TimerStartError) {
        return this.presentWithoutTimer(session, index, message);
      }
      await this.forceStop(session, TIMER_FATAL_NOTICE);
      return 'failed';
    }

    if (!this.sessions.isCurrent(session)) {
      timer.cancel();
      return 'stopped';
    }
    // A pause that landed while the timer was being set up.
    if (session.paused) timer.pause();

    let countdown: CountdownOutcome;
    try {
      countdown = await timer.done;
    } catch (error) {
      this.recordError(key, 'countdown', error);
      if (step.outcome === 'advance' || step.outcome === 'complete') return step.outcome;
      await this.forceStop(session, TIMER_FATAL_NOTICE);
      return 'failed';
    }

    if (countdown === 'cancelled') {
      if (!this.sessions.isCurrent(session)) return 'stopped';
      this.recordError(key, 'countdown', new TimerConflictError(key));
      await this.forceStop(session, TIMER_FATAL_NOTICE);
      return 'failed';
    }
    return step.outcome ?? 'stopped';
  }

  /** Used when no countdown could be started: a plain wait, then the reveal. */
  private async presentWithoutTimer(
    session: QuizSession,
    index: number,
    message: MessageHandle,
  ): Promise<StepOutcome> {
    const duration = session.settings.timerDurationSeconds;
    this.logger.warn(`Timer fallback engaged in channel ${session.channelKey} for question ${index + 1}`);

    await this.editMessage(session, message, formatTimerFallback(this.viewOf(session, index), duration), 'timer_fallback');
    await delay(duration * 1000, session.lifetime.signal);
    return this.revealAndAdvance(session, index, message);
  }

  private async revealAndAdvance(
    session: QuizSession,
    index: number,
    message: MessageHandle,
  ): Promise<StepOutcome> {
    const key = session.channelKey;
    if (!this.sessions.isCurrent(session) || session.cursor !== index) return 'stopped';

    await this.timers.cancelTimer(key);
    await this.editMessage(session, message, formatReveal(this.viewOf(session, index)), 'reveal_answer');
    if (!this.sessions.isCurrent(session)) return 'stopped';

    if (index + 1 >= session.questions.length) {
      session.cursor = session.questions.length;
      this.deactivate(session);
      const record: CompletionRecord = { snapshot: snapshotOf(session), finishedAt: new Date() };
      this.completed.set(key, record);
      this.logger.log(`Session completed in channel ${key}: "${session.questionSetName}"`);

      await this.sendNotice(key, formatCompletionSummary(record.snapshot, record.finishedAt), 'completion_summary');
      return 'complete';
    }

    session.cursor = index + 1;
    await delay(this.timing.advanceDelayMs, session.lifetime.signal);
    if (!this.sessions.isCurrent(session)) return 'stopped';

    if (!(await this.restoreTimerReadiness(key))) {
      this.recordError(key, 'verify_readiness', new TimerConflictError(key));
      await this.forceStop(session, TIMER_FATAL_NOTICE);
      return 'failed';
    }
    return 'advance';
  }

  private async restoreTimerReadiness(key: ChannelKey): Promise<boolean> {
    try {
      await this.readinessRetry.execute(async () => {
        if (this.timers.isReady(key)) return;
        await this.timers.cancelTimer(key);
        if (!this.timers.isReady(key)) throw new TimerConflictError(key);
      });
      return true;
    } catch (error) {
      this.logger.error(`Could not restore timer readiness in channel ${key}: ${describeError(error)}`);
      return false;
    }
  }

  // --- helpers ---

  private viewOf(session: QuizSession, index: number): QuestionView {
    return {
      question: session.questions[index],
      number: index + 1,
      total: session.questions.length,
      questionSetName: session.questionSetName,
    };
  }

  private deactivate(session: QuizSession): void {
    session.active = false;
    session.paused = false;
    this.sessions.remove(session);
    session.lifetime.abort();
  }

  private async forceStop(session: QuizSession, notice?: string): Promise<void> {
    const key = session.channelKey;
    if (!this.sessions.isCurrent(session)) return;

    this.deactivate(session);
    await this.timers.cancelTimer(key);
    this.logger.warn(`Session force-stopped in channel ${key} at question ${session.cursor + 1}`);

    if (notice) await this.sendNotice(key, notice, 'fatal_notice');
  }

  /** Edit failures are recorded; the quiz carries on. */
  private async editMessage(
    session: QuizSession,
    message: MessageHandle,
    content: string,
    operation: string,
  ): Promise<void> {
    if (!this.sessions.isCurrent(session)) return;
    try {
      await this.channel.edit(message, content);
    } catch (error) {
      this.recordError(session.channelKey, operation, error);
    }
  }

  private async sendNotice(key: ChannelKey, content: string, operation: string): Promise<void> {
    try {
      await this.channel.send(key, content);
    } catch (error) {
      this.recordError(key, operation, error);
    }
  }

  private recordError(key: ChannelKey, operation: string, error: unknown): void {
    const entry: ErrorLogEntry = {
      at: new Date(),
      operation,
      kind: error instanceof QuizError ? error.kind : 'unexpected',
      message: describeError(error),
    };
    const entries = this.errorLogs.get(key);
    if (entries) entries.push(entry);
    else this.errorLogs.set(key, [entry]);

    this.logger.error(`[${key}] ${operation} failed: ${entry.message}`);
  }
}
