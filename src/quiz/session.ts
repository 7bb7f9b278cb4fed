/** Opaque chat identifier; one session per key. */
export type ChannelKey = string;

export interface QuizQuestion {
  readonly text: string;
  readonly answer: string;
  readonly options: readonly string[];
}

export interface QuizSettings {
  /** Absent means "use every question in the set". */
  questionCount?: number;
  randomOrder: boolean;
  timerDurationSeconds: number;
}

export type SessionState = 'inactive' | 'active' | 'paused' | 'completed';

export interface QuizSession {
  readonly channelKey: ChannelKey;
  readonly questionSetName: string;
  readonly questions: readonly QuizQuestion[];
  /** `cursor === questions.length` means the quiz is complete. */
  cursor: number;
  active: boolean;
  paused: boolean;
  readonly settings: Readonly<QuizSettings>;
  readonly startedAt: Date;
  /** Aborted when the session stops; wakes settle and fallback delays. */
  readonly lifetime: AbortController;
  /** True while a question loop is running for this session. */
  presenting: boolean;
  /** No loop is running and a resume should start one. */
  suspended: boolean;
}

export interface SessionSnapshot {
  channelKey: ChannelKey;
  questionSetName: string;
  cursor: number;
  total: number;
  active: boolean;
  paused: boolean;
  settings: QuizSettings;
  startedAt: Date;
}

export function copySettings(settings: Readonly<QuizSettings>): QuizSettings {
  const copy: QuizSettings = {
    randomOrder: settings.randomOrder,
    timerDurationSeconds: settings.timerDurationSeconds,
  };
  if (settings.questionCount !== undefined) copy.questionCount = settings.questionCount;
  return copy;
}

export function snapshotOf(session: QuizSession): SessionSnapshot {
  return {
    channelKey: session.channelKey,
    questionSetName: session.questionSetName,
    cursor: session.cursor,
    total: session.questions.length,
    active: session.active,
    paused: session.paused,
    settings: copySettings(session.settings),
    startedAt: new Date(session.startedAt.getTime()),
  };
}

/**
 * Sessions keyed by chat. Only the session service holds a reference, and
 * every method is synchronous, so a caller never observes a half-applied
 * change.
 */
export class SessionRegistry {
  private readonly sessions = new Map<ChannelKey, QuizSession>();

  get(key: ChannelKey): QuizSession | undefined {
    return this.sessions.get(key);
  }

  add(session: QuizSession): void {
    if (this.sessions.has(session.channelKey)) {
      throw new Error(`Session for channel ${session.channelKey} is already registered`);
    }
    this.sessions.set(session.channelKey, session);
  }

  /** Removes `session` only if it is still the one registered under its key. */
  remove(session: QuizSession): boolean {
    if (this.sessions.get(session.channelKey) !== session) return false;
    return this.sessions.delete(session.channelKey);
  }

  isCurrent(session: QuizSession): boolean {
    return session.active && this.sessions.get(session.channelKey) === session;
  }

  values(): QuizSession[] {
    return [...this.sessions.values()];
  }
}
