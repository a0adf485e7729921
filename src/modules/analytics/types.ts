/**
 * Voice Analytics Module Types
 * All timestamps and durations are whole epoch seconds.
 */

/**
 * One continuous stay of one user in one voice channel, as handed to the engine.
 * leftTs is exclusive; null means the session is still open.
 */
export interface VoiceSessionRecord {
  readonly userId: string;
  readonly channelId: string;
  readonly joinedTs: number;
  readonly leftTs: number | null;
}

/**
 * Closed-open interval fully inside [since, now]; end > start always
 */
export interface ClampedInterval {
  readonly start: number;
  readonly end: number;
}

export interface ClampedSession extends ClampedInterval {
  readonly userId: string;
  readonly channelId: string;
}

/**
 * Per-guild settings the caller threads into every aggregation
 */
export interface AnalyticsSettings {
  timezone: string;
  excludedChannelId: string | null;
}

/**
 * Everything one aggregation call depends on besides the sessions.
 * now is captured once by the caller so every step agrees on the same instant.
 */
export interface AnalyticsQuery extends AnalyticsSettings {
  since: number;
  now: number;
}

export type Granularity = 'hour' | 'day';

/**
 * Wall-clock reading of an instant in a zone.
 * weekday is Monday-first (Monday = 0, Sunday = 6).
 */
export interface LocalTime {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: number;
}

/**
 * A piece of an interval that lies within a single hour or calendar day
 */
export interface SplitSpan {
  start: number;
  end: number;
  seconds: number;
  local: LocalTime; // Wall-clock time at span start
}

export interface SweepEvent {
  ts: number;
  delta: 1 | -1;
  userId: string;
}

export interface ConcurrencyPeaks {
  overallPeak: number;
  perDayPeak: Record<string, number>;
}

export interface RankedTotal {
  id: string;
  seconds: number;
}

export interface SessionHistoryEntry {
  channelId: string;
  joinedTs: number;
  leftTs: number | null;
  durationSeconds: number;
  open: boolean;
}

export interface VoiceReport {
  hourOfDay: number[];
  weekday: number[];
  daily: Record<string, number>;
  uniqueUsers: Record<string, number>;
  peaks: ConcurrencyPeaks;
  solo: Record<string, number>;
  totalSeconds: number;
  sessionCount: number;
}

/**
 * Read contract the analytics service needs from storage
 */
export interface SessionSource {
  /**
   * Sessions overlapping [since, now]: joined before now and still open or left after since
   */
  findOverlapping(guildId: string, since: number, now: number): Promise<VoiceSessionRecord[]>;

  /**
   * A user's sessions, newest first
   */
  findByUser(guildId: string, userId: string, limit: number): Promise<VoiceSessionRecord[]>;
}
