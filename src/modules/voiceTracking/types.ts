/**
 * Voice Tracking Module Types
 */

export type SessionCloseReason = 'leave' | 'switch' | 'rejoin' | 'recovery';

/**
 * Where a user is connected right now, as reported by Discord
 */
export interface LiveVoiceState {
  userId: string;
  channelId: string;
}

export interface OpenSessionRef {
  userId: string;
  channelId: string;
  joinedTs: number;
}

/**
 * What the startup/periodic reconciliation has to change in storage
 */
export interface ReconciliationPlan {
  toOpen: LiveVoiceState[];
  toClose: OpenSessionRef[];
}

export interface ReconciliationResult {
  opened: number;
  closed: number;
}

/**
 * Write side of session storage used by tracking and recovery
 */
export interface SessionWriter {
  openSession(guildId: string, userId: string, channelId: string, ts: number): Promise<void>;
  closeOpenSessions(
    guildId: string,
    userId: string,
    channelId: string | null,
    ts: number,
    reason: SessionCloseReason
  ): Promise<number>;
  findOpenSessions(guildId: string): Promise<OpenSessionRef[]>;
}
