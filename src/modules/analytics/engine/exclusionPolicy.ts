import type { VoiceSessionRecord } from '../types';

/**
 * Whether a session counts toward analytics.
 * Sessions in the excluded (AFK/idle) channel are dropped whole.
 */
export function isIncluded(session: VoiceSessionRecord, excludedChannelId: string | null): boolean {
  if (excludedChannelId === null) {
    return true;
  }
  return session.channelId !== excludedChannelId;
}

export function applyExclusion(
  sessions: readonly VoiceSessionRecord[],
  excludedChannelId: string | null
): VoiceSessionRecord[] {
  return sessions.filter((session) => isIncluded(session, excludedChannelId));
}
