import type { AnalyticsQuery, VoiceSessionRecord } from '../src/modules/analytics/types';

// 2024-01-01T00:00:00Z, a Monday
export const JAN_1_2024 = 1704067200;
export const HOUR = 3600;
export const DAY = 86400;

export function session(
  userId: string,
  channelId: string,
  joinedTs: number,
  leftTs: number | null
): VoiceSessionRecord {
  return { userId, channelId, joinedTs, leftTs };
}

export function query(overrides: Partial<AnalyticsQuery> = {}): AnalyticsQuery {
  return {
    since: 0,
    now: JAN_1_2024 + 30 * DAY,
    timezone: 'UTC',
    excludedChannelId: null,
    ...overrides,
  };
}
