import logger from '../../../core/logger';
import { nowSeconds, sinceDaysAgo } from '../../../utils/timeFormatters';
import { sessionStore } from '../../voiceTracking/services/sessionStore';
import type {
  AnalyticsQuery,
  AnalyticsSettings,
  ConcurrencyPeaks,
  RankedTotal,
  SessionHistoryEntry,
  SessionSource,
  VoiceReport,
  VoiceSessionRecord,
} from '../types';
import { resolveZone, type ResolvedZone } from '../engine/zoneClock';
import { dailyTotals, hourOfDayHistogram, uniqueUsersPerDay, weekdayHistogram } from '../engine/histograms';
import { concurrencyPeaks } from '../engine/concurrencySweep';
import { soloTime } from '../engine/soloTimeSweep';
import { recentSessions, topN, totalsByChannel, totalsByUser, userTotal } from '../engine/totals';
import { buildVoiceReport } from '../engine/report';

export const LEADERBOARD_LIMIT = 10;
const HISTORY_FETCH_LIMIT = 100;

/**
 * Aggregate plus the exact window and zone it was computed for
 */
export interface AnalyticsResult<T> {
  data: T;
  query: AnalyticsQuery;
  zone: ResolvedZone;
  days: number | null; // null for lifetime
}

interface Snapshot {
  sessions: VoiceSessionRecord[];
  query: AnalyticsQuery;
  zone: ResolvedZone;
}

/**
 * Analytics Service
 * Fetches one snapshot of sessions per request, fixes "now" once and runs the engine on it
 */
export class AnalyticsService {
  constructor(
    private readonly source: SessionSource = sessionStore,
    private readonly clock: () => number = nowSeconds
  ) {}

  async getReport(guildId: string, days: number, settings: AnalyticsSettings): Promise<AnalyticsResult<VoiceReport>> {
    return this.run(guildId, days, settings, buildVoiceReport);
  }

  async getHourOfDay(guildId: string, days: number, settings: AnalyticsSettings): Promise<AnalyticsResult<number[]>> {
    return this.run(guildId, days, settings, hourOfDayHistogram);
  }

  async getWeekday(guildId: string, days: number, settings: AnalyticsSettings): Promise<AnalyticsResult<number[]>> {
    return this.run(guildId, days, settings, weekdayHistogram);
  }

  async getDaily(
    guildId: string,
    days: number,
    settings: AnalyticsSettings
  ): Promise<AnalyticsResult<Record<string, number>>> {
    return this.run(guildId, days, settings, dailyTotals);
  }

  async getUniqueUsers(
    guildId: string,
    days: number,
    settings: AnalyticsSettings
  ): Promise<AnalyticsResult<Record<string, number>>> {
    return this.run(guildId, days, settings, uniqueUsersPerDay);
  }

  async getPeaks(guildId: string, days: number, settings: AnalyticsSettings): Promise<AnalyticsResult<ConcurrencyPeaks>> {
    return this.run(guildId, days, settings, concurrencyPeaks);
  }

  /**
   * Alone time per user, highest first
   */
  async getSoloTime(guildId: string, days: number, settings: AnalyticsSettings): Promise<AnalyticsResult<RankedTotal[]>> {
    return this.run(guildId, days, settings, (sessions, query) =>
      Object.entries(soloTime(sessions, query))
        .map(([id, seconds]) => ({ id, seconds }))
        .sort((a, b) => b.seconds - a.seconds || a.id.localeCompare(b.id))
    );
  }

  /**
   * One user's time over the last N days, or lifetime when days is null
   */
  async getUserTotal(
    guildId: string,
    userId: string,
    days: number | null,
    settings: AnalyticsSettings
  ): Promise<AnalyticsResult<number>> {
    return this.run(guildId, days, settings, (sessions, query) => userTotal(sessions, userId, query));
  }

  async getTopUsers(
    guildId: string,
    days: number,
    settings: AnalyticsSettings,
    limit = LEADERBOARD_LIMIT
  ): Promise<AnalyticsResult<RankedTotal[]>> {
    return this.run(guildId, days, settings, (sessions, query) => topN(totalsByUser(sessions, query), limit));
  }

  async getTopChannels(
    guildId: string,
    days: number,
    settings: AnalyticsSettings,
    limit = LEADERBOARD_LIMIT
  ): Promise<AnalyticsResult<RankedTotal[]>> {
    return this.run(guildId, days, settings, (sessions, query) => topN(totalsByChannel(sessions, query), limit));
  }

  /**
   * Top users inside one channel. The excluded channel always comes back empty.
   */
  async getChannelTopUsers(
    guildId: string,
    channelId: string,
    days: number,
    settings: AnalyticsSettings,
    limit = LEADERBOARD_LIMIT
  ): Promise<AnalyticsResult<RankedTotal[]>> {
    return this.run(guildId, days, settings, (sessions, query) =>
      topN(
        totalsByUser(
          sessions.filter((session) => session.channelId === channelId),
          query
        ),
        limit
      )
    );
  }

  /**
   * A user's most recent sessions, newest first
   */
  async getHistory(
    guildId: string,
    userId: string,
    limit: number,
    settings: AnalyticsSettings
  ): Promise<SessionHistoryEntry[]> {
    const now = this.clock();

    try {
      const sessions = await this.source.findByUser(guildId, userId, HISTORY_FETCH_LIMIT);
      return recentSessions(sessions, userId, limit, now, settings.excludedChannelId);
    } catch (error) {
      logger.error(`Failed to load voice history for user ${userId}:`, error);
      throw error;
    }
  }

  private async run<T>(
    guildId: string,
    days: number | null,
    settings: AnalyticsSettings,
    aggregate: (sessions: readonly VoiceSessionRecord[], query: AnalyticsQuery) => T
  ): Promise<AnalyticsResult<T>> {
    const { sessions, query, zone } = await this.snapshot(guildId, days, settings);
    return { data: aggregate(sessions, query), query, zone, days };
  }

  private async snapshot(guildId: string, days: number | null, settings: AnalyticsSettings): Promise<Snapshot> {
    const now = this.clock();
    const since = days === null ? 0 : sinceDaysAgo(now, days);

    const zone = resolveZone(settings.timezone);
    if (zone.fallback) {
      logger.warn(`Unknown timezone "${zone.requested}" for guild ${guildId}, using ${zone.name}`);
    }

    const query: AnalyticsQuery = {
      since,
      now,
      timezone: zone.name,
      excludedChannelId: settings.excludedChannelId,
    };

    try {
      const sessions = await this.source.findOverlapping(guildId, since, now);
      logger.debug(`Loaded ${sessions.length} voice sessions for guild ${guildId} (since ${since})`);
      return { sessions, query, zone };
    } catch (error) {
      logger.error(`Failed to load voice sessions for guild ${guildId}:`, error);
      throw error;
    }
  }
}

export const analyticsService = new AnalyticsService();
