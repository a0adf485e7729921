import { configManager } from '../../../core/configManager';
import logger from '../../../core/logger';
import type { SessionWriter } from '../types';
import { UserTaskQueue, userTaskQueue } from '../utils/userTaskQueue';
import { sessionStore } from './sessionStore';

/**
 * Session Manager
 * Turns join / leave / switch voice events into open and closed session records.
 * Events for one user are applied in the order they arrive.
 */
export class SessionManager {
  constructor(
    private readonly store: SessionWriter = sessionStore,
    private readonly queue: UserTaskQueue = userTaskQueue
  ) {}

  /**
   * Check if voice tracking is enabled for a guild
   */
  isTrackingEnabled(guildId: string): boolean {
    try {
      return configManager.getConfig(guildId).vcTracking.enabled;
    } catch (error) {
      logger.debug(`Tracking state unavailable for guild ${guildId}:`, error);
      return false;
    }
  }

  /**
   * User connected to a channel.
   * A session left open by a missed leave event is closed first.
   */
  handleJoin(guildId: string, userId: string, channelId: string, ts: number): Promise<void> {
    return this.queue.runEvent(guildId, userId, async () => {
      const stale = await this.store.closeOpenSessions(guildId, userId, null, ts, 'rejoin');
      if (stale > 0) {
        logger.warn(`User ${userId} already had ${stale} open session(s), closed before joining ${channelId}`);
      }

      await this.store.openSession(guildId, userId, channelId, ts);
      logger.info(`User ${userId} joined voice channel ${channelId} in guild ${guildId}`);
    });
  }

  /**
   * User disconnected from a channel
   */
  handleLeave(guildId: string, userId: string, channelId: string, ts: number): Promise<void> {
    return this.queue.runEvent(guildId, userId, async () => {
      const closed = await this.store.closeOpenSessions(guildId, userId, channelId, ts, 'leave');

      if (closed === 0) {
        logger.warn(`User ${userId} left voice channel ${channelId} but had no open session`);
        return;
      }

      logger.info(`User ${userId} left voice channel ${channelId} in guild ${guildId}`);
    });
  }

  /**
   * User moved between channels: close whatever they had open and open the new channel at the same second
   */
  handleSwitch(
    guildId: string,
    userId: string,
    oldChannelId: string,
    newChannelId: string,
    ts: number
  ): Promise<void> {
    return this.queue.runEvent(guildId, userId, async () => {
      const closed = await this.store.closeOpenSessions(guildId, userId, null, ts, 'switch');
      if (closed === 0) {
        logger.warn(`User ${userId} switched from ${oldChannelId} without an open session`);
      } else if (closed > 1) {
        logger.warn(`User ${userId} had ${closed} open sessions when switching from ${oldChannelId}`);
      }

      await this.store.openSession(guildId, userId, newChannelId, ts);
      logger.info(`User ${userId} switched voice channel ${oldChannelId} -> ${newChannelId} in guild ${guildId}`);
    });
  }
}

export const sessionManager = new SessionManager();
