import { database } from '../../../database/client';
import logger from '../../../core/logger';
import type { SessionSource, VoiceSessionRecord } from '../../analytics/types';
import type { OpenSessionRef, SessionCloseReason, SessionWriter } from '../types';
import { toSessionRecord } from '../utils/validators';

/**
 * Session Store
 * Persists voice sessions in MongoDB and serves them to the analytics engine
 */
export class SessionStore implements SessionSource, SessionWriter {
  /**
   * Sessions overlapping [since, now] for a guild
   */
  async findOverlapping(guildId: string, since: number, now: number): Promise<VoiceSessionRecord[]> {
    try {
      const docs = await database.voiceSessions
        .find({
          guildId,
          joinedTs: { $lt: now },
          $or: [{ leftTs: null }, { leftTs: { $gt: since } }],
        })
        .toArray();

      return this.validateAll(docs, guildId);
    } catch (error) {
      logger.error(`Failed to query voice sessions for guild ${guildId}:`, error);
      throw error;
    }
  }

  /**
   * A user's sessions, newest first
   */
  async findByUser(guildId: string, userId: string, limit: number): Promise<VoiceSessionRecord[]> {
    try {
      const docs = await database.voiceSessions
        .find({ guildId, userId })
        .sort({ joinedTs: -1 })
        .limit(limit)
        .toArray();

      return this.validateAll(docs, guildId);
    } catch (error) {
      logger.error(`Failed to query voice history for user ${userId}:`, error);
      throw error;
    }
  }

  /**
   * Open a session at ts
   */
  async openSession(guildId: string, userId: string, channelId: string, ts: number): Promise<void> {
    await database.voiceSessions.insertOne({
      guildId,
      userId,
      channelId,
      joinedTs: ts,
      leftTs: null,
      createdAt: new Date(),
    });

    logger.debug(`Opened voice session for user ${userId} in channel ${channelId} at ${ts}`);
  }

  /**
   * Close the user's open sessions (optionally only in one channel) at ts.
   * leftTs never goes below joinedTs.
   */
  async closeOpenSessions(
    guildId: string,
    userId: string,
    channelId: string | null,
    ts: number,
    reason: SessionCloseReason
  ): Promise<number> {
    const filter = channelId
      ? { guildId, userId, channelId, leftTs: null }
      : { guildId, userId, leftTs: null };

    const result = await database.voiceSessions.updateMany(filter, [
      { $set: { leftTs: { $max: ['$joinedTs', ts] }, closedBy: reason } },
    ]);

    if (result.modifiedCount > 0) {
      logger.debug(`Closed ${result.modifiedCount} open session(s) for user ${userId} (${reason})`);
    }

    return result.modifiedCount;
  }

  async findOpenSessions(guildId: string): Promise<OpenSessionRef[]> {
    try {
      const docs = await database.voiceSessions
        .find({ guildId, leftTs: null }, { projection: { userId: 1, channelId: 1, joinedTs: 1 } })
        .toArray();

      return docs.map((doc) => ({ userId: doc.userId, channelId: doc.channelId, joinedTs: doc.joinedTs }));
    } catch (error) {
      logger.error(`Failed to query open voice sessions for guild ${guildId}:`, error);
      throw error;
    }
  }

  private validateAll(docs: readonly unknown[], guildId: string): VoiceSessionRecord[] {
    const records: VoiceSessionRecord[] = [];
    let skipped = 0;

    for (const doc of docs) {
      const record = toSessionRecord(doc);
      if (record) {
        records.push(record);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} malformed voice session document(s) in guild ${guildId}`);
    }

    return records;
  }
}

export const sessionStore = new SessionStore();
