import { Guild } from 'discord.js';
import logger from '../../../core/logger';
import { nowSeconds } from '../../../utils/timeFormatters';
import type {
  LiveVoiceState,
  OpenSessionRef,
  ReconciliationPlan,
  ReconciliationResult,
  SessionWriter,
} from '../types';
import { UserTaskQueue, userTaskQueue } from '../utils/userTaskQueue';
import { sessionStore } from './sessionStore';

/**
 * Compare stored open sessions with who is actually connected.
 * A user in voice without a matching open session gets one; an open session
 * whose user is gone (or in another channel) gets closed.
 * Duplicate open sessions for one user are all closed and replaced by a fresh one.
 */
export function planReconciliation(
  openSessions: readonly OpenSessionRef[],
  live: readonly LiveVoiceState[]
): ReconciliationPlan {
  const liveByUser = new Map(live.map((state) => [state.userId, state.channelId]));
  const byUser = new Map<string, OpenSessionRef[]>();

  for (const session of openSessions) {
    const list = byUser.get(session.userId) ?? [];
    list.push(session);
    byUser.set(session.userId, list);
  }

  const kept = new Set<string>();
  const toClose: OpenSessionRef[] = [];

  for (const [userId, sessions] of byUser) {
    if (sessions.length === 1 && liveByUser.get(userId) === sessions[0].channelId) {
      kept.add(userId);
    } else {
      toClose.push(...sessions);
    }
  }

  const toOpen = live.filter((state) => !kept.has(state.userId));

  return { toOpen, toClose };
}

interface UserActions {
  close: OpenSessionRef[];
  open: LiveVoiceState[];
}

/**
 * Recovery Manager
 * Brings stored sessions back in line with Discord's voice state after a restart
 * or a missed event
 */
export class RecoveryManager {
  constructor(
    private readonly store: SessionWriter = sessionStore,
    private readonly queue: UserTaskQueue = userTaskQueue
  ) {}

  /**
   * Full reconciliation on startup: close orphans and open sessions for users already connected
   */
  async recoverActiveSessions(guild: Guild, ignoreBots = true): Promise<ReconciliationResult> {
    logger.info('Starting voice session recovery after bot restart...');

    try {
      const result = await this.reconcile(guild.id, this.liveStates(guild, ignoreBots), nowSeconds());
      logger.info(`Session recovery complete: ${result.opened} opened, ${result.closed} closed`);
      return result;
    } catch (error) {
      logger.error(`Error during session recovery for guild ${guild.id}:`, error);
      return { opened: 0, closed: 0 };
    }
  }

  /**
   * Periodic check for missed voice events while the bot stayed connected
   */
  async verifySessionIntegrity(guild: Guild, ignoreBots = true): Promise<ReconciliationResult> {
    try {
      const result = await this.reconcile(guild.id, this.liveStates(guild, ignoreBots), nowSeconds());
      if (result.closed > 0 || result.opened > 0) {
        logger.info(`Session integrity check: ${result.opened} opened, ${result.closed} closed`);
      } else {
        logger.debug('Session integrity check found no orphaned sessions');
      }
      return result;
    } catch (error) {
      logger.error(`Error during session integrity check for guild ${guild.id}:`, error);
      return { opened: 0, closed: 0 };
    }
  }

  /**
   * Apply the reconciliation plan user by user, behind any voice events already queued for them.
   * A user with a voice event newer than the live snapshot is left alone.
   */
  async reconcile(
    guildId: string,
    live: readonly LiveVoiceState[],
    ts: number
  ): Promise<ReconciliationResult> {
    const checkpoint = this.queue.checkpoint();
    const openSessions = await this.store.findOpenSessions(guildId);
    const plan = planReconciliation(openSessions, live);

    const users = new Map<string, UserActions>();
    const entry = (userId: string): UserActions => {
      const existing = users.get(userId);
      if (existing) return existing;
      const created: UserActions = { close: [], open: [] };
      users.set(userId, created);
      return created;
    };
    for (const session of plan.toClose) entry(session.userId).close.push(session);
    for (const state of plan.toOpen) entry(state.userId).open.push(state);

    let closed = 0;
    let opened = 0;

    for (const [userId, actions] of users) {
      await this.queue.run(guildId, userId, async () => {
        if (this.queue.changedSince(guildId, userId, checkpoint)) {
          logger.debug(`Skipped reconciliation for user ${userId}, voice state changed during the check`);
          return;
        }

        for (const session of actions.close) {
          closed += await this.store.closeOpenSessions(guildId, userId, session.channelId, ts, 'recovery');
          logger.debug(`Closed orphaned session for user ${userId} in channel ${session.channelId}`);
        }

        for (const state of actions.open) {
          await this.store.openSession(guildId, userId, state.channelId, ts);
          opened++;
          logger.debug(`Recovered session for user ${userId} in channel ${state.channelId}`);
        }
      });
    }

    return { opened, closed };
  }

  private liveStates(guild: Guild, ignoreBots: boolean): LiveVoiceState[] {
    const states: LiveVoiceState[] = [];

    for (const state of guild.voiceStates.cache.values()) {
      if (!state.channelId) continue;
      if (ignoreBots && state.member?.user.bot) continue;
      states.push({ userId: state.id, channelId: state.channelId });
    }

    return states;
  }
}

export const recoveryManager = new RecoveryManager();

export interface TrackingConfigSource {
  getCachedGuildId(): string | null;
  getConfig(guildId: string): { vcTracking: { enabled: boolean; ignoreBots: boolean } };
}

export interface GuildRecovery<G> {
  recoverActiveSessions(guild: G, ignoreBots: boolean): Promise<ReconciliationResult>;
}

/**
 * Startup recovery for every guild whose config is loaded and has tracking on.
 * Guilds without a loaded config are skipped; one guild failing does not stop the others.
 * Returns the ids of the guilds that were recovered.
 */
export async function recoverLoadedGuilds<G extends { id: string }>(
  guilds: Iterable<G>,
  configs: TrackingConfigSource,
  recovery: GuildRecovery<G>
): Promise<string[]> {
  const recovered: string[] = [];

  for (const guild of guilds) {
    if (configs.getCachedGuildId() !== guild.id) {
      logger.warn(`Skipping session recovery for guild ${guild.id}: no config loaded`);
      continue;
    }

    try {
      const tracking = configs.getConfig(guild.id).vcTracking;
      if (!tracking.enabled) continue;

      await recovery.recoverActiveSessions(guild, tracking.ignoreBots);
      recovered.push(guild.id);
    } catch (error) {
      logger.error(`Skipping session recovery for guild ${guild.id}:`, error);
    }
  }

  return recovered;
}
