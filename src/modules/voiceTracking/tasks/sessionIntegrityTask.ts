import * as cron from 'node-cron';
import { BotClient } from '../../../core/client';
import { config } from '../../../core/config';
import { configManager } from '../../../core/configManager';
import { recoveryManager } from '../services/recoveryManager';
import logger from '../../../core/logger';

/**
 * Session Integrity Task
 * Periodically reconciles open sessions with live voice state so a missed
 * leave event cannot leave a session open forever
 */

let integrityTask: cron.ScheduledTask | null = null;
let isRunning = false;

/**
 * Start the integrity cron job
 */
export function startSessionIntegrityTask(client: BotClient, schedule: string = config.tracking.integrityCron): void {
  if (integrityTask) {
    logger.warn('Session integrity task is already running');
    return;
  }

  if (!cron.validate(schedule)) {
    logger.error(`Invalid INTEGRITY_CRON schedule "${schedule}", session integrity task not started`);
    return;
  }

  integrityTask = cron.schedule(schedule, async () => {
    if (isRunning) {
      logger.warn('Session integrity check already in progress, skipping this run');
      return;
    }

    isRunning = true;
    try {
      const guildId = configManager.getCachedGuildId();
      const guild = guildId ? client.guilds.cache.get(guildId) : undefined;
      if (!guild) {
        logger.warn('Session integrity task: no guild with a loaded config');
        return;
      }

      const serverConfig = configManager.getConfig(guild.id);
      if (!serverConfig.vcTracking.enabled) {
        return;
      }

      await recoveryManager.verifySessionIntegrity(guild, serverConfig.vcTracking.ignoreBots);
    } catch (error) {
      logger.error('Error in session integrity cron task:', error);
    } finally {
      isRunning = false;
    }
  }, {
    scheduled: true,
    timezone: 'UTC',
  });

  logger.info(`Session integrity task scheduled (${schedule})`);
}

/**
 * Stop the integrity cron job
 */
export function stopSessionIntegrityTask(): void {
  if (integrityTask) {
    integrityTask.stop();
    integrityTask = null;
    logger.info('Session integrity task stopped');
  }
}
