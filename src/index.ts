import { readdirSync } from 'fs';
import { join } from 'path';
import { RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import { BotClient, isBotCommand, isBotEvent } from './core/client';
import { database } from './database/client';
import { configManager } from './core/configManager';
import { webhookServer } from './core/webhookServer';
import { recoverLoadedGuilds, recoveryManager } from './modules/voiceTracking/services/recoveryManager';
import {
  startSessionIntegrityTask,
  stopSessionIntegrityTask,
} from './modules/voiceTracking/tasks/sessionIntegrityTask';
import logger from './core/logger';

const client = new BotClient();

/**
 * Global error handlers to prevent silent crashes
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Promise Rejection:', {
    reason,
    stack: reason instanceof Error ? reason.stack : undefined
  });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  shutdown('UNCAUGHT_EXCEPTION').catch(() => process.exit(1));
});

/**
 * Graceful shutdown handler
 */
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received. Shutting down gracefully...`);

  try {
    stopSessionIntegrityTask();
    webhookServer.stop();
    await client.stop();
    await database.disconnect();

    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown:', error);
    process.exit(1);
  }
}

function sourceFiles(dir: string): string[] {
  return readdirSync(dir).filter((file) =>
    (file.endsWith('.js') || file.endsWith('.ts')) && !file.endsWith('.d.ts')
  );
}

function defaultExport(filePath: string): unknown {
  const mod: unknown = require(filePath);
  return typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
}

/**
 * Load configs, reconcile sessions left open by the last run and start background work
 */
async function onReady(): Promise<void> {
  logger.info('Loading server configurations...');
  for (const guild of client.guilds.cache.values()) {
    try {
      await configManager.loadConfig(guild.id);
    } catch (error) {
      logger.error(`Failed to load config for guild ${guild.id}:`, error);
    }
  }

  webhookServer.start();

  await recoverLoadedGuilds(client.guilds.cache.values(), configManager, recoveryManager);

  startSessionIntegrityTask(client);

  logger.info('All systems initialized and ready');
}

/**
 * Main bot initialization
 */
async function main(): Promise<void> {
  try {
    logger.info('Starting voice analytics bot...');

    logger.info('Connecting to database...');
    await database.connect();

    logger.info('Loading commands...');
    const commandsPath = join(__dirname, 'commands');
    const commands: RESTPostAPIChatInputApplicationCommandsJSONBody[] = [];

    for (const file of sourceFiles(commandsPath)) {
      const command = defaultExport(join(commandsPath, file));

      if (isBotCommand(command)) {
        client.commands.set(command.data.name, command);
        commands.push(command.data.toJSON());
        logger.info(`Loaded command: ${command.data.name}`);
      } else {
        logger.warn(`Skipping invalid command file: ${file}`);
      }
    }

    logger.info('Loading events...');
    const eventsPath = join(__dirname, 'events');

    for (const file of sourceFiles(eventsPath)) {
      const event = defaultExport(join(eventsPath, file));

      if (!isBotEvent(event)) {
        logger.warn(`Skipping invalid event file: ${file}`);
        continue;
      }

      const listener = (...args: unknown[]) => {
        event.execute(...args).catch((error) => logger.error(`Unhandled error in ${event.name} event:`, error));
      };

      if (event.once) {
        client.once(event.name, listener);
      } else {
        client.on(event.name, listener);
      }

      logger.info(`Loaded event: ${event.name}`);
    }

    if (commands.length > 0) {
      await client.registerCommands(commands);
    }

    // Registered before login so the ready event cannot be missed
    client.once('ready', () => {
      onReady().catch((error) => logger.error('Failed to initialize after ready:', error));
    });

    await client.start();

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Fatal error during startup:', error);
    process.exit(1);
  }
}

void main();
