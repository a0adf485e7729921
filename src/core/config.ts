import dotenv from 'dotenv';
import { BotConfig, LogLevel } from '../types/config';

// Load environment variables
dotenv.config();

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Validate required environment variables
 */
function validateEnv(): void {
  const required = [
    'DISCORD_BOT_TOKEN',
    'DISCORD_CLIENT_ID',
    'MONGODB_URI',
    'MONGODB_DB_NAME',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}\n` +
      'Please check your .env file and ensure all required variables are set.'
    );
  }
}

function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? 'info';
}

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(): BotConfig {
  // Validate first
  validateEnv();

  const config: BotConfig = {
    discord: {
      botToken: requireEnv('DISCORD_BOT_TOKEN'),
      clientId: requireEnv('DISCORD_CLIENT_ID'),
    },
    database: {
      uri: requireEnv('MONGODB_URI'),
      name: requireEnv('MONGODB_DB_NAME'),
    },
    analytics: {
      timezone: process.env.TIMEZONE || 'Europe/Stockholm',
      // Empty or "0" means no AFK channel is excluded
      excludedChannelId:
        process.env.AFK_CHANNEL_ID && process.env.AFK_CHANNEL_ID !== '0'
          ? process.env.AFK_CHANNEL_ID
          : null,
      defaultDays: parseInt(process.env.ANALYTICS_DEFAULT_DAYS || '7', 10),
      maxDays: parseInt(process.env.ANALYTICS_MAX_DAYS || '90', 10),
    },
    webhook: {
      port: parseInt(process.env.WEBHOOK_PORT || '3001', 10),
      secret: process.env.WEBHOOK_SECRET || 'change_me_in_production',
    },
    tracking: {
      integrityCron: process.env.INTEGRITY_CRON || '*/10 * * * *',
    },
    logging: {
      level: parseLogLevel(process.env.LOG_LEVEL),
    },
  };

  return config;
}

// Export singleton instance
export const config = loadConfig();
