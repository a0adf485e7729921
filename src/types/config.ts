/**
 * Configuration types for the bot
 */

export interface BotConfig {
  discord: DiscordConfig;
  database: DatabaseConfig;
  analytics: AnalyticsDefaults;
  webhook: WebhookConfig;
  tracking: TrackingConfig;
  logging: LoggingConfig;
}

export interface DiscordConfig {
  botToken: string;
  clientId: string;
}

export interface DatabaseConfig {
  uri: string;
  name: string;
}

/**
 * Defaults copied into a guild's config document the first time it is loaded
 */
export interface AnalyticsDefaults {
  timezone: string;
  excludedChannelId: string | null;
  defaultDays: number;
  maxDays: number;
}

export interface WebhookConfig {
  port: number;
  secret: string;
}

export interface TrackingConfig {
  integrityCron: string;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
  level: LogLevel;
}
