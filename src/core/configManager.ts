import { database } from '../database/client';
import { ServerConfigDocument } from '../types/database';
import { AnalyticsSettings } from '../modules/analytics/types';
import { config } from './config';
import logger from './logger';

/**
 * Configuration Manager
 * Handles loading, caching, and reloading server-specific configuration from database
 * Optimized for single-guild operation
 */
class ConfigManager {
  private cachedConfig: ServerConfigDocument | null = null;
  private loadTimestamp: Date | null = null;
  private guildId: string | null = null;

  /**
   * Load configuration from database for the guild
   */
  async loadConfig(guildId: string): Promise<ServerConfigDocument> {
    try {
      // Single guild validation: ensure we only load config for one guild
      if (this.guildId && this.guildId !== guildId) {
        logger.warn(
          `Attempted to load config for guild ${guildId} but cached guild is ${this.guildId}. ` +
          `This bot is optimized for single-guild operation. Rejecting load.`
        );
        throw new Error(
          `Cannot load config for different guild. This bot is configured for guild ${this.guildId}`
        );
      }

      if (!this.guildId) {
        this.guildId = guildId;
      }

      let serverConfig = await database.serverConfigs.findOne({ guildId });

      if (!serverConfig) {
        logger.info(`No config found for guild ${guildId}, creating default config`);
        const newConfig = await this.createDefaultConfig(guildId);
        this.cachedConfig = newConfig;
        this.loadTimestamp = new Date();
        logger.info(`Loaded config for guild ${guildId} (version ${newConfig.version})`);
        return newConfig;
      }

      // Migration: configs written before analytics settings existed
      if (!serverConfig.voiceAnalytics) {
        logger.info(`Migrating config for guild ${guildId}: adding voiceAnalytics defaults`);

        await database.serverConfigs.updateOne(
          { guildId },
          {
            $set: { voiceAnalytics: this.defaultAnalyticsSettings() },
            $inc: { version: 1 },
          }
        );

        serverConfig = await database.serverConfigs.findOne({ guildId });
        if (!serverConfig) {
          throw new Error(`Failed to reload config after migration for guild ${guildId}`);
        }
        logger.info(`Migration complete for guild ${guildId} (version ${serverConfig.version})`);
      }

      this.cachedConfig = serverConfig;
      this.loadTimestamp = new Date();

      logger.info(`Loaded config for guild ${guildId} (version ${serverConfig.version})`);
      return serverConfig;
    } catch (error) {
      logger.error(`Failed to load config for guild ${guildId}:`, error);
      throw error;
    }
  }

  /**
   * Get cached configuration for the guild
   */
  getConfig(guildId?: string): ServerConfigDocument {
    if (!this.cachedConfig) {
      const targetGuildId = guildId || this.guildId || 'unknown';
      throw new Error(`Config not loaded for guild ${targetGuildId}. Call loadConfig() first.`);
    }

    if (guildId && guildId !== this.guildId) {
      logger.warn(
        `getConfig() called with guildId ${guildId} but cached guild is ${this.guildId}. ` +
        `Returning cached config for ${this.guildId}`
      );
    }

    return this.cachedConfig;
  }

  /**
   * Settings the analytics engine needs for one request
   */
  getAnalyticsSettings(guildId: string): AnalyticsSettings {
    const { voiceAnalytics } = this.getConfig(guildId);
    return {
      timezone: voiceAnalytics.timezone,
      excludedChannelId: voiceAnalytics.excludedChannelId,
    };
  }

  /**
   * Clamp a requested look-back window to the guild's limits
   */
  resolveDays(guildId: string, requested: number | null): number {
    const { voiceAnalytics } = this.getConfig(guildId);
    const days = requested ?? voiceAnalytics.defaultDays;
    return Math.max(1, Math.min(voiceAnalytics.maxDays, days));
  }

  /**
   * Reload configuration from database
   */
  async reloadConfig(guildId: string): Promise<void> {
    logger.info(`Reloading config for guild ${guildId}`);
    await this.loadConfig(guildId);
  }

  /**
   * Create default configuration for a new guild
   */
  private async createDefaultConfig(guildId: string): Promise<ServerConfigDocument> {
    const defaultConfig: ServerConfigDocument = {
      guildId,

      vcTracking: {
        enabled: true,
        ignoreBots: true,
      },

      voiceAnalytics: this.defaultAnalyticsSettings(),

      updatedAt: new Date(),
      updatedBy: 'system',
      version: 1,
    };

    await database.serverConfigs.insertOne(defaultConfig);
    logger.info(`Created default config for guild ${guildId}`);

    // Fetch the inserted document to get the full WithId type
    const insertedConfig = await database.serverConfigs.findOne({ guildId });
    if (!insertedConfig) {
      throw new Error(`Failed to retrieve inserted config for guild ${guildId}`);
    }

    return insertedConfig;
  }

  private defaultAnalyticsSettings(): ServerConfigDocument['voiceAnalytics'] {
    return {
      timezone: config.analytics.timezone,
      excludedChannelId: config.analytics.excludedChannelId,
      defaultDays: config.analytics.defaultDays,
      maxDays: config.analytics.maxDays,
    };
  }

  /**
   * When the cached config was last read from the database
   */
  getLoadTimestamp(): Date | null {
    return this.loadTimestamp;
  }

  /**
   * Get cached guild ID
   */
  getCachedGuildId(): string | null {
    return this.guildId;
  }
}

export const configManager = new ConfigManager();
