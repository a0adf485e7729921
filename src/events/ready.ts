import { Events, Client } from 'discord.js';
import logger from '../core/logger';

export default {
  name: Events.ClientReady,
  once: true,
  async execute(client: Client) {
    if (!client.user) {
      logger.error('Client user is not available');
      return;
    }

    logger.info(`Bot ready! Logged in as ${client.user.tag}`);

    // Optimized for single-guild operation
    const guild = client.guilds.cache.first();
    if (guild) {
      logger.info(`Server: ${guild.name} (${guild.id}) - ${guild.memberCount} members`);
      logger.info(`Voice states cached: ${guild.voiceStates.cache.size}`);
    } else {
      logger.warn('Bot is not in any guilds');
    }
  },
};
