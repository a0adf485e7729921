import { Events, VoiceState } from 'discord.js';
import { configManager } from '../core/configManager';
import { sessionManager } from '../modules/voiceTracking/services/sessionManager';
import { nowSeconds } from '../utils/timeFormatters';
import logger from '../core/logger';

export default {
  name: Events.VoiceStateUpdate,
  async execute(oldState: VoiceState, newState: VoiceState) {
    try {
      const guildId = newState.guild.id;

      if (!sessionManager.isTrackingEnabled(guildId)) {
        return;
      }

      const member = newState.member ?? oldState.member;
      if (member?.user.bot && configManager.getConfig(guildId).vcTracking.ignoreBots) {
        return;
      }

      const userId = newState.id;
      const oldChannelId = oldState.channelId;
      const newChannelId = newState.channelId;
      const ts = nowSeconds();

      if (!oldChannelId && newChannelId) {
        await sessionManager.handleJoin(guildId, userId, newChannelId, ts);
      }
      else if (oldChannelId && !newChannelId) {
        await sessionManager.handleLeave(guildId, userId, oldChannelId, ts);
      }
      else if (oldChannelId && newChannelId && oldChannelId !== newChannelId) {
        await sessionManager.handleSwitch(guildId, userId, oldChannelId, newChannelId, ts);
      }
      // Mute / deafen / stream changes keep the same channel and are not session boundaries
    } catch (error) {
      logger.error('Error in voiceStateUpdate event:', error);
    }
  },
};
