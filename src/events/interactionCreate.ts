import { Events, Interaction } from 'discord.js';
import logger from '../core/logger';
import { BotClient } from '../core/client';

export default {
  name: Events.InteractionCreate,
  async execute(interaction: Interaction) {
    if (!interaction.isChatInputCommand()) {
      return;
    }

    const client = interaction.client;
    const command = client instanceof BotClient ? client.commands.get(interaction.commandName) : undefined;

    if (!command) {
      logger.warn(`No command found for: ${interaction.commandName}`);
      return;
    }

    try {
      logger.info(
        `Executing command: ${interaction.commandName} by ${interaction.user.tag} in ${interaction.guild?.name || 'DM'}`
      );

      await command.execute(interaction);
    } catch (error) {
      logger.error(`Error executing command ${interaction.commandName}:`, error);

      const errorMessage = {
        content: '❌ There was an error executing this command!',
        ephemeral: true,
      };

      if (interaction.replied || interaction.deferred) {
        await interaction.followUp(errorMessage);
      } else {
        await interaction.reply(errorMessage);
      }
    }
  },
};
