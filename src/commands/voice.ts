import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  EmbedBuilder,
  ChannelType,
  Guild,
} from 'discord.js';
import { configManager } from '../core/configManager';
import { analyticsService } from '../modules/analytics/services/analyticsService';
import type { RankedTotal } from '../modules/analytics/types';
import { MAX_HISTORY_LIMIT } from '../modules/analytics/engine/totals';
import logger from '../core/logger';
import { formatHoursMinutes, formatLocalTimestamp } from '../utils/timeFormatters';
import { daysOption } from '../utils/commandOptions';

const COLOR = 0x5865f2;

export default {
  data: new SlashCommandBuilder()
    .setName('voice')
    .setDescription('Voice channel time tracking')
    .addSubcommand((sub) =>
      sub
        .setName('report')
        .setDescription('Your voice time in the last X days')
        .addIntegerOption(daysOption)
    )
    .addSubcommand((sub) => sub.setName('total').setDescription('Your lifetime voice time'))
    .addSubcommand((sub) =>
      sub
        .setName('history')
        .setDescription('Your most recent voice sessions')
        .addIntegerOption((option) =>
          option
            .setName('limit')
            .setDescription('Number of sessions (default 5)')
            .setMinValue(1)
            .setMaxValue(MAX_HISTORY_LIMIT)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName('top')
        .setDescription('Top 10 users by voice time')
        .addIntegerOption(daysOption)
    )
    .addSubcommand((sub) => sub.setName('current').setDescription('Who is in voice right now'))
    .addSubcommand((sub) =>
      sub
        .setName('channel_top')
        .setDescription('Top 10 users in one voice channel')
        .addChannelOption((option) =>
          option
            .setName('channel')
            .setDescription('Voice channel')
            .setRequired(true)
            .addChannelTypes(ChannelType.GuildVoice, ChannelType.GuildStageVoice)
        )
        .addIntegerOption(daysOption)
    )
    .addSubcommand((sub) =>
      sub
        .setName('channels_top')
        .setDescription('Top 10 voice channels by total time')
        .addIntegerOption(daysOption)
    ),

  async execute(interaction: ChatInputCommandInteraction): Promise<void> {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: 'This command can only be used in a server.', ephemeral: true });
      return;
    }

    try {
      await interaction.deferReply();

      const guildId = interaction.guildId;
      const guild = interaction.guild;
      const settings = configManager.getAnalyticsSettings(guildId);
      const days = configManager.resolveDays(guildId, interaction.options.getInteger('days'));
      const subcommand = interaction.options.getSubcommand();

      switch (subcommand) {
        case 'report': {
          const result = await analyticsService.getUserTotal(guildId, interaction.user.id, days, settings);
          await interaction.editReply({
            content: `🎧 ${interaction.user.toString()}: last ${days}d **${formatHoursMinutes(result.data)}**`,
          });
          return;
        }

        case 'total': {
          const result = await analyticsService.getUserTotal(guildId, interaction.user.id, null, settings);
          await interaction.editReply({
            content: `📊 ${interaction.user.toString()}: lifetime **${formatHoursMinutes(result.data)}**`,
          });
          return;
        }

        case 'history': {
          const limit = interaction.options.getInteger('limit') ?? 5;
          const entries = await analyticsService.getHistory(guildId, interaction.user.id, limit, settings);

          if (entries.length === 0) {
            await interaction.editReply({ content: 'No sessions found.' });
            return;
          }

          const lines = entries.map((entry) => {
            const name = channelName(guild, entry.channelId);
            const start = formatLocalTimestamp(entry.joinedTs, settings.timezone);
            const live = entry.open ? ' 🔴 live' : '';
            return `• **${name}** — ${start} (${formatHoursMinutes(entry.durationSeconds)})${live}`;
          });

          await interaction.editReply({
            embeds: [
              new EmbedBuilder()
                .setColor(COLOR)
                .setTitle('📜 Your recent sessions')
                .setDescription(lines.join('\n')),
            ],
          });
          return;
        }

        case 'top': {
          const result = await analyticsService.getTopUsers(guildId, days, settings);
          await replyWithRanking(
            interaction,
            result.data,
            `Top voice time (last ${days}d)`,
            (id) => `<@${id}>`,
            `No voice activity in the last ${days}d.`
          );
          return;
        }

        case 'current': {
          const lines = currentOccupancy(guild);
          await interaction.editReply({
            content: lines.length > 0 ? lines.join('\n') : 'No one is in voice right now.',
          });
          return;
        }

        case 'channel_top': {
          const channel = interaction.options.getChannel('channel', true);

          if (settings.excludedChannelId === channel.id) {
            await interaction.editReply({ content: `AFK channel **${channel.name}** is excluded from stats.` });
            return;
          }

          const result = await analyticsService.getChannelTopUsers(guildId, channel.id, days, settings);
          await replyWithRanking(
            interaction,
            result.data,
            `Top voice in ${channel.name} (last ${days}d)`,
            (id) => `<@${id}>`,
            `No activity in <#${channel.id}> in the last ${days}d.`
          );
          return;
        }

        case 'channels_top': {
          const result = await analyticsService.getTopChannels(guildId, days, settings);
          await replyWithRanking(
            interaction,
            result.data,
            `Top channels (last ${days}d)`,
            (id) => (guild.channels.cache.has(id) ? `<#${id}>` : `#<deleted:${id}>`),
            `No voice activity in the last ${days}d.`
          );
          return;
        }

        default:
          logger.warn(`Unknown voice subcommand: ${subcommand}`);
          await interaction.editReply({ embeds: [createErrorEmbed('Unknown command', 'That subcommand does not exist.')] });
      }
    } catch (error) {
      logger.error('Error in voice command:', error);
      await interaction.editReply({
        embeds: [createErrorEmbed('Error', 'An error occurred while fetching voice statistics. Please try again.')],
      });
    }
  },
};

async function replyWithRanking(
  interaction: ChatInputCommandInteraction,
  entries: readonly RankedTotal[],
  title: string,
  mention: (id: string) => string,
  emptyMessage: string
): Promise<void> {
  if (entries.length === 0) {
    await interaction.editReply({ content: emptyMessage });
    return;
  }

  const lines = entries.map(
    (entry, index) => `${index + 1}. ${mention(entry.id)} — **${formatHoursMinutes(entry.seconds)}**`
  );

  await interaction.editReply({
    embeds: [new EmbedBuilder().setColor(COLOR).setTitle(title).setDescription(lines.join('\n')).setTimestamp()],
  });
}

/**
 * "🔊 **Channel**: name, name" for every voice channel with people in it
 */
function currentOccupancy(guild: Guild): string[] {
  const lines: string[] = [];

  for (const channel of guild.channels.cache.values()) {
    if (!channel.isVoiceBased() || channel.members.size === 0) continue;

    const names = channel.members.map((member) => member.displayName).join(', ');
    lines.push(`🔊 **${channel.name}**: ${names}`);
  }

  return lines;
}

function channelName(guild: Guild, channelId: string): string {
  return guild.channels.cache.get(channelId)?.name ?? `#${channelId}`;
}

function createErrorEmbed(title: string, description: string): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(`❌ ${title}`)
    .setDescription(description)
    .setColor(0xe74c3c);
}
