import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  EmbedBuilder,
} from 'discord.js';
import { configManager } from '../core/configManager';
import { analyticsService, type AnalyticsResult } from '../modules/analytics/services/analyticsService';
import {
  busiestIndex,
  dateRows,
  hourRows,
  renderBarChart,
  weekdayRows,
  WEEKDAY_LABELS,
} from '../modules/analytics/utils/chartFormatters';
import { sumValues } from '../modules/analytics/engine/histograms';
import logger from '../core/logger';
import { formatCompact, formatHoursMinutes } from '../utils/timeFormatters';
import { daysOption } from '../utils/commandOptions';

const COLOR = 0x3498db;
const SOLO_LIMIT = 10;

export default {
  data: new SlashCommandBuilder()
    .setName('voicestats')
    .setDescription('Server voice activity analytics')
    .addSubcommand((sub) =>
      sub.setName('summary').setDescription('Overview of voice activity').addIntegerOption(daysOption)
    )
    .addSubcommand((sub) =>
      sub.setName('hours').setDescription('Voice time by hour of day').addIntegerOption(daysOption)
    )
    .addSubcommand((sub) =>
      sub.setName('weekdays').setDescription('Voice time by day of week').addIntegerOption(daysOption)
    )
    .addSubcommand((sub) =>
      sub.setName('daily').setDescription('Voice time per day').addIntegerOption(daysOption)
    )
    .addSubcommand((sub) =>
      sub.setName('peak').setDescription('Most people in voice at once').addIntegerOption(daysOption)
    )
    .addSubcommand((sub) =>
      sub.setName('unique').setDescription('Distinct people in voice per day').addIntegerOption(daysOption)
    )
    .addSubcommand((sub) =>
      sub.setName('alone').setDescription('Who spends the most time alone in a channel').addIntegerOption(daysOption)
    ),

  async execute(interaction: ChatInputCommandInteraction): Promise<void> {
    if (!interaction.inCachedGuild()) {
      await interaction.reply({ content: 'This command can only be used in a server.', ephemeral: true });
      return;
    }

    try {
      await interaction.deferReply();

      const guildId = interaction.guildId;
      const settings = configManager.getAnalyticsSettings(guildId);
      const days = configManager.resolveDays(guildId, interaction.options.getInteger('days'));
      const subcommand = interaction.options.getSubcommand();

      let embed: EmbedBuilder;

      switch (subcommand) {
        case 'summary': {
          const result = await analyticsService.getReport(guildId, days, settings);
          const report = result.data;
          const busiestHour = busiestIndex(report.hourOfDay);
          const busiestDay = busiestIndex(report.weekday);

          embed = baseEmbed(`📊 Voice summary (last ${days}d)`, result).addFields(
            { name: 'Total Voice Time', value: formatHoursMinutes(report.totalSeconds), inline: true },
            { name: 'Sessions', value: report.sessionCount.toLocaleString(), inline: true },
            { name: 'Peak Concurrency', value: report.peaks.overallPeak.toString(), inline: true },
            {
              name: 'Busiest Hour',
              value: busiestHour === null ? '—' : `${busiestHour.toString().padStart(2, '0')}:00`,
              inline: true,
            },
            { name: 'Busiest Weekday', value: busiestDay === null ? '—' : WEEKDAY_LABELS[busiestDay], inline: true },
            { name: 'Active Days', value: Object.keys(report.daily).length.toString(), inline: true }
          );
          break;
        }

        case 'hours': {
          const result = await analyticsService.getHourOfDay(guildId, days, settings);
          embed = chartEmbed(`🕒 Voice time by hour (last ${days}d)`, result, sumValues(result.data), () =>
            renderBarChart(hourRows(result.data), formatCompact)
          );
          break;
        }

        case 'weekdays': {
          const result = await analyticsService.getWeekday(guildId, days, settings);
          embed = chartEmbed(`📅 Voice time by weekday (last ${days}d)`, result, sumValues(result.data), () =>
            renderBarChart(weekdayRows(result.data), formatCompact)
          );
          break;
        }

        case 'daily': {
          const result = await analyticsService.getDaily(guildId, days, settings);
          embed = chartEmbed(`📈 Daily voice time (last ${days}d)`, result, sumValues(Object.values(result.data)), () =>
            renderBarChart(dateRows(result.data), formatCompact)
          );
          break;
        }

        case 'unique': {
          const result = await analyticsService.getUniqueUsers(guildId, days, settings);
          embed = chartEmbed(`👥 Unique people per day (last ${days}d)`, result, sumValues(Object.values(result.data)), () =>
            renderBarChart(dateRows(result.data), (value) => value.toString())
          );
          break;
        }

        case 'peak': {
          const result = await analyticsService.getPeaks(guildId, days, settings);
          const { overallPeak, perDayPeak } = result.data;
          embed = chartEmbed(`🔝 Peak concurrency (last ${days}d)`, result, overallPeak, () =>
            `Most people in voice at once: **${overallPeak}**\n` +
            renderBarChart(dateRows(perDayPeak), (value) => value.toString())
          );
          break;
        }

        case 'alone': {
          const result = await analyticsService.getSoloTime(guildId, days, settings);
          const lines = result.data
            .slice(0, SOLO_LIMIT)
            .map((entry, index) => `${index + 1}. <@${entry.id}> — **${formatHoursMinutes(entry.seconds)}**`);
          embed = chartEmbed(`🧍 Time alone in a channel (last ${days}d)`, result, lines.length, () => lines.join('\n'));
          break;
        }

        default:
          logger.warn(`Unknown voicestats subcommand: ${subcommand}`);
          embed = createErrorEmbed('Unknown command', 'That subcommand does not exist.');
      }

      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      logger.error('Error in voicestats command:', error);
      await interaction.editReply({
        embeds: [createErrorEmbed('Error', 'An error occurred while computing voice analytics. Please try again.')],
      });
    }
  },
};

function baseEmbed<T>(title: string, result: AnalyticsResult<T>): EmbedBuilder {
  const zoneNote = result.zone.fallback ? `${result.zone.name} (unknown zone "${result.zone.requested}")` : result.zone.name;
  const afkNote = result.query.excludedChannelId ? ' • AFK channel excluded' : '';

  return new EmbedBuilder()
    .setColor(COLOR)
    .setTitle(title)
    .setFooter({ text: `Timezone: ${zoneNote}${afkNote}` })
    .setTimestamp(result.query.now * 1000);
}

/**
 * Chart body, or a "no activity" line when there is nothing to draw
 */
function chartEmbed<T>(
  title: string,
  result: AnalyticsResult<T>,
  magnitude: number,
  render: () => string
): EmbedBuilder {
  const description = magnitude > 0 ? render() : 'No voice activity in this period.';
  return baseEmbed(title, result).setDescription(description);
}

function createErrorEmbed(title: string, description: string): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(`❌ ${title}`)
    .setDescription(description)
    .setColor(0xe74c3c);
}
