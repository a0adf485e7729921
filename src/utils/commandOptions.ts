import { SlashCommandIntegerOption } from 'discord.js';
import { config } from '../core/config';

export interface DaysLimits {
  defaultDays: number;
  maxDays: number;
}

export function daysOptionDescription(limits: DaysLimits = config.analytics): string {
  return `Days to look back (default ${limits.defaultDays}, max ${limits.maxDays})`;
}

/**
 * The shared `days` option, bounded the same way the lookback is resolved
 */
export function daysOption(
  option: SlashCommandIntegerOption,
  limits: DaysLimits = config.analytics
): SlashCommandIntegerOption {
  return option
    .setName('days')
    .setDescription(daysOptionDescription(limits))
    .setMinValue(1)
    .setMaxValue(limits.maxDays);
}
