/**
 * Text charts for Discord embeds
 */

export const WEEKDAY_LABELS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

const BAR_WIDTH = 20;
const FULL_BLOCK = '█';
const EMPTY_BLOCK = '░';

export interface ChartRow {
  label: string;
  value: number;
}

/**
 * Horizontal bar chart wrapped in a code block.
 * Bars are scaled to the largest value; an all-zero chart renders empty bars.
 */
export function renderBarChart(rows: readonly ChartRow[], formatValue: (value: number) => string): string {
  if (rows.length === 0) {
    return '```\n(no data)\n```';
  }

  const max = Math.max(...rows.map((row) => row.value));
  const labelWidth = Math.max(...rows.map((row) => row.label.length));

  const lines = rows.map((row) => {
    const filled = max > 0 ? Math.round((row.value / max) * BAR_WIDTH) : 0;
    const bar = FULL_BLOCK.repeat(filled) + EMPTY_BLOCK.repeat(BAR_WIDTH - filled);
    return `${row.label.padEnd(labelWidth)} ${bar} ${formatValue(row.value)}`;
  });

  return '```\n' + lines.join('\n') + '\n```';
}

export function hourRows(buckets: readonly number[]): ChartRow[] {
  return buckets.map((value, hour) => ({ label: hour.toString().padStart(2, '0'), value }));
}

export function weekdayRows(buckets: readonly number[]): ChartRow[] {
  return buckets.map((value, index) => ({ label: WEEKDAY_LABELS[index] ?? `D${index}`, value }));
}

/**
 * Dated rows, oldest first, keeping only the most recent `limit` dates
 */
export function dateRows(values: Record<string, number>, limit = 31): ChartRow[] {
  return Object.keys(values)
    .sort()
    .slice(-limit)
    .map((date) => ({ label: date, value: values[date] }));
}

/**
 * Index of the largest bucket, or null when every bucket is zero
 */
export function busiestIndex(buckets: readonly number[]): number | null {
  let best: number | null = null;
  for (let index = 0; index < buckets.length; index++) {
    if (buckets[index] > 0 && (best === null || buckets[index] > buckets[best])) {
      best = index;
    }
  }
  return best;
}
