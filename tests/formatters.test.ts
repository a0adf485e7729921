import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  formatCompact,
  formatHoursMinutes,
  formatLocalTimestamp,
  nowSeconds,
  sinceDaysAgo,
} from '../src/utils/timeFormatters';
import {
  busiestIndex,
  dateRows,
  hourRows,
  renderBarChart,
  weekdayRows,
} from '../src/modules/analytics/utils/chartFormatters';
import { JAN_1_2024 } from './fixtures';

describe('timeFormatters', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats hours and minutes', () => {
    expect(formatHoursMinutes(3600)).toBe('1h 0m');
    expect(formatHoursMinutes(5459)).toBe('1h 30m');
    expect(formatHoursMinutes(90061)).toBe('25h 1m');
    expect(formatHoursMinutes(-5)).toBe('0h 0m');
  });

  it('formats compact chart labels', () => {
    expect(formatCompact(129600)).toBe('1.5d');
    expect(formatCompact(9000)).toBe('2.5h');
    expect(formatCompact(2700)).toBe('45m');
    expect(formatCompact(59)).toBe('59s');
  });

  it('formats a timestamp in a zone', () => {
    expect(formatLocalTimestamp(JAN_1_2024, 'UTC')).toBe('2024-01-01 00:00');
    expect(formatLocalTimestamp(JAN_1_2024 + 1800, 'Europe/Stockholm')).toBe('2024-01-01 01:30');
    expect(formatLocalTimestamp(JAN_1_2024, 'Bad/Zone')).toBe('2024-01-01 00:00 UTC');
  });

  it('reads the clock in whole seconds', () => {
    vi.spyOn(Date, 'now').mockReturnValue(JAN_1_2024 * 1000 + 999);

    expect(nowSeconds()).toBe(JAN_1_2024);
  });

  it('computes a window start', () => {
    expect(sinceDaysAgo(1_000_000, 2)).toBe(827_200);
  });
});

describe('chartFormatters', () => {
  it('scales bars to the largest value', () => {
    const chart = renderBarChart(
      [
        { label: 'a', value: 10 },
        { label: 'bb', value: 5 },
      ],
      (value) => value.toString()
    );

    expect(chart).toBe(
      '```\n' + `a  ${'█'.repeat(20)} 10\n` + `bb ${'█'.repeat(10)}${'░'.repeat(10)} 5\n` + '```'
    );
  });

  it('renders empty bars when everything is zero', () => {
    expect(renderBarChart([{ label: 'x', value: 0 }], (value) => value.toString())).toBe(
      '```\n' + `x ${'░'.repeat(20)} 0\n` + '```'
    );
  });

  it('renders a placeholder with no rows', () => {
    expect(renderBarChart([], (value) => value.toString())).toBe('```\n(no data)\n```');
  });

  it('labels hour and weekday rows', () => {
    const hours = hourRows(new Array<number>(24).fill(0));

    expect(hours[0].label).toBe('00');
    expect(hours[23].label).toBe('23');
    expect(weekdayRows([1, 2, 3, 4, 5, 6, 7]).map((row) => row.label)).toEqual([
      'Mon',
      'Tue',
      'Wed',
      'Thu',
      'Fri',
      'Sat',
      'Sun',
    ]);
  });

  it('keeps the most recent dates in order', () => {
    expect(dateRows({ '2024-01-03': 3, '2024-01-01': 1, '2024-01-02': 2 }, 2)).toEqual([
      { label: '2024-01-02', value: 2 },
      { label: '2024-01-03', value: 3 },
    ]);
  });

  it('finds the first busiest bucket', () => {
    expect(busiestIndex([0, 3, 5, 5])).toBe(2);
    expect(busiestIndex([0, 0])).toBeNull();
  });
});
