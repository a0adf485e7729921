import { describe, expect, it } from 'vitest';
import {
  dailyTotals,
  hourOfDayHistogram,
  sumValues,
  uniqueUsersPerDay,
  weekdayHistogram,
} from '../src/modules/analytics/engine/histograms';
import { clampSessions, clampedDuration } from '../src/modules/analytics/engine/intervalClamp';
import { DAY, HOUR, JAN_1_2024, query, session } from './fixtures';

const STOCKHOLM_MAR_31 = 1711839600;
const STOCKHOLM_APR_1 = 1711922400;
const STOCKHOLM_OCT_27 = 1729980000;
const STOCKHOLM_OCT_28 = 1730070000;
// America/Santiago 2024-09-08 has no 00:00; the day runs 01:00 -03 to 00:00 -03
const SANTIAGO_SEP_8 = 1725768000;
const SANTIAGO_SEP_9 = 1725850800;

describe('hourOfDayHistogram', () => {
  it('returns 24 zero buckets for no sessions', () => {
    expect(hourOfDayHistogram([], query())).toEqual(new Array<number>(24).fill(0));
  });

  it('puts a session inside one hour into that bucket only', () => {
    const buckets = hourOfDayHistogram([session('u1', 'c1', JAN_1_2024 + 9 * HOUR + 600, JAN_1_2024 + 9 * HOUR + 1800)], query());

    expect(buckets[9]).toBe(1200);
    expect(sumValues(buckets)).toBe(1200);
  });

  it('skips the missing hour on a spring-forward day', () => {
    const buckets = hourOfDayHistogram(
      [session('u1', 'c1', STOCKHOLM_MAR_31, STOCKHOLM_APR_1)],
      query({ since: 0, now: STOCKHOLM_APR_1 + DAY, timezone: 'Europe/Stockholm' })
    );

    expect(buckets[2]).toBe(0);
    expect(buckets[3]).toBe(3600);
    expect(sumValues(buckets)).toBe(23 * HOUR);
  });

  it('counts the repeated hour twice on a fall-back day', () => {
    const buckets = hourOfDayHistogram(
      [session('u1', 'c1', STOCKHOLM_OCT_27, STOCKHOLM_OCT_28)],
      query({ since: 0, now: STOCKHOLM_OCT_28, timezone: 'Europe/Stockholm' })
    );

    expect(buckets[2]).toBe(7200);
    expect(sumValues(buckets)).toBe(25 * HOUR);
  });

  it('falls back to UTC for an unknown zone', () => {
    const sessions = [session('u1', 'c1', JAN_1_2024 + 5 * HOUR, JAN_1_2024 + 6 * HOUR)];

    expect(hourOfDayHistogram(sessions, query({ timezone: 'Nowhere/Unknown' }))).toEqual(
      hourOfDayHistogram(sessions, query({ timezone: 'UTC' }))
    );
  });

  it('stays exact for an open session running for years', () => {
    const now = JAN_1_2024 + 1096 * DAY; // 2027-01-01
    const buckets = hourOfDayHistogram([session('u1', 'c1', JAN_1_2024, null)], query({ now }));

    expect(buckets).toEqual(new Array<number>(24).fill(1096 * HOUR));
  });
});

describe('weekdayHistogram', () => {
  it('splits across the weekday boundary, Monday first', () => {
    const buckets = weekdayHistogram(
      [session('u1', 'c1', JAN_1_2024 + 23 * HOUR, JAN_1_2024 + DAY + 5400)],
      query()
    );

    expect(buckets).toEqual([3600, 5400, 0, 0, 0, 0, 0]);
  });

  it('returns 7 zero buckets for no sessions', () => {
    expect(weekdayHistogram([], query())).toEqual([0, 0, 0, 0, 0, 0, 0]);
  });
});

describe('dailyTotals', () => {
  it('keys by local date in ascending order', () => {
    const totals = dailyTotals(
      [
        session('u2', 'c1', JAN_1_2024 + 2 * DAY, JAN_1_2024 + 2 * DAY + 600),
        session('u1', 'c1', JAN_1_2024 + 23 * HOUR, JAN_1_2024 + DAY + 5400),
      ],
      query()
    );

    expect(totals).toEqual({ '2024-01-01': 3600, '2024-01-02': 5400, '2024-01-03': 600 });
    expect(Object.keys(totals)).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
  });

  it('splits at the skipped midnight and measures the shortened day', () => {
    expect(
      dailyTotals(
        [session('u1', 'c1', SANTIAGO_SEP_8 - 12 * HOUR, SANTIAGO_SEP_9)],
        query({ since: 0, now: SANTIAGO_SEP_9 + DAY, timezone: 'America/Santiago' })
      )
    ).toEqual({ '2024-09-07': 12 * HOUR, '2024-09-08': 23 * HOUR });
  });

  it('measures a 23-hour local day', () => {
    expect(
      dailyTotals(
        [session('u1', 'c1', STOCKHOLM_MAR_31, STOCKHOLM_APR_1)],
        query({ since: 0, now: STOCKHOLM_APR_1 + DAY, timezone: 'Europe/Stockholm' })
      )
    ).toEqual({ '2024-03-31': 23 * HOUR });
  });

  it('ignores the excluded channel', () => {
    expect(dailyTotals([session('u1', 'afk', JAN_1_2024, JAN_1_2024 + DAY)], query({ excludedChannelId: 'afk' }))).toEqual({});
  });
});

describe('uniqueUsersPerDay', () => {
  it('counts each user once per day touched', () => {
    const counts = uniqueUsersPerDay(
      [
        session('u1', 'c1', JAN_1_2024 + 23 * HOUR, JAN_1_2024 + DAY + HOUR),
        session('u1', 'c2', JAN_1_2024 + DAY + 10 * HOUR, JAN_1_2024 + DAY + 11 * HOUR),
        session('u2', 'c1', JAN_1_2024 + DAY + 5 * HOUR, JAN_1_2024 + DAY + 6 * HOUR),
      ],
      query()
    );

    expect(counts).toEqual({ '2024-01-01': 1, '2024-01-02': 2 });
  });

  it('does not count a session ending exactly at midnight toward the next day', () => {
    expect(uniqueUsersPerDay([session('u1', 'c1', JAN_1_2024 + 22 * HOUR, JAN_1_2024 + DAY)], query())).toEqual({
      '2024-01-01': 1,
    });
  });
});

describe('conservation', () => {
  it('every histogram sums to the clamped durations', () => {
    const sessions = [
      session('u1', 'c1', JAN_1_2024 - 2 * HOUR, JAN_1_2024 + 3 * HOUR),
      session('u2', 'c1', JAN_1_2024 + 20 * HOUR, JAN_1_2024 + 2 * DAY + 1234),
      session('u3', 'c2', JAN_1_2024 + 5 * DAY + 17, null),
      session('u4', 'afk', JAN_1_2024, JAN_1_2024 + 4 * DAY),
      session('u5', 'c2', JAN_1_2024 + 9 * DAY, JAN_1_2024 + 9 * DAY),
    ];
    const q = query({
      since: JAN_1_2024,
      now: JAN_1_2024 + 7 * DAY + 999,
      timezone: 'Europe/Stockholm',
      excludedChannelId: 'afk',
    });

    const expected = sumValues(clampSessions(sessions, q).map(clampedDuration));

    expect(expected).toBe(3 * HOUR + (28 * HOUR + 1234) + (2 * DAY - 17 + 999));
    expect(sumValues(hourOfDayHistogram(sessions, q))).toBe(expected);
    expect(sumValues(weekdayHistogram(sessions, q))).toBe(expected);
    expect(sumValues(Object.values(dailyTotals(sessions, q)))).toBe(expected);
  });
});
