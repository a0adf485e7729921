import { describe, expect, it } from 'vitest';
import { ZoneClock, formatDateKey, resolveZone } from '../src/modules/analytics/engine/zoneClock';
import { JAN_1_2024 } from './fixtures';

// Europe/Stockholm local midnights around the 2024 DST changes
const STOCKHOLM_MAR_31 = 1711839600; // 23-hour day
const STOCKHOLM_APR_1 = 1711922400;

// America/Santiago moves from -04 to -03 at local midnight, so 2024-09-08 starts at 01:00
const SANTIAGO_SEP_7 = 1725681600; // 00:00 -04
const SANTIAGO_SEP_8 = 1725768000; // 01:00 -03

describe('resolveZone', () => {
  it('keeps a known zone', () => {
    expect(resolveZone('Europe/Stockholm')).toEqual({
      name: 'Europe/Stockholm',
      requested: 'Europe/Stockholm',
      fallback: false,
    });
  });

  it('falls back to UTC for unknown or empty names', () => {
    expect(resolveZone('Mars/Olympus_Mons')).toEqual({ name: 'UTC', requested: 'Mars/Olympus_Mons', fallback: true });
    expect(resolveZone('  ')).toEqual({ name: 'UTC', requested: '  ', fallback: true });
  });
});

describe('ZoneClock', () => {
  it('reads wall-clock time with a Monday-first weekday', () => {
    expect(ZoneClock.forZone('UTC').localTime(JAN_1_2024 + 13 * 3600 + 5 * 60 + 9)).toEqual({
      year: 2024,
      month: 1,
      day: 1,
      hour: 13,
      minute: 5,
      second: 9,
      weekday: 0,
    });
    // 2024-01-07 is a Sunday
    expect(ZoneClock.forZone('UTC').localTime(JAN_1_2024 + 6 * 86400).weekday).toBe(6);
  });

  it('formats date keys', () => {
    expect(formatDateKey({ year: 2024, month: 3, day: 9 })).toBe('2024-03-09');
    expect(ZoneClock.forZone('Europe/Stockholm').dateKey(JAN_1_2024 - 1800)).toBe('2024-01-01');
  });

  it('reports the offset in effect', () => {
    const clock = ZoneClock.forZone('Europe/Stockholm');
    expect(clock.offsetAt(JAN_1_2024)).toBe(3600);
    expect(clock.offsetAt(STOCKHOLM_APR_1)).toBe(7200);
  });

  it('finds the next local midnight across a spring-forward day', () => {
    const clock = ZoneClock.forZone('Europe/Stockholm');
    const next = clock.nextBoundary(STOCKHOLM_MAR_31, clock.localTime(STOCKHOLM_MAR_31), 'day');

    expect(next).toBe(STOCKHOLM_APR_1);
  });

  it('finds the next hour in a half-hour offset zone', () => {
    const clock = ZoneClock.forZone('Asia/Kolkata');
    // 05:30 local
    expect(clock.nextBoundary(JAN_1_2024, clock.localTime(JAN_1_2024), 'hour')).toBe(JAN_1_2024 + 1800);
  });

  it('starts the next day at the first wall-clock time when midnight is skipped', () => {
    const clock = ZoneClock.forZone('America/Santiago');

    expect(clock.nextBoundary(SANTIAGO_SEP_7, clock.localTime(SANTIAGO_SEP_7), 'day')).toBe(SANTIAGO_SEP_8);
    expect(clock.dateKey(SANTIAGO_SEP_8)).toBe('2024-09-08');
    expect(clock.localTime(SANTIAGO_SEP_8).hour).toBe(1);
  });

  it('reaches the skipped midnight from later in the day', () => {
    const clock = ZoneClock.forZone('America/Santiago');
    const noon = SANTIAGO_SEP_7 + 12 * 3600;

    expect(clock.nextBoundary(noon, clock.localTime(noon), 'day')).toBe(SANTIAGO_SEP_8);
  });
});
