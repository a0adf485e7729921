import type { Granularity, LocalTime } from '../types';

const SECONDS_PER_HOUR = 3600;
const SECONDS_PER_DAY = 86400;

export interface ResolvedZone {
  name: string; // Zone actually used
  requested: string;
  fallback: boolean; // True when the requested name was unknown and UTC is used instead
}

/**
 * Resolve an IANA zone name. Unknown names degrade to UTC instead of throwing.
 */
export function resolveZone(requested: string): ResolvedZone {
  const trimmed = requested.trim();
  if (trimmed.length === 0) {
    return { name: 'UTC', requested, fallback: true };
  }

  try {
    const name = new Intl.DateTimeFormat('en-US', { timeZone: trimmed }).resolvedOptions().timeZone;
    return { name, requested, fallback: false };
  } catch {
    return { name: 'UTC', requested, fallback: true };
  }
}

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

export function formatDateKey(local: Pick<LocalTime, 'year' | 'month' | 'day'>): string {
  return `${pad(local.year, 4)}-${pad(local.month)}-${pad(local.day)}`;
}

/**
 * Converts epoch seconds to wall-clock time in one zone and finds the next
 * local hour or midnight boundary. Built per aggregation call.
 */
export class ZoneClock {
  private readonly formatter: Intl.DateTimeFormat;

  constructor(readonly zone: ResolvedZone) {
    this.formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: zone.name,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
  }

  static forZone(name: string): ZoneClock {
    return new ZoneClock(resolveZone(name));
  }

  localTime(ts: number): LocalTime {
    const fields = { year: 1970, month: 1, day: 1, hour: 0, minute: 0, second: 0 };

    for (const part of this.formatter.formatToParts(new Date(ts * 1000))) {
      switch (part.type) {
        case 'year':
        case 'month':
        case 'day':
        case 'hour':
        case 'minute':
        case 'second':
          fields[part.type] = parseInt(part.value, 10);
          break;
      }
    }

    // Some ICU builds render midnight as hour 24
    if (fields.hour === 24) {
      fields.hour = 0;
    }

    const weekdaySundayFirst = new Date(Date.UTC(fields.year, fields.month - 1, fields.day)).getUTCDay();

    return { ...fields, weekday: (weekdaySundayFirst + 6) % 7 };
  }

  dateKey(ts: number): string {
    return formatDateKey(this.localTime(ts));
  }

  /**
   * Seconds the zone is ahead of UTC at ts
   */
  offsetAt(ts: number): number {
    const local = this.localTime(ts);
    return this.wallSeconds(local) - ts;
  }

  /**
   * First boundary strictly after ts. local must be localTime(ts).
   */
  nextBoundary(ts: number, local: LocalTime, granularity: Granularity): number {
    return granularity === 'hour' ? this.nextHour(ts, local) : this.nextMidnight(ts, local);
  }

  private nextHour(ts: number, local: LocalTime): number {
    return ts + SECONDS_PER_HOUR - (local.minute * 60 + local.second);
  }

  private nextMidnight(ts: number, local: LocalTime): number {
    const tomorrow = new Date(Date.UTC(local.year, local.month - 1, local.day + 1));
    const wallMidnight = Date.UTC(tomorrow.getUTCFullYear(), tomorrow.getUTCMonth(), tomorrow.getUTCDate()) / 1000;

    // Two passes settle the offset across a DST change between ts and midnight
    let candidate = wallMidnight - this.offsetAt(ts);
    candidate = wallMidnight - this.offsetAt(candidate);

    if (candidate > ts && this.dateKey(candidate) !== formatDateKey(local)) {
      return candidate;
    }

    // Midnight does not exist on this date (DST jump at 00:00): walk hours until the date changes
    const today = formatDateKey(local);
    let cursor = ts;
    do {
      cursor = this.nextHour(cursor, this.localTime(cursor));
    } while (this.dateKey(cursor) === today && cursor - ts < SECONDS_PER_DAY * 2);
    return cursor;
  }

  private wallSeconds(local: LocalTime): number {
    return Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second) / 1000;
  }
}
