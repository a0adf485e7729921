import { describe, expect, it } from 'vitest';
import { soloTime } from '../src/modules/analytics/engine/soloTimeSweep';
import { query, session } from './fixtures';

const q = query({ since: 0, now: 1000 });

describe('soloTime', () => {
  it('credits a lone occupant with the whole session', () => {
    expect(soloTime([session('a', 'c1', 0, 100)], q)).toEqual({ a: 100 });
  });

  it('stops crediting while someone else is present', () => {
    // a is alone for [0,40) and [60,100)
    const result = soloTime([session('a', 'c1', 0, 100), session('b', 'c1', 40, 60)], q);

    expect(result).toEqual({ a: 80 });
    expect(result.b).toBeUndefined();
  });

  it('treats channels independently', () => {
    expect(soloTime([session('a', 'c1', 0, 100), session('b', 'c2', 0, 100)], q)).toEqual({ a: 100, b: 100 });
  });

  it('sums solo time across channels', () => {
    expect(soloTime([session('a', 'c1', 0, 30), session('a', 'c2', 50, 70)], q)).toEqual({ a: 50 });
  });

  it('splits a same-second hand-off cleanly', () => {
    expect(soloTime([session('a', 'c1', 0, 50), session('b', 'c1', 50, 100)], q)).toEqual({ a: 50, b: 50 });
  });

  it('counts overlapping stays by the same user as one presence', () => {
    expect(soloTime([session('a', 'c1', 0, 100), session('a', 'c1', 50, 150)], q)).toEqual({ a: 150 });
  });

  it('clamps to the window and drops the excluded channel', () => {
    const result = soloTime(
      [session('a', 'c1', 0, 100), session('b', 'afk', 0, 500)],
      query({ since: 20, now: 60, excludedChannelId: 'afk' })
    );

    expect(result).toEqual({ a: 40 });
  });

  it('returns an empty table for no sessions', () => {
    expect(soloTime([], q)).toEqual({});
  });
});
