import { describe, expect, it } from 'vitest';
import {
  MAX_HISTORY_LIMIT,
  recentSessions,
  topN,
  totalsByChannel,
  totalsByUser,
  userTotal,
} from '../src/modules/analytics/engine/totals';
import { query, session } from './fixtures';

const sessions = [
  session('u1', 'c1', 0, 100),
  session('u2', 'c1', 0, 300),
  session('u1', 'c2', 200, 400),
  session('u3', 'afk', 0, 1000),
];
const q = query({ since: 50, now: 350, excludedChannelId: 'afk' });

describe('totals', () => {
  it('ranks users by clamped seconds', () => {
    expect(totalsByUser(sessions, q)).toEqual([
      { id: 'u2', seconds: 250 },
      { id: 'u1', seconds: 200 },
    ]);
  });

  it('ranks channels by clamped seconds', () => {
    expect(totalsByChannel(sessions, q)).toEqual([
      { id: 'c1', seconds: 300 },
      { id: 'c2', seconds: 150 },
    ]);
  });

  it('breaks ties by id', () => {
    expect(totalsByUser([session('b', 'c1', 0, 10), session('a', 'c1', 0, 10)], query({ now: 100 }))).toEqual([
      { id: 'a', seconds: 10 },
      { id: 'b', seconds: 10 },
    ]);
  });

  it('sums one user', () => {
    expect(userTotal(sessions, 'u1', q)).toBe(200);
    expect(userTotal(sessions, 'u3', q)).toBe(0);
  });

  it('takes the first N', () => {
    expect(topN(totalsByUser(sessions, q), 1)).toEqual([{ id: 'u2', seconds: 250 }]);
    expect(topN(totalsByUser(sessions, q), -1)).toEqual([]);
  });
});

describe('recentSessions', () => {
  const history = [
    session('u1', 'c1', 100, 200),
    session('u1', 'c2', 300, null),
    session('u1', 'afk', 400, 500),
    session('u2', 'c1', 500, 600),
  ];

  it('lists newest first, measures open sessions to now and skips the excluded channel', () => {
    expect(recentSessions(history, 'u1', 5, 1000, 'afk')).toEqual([
      { channelId: 'c2', joinedTs: 300, leftTs: null, durationSeconds: 700, open: true },
      { channelId: 'c1', joinedTs: 100, leftTs: 200, durationSeconds: 100, open: false },
    ]);
  });

  it('clamps the limit', () => {
    const many = Array.from({ length: 25 }, (_, i) => session('u1', 'c1', i * 10, i * 10 + 5));

    expect(recentSessions(history, 'u1', 0, 1000, null)).toHaveLength(1);
    expect(recentSessions(many, 'u1', 50, 1000, null)).toHaveLength(MAX_HISTORY_LIMIT);
  });
});
