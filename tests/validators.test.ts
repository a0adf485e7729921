import { describe, expect, it } from 'vitest';
import { toSessionRecord } from '../src/modules/voiceTracking/utils/validators';

describe('toSessionRecord', () => {
  it('keeps the four session fields and freezes the record', () => {
    const record = toSessionRecord({
      _id: 'doc-1',
      guildId: 'g1',
      userId: 'u1',
      channelId: 'c1',
      joinedTs: 100,
      leftTs: 200,
      closedBy: 'leave',
    });

    expect(record).toEqual({ userId: 'u1', channelId: 'c1', joinedTs: 100, leftTs: 200 });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('treats a missing or null leftTs as open', () => {
    expect(toSessionRecord({ userId: 'u1', channelId: 'c1', joinedTs: 100 })).toEqual({
      userId: 'u1',
      channelId: 'c1',
      joinedTs: 100,
      leftTs: null,
    });
    expect(toSessionRecord({ userId: 'u1', channelId: 'c1', joinedTs: 100, leftTs: null })?.leftTs).toBeNull();
  });

  it('accepts a zero-length session', () => {
    expect(toSessionRecord({ userId: 'u1', channelId: 'c1', joinedTs: 100, leftTs: 100 })?.leftTs).toBe(100);
  });

  it('rejects malformed documents', () => {
    expect(toSessionRecord(null)).toBeNull();
    expect(toSessionRecord('u1')).toBeNull();
    expect(toSessionRecord({ userId: 'u1', channelId: 'c1' })).toBeNull();
    expect(toSessionRecord({ userId: '', channelId: 'c1', joinedTs: 100 })).toBeNull();
    expect(toSessionRecord({ userId: 'u1', channelId: 42, joinedTs: 100 })).toBeNull();
    expect(toSessionRecord({ userId: 'u1', channelId: 'c1', joinedTs: 100.5 })).toBeNull();
    expect(toSessionRecord({ userId: 'u1', channelId: 'c1', joinedTs: -1 })).toBeNull();
    expect(toSessionRecord({ userId: 'u1', channelId: 'c1', joinedTs: 100, leftTs: 99 })).toBeNull();
    expect(toSessionRecord({ userId: 'u1', channelId: 'c1', joinedTs: 100, leftTs: '200' })).toBeNull();
  });
});
