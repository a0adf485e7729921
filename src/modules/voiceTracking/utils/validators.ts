import type { VoiceSessionRecord } from '../../analytics/types';

function isEpochSeconds(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isId(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Validate a stored document into an immutable session record.
 * Returns null for anything that does not have the four fields in a usable shape.
 */
export function toSessionRecord(doc: unknown): VoiceSessionRecord | null {
  if (typeof doc !== 'object' || doc === null) {
    return null;
  }
  if (!('userId' in doc) || !('channelId' in doc) || !('joinedTs' in doc)) {
    return null;
  }

  const { userId, channelId, joinedTs } = doc;
  const leftTs = 'leftTs' in doc ? doc.leftTs : null;

  if (!isId(userId) || !isId(channelId) || !isEpochSeconds(joinedTs)) {
    return null;
  }

  if (leftTs === null || leftTs === undefined) {
    return Object.freeze({ userId, channelId, joinedTs, leftTs: null });
  }

  if (!isEpochSeconds(leftTs) || leftTs < joinedTs) {
    return null;
  }

  return Object.freeze({ userId, channelId, joinedTs, leftTs });
}
