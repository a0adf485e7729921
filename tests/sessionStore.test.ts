import { afterEach, describe, expect, it, vi } from 'vitest';
import logger from '../src/core/logger';
import { SessionStore } from '../src/modules/voiceTracking/services/sessionStore';

describe('SessionStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs and rethrows when open sessions cannot be read', async () => {
    const logged = vi.spyOn(logger, 'error').mockImplementation(() => logger);

    // No connect(): every collection access fails
    await expect(new SessionStore().findOpenSessions('g1')).rejects.toThrow(
      'Database not connected. Call connect() first.'
    );
    expect(logged).toHaveBeenCalledWith('Failed to query open voice sessions for guild g1:', expect.any(Error));
  });
});
