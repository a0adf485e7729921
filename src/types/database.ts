/**
 * Database document schemas
 */

/**
 * Voice Session Document
 * One continuous stay of one user in one voice channel.
 * Timestamps are epoch seconds; leftTs stays null while the user is still connected.
 */
export interface VoiceSessionDocument {
  guildId: string;
  userId: string;
  channelId: string;
  joinedTs: number; // Inclusive start
  leftTs: number | null; // Exclusive end, null while open
  createdAt: Date;
  closedBy?: 'leave' | 'switch' | 'rejoin' | 'recovery'; // What ended the session
}

/**
 * Server Configuration Document
 * Per-guild settings, created from env defaults on first load
 */
export interface ServerConfigDocument {
  guildId: string;

  // Voice tracking
  vcTracking: {
    enabled: boolean;
    ignoreBots: boolean;
  };

  // Voice analytics
  voiceAnalytics: {
    timezone: string; // IANA zone name, falls back to UTC when unknown
    excludedChannelId: string | null; // AFK/idle channel left out of every aggregate
    defaultDays: number;
    maxDays: number;
  };

  updatedAt: Date;
  updatedBy: string;
  version: number; // Incremented on every dashboard edit
}
