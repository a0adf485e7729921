import { MongoClient, Db, Collection, Document } from 'mongodb';
import { config } from '../core/config';
import logger from '../core/logger';
import { VoiceSessionDocument, ServerConfigDocument } from '../types/database';

/**
 * MongoDB Client Manager
 */
class DatabaseClient {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private isConnected = false;

  /**
   * Connect to MongoDB
   */
  async connect(): Promise<void> {
    if (this.isConnected) {
      logger.warn('Database already connected');
      return;
    }

    try {
      logger.info('Connecting to MongoDB...');
      this.client = new MongoClient(config.database.uri, {
        retryReads: true,
        maxPoolSize: 10,
        minPoolSize: 2,
      });

      await this.client.connect();
      this.db = this.client.db(config.database.name);
      this.isConnected = true;

      logger.info('Successfully connected to MongoDB');

      // Create indexes
      await this.createIndexes();
    } catch (error) {
      logger.error('Failed to connect to MongoDB:', error);
      throw error;
    }
  }

  /**
   * Disconnect from MongoDB
   */
  async disconnect(): Promise<void> {
    if (!this.isConnected || !this.client) {
      return;
    }

    try {
      await this.client.close();
      this.isConnected = false;
      logger.info('Disconnected from MongoDB');
    } catch (error) {
      logger.error('Error disconnecting from MongoDB:', error);
      throw error;
    }
  }

  /**
   * Get database instance
   */
  getDb(): Db {
    if (!this.db) {
      throw new Error('Database not connected. Call connect() first.');
    }
    return this.db;
  }

  /**
   * Get collection with type safety
   */
  getCollection<T extends Document>(name: string): Collection<T> {
    return this.getDb().collection<T>(name);
  }

  /**
   * Collection accessors
   */
  get voiceSessions(): Collection<VoiceSessionDocument> {
    return this.getCollection<VoiceSessionDocument>('voiceSessions');
  }

  get serverConfigs(): Collection<ServerConfigDocument> {
    return this.getCollection<ServerConfigDocument>('serverConfigs');
  }

  /**
   * Create database indexes for performance
   */
  private async createIndexes(): Promise<void> {
    logger.info('Creating database indexes...');

    try {
      // Voice session indexes
      await this.voiceSessions.createIndex({ guildId: 1, joinedTs: 1 }); // Window queries
      await this.voiceSessions.createIndex({ guildId: 1, userId: 1, leftTs: 1 }); // Open session lookup
      await this.voiceSessions.createIndex({ guildId: 1, channelId: 1 });
      await this.voiceSessions.createIndex({ guildId: 1, userId: 1, joinedTs: -1 }); // History

      // ServerConfigs indexes
      await this.serverConfigs.createIndex({ guildId: 1 }, { unique: true });

      logger.info('Database indexes created successfully');
    } catch (error) {
      logger.error('Error creating indexes:', error);
      throw error;
    }
  }

  /**
   * Check if database is connected
   */
  isReady(): boolean {
    return this.isConnected;
  }
}

// Export singleton instance
export const database = new DatabaseClient();
