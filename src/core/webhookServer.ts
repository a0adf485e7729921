import express, { Request, Response } from 'express';
import { Server } from 'http';
import { configManager } from './configManager';
import { database } from '../database/client';
import { config } from './config';
import logger from './logger';

interface ConfigUpdatedBody {
  guildId: unknown;
  secret: unknown;
}

function readConfigUpdatedBody(body: unknown): ConfigUpdatedBody {
  if (typeof body !== 'object' || body === null) {
    return { guildId: undefined, secret: undefined };
  }
  return {
    guildId: 'guildId' in body ? body.guildId : undefined,
    secret: 'secret' in body ? body.secret : undefined,
  };
}

/**
 * Webhook Server
 * Listens for config update notifications from the dashboard so timezone and
 * AFK channel changes apply without a restart
 */
export class WebhookServer {
  private app: express.Application;
  private server: Server | null = null;

  constructor(private readonly secret: string = config.webhook.secret) {
    this.app = express();
    this.app.use(express.json());
    this.setupRoutes();
  }

  /**
   * Setup webhook routes
   */
  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        uptime: process.uptime(),
        database: database.isReady(),
        configLoadedAt: configManager.getLoadTimestamp()?.toISOString() ?? null,
      });
    });

    this.app.post('/api/config-updated', async (req: Request, res: Response): Promise<void> => {
      try {
        const { guildId, secret } = readConfigUpdatedBody(req.body);

        if (typeof guildId !== 'string' || guildId.length === 0) {
          res.status(400).json({ error: 'Missing guildId' });
          return;
        }

        if (secret !== this.secret) {
          logger.warn(`Unauthorized config update attempt for guild ${guildId}`);
          res.status(401).json({ error: 'Unauthorized' });
          return;
        }

        logger.info(`Received config update webhook for guild ${guildId}`);

        const cachedGuildId = configManager.getCachedGuildId();
        if (cachedGuildId && cachedGuildId !== guildId) {
          logger.warn(
            `Webhook received config update for guild ${guildId} but bot is configured for guild ${cachedGuildId}. Rejecting.`
          );
          res.status(400).json({
            error: `Invalid guildId. This bot is configured for guild ${cachedGuildId}`,
          });
          return;
        }

        await configManager.reloadConfig(guildId);

        const newConfig = configManager.getConfig(guildId);
        logger.info(`Config reloaded successfully (version ${newConfig.version})`);

        res.json({
          success: true,
          version: newConfig.version,
          reloadedAt: new Date().toISOString(),
        });
      } catch (error) {
        logger.error('Error processing config update webhook:', error);
        res.status(500).json({
          error: 'Internal server error',
          message: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    });
  }

  /**
   * Start the webhook server
   */
  start(port: number = config.webhook.port): void {
    this.server = this.app.listen(port, () => {
      logger.info(`Webhook server listening on port ${port}`);
      logger.info(`Health check available at: http://localhost:${port}/health`);
    });

    this.server.on('error', (error: Error) => {
      logger.error('Webhook server error:', error);
    });
  }

  /**
   * Stop the webhook server
   */
  stop(): void {
    if (this.server) {
      this.server.close(() => {
        logger.info('Webhook server stopped');
      });
      this.server = null;
    }
  }
}

export const webhookServer = new WebhookServer();
