import {
  Client,
  GatewayIntentBits,
  Collection,
  REST,
  Routes,
  ActivityType,
  ChatInputCommandInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { config } from './config';
import logger from './logger';

/**
 * Shape every file under src/commands exports as default
 */
export interface BotCommand {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  execute(interaction: ChatInputCommandInteraction): Promise<void>;
}

/**
 * Shape every file under src/events exports as default
 */
export interface BotEvent {
  name: string;
  once?: boolean;
  execute(...args: unknown[]): Promise<void>;
}

export function isBotCommand(value: unknown): value is BotCommand {
  return (
    typeof value === 'object' &&
    value !== null &&
    'data' in value &&
    'execute' in value &&
    typeof value.execute === 'function' &&
    typeof value.data === 'object' &&
    value.data !== null &&
    'name' in value.data &&
    typeof value.data.name === 'string'
  );
}

export function isBotEvent(value: unknown): value is BotEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    'execute' in value &&
    typeof value.name === 'string' &&
    typeof value.execute === 'function'
  );
}

/**
 * Extended Discord Client with command collection
 */
export class BotClient extends Client {
  public commands: Collection<string, BotCommand>;

  constructor() {
    super({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildVoiceStates,
        GatewayIntentBits.GuildMembers,
      ],
      presence: {
        status: 'online',
        activities: [
          {
            name: 'voice channels',
            type: ActivityType.Watching,
          },
        ],
      },
    });

    this.commands = new Collection();
  }

  /**
   * Register slash commands globally
   */
  async registerCommands(commands: RESTPostAPIChatInputApplicationCommandsJSONBody[]): Promise<void> {
    try {
      logger.info('Registering slash commands...');

      const rest = new REST({ version: '10' }).setToken(config.discord.botToken);

      await rest.put(Routes.applicationCommands(config.discord.clientId), {
        body: commands,
      });

      logger.info(`Successfully registered ${commands.length} slash commands`);
    } catch (error) {
      logger.error('Failed to register slash commands:', error);
      throw error;
    }
  }

  /**
   * Start the bot
   */
  async start(): Promise<void> {
    try {
      logger.info('Starting Discord bot...');
      await this.login(config.discord.botToken);
    } catch (error) {
      logger.error('Failed to start bot:', error);
      throw error;
    }
  }

  /**
   * Stop the bot
   */
  async stop(): Promise<void> {
    logger.info('Stopping Discord bot...');
    await this.destroy();
  }
}
