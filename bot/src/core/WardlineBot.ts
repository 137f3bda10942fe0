import { Client, Events, REST, Routes } from 'discord.js';
import { WardlineConfig } from '../config/EnvironmentManager';
import { IDatabaseManager } from './interfaces/IDatabaseManager';
import { IDiscordEventHandler } from './interfaces/IDiscordEventHandler';
import { ILogger } from './interfaces/ILogger';
import { BotCommand } from './interfaces/BotCommand';
import { LexiconStore } from '../moderation/lexicon/LexiconStore';
import { BayesianClassifier } from '../moderation/classifier/BayesianClassifier';
import { InfractionScheduler } from '../moderation/scheduler/InfractionScheduler';
import { ConfigurationError } from '../utils/errors';

export interface WardlineBotDependencies {
  client: Client;
  config: WardlineConfig;
  db: IDatabaseManager;
  lexicon: LexiconStore;
  classifier: BayesianClassifier;
  scheduler: InfractionScheduler;
  eventHandler: IDiscordEventHandler;
  commands: BotCommand[];
  logger: ILogger;
}

export class WardlineBot {
  private client: Client;
  private config: WardlineConfig;
  private db: IDatabaseManager;
  private lexicon: LexiconStore;
  private classifier: BayesianClassifier;
  private scheduler: InfractionScheduler;
  private eventHandler: IDiscordEventHandler;
  private commands: BotCommand[];
  private logger: ILogger;
  private isRunning = false;
  private stopping: Promise<void> | null = null;

  constructor(deps: WardlineBotDependencies) {
    this.client = deps.client;
    this.config = deps.config;
    this.db = deps.db;
    this.lexicon = deps.lexicon;
    this.classifier = deps.classifier;
    this.scheduler = deps.scheduler;
    this.eventHandler = deps.eventHandler;
    this.commands = deps.commands;
    this.logger = deps.logger;

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.on(Events.MessageCreate, this.eventHandler.handleMessage.bind(this.eventHandler));
    this.client.on(Events.MessageUpdate, this.eventHandler.handleMessageUpdate.bind(this.eventHandler));
    this.client.on(Events.InteractionCreate, this.eventHandler.handleInteraction.bind(this.eventHandler));
    this.client.on(Events.Error, this.onError.bind(this));
  }

  private async onReady(client: Client<true>): Promise<void> {
    this.logger.info('Bot ready', {
      username: client.user.username,
      guildCount: client.guilds.cache.size
    });

    await this.registerSlashCommands(client.user.id);
  }

  private onError(error: Error): void {
    this.logger.error('Discord client error', {
      error: error.message,
      stack: error.stack
    });
  }

  private async registerSlashCommands(applicationId: string): Promise<void> {
    const token = this.config.discord.token;
    if (!token) {
      this.logger.warn('Cannot register slash commands: missing token');
      return;
    }

    try {
      const rest = new REST({ version: '10' }).setToken(token);
      const body = this.commands.map(command => command.data.toJSON());

      await rest.put(Routes.applicationCommands(applicationId), { body });

      this.logger.info('Successfully registered slash commands', {
        commandCount: body.length
      });
    } catch (error) {
      this.logger.error('Failed to register slash commands', {
        error: String(error)
      });
    }
  }

  /**
   * Opens the store, loads the lexicon and model, then logs in. The sweep
   * waits for the client's ready event before its first run.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Bot is already running');
    }

    const token = this.config.discord.token;
    if (!token) {
      throw new ConfigurationError('Discord token not found. Set DISCORD_TOKEN or discord.token.');
    }

    this.db.initialize();
    await this.lexicon.reload();
    await this.classifier.loadModel(this.config.classifier.modelPath);

    const ready = new Promise<Client<true>>(resolve => {
      this.client.once(Events.ClientReady, resolve);
    });
    ready.then(client => this.onReady(client)).catch(error => {
      this.logger.error('Ready handler failed', { error: String(error) });
    });

    this.scheduler.start(ready);
    this.isRunning = true;

    try {
      await this.client.login(token);
      this.logger.info('Bot started successfully', {
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      this.logger.error('Failed to start bot', {
        error: String(error)
      });
      await this.stop();
      throw error;
    }
  }

  /**
   * Stops the sweep (waiting for one in progress), then the client and the
   * store. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.logger.info('Shutting down bot gracefully');

    await this.scheduler.stop();
    await this.client.destroy();
    this.db.close();
    this.isRunning = false;

    this.logger.info('Bot shut down successfully');
  }
}
