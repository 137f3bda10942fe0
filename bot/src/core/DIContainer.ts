import { Client, GatewayIntentBits, Partials } from 'discord.js';
import { WardlineConfig } from '../config/EnvironmentManager';
import { DatabaseManager } from '../database/DatabaseManager';
import { Logger } from '../utils/Logger';
import { ErrorHandler } from '../utils/ErrorHandler';
import { Tokenizer } from '../moderation/text/Tokenizer';
import { LexiconStore } from '../moderation/lexicon/LexiconStore';
import { BayesianClassifier } from '../moderation/classifier/BayesianClassifier';
import { ClassificationPipeline } from '../moderation/ClassificationPipeline';
import { InfractionScheduler } from '../moderation/scheduler/InfractionScheduler';
import { DiscordMessageDeleter } from '../moderation/actions/DiscordMessageDeleter';
import { AuditLogService } from './AuditLogService';
import { ModerationCoordinator } from './ModerationCoordinator';
import { DiscordEventHandler } from './DiscordEventHandler';
import { WardlineBot } from './WardlineBot';
import { createLexiconCommand } from './commands/LexiconCommand';
import { BotCommand } from './interfaces/BotCommand';
import { IMessageDeleter } from './interfaces/IMessageDeleter';

export interface Services {
  config: WardlineConfig;
  logger: Logger;
  errorHandler: ErrorHandler;
  tokenizer: Tokenizer;
  lexiconStore: LexiconStore;
  classifier: BayesianClassifier;
  classificationPipeline: ClassificationPipeline;
  databaseManager: DatabaseManager;
  client: Client;
  messageDeleter: IMessageDeleter;
  infractionScheduler: InfractionScheduler;
  auditLogService: AuditLogService;
  moderationCoordinator: ModerationCoordinator;
  commands: BotCommand[];
  discordEventHandler: DiscordEventHandler;
  bot: WardlineBot;
}

// Service tokens
export const TOKENS = {
  Config: 'config',
  Logger: 'logger',
  ErrorHandler: 'errorHandler',
  Tokenizer: 'tokenizer',
  LexiconStore: 'lexiconStore',
  Classifier: 'classifier',
  ClassificationPipeline: 'classificationPipeline',
  DatabaseManager: 'databaseManager',
  Client: 'client',
  MessageDeleter: 'messageDeleter',
  InfractionScheduler: 'infractionScheduler',
  AuditLogService: 'auditLogService',
  ModerationCoordinator: 'moderationCoordinator',
  Commands: 'commands',
  DiscordEventHandler: 'discordEventHandler',
  Bot: 'bot'
} as const satisfies Record<string, keyof Services>;

export type Factories = {
  [K in keyof Services]: (container: IDependencyContainer) => Services[K];
};

export interface IDependencyContainer {
  resolve<K extends keyof Services>(token: K): Services[K];
  hasInstance(token: keyof Services): boolean;
}

export class DependencyContainer implements IDependencyContainer {
  private singletons: Partial<Services> = {};

  constructor(private factories: Factories) {}

  resolve<K extends keyof Services>(token: K): Services[K] {
    const existing: Services[K] | undefined = this.singletons[token];
    if (existing !== undefined) {
      return existing;
    }

    const instance = this.factories[token](this);
    this.singletons[token] = instance;
    return instance;
  }

  hasInstance(token: keyof Services): boolean {
    return this.singletons[token] !== undefined;
  }

  // Method to override a service (useful for testing)
  override<K extends keyof Services>(token: K, instance: Services[K]): void {
    this.singletons[token] = instance;
  }
}

const HOURS = 60 * 60 * 1000;

export function createContainer(config: WardlineConfig, logger: Logger): DependencyContainer {
  const errorHandler = logger.getErrorHandler();

  return new DependencyContainer({
    config: () => config,
    logger: () => logger,
    errorHandler: () => errorHandler,

    tokenizer: () => new Tokenizer(),

    lexiconStore: c => new LexiconStore(
      config.lexicon,
      c.resolve(TOKENS.Tokenizer),
      logger.child({ component: 'lexicon_store' }),
      errorHandler
    ),

    classifier: () => new BayesianClassifier(logger, config.moderation.spamThreshold, errorHandler),

    classificationPipeline: c => new ClassificationPipeline(
      c.resolve(TOKENS.LexiconStore),
      c.resolve(TOKENS.Classifier),
      c.resolve(TOKENS.Tokenizer),
      logger,
      errorHandler
    ),

    databaseManager: () => new DatabaseManager(config.database.path, logger),

    client: () => new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent
      ],
      partials: [Partials.Message, Partials.Channel]
    }),

    messageDeleter: c => new DiscordMessageDeleter(c.resolve(TOKENS.Client), logger),

    infractionScheduler: c => new InfractionScheduler(
      c.resolve(TOKENS.DatabaseManager),
      c.resolve(TOKENS.MessageDeleter),
      logger.child({ component: 'infraction_scheduler' }),
      errorHandler,
      {
        deletionDelayMs: config.moderation.deletionDelayHours * HOURS,
        sweepIntervalMs: config.moderation.sweepIntervalSeconds * 1000,
        deleteTimeoutMs: config.moderation.deleteTimeoutMs,
        onFatalError: () => {
          c.resolve(TOKENS.Bot).stop().catch(error => {
            logger.error('Shutdown after persistence failure failed', { error: String(error) });
          });
        }
      }
    ),

    auditLogService: c => new AuditLogService(c.resolve(TOKENS.Client), config.discord.adminChannelId, logger),

    moderationCoordinator: c => new ModerationCoordinator(
      c.resolve(TOKENS.ClassificationPipeline),
      c.resolve(TOKENS.InfractionScheduler),
      c.resolve(TOKENS.AuditLogService),
      logger
    ),

    commands: c => [
      createLexiconCommand({
        lexicon: c.resolve(TOKENS.LexiconStore),
        db: c.resolve(TOKENS.DatabaseManager)
      })
    ],

    discordEventHandler: c => new DiscordEventHandler(
      c.resolve(TOKENS.ModerationCoordinator),
      c.resolve(TOKENS.Commands),
      logger,
      errorHandler
    ),

    bot: c => new WardlineBot({
      client: c.resolve(TOKENS.Client),
      config,
      db: c.resolve(TOKENS.DatabaseManager),
      lexicon: c.resolve(TOKENS.LexiconStore),
      classifier: c.resolve(TOKENS.Classifier),
      scheduler: c.resolve(TOKENS.InfractionScheduler),
      eventHandler: c.resolve(TOKENS.DiscordEventHandler),
      commands: c.resolve(TOKENS.Commands),
      logger
    })
  });
}
