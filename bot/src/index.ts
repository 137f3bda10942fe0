#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { EnvironmentManager, WardlineConfig } from './config/EnvironmentManager';
import { createContainer, DependencyContainer, TOKENS } from './core/DIContainer';
import { LexiconAction, runLexiconAction } from './core/commands/LexiconCommand';
import { Verdict } from './core/interfaces/IClassificationPipeline';
import { Logger } from './utils/Logger';
import { toError } from './utils/errors';

dotenv.config();

const program = new Command();
const environment = Logger.resolveEnvironment(process.env['NODE_ENV']);
const bootstrapLogger = new Logger(process.env['LOG_LEVEL'] ?? 'info');
const bootstrapErrorHandler = bootstrapLogger.getErrorHandler();

bootstrapErrorHandler.installProcessHandlers();

program
  .name('wardline')
  .description('A Discord moderation bot with lexicon, phonetic and statistical message screening')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to JSON configuration file', './config/wardline.json')
  .showHelpAfterError();

const banner = (message: string): void => {
  console.log(chalk.blue.bold(`Wardline: ${message}`));
};

const withAction = <T extends unknown[]>(label: string, action: (...args: T) => Promise<void>) => {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const err = toError(error);
      bootstrapLogger.error(`${label} failed`, { error: err.message });
      console.error(chalk.red(`${label} failed:`), err.message);
      process.exitCode = 1;
    }
  };
};

interface Runtime {
  config: WardlineConfig;
  logger: Logger;
  container: DependencyContainer;
}

const loadRuntime = (): Runtime => {
  const { config: configPath } = program.opts<{ config: string }>();
  const config = new EnvironmentManager(bootstrapLogger, bootstrapErrorHandler, configPath).loadConfiguration();

  const logger = environment === 'production'
    ? new Logger(config.logging.level, config.logging.filePath)
    : Logger.create(environment, config.logging.filePath);

  return { config, logger, container: createContainer(config, logger) };
};

const prepareClassification = async (container: DependencyContainer, config: WardlineConfig): Promise<void> => {
  await container.resolve(TOKENS.LexiconStore).reload();
  await container.resolve(TOKENS.Classifier).loadModel(config.classifier.modelPath);
};

const formatVerdict = (verdict: Verdict): string => {
  if (!verdict.isFlagged) {
    const score = verdict.score === undefined ? '' : chalk.gray(` (spam score ${verdict.score.toFixed(4)})`);
    return `${chalk.green('Not flagged')}${score}`;
  }

  switch (verdict.reason) {
    case 'LEXICON':
      return `${chalk.red('Flagged')} LEXICON: banned word "${verdict.matchedToken}"`;
    case 'PHONETIC':
      return `${chalk.red('Flagged')} PHONETIC: "${verdict.matchedToken}" sounds like a banned word (${verdict.phoneticCode})`;
    case 'STATISTICAL':
      return `${chalk.red('Flagged')} STATISTICAL: spam score ${verdict.score.toFixed(4)}`;
  }
};

program
  .command('start')
  .description('Start the Wardline moderation bot')
  .action(
    withAction('Startup', async () => {
      banner('Starting');
      const { logger, container } = loadRuntime();
      const bot = container.resolve(TOKENS.Bot);

      const shutdown = async (signal: string): Promise<void> => {
        console.log(chalk.yellow(`\nReceived ${signal}, shutting down gracefully...`));
        logger.info(`Received ${signal}, shutting down`);

        try {
          await bot.stop();
          await logger.close();
          process.exit(0);
        } catch (error) {
          logger.error('Error during shutdown', { error: String(error) });
          process.exit(1);
        }
      };

      process.on('SIGTERM', () => void shutdown('SIGTERM'));
      process.on('SIGINT', () => void shutdown('SIGINT'));

      await bot.start();
      console.log(chalk.green('Wardline is online.'));
    })
  );

program
  .command('classify <text>')
  .description('Classify a message without recording anything')
  .action(
    withAction('Classify', async (text: string) => {
      const { config, container } = loadRuntime();
      await prepareClassification(container, config);

      const verdict = container.resolve(TOKENS.ClassificationPipeline).classify(text);
      console.log(formatVerdict(verdict));
    })
  );

program
  .command('pending')
  .description('List pending message deletions')
  .option('-n, --limit <number>', 'Maximum number of infractions to show', '50')
  .action(
    withAction('Pending', async (options: { limit: string }) => {
      banner('Pending Deletions');

      const limit = Number(options.limit);
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new Error('Limit must be a positive integer.');
      }

      const { container } = loadRuntime();
      const db = container.resolve(TOKENS.DatabaseManager);
      db.initialize();

      try {
        const infractions = db.getPendingInfractions(limit);
        if (infractions.length === 0) {
          console.log(chalk.green('No pending deletions.'));
          return;
        }

        console.log(chalk.yellow(`\n${db.countPendingInfractions()} pending:`));
        for (const infraction of infractions) {
          console.log(
            chalk.gray(`  #${infraction.id}`),
            `${infraction.deletionTime.toISOString()}`,
            chalk.gray(`channel ${infraction.channelId} message ${infraction.messageId}`)
          );
        }
      } finally {
        db.close();
      }
    })
  );

program
  .command('lexicon <action> [word]')
  .description('Manage word lists: reload | add <word> | remove <word>')
  .option('-e, --exceptions', 'Change the exception list instead of the banned list')
  .action(
    withAction('Lexicon', async (action: string, word: string | undefined, options: { exceptions?: boolean }) => {
      const list = options.exceptions ? 'exceptions' : 'banned';
      let lexiconAction: LexiconAction;

      if (action === 'reload') {
        lexiconAction = { type: 'reload' };
      } else if (action === 'add' || action === 'remove') {
        if (!word) {
          throw new Error(`"lexicon ${action}" needs a word.`);
        }
        lexiconAction = { type: action, list, word };
      } else {
        throw new Error(`Unknown lexicon action "${action}". Use reload, add or remove.`);
      }

      const { container } = loadRuntime();
      console.log(await runLexiconAction(lexiconAction, container.resolve(TOKENS.LexiconStore)));
    })
  );

async function main(): Promise<void> {
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  bootstrapLogger.error('CLI failed', { error: String(error) });
  console.error(chalk.red('Wardline failed to start:'), error);
  process.exit(1);
});
