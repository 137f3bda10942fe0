import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import path from 'path';
import { EnvironmentManager, WardlineConfig } from '../../bot/src/config/EnvironmentManager';
import { createContainer, DependencyContainer, TOKENS } from '../../bot/src/core/DIContainer';
import { DatabaseManager } from '../../bot/src/database/DatabaseManager';
import { Logger } from '../../bot/src/utils/Logger';
import { FakeMessageDeleter, createTempDir, createTestErrorHandler, createTestLogger, removeTempDir, writeLexicon } from '../setup';

describe('DependencyContainer', () => {
  let dir: string;
  let logger: Logger;
  let config: WardlineConfig;
  let container: DependencyContainer;

  beforeEach(() => {
    dir = createTempDir();
    logger = createTestLogger();
    const paths = writeLexicon(dir, ['darn']);

    config = new EnvironmentManager(logger, createTestErrorHandler(logger), path.join(dir, 'missing.json'), {
      BANNED_WORDS_PATH: paths.bannedWordsPath,
      EXCEPTIONS_PATH: paths.exceptionsPath,
      DATABASE_PATH: path.join(dir, 'infractions.db'),
      DELETION_DELAY_HOURS: '2'
    }).loadConfiguration();

    container = createContainer(config, logger);
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  test('resolves each service once', () => {
    expect(container.hasInstance(TOKENS.LexiconStore)).toBe(false);

    const pipeline = container.resolve(TOKENS.ClassificationPipeline);

    expect(container.resolve(TOKENS.ClassificationPipeline)).toBe(pipeline);
    expect(container.hasInstance(TOKENS.LexiconStore)).toBe(true);
    expect(container.hasInstance(TOKENS.Client)).toBe(false);
  });

  test('wires the lexicon from configuration', async () => {
    await container.resolve(TOKENS.LexiconStore).reload();

    expect(container.resolve(TOKENS.ClassificationPipeline).classify('darn')).toEqual({
      isFlagged: true,
      reason: 'LEXICON',
      matchedToken: 'darn'
    });
  });

  test('uses overridden services in their dependents', () => {
    const db = new DatabaseManager(':memory:', logger);
    container.override(TOKENS.DatabaseManager, db);
    container.override(TOKENS.MessageDeleter, new FakeMessageDeleter());
    db.initialize();

    const scheduler = container.resolve(TOKENS.InfractionScheduler);
    scheduler.schedule({ messageId: 'm1', channelId: 'c1', authorId: 'a1', content: 'darn', createdAt: new Date() });

    expect(scheduler.getDeletionDelayMs()).toBe(2 * 60 * 60 * 1000);
    expect(db.countPendingInfractions()).toBe(1);
    expect(container.hasInstance(TOKENS.Client)).toBe(false);
    db.close();
  });
});
