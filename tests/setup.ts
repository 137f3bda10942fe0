/**
 * Shared test utilities: temp directories, in-process fakes for the Discord
 * collaborators, and a small classifier model.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { Logger } from '../bot/src/utils/Logger';
import { ErrorHandler } from '../bot/src/utils/ErrorHandler';
import { DeletionOutcome, IMessageDeleter } from '../bot/src/core/interfaces/IMessageDeleter';
import { AuditEvent, IAuditLogService } from '../bot/src/core/interfaces/IAuditLogService';
import { LexiconPaths } from '../bot/src/moderation/lexicon/LexiconStore';
import { ClassifierModel } from '../bot/src/moderation/classifier/BayesianClassifier';

export const createTestLogger = (): Logger => new Logger('error');

export const createTestErrorHandler = (logger: Logger): ErrorHandler =>
  logger.getErrorHandler();

export const createTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'wardline-test-'));

export const removeTempDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true });
};

export const writeLexicon = (dir: string, banned: string[], exceptions: string[] = []): LexiconPaths => {
  const paths = {
    bannedWordsPath: path.join(dir, 'banned_words.txt'),
    exceptionsPath: path.join(dir, 'exceptions.txt')
  };
  fs.writeFileSync(paths.bannedWordsPath, banned.map(word => `${word}\n`).join(''), 'utf8');
  fs.writeFileSync(paths.exceptionsPath, exceptions.map(word => `${word}\n`).join(''), 'utf8');
  return paths;
};

// ham: hello 8, meeting 4 (12); spam: free 6, money 4 (10)
export const TEST_MODEL_JSON = {
  ham_counts: { hello: 8, meeting: 4 },
  spam_counts: { free: 6, money: 4 },
  total_ham: 12,
  total_spam: 10
};

export const TEST_MODEL: ClassifierModel = {
  hamCounts: new Map([['hello', 8], ['meeting', 4]]),
  spamCounts: new Map([['free', 6], ['money', 4]]),
  totalHam: 12,
  totalSpam: 10
};

/**
 * Answers deletion requests from a per-message script; unscripted messages
 * are deleted.
 */
export class FakeMessageDeleter implements IMessageDeleter {
  readonly calls: Array<{ channelId: string; messageId: string }> = [];
  private scripted = new Map<string, Array<DeletionOutcome | (() => Promise<DeletionOutcome>)>>();

  script(messageId: string, ...outcomes: Array<DeletionOutcome | (() => Promise<DeletionOutcome>)>): void {
    this.scripted.set(messageId, outcomes);
  }

  async deleteMessage(channelId: string, messageId: string): Promise<DeletionOutcome> {
    this.calls.push({ channelId, messageId });
    const next = this.scripted.get(messageId)?.shift();
    if (next === undefined) {
      return { kind: 'deleted' };
    }
    return typeof next === 'function' ? next() : next;
  }
}

export class RecordingAuditLog implements IAuditLogService {
  readonly events: AuditEvent[] = [];

  async recordInfraction(event: AuditEvent): Promise<void> {
    this.events.push(event);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export const deferred = <T = void>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

export const waitFor = async (condition: () => boolean, timeoutMs: number = 2000): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
};

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Mutable clock for scheduler tests. */
export class TestClock {
  constructor(private current: number = Date.UTC(2024, 0, 1, 12, 0, 0)) {}

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}
