/**
 * InfractionScheduler Unit Tests
 * Real in-memory store, fake deleter, injected clock.
 */

import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import path from 'path';
import { DatabaseManager } from '../../bot/src/database/DatabaseManager';
import { InfractionScheduler, SchedulerOptions } from '../../bot/src/moderation/scheduler/InfractionScheduler';
import { ErrorCategory, ErrorHandler } from '../../bot/src/utils/ErrorHandler';
import { PersistenceError } from '../../bot/src/utils/errors';
import { Logger } from '../../bot/src/utils/Logger';
import {
  FakeMessageDeleter,
  TestClock,
  createTempDir,
  createTestErrorHandler,
  createTestLogger,
  deferred,
  removeTempDir,
  sleep,
  waitFor
} from '../setup';

const DELAY_MS = 60_000;

const POSTED_AT = new Date('2024-01-01T09:30:00.000Z');

const message = (id: string) => ({
  messageId: id,
  channelId: 'channel-1',
  authorId: 'author-1',
  content: `flagged ${id}`,
  createdAt: POSTED_AT
});

describe('InfractionScheduler', () => {
  let logger: Logger;
  let errorHandler: ErrorHandler;
  let db: DatabaseManager;
  let deleter: FakeMessageDeleter;
  let clock: TestClock;
  let scheduler: InfractionScheduler;

  const options = (overrides: Partial<SchedulerOptions> = {}): SchedulerOptions => ({
    deletionDelayMs: DELAY_MS,
    sweepIntervalMs: 10,
    deleteTimeoutMs: 1000,
    clock: clock.now,
    ...overrides
  });

  const createScheduler = (overrides: Partial<SchedulerOptions> = {}): InfractionScheduler =>
    new InfractionScheduler(db, deleter, logger, errorHandler, options(overrides));

  beforeEach(() => {
    logger = createTestLogger();
    errorHandler = createTestErrorHandler(logger);
    db = new DatabaseManager(':memory:', logger);
    db.initialize();
    deleter = new FakeMessageDeleter();
    clock = new TestClock();
    scheduler = createScheduler();
  });

  afterEach(async () => {
    await scheduler.stop();
    db.close();
  });

  describe('schedule', () => {
    test('records the deletion time one delay after now', () => {
      const infraction = scheduler.schedule(message('m1'));

      expect(infraction?.createdAt.getTime()).toBe(POSTED_AT.getTime());
      expect(infraction?.deletionTime.getTime()).toBe(clock.now().getTime() + DELAY_MS);
      expect(db.countPendingInfractions()).toBe(1);
    });

    test('returns null when the message is already pending', () => {
      scheduler.schedule(message('m1'));

      expect(scheduler.schedule(message('m1'))).toBeNull();
      expect(db.countPendingInfractions()).toBe(1);
    });
  });

  describe('sweep', () => {
    test('never deletes before the deletion time', async () => {
      scheduler.schedule(message('m1'));

      clock.advance(DELAY_MS - 1);
      const early = await scheduler.sweep();

      expect(early.due).toBe(0);
      expect(deleter.calls).toEqual([]);

      clock.advance(1);
      const onTime = await scheduler.sweep();

      expect(onTime).toMatchObject({ due: 1, deleted: 1 });
      expect(deleter.calls).toEqual([{ channelId: 'channel-1', messageId: 'm1' }]);
      expect(db.countPendingInfractions()).toBe(0);
    });

    test('removes the record when the message is already gone', async () => {
      scheduler.schedule(message('m1'));
      deleter.script('m1', { kind: 'not_found' });
      clock.advance(DELAY_MS);

      const report = await scheduler.sweep();

      expect(report).toMatchObject({ due: 1, deleted: 0, notFound: 1 });
      expect(db.countPendingInfractions()).toBe(0);
    });

    test('abandons and reports a deletion the bot may not perform', async () => {
      scheduler.schedule(message('m1'));
      deleter.script('m1', { kind: 'forbidden', detail: 'Missing Permissions' });
      clock.advance(DELAY_MS);

      const report = await scheduler.sweep();

      expect(report).toMatchObject({ due: 1, forbidden: 1 });
      expect(db.countPendingInfractions()).toBe(0);
      expect(errorHandler.getErrors({ category: ErrorCategory.PERMISSION })).toHaveLength(1);
    });

    test('keeps the record after a transient failure and retries on the next sweep', async () => {
      scheduler.schedule(message('m1'));
      deleter.script('m1', { kind: 'transient_error', detail: '503' });
      clock.advance(DELAY_MS);

      const first = await scheduler.sweep();

      expect(first).toMatchObject({ due: 1, deleted: 0, retried: 1 });
      expect(db.countPendingInfractions()).toBe(1);

      const second = await scheduler.sweep();

      expect(second).toMatchObject({ due: 1, deleted: 1, retried: 0 });
      expect(deleter.calls).toHaveLength(2);
      expect(db.countPendingInfractions()).toBe(0);
    });

    test('treats a deleter that throws as transient', async () => {
      scheduler.schedule(message('m1'));
      deleter.script('m1', async () => {
        throw new Error('socket hang up');
      });
      clock.advance(DELAY_MS);

      const report = await scheduler.sweep();

      expect(report.retried).toBe(1);
      expect(db.countPendingInfractions()).toBe(1);
      expect(errorHandler.getErrors({ category: ErrorCategory.NETWORK })).toHaveLength(1);
    });

    test('bounds a hung deletion by the deletion timeout', async () => {
      scheduler = createScheduler({ deleteTimeoutMs: 20 });
      scheduler.schedule(message('m1'));
      scheduler.schedule(message('m2'));
      deleter.script('m1', () => new Promise(() => undefined));
      clock.advance(DELAY_MS);

      const report = await scheduler.sweep();

      expect(report).toMatchObject({ due: 2, deleted: 1, retried: 1 });
      expect(db.getInfractionByMessageId('m1')).not.toBeNull();
      expect(db.getInfractionByMessageId('m2')).toBeNull();
      expect(errorHandler.getErrors({ category: ErrorCategory.TIMEOUT })).toHaveLength(1);
    });

    test('shares a sweep that is already in progress', async () => {
      const gate = deferred();
      scheduler.schedule(message('m1'));
      deleter.script('m1', async () => {
        await gate.promise;
        return { kind: 'deleted' };
      });
      clock.advance(DELAY_MS);

      const first = scheduler.sweep();
      const second = scheduler.sweep();
      gate.resolve();

      expect(second).toBe(first);
      await expect(first).resolves.toMatchObject({ deleted: 1 });
      expect(deleter.calls).toHaveLength(1);
    });

    test('processes due infractions in deletion order', async () => {
      scheduler.schedule(message('first'));
      clock.advance(1000);
      scheduler.schedule(message('second'));
      clock.advance(DELAY_MS);

      await scheduler.sweep();

      expect(deleter.calls.map(call => call.messageId)).toEqual(['first', 'second']);
    });
  });

  describe('start / stop', () => {
    test('does not sweep until the ready signal resolves', async () => {
      const ready = deferred();
      scheduler.schedule(message('m1'));
      clock.advance(DELAY_MS);

      scheduler.start(ready.promise);
      await sleep(40);

      expect(deleter.calls).toEqual([]);
      expect(scheduler.isRunning()).toBe(true);

      ready.resolve();
      await waitFor(() => db.countPendingInfractions() === 0);

      expect(deleter.calls).toHaveLength(1);
    });

    test('never sweeps when the ready signal rejects', async () => {
      const ready = deferred();
      scheduler.schedule(message('m1'));
      clock.advance(DELAY_MS);

      scheduler.start(ready.promise);
      ready.reject(new Error('login failed'));
      await sleep(40);

      expect(deleter.calls).toEqual([]);
      expect(errorHandler.getErrors({ category: ErrorCategory.UNKNOWN })).toHaveLength(1);
    });

    test('stop before ready ends the loop without sweeping', async () => {
      scheduler.schedule(message('m1'));
      clock.advance(DELAY_MS);

      scheduler.start(new Promise(() => undefined));
      await scheduler.stop();

      expect(scheduler.isRunning()).toBe(false);
      expect(deleter.calls).toEqual([]);
    });

    test('start is idempotent', async () => {
      const ready = deferred();
      const info = jest.spyOn(logger, 'info');

      scheduler.start(ready.promise);
      scheduler.start(ready.promise);

      expect(info.mock.calls.filter(([msg]) => msg === 'Infraction scheduler started')).toHaveLength(1);
    });

    test('stop waits for the sweep in progress', async () => {
      const gate = deferred();
      let finished = false;
      scheduler.schedule(message('m1'));
      deleter.script('m1', async () => {
        await gate.promise;
        finished = true;
        return { kind: 'deleted' };
      });
      clock.advance(DELAY_MS);

      scheduler.start(Promise.resolve());
      await waitFor(() => deleter.calls.length === 1);

      const stopped = scheduler.stop();
      setTimeout(() => gate.resolve(), 20);
      await stopped;

      expect(finished).toBe(true);
      expect(db.countPendingInfractions()).toBe(0);
    });

    test('keeps sweeping on the interval', async () => {
      scheduler.start(Promise.resolve());
      await sleep(20);

      scheduler.schedule(message('m1'));
      clock.advance(DELAY_MS);

      await waitFor(() => db.countPendingInfractions() === 0);
      expect(deleter.calls).toEqual([{ channelId: 'channel-1', messageId: 'm1' }]);
    });
  });

  describe('persistence failures', () => {
    test('a store failure stops the scheduler and reports it once', async () => {
      const onFatalError = jest.fn<(error: PersistenceError) => void>();
      scheduler = createScheduler({ onFatalError });

      scheduler.start(Promise.resolve());
      db.close();

      await waitFor(() => onFatalError.mock.calls.length > 0);
      await sleep(40);

      expect(onFatalError).toHaveBeenCalledTimes(1);
      expect(onFatalError.mock.calls[0]?.[0]).toBeInstanceOf(PersistenceError);
      expect(scheduler.isRunning()).toBe(false);
      expect(errorHandler.getErrors({ category: ErrorCategory.DATABASE })).toHaveLength(1);
      expect(() => scheduler.start(Promise.resolve())).toThrow(PersistenceError);
    });

    test('a failing sweep rejects its caller with the PersistenceError', async () => {
      db.close();

      await expect(scheduler.sweep()).rejects.toBeInstanceOf(PersistenceError);
    });

    test('a failed schedule stops the scheduler and reports it once', async () => {
      const onFatalError = jest.fn<(error: PersistenceError) => void>();
      scheduler = createScheduler({ onFatalError });
      scheduler.start(Promise.resolve());
      db.close();

      expect(() => scheduler.schedule(message('m1'))).toThrow(PersistenceError);
      expect(() => scheduler.schedule(message('m2'))).toThrow(PersistenceError);
      await sleep(40);

      expect(onFatalError).toHaveBeenCalledTimes(1);
      expect(onFatalError.mock.calls[0]?.[0]?.operation).toBe('add_infraction');
      expect(scheduler.isRunning()).toBe(false);
      expect(errorHandler.getErrors({ category: ErrorCategory.DATABASE })).toHaveLength(1);
    });

    test('pending deletions survive a restart and run once due', async () => {
      const dir = createTempDir();
      const dbPath = path.join(dir, 'wardline.db');

      try {
        const before = new DatabaseManager(dbPath, logger);
        before.initialize();
        new InfractionScheduler(before, deleter, logger, errorHandler, options()).schedule(message('m1'));
        before.close();

        const after = new DatabaseManager(dbPath, logger);
        after.initialize();
        const restarted = new InfractionScheduler(after, deleter, logger, errorHandler, options());

        expect((await restarted.sweep()).due).toBe(0);

        clock.advance(DELAY_MS);
        const report = await restarted.sweep();

        expect(report).toMatchObject({ due: 1, deleted: 1 });
        expect(after.countPendingInfractions()).toBe(0);
        after.close();
      } finally {
        removeTempDir(dir);
      }
    });
  });
});
