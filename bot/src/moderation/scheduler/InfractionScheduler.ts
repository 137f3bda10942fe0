import { IDatabaseManager } from '../../core/interfaces/IDatabaseManager';
import { ILogger } from '../../core/interfaces/ILogger';
import { DeletionOutcome, IMessageDeleter } from '../../core/interfaces/IMessageDeleter';
import { Infraction } from '../../database/DatabaseManager';
import { ErrorHandler, ErrorCategory, ErrorSeverity } from '../../utils/ErrorHandler';
import { PersistenceError, toError } from '../../utils/errors';
import { TimeoutError, withTimeout } from '../../utils/timeout';

export interface SchedulerOptions {
  deletionDelayMs: number;
  sweepIntervalMs: number;
  deleteTimeoutMs: number;
  clock?: () => Date;
  /** Called once when the store fails and the scheduler has stopped itself. */
  onFatalError?: (error: PersistenceError) => void;
}

export interface ScheduledMessage {
  messageId: string;
  channelId: string;
  authorId: string;
  content: string;
  /** When the message was posted or last edited. */
  createdAt: Date;
}

export interface SweepReport {
  startedAt: Date;
  due: number;
  deleted: number;
  notFound: number;
  forbidden: number;
  retried: number;
}

export class InfractionScheduler {
  private db: IDatabaseManager;
  private deleter: IMessageDeleter;
  private logger: ILogger;
  private errorHandler: ErrorHandler;
  private options: SchedulerOptions;
  private clock: () => Date;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private inFlight: Promise<SweepReport> | null = null;
  private failed = false;

  constructor(
    db: IDatabaseManager,
    deleter: IMessageDeleter,
    logger: ILogger,
    errorHandler: ErrorHandler,
    options: SchedulerOptions
  ) {
    this.db = db;
    this.deleter = deleter;
    this.logger = logger;
    this.errorHandler = errorHandler;
    this.options = options;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Records a pending deletion `deletionDelayMs` from now. Returns null when
   * the message is already pending. A PersistenceError stops the scheduler
   * and is rethrown.
   */
  schedule(message: ScheduledMessage): Infraction | null {
    let infraction: Infraction | null;
    try {
      infraction = this.db.addInfraction({
        ...message,
        deletionTime: new Date(this.clock().getTime() + this.options.deletionDelayMs)
      });
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.fail(error);
      }
      throw error;
    }

    if (infraction) {
      this.logger.info('Infraction scheduled', {
        component: 'infraction_scheduler',
        infractionId: infraction.id,
        messageId: infraction.messageId,
        deletionTime: infraction.deletionTime.toISOString()
      });
    } else {
      this.logger.debug('Message already has a pending infraction', {
        component: 'infraction_scheduler',
        messageId: message.messageId
      });
    }

    return infraction;
  }

  getDeletionDelayMs(): number {
    return this.options.deletionDelayMs;
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * Starts the periodic sweep. Nothing runs until `whenReady` resolves; if it
   * rejects, the scheduler never sweeps.
   */
  start(whenReady: Promise<unknown>): void {
    if (this.controller) {
      return;
    }
    if (this.failed) {
      throw new PersistenceError('Scheduler stopped after a persistence failure', 'start');
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(whenReady, controller.signal);

    this.logger.info('Infraction scheduler started', {
      component: 'infraction_scheduler',
      sweepIntervalMs: this.options.sweepIntervalMs,
      deletionDelayMs: this.options.deletionDelayMs
    });
  }

  /**
   * Schedules no further sweeps and waits for the one in progress, if any.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    const loop = this.loop;
    this.controller = null;
    this.loop = null;

    controller?.abort();
    if (loop) {
      await loop;
    }

    const inFlight = this.inFlight;
    if (inFlight) {
      // The caller that requested this sweep receives its result or error.
      await inFlight.then(
        () => undefined,
        () => undefined
      );
    }

    if (controller) {
      this.logger.info('Infraction scheduler stopped', { component: 'infraction_scheduler' });
    }
  }

  /**
   * Runs one sweep now. A sweep already in progress is shared, not repeated.
   */
  sweep(): Promise<SweepReport> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const run = this.runSweep().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async run(whenReady: Promise<unknown>, signal: AbortSignal): Promise<void> {
    try {
      await Promise.race([whenReady, this.untilAborted(signal)]);
    } catch (error) {
      this.errorHandler.handleError(toError(error), ErrorCategory.UNKNOWN, ErrorSeverity.HIGH, {
        component: 'infraction_scheduler',
        operation: 'await_ready'
      });
      return;
    }

    while (!signal.aborted) {
      try {
        await this.sweep();
      } catch (error) {
        if (error instanceof PersistenceError) {
          return;
        }
        this.errorHandler.handleError(toError(error), ErrorCategory.UNKNOWN, ErrorSeverity.HIGH, {
          component: 'infraction_scheduler',
          operation: 'sweep'
        });
      }

      await this.sleep(this.options.sweepIntervalMs, signal);
    }
  }

  private async runSweep(): Promise<SweepReport> {
    const report: SweepReport = {
      startedAt: this.clock(),
      due: 0,
      deleted: 0,
      notFound: 0,
      forbidden: 0,
      retried: 0
    };

    try {
      const due = this.db.getDueInfractions(report.startedAt);
      report.due = due.length;

      for (const infraction of due) {
        const outcome = await this.requestDeletion(infraction);
        this.applyOutcome(infraction, outcome, report);
      }
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.fail(error);
      }
      throw error;
    }

    if (report.due > 0) {
      this.logger.info('Sweep completed', { component: 'infraction_scheduler', ...report });
    }

    return report;
  }

  private async requestDeletion(infraction: Infraction): Promise<DeletionOutcome> {
    try {
      return await withTimeout(
        this.deleter.deleteMessage(infraction.channelId, infraction.messageId),
        this.options.deleteTimeoutMs,
        'delete_message'
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.errorHandler.handleTimeoutError(error, {
          component: 'infraction_scheduler',
          infractionId: infraction.id,
          messageId: infraction.messageId,
          channelId: infraction.channelId
        });
        return { kind: 'transient_error', detail: error.message };
      }

      this.errorHandler.handleNetworkError(toError(error), 'delete_message', {
        component: 'infraction_scheduler',
        infractionId: infraction.id,
        messageId: infraction.messageId
      });
      return { kind: 'transient_error', detail: String(error) };
    }
  }

  private applyOutcome(infraction: Infraction, outcome: DeletionOutcome, report: SweepReport): void {
    const context = {
      component: 'infraction_scheduler',
      infractionId: infraction.id,
      messageId: infraction.messageId,
      channelId: infraction.channelId
    };

    switch (outcome.kind) {
      case 'deleted':
        this.db.removeInfraction(infraction.id);
        report.deleted++;
        this.logger.info('Flagged message deleted', context);
        break;

      case 'not_found':
        this.db.removeInfraction(infraction.id);
        report.notFound++;
        this.logger.warn('Flagged message no longer exists, infraction abandoned', context);
        break;

      case 'forbidden':
        this.db.removeInfraction(infraction.id);
        report.forbidden++;
        this.errorHandler.handlePermissionError('delete_message', {
          ...context,
          metadata: { detail: outcome.detail }
        });
        break;

      case 'transient_error':
        report.retried++;
        this.logger.warn('Deletion failed, will retry next sweep', { ...context, detail: outcome.detail });
        break;
    }
  }

  private fail(error: PersistenceError): void {
    if (this.failed) {
      return;
    }
    this.failed = true;

    this.errorHandler.handlePersistenceError(error, { component: 'infraction_scheduler' });

    this.controller?.abort();
    this.controller = null;
    this.loop = null;

    this.options.onFatalError?.(error);
  }

  private untilAborted(signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      if (signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  private sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      if (signal.aborted) {
        resolve();
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
