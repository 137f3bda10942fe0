import { IAuditLogService } from './interfaces/IAuditLogService';
import { IClassificationPipeline, Verdict } from './interfaces/IClassificationPipeline';
import { ILogger } from './interfaces/ILogger';
import { Infraction } from '../database/DatabaseManager';
import { InfractionScheduler } from '../moderation/scheduler/InfractionScheduler';

export interface InboundMessage {
  id: string;
  channelId: string;
  authorId: string;
  content: string;
  createdAt: Date;
}

export interface ModerationOutcome {
  verdict: Verdict;
  /** The newly recorded infraction; null when not flagged or already pending. */
  infraction: Infraction | null;
}

/**
 * Classifies inbound messages and records flagged ones. Deletion itself is
 * left to the scheduler's sweep.
 */
export class ModerationCoordinator {
  constructor(
    private pipeline: IClassificationPipeline,
    private scheduler: InfractionScheduler,
    private auditLog: IAuditLogService,
    private logger: ILogger
  ) {}

  async handleMessage(message: InboundMessage): Promise<ModerationOutcome> {
    const verdict = this.pipeline.classify(message.content);
    if (!verdict.isFlagged) {
      return { verdict, infraction: null };
    }

    // Written to disk before anything is announced; PersistenceError propagates.
    const infraction = this.scheduler.schedule({
      messageId: message.id,
      channelId: message.channelId,
      authorId: message.authorId,
      content: message.content,
      createdAt: message.createdAt
    });

    if (!infraction) {
      return { verdict, infraction: null };
    }

    this.logger.info('Message flagged', {
      component: 'moderation_coordinator',
      messageId: message.id,
      authorId: message.authorId,
      channelId: message.channelId,
      reason: verdict.reason,
      infractionId: infraction.id
    });

    await this.auditLog.recordInfraction({
      messageId: message.id,
      authorId: message.authorId,
      channelId: message.channelId,
      contentSnapshot: message.content,
      verdict,
      scheduledDeletionAt: infraction.deletionTime,
      scheduledDeletionDelaySeconds: Math.round(this.scheduler.getDeletionDelayMs() / 1000)
    });

    return { verdict, infraction };
  }
}
