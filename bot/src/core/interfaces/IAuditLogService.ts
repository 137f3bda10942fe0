import { FlaggedVerdict } from './IClassificationPipeline';

export interface AuditEvent {
  messageId: string;
  authorId: string;
  channelId: string;
  contentSnapshot: string;
  verdict: FlaggedVerdict;
  scheduledDeletionAt: Date;
  scheduledDeletionDelaySeconds: number;
}

export interface IAuditLogService {
  recordInfraction(event: AuditEvent): Promise<void>;
}
