import { APIEmbedField, Client, EmbedBuilder } from 'discord.js';
import { AuditEvent, IAuditLogService } from './interfaces/IAuditLogService';
import { FlaggedVerdict } from './interfaces/IClassificationPipeline';
import { ILogger } from './interfaces/ILogger';

const REASON_COLORS: Record<FlaggedVerdict['reason'], number> = {
  LEXICON: 0xff4444, // Red
  PHONETIC: 0xff8800, // Orange
  STATISTICAL: 0xffff00 // Yellow
};

export function truncateContent(content: string, maxLength: number = 1000): string {
  if (content.length <= maxLength) {
    return content;
  }
  return content.substring(0, maxLength - 3) + '...';
}

export function describeVerdict(verdict: FlaggedVerdict): string {
  switch (verdict.reason) {
    case 'LEXICON':
      return `Banned word: ${verdict.matchedToken}`;
    case 'PHONETIC':
      return `Sounds like a banned word: ${verdict.matchedToken} (${verdict.phoneticCode})`;
    case 'STATISTICAL':
      return `Spam score ${(verdict.score * 100).toFixed(1)}%`;
  }
}

export function buildAuditFields(event: AuditEvent): APIEmbedField[] {
  const deletionAt = Math.floor(event.scheduledDeletionAt.getTime() / 1000);

  return [
    { name: 'User', value: `<@${event.authorId}>`, inline: true },
    { name: 'Channel', value: `<#${event.channelId}>`, inline: true },
    { name: 'Reason', value: event.verdict.reason, inline: true },
    { name: 'Detection', value: describeVerdict(event.verdict), inline: false },
    { name: 'Message Content', value: truncateContent(event.contentSnapshot) || '(empty)', inline: false },
    {
      name: 'Scheduled Deletion',
      value: `<t:${deletionAt}:F> (in ${event.scheduledDeletionDelaySeconds}s)`,
      inline: false
    },
    { name: 'Message ID', value: event.messageId, inline: true }
  ];
}

/**
 * Posts one embed per recorded infraction to the admin channel. Delivery
 * problems are logged; they never fail the moderation flow.
 */
export class AuditLogService implements IAuditLogService {
  constructor(
    private client: Client,
    private adminChannelId: string | undefined,
    private logger: ILogger
  ) {}

  async recordInfraction(event: AuditEvent): Promise<void> {
    if (!this.adminChannelId) {
      this.logger.warn('No admin channel configured, audit event not sent', {
        component: 'audit_log',
        messageId: event.messageId
      });
      return;
    }

    try {
      const channel = this.client.channels.cache.get(this.adminChannelId)
        ?? await this.client.channels.fetch(this.adminChannelId);

      if (!channel || !channel.isTextBased() || !('send' in channel)) {
        this.logger.warn('Admin channel not found', {
          component: 'audit_log',
          channelId: this.adminChannelId
        });
        return;
      }

      const embed = new EmbedBuilder()
        .setTitle('Recorded Infraction')
        .setColor(REASON_COLORS[event.verdict.reason])
        .addFields(buildAuditFields(event))
        .setTimestamp();

      await channel.send({ embeds: [embed] });

      this.logger.debug('Audit event sent', {
        component: 'audit_log',
        messageId: event.messageId,
        reason: event.verdict.reason
      });
    } catch (error) {
      this.logger.error('Failed to send audit event', {
        component: 'audit_log',
        error: String(error),
        messageId: event.messageId,
        channelId: this.adminChannelId
      });
    }
  }
}
