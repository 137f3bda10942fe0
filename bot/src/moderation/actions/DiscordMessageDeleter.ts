import { Client, RESTJSONErrorCodes } from 'discord.js';
import { ILogger } from '../../core/interfaces/ILogger';
import { DeletionOutcome, IMessageDeleter } from '../../core/interfaces/IMessageDeleter';

const NOT_FOUND_CODES: ReadonlySet<number> = new Set([
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownMessage
]);

const FORBIDDEN_CODES: ReadonlySet<number> = new Set([
  RESTJSONErrorCodes.MissingAccess,
  RESTJSONErrorCodes.MissingPermissions
]);

/**
 * Maps a failed REST call to a deletion outcome by its Discord error code.
 * Anything unrecognised is treated as transient.
 */
export function classifyDeletionError(error: unknown): DeletionOutcome {
  const code = error instanceof Error && 'code' in error ? error.code : undefined;
  const detail = error instanceof Error ? error.message : String(error);

  if (typeof code === 'number') {
    if (NOT_FOUND_CODES.has(code)) {
      return { kind: 'not_found' };
    }
    if (FORBIDDEN_CODES.has(code)) {
      return { kind: 'forbidden', detail };
    }
  }

  return { kind: 'transient_error', detail };
}

export class DiscordMessageDeleter implements IMessageDeleter {
  constructor(
    private client: Client,
    private logger: ILogger
  ) {}

  async deleteMessage(channelId: string, messageId: string): Promise<DeletionOutcome> {
    try {
      const channel = await this.client.channels.fetch(channelId);
      if (!channel || !channel.isTextBased()) {
        return { kind: 'not_found' };
      }

      await channel.messages.delete(messageId);
      return { kind: 'deleted' };
    } catch (error) {
      const outcome = classifyDeletionError(error);
      this.logger.debug('Message deletion failed', {
        component: 'message_deleter',
        channelId,
        messageId,
        outcome: outcome.kind
      });
      return outcome;
    }
  }
}
