import { ChatInputCommandInteraction, Interaction, Message, PartialMessage } from 'discord.js';
import { IDiscordEventHandler } from './interfaces/IDiscordEventHandler';
import { ILogger } from './interfaces/ILogger';
import { BotCommand } from './interfaces/BotCommand';
import { InboundMessage, ModerationCoordinator } from './ModerationCoordinator';
import { ErrorHandler, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import { PersistenceError, toError } from '../utils/errors';

export function toInboundMessage(message: Message): InboundMessage {
  return {
    id: message.id,
    channelId: message.channelId,
    authorId: message.author.id,
    content: message.content,
    createdAt: message.editedAt ?? message.createdAt
  };
}

// Bots, system notices and attachment-only posts carry no text to screen.
function isScreenable(message: Message): boolean {
  return !message.author.bot && !message.system && message.content.trim().length > 0;
}

export class DiscordEventHandler implements IDiscordEventHandler {
  private commands: Map<string, BotCommand>;

  constructor(
    private coordinator: ModerationCoordinator,
    commands: BotCommand[],
    private logger: ILogger,
    private errorHandler: ErrorHandler
  ) {
    this.commands = new Map(commands.map(command => [command.data.name, command]));
  }

  async handleMessage(message: Message): Promise<void> {
    if (!isScreenable(message)) {
      return;
    }

    const inbound = toInboundMessage(message);
    this.logger.debug('Screening message', {
      messageId: inbound.id,
      channelId: inbound.channelId,
      contentLength: inbound.content.length
    });

    try {
      await this.coordinator.handleMessage(inbound);
    } catch (error) {
      const context = {
        component: 'discord_event_handler',
        messageId: inbound.id,
        channelId: inbound.channelId,
        authorId: inbound.authorId
      };

      // The scheduler has already reported the store failure and stopped.
      if (error instanceof PersistenceError) {
        this.logger.warn('Message not recorded after a store failure', { ...context, operation: error.operation });
      } else {
        this.logger.error('Error processing message', { ...context, error: String(error) });
      }
    }
  }

  async handleMessageUpdate(oldMessage: Message | PartialMessage, newMessage: Message | PartialMessage): Promise<void> {
    // Embed unfurls also fire updates; only re-screen a real text edit.
    if (!oldMessage.partial && !newMessage.partial && oldMessage.content === newMessage.content) {
      return;
    }

    let message: Message;
    try {
      message = newMessage.partial ? await newMessage.fetch() : newMessage;
    } catch (error) {
      this.logger.warn('Could not fetch edited message', {
        error: String(error),
        messageId: newMessage.id
      });
      return;
    }

    await this.handleMessage(message);
  }

  async handleInteraction(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand()) {
      return;
    }

    const command = this.commands.get(interaction.commandName);

    try {
      this.logger.debug('Processing command interaction', {
        commandName: interaction.commandName,
        userId: interaction.user.id,
        guildId: interaction.guildId
      });

      if (!command) {
        await interaction.reply({ content: 'Unknown command.', ephemeral: true });
        return;
      }

      await command.execute(interaction);
    } catch (error) {
      this.errorHandler.handleError(toError(error), ErrorCategory.UNKNOWN, ErrorSeverity.MEDIUM, {
        component: 'discord_event_handler',
        operation: `command_${interaction.commandName}`,
        metadata: { userId: interaction.user.id }
      });

      await this.replyWithFailure(interaction, error);
    }
  }

  private async replyWithFailure(interaction: ChatInputCommandInteraction, cause: unknown): Promise<void> {
    const reply = { content: 'That command failed. Check the bot logs for details.', ephemeral: true };
    try {
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp(reply);
      } else {
        await interaction.reply(reply);
      }
    } catch (replyError) {
      this.logger.error('Failed to send error response', {
        error: String(replyError),
        originalError: String(cause)
      });
    }
  }
}
