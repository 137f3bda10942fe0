import { Interaction, Message, PartialMessage } from 'discord.js';

export interface IDiscordEventHandler {
  handleMessage(message: Message): Promise<void>;
  handleMessageUpdate(oldMessage: Message | PartialMessage, newMessage: Message | PartialMessage): Promise<void>;
  handleInteraction(interaction: Interaction): Promise<void>;
}
