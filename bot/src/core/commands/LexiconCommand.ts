import {
  APIEmbedField,
  ChatInputCommandInteraction,
  EmbedBuilder,
  PermissionFlagsBits,
  SlashCommandBuilder
} from 'discord.js';
import { IDatabaseManager } from '../interfaces/IDatabaseManager';
import { BotCommand } from '../interfaces/BotCommand';
import { LexiconList, LexiconStats, LexiconStore, normalizeLexiconWord } from '../../moderation/lexicon/LexiconStore';
import { LexiconError } from '../../utils/errors';

export type LexiconAction =
  | { type: 'reload' }
  | { type: 'add'; list: LexiconList; word: string }
  | { type: 'remove'; list: LexiconList; word: string };

export interface LexiconCommandDependencies {
  lexicon: LexiconStore;
  db: IDatabaseManager;
}

function listLabel(list: LexiconList): string {
  return list === 'banned' ? 'banned words' : 'exceptions';
}

/**
 * Applies an administrative lexicon change and returns the reply text.
 */
export async function runLexiconAction(action: LexiconAction, lexicon: LexiconStore): Promise<string> {
  switch (action.type) {
    case 'reload': {
      const snapshot = await lexicon.reload();
      return `Lexicon reloaded: ${snapshot.bannedWords.size} banned words, ${snapshot.exceptions.size} exceptions.`;
    }
    case 'add': {
      try {
        const added = await lexicon.addWord(action.list, action.word);
        return added
          ? `Added "${normalizeLexiconWord(action.word)}" to ${listLabel(action.list)}.`
          : `"${normalizeLexiconWord(action.word)}" is already in ${listLabel(action.list)}.`;
      } catch (error) {
        if (error instanceof LexiconError) return error.message;
        throw error;
      }
    }
    case 'remove': {
      try {
        const removed = await lexicon.removeWord(action.list, action.word);
        return removed
          ? `Removed "${normalizeLexiconWord(action.word)}" from ${listLabel(action.list)}.`
          : `"${normalizeLexiconWord(action.word)}" is not in ${listLabel(action.list)}.`;
      } catch (error) {
        if (error instanceof LexiconError) return error.message;
        throw error;
      }
    }
  }
}

export function buildStatusFields(stats: LexiconStats, pendingInfractions: number): APIEmbedField[] {
  return [
    { name: 'Banned Words', value: stats.bannedWords.toString(), inline: true },
    { name: 'Exceptions', value: stats.exceptions.toString(), inline: true },
    { name: 'Phonetic Codes', value: stats.phoneticCodes.toString(), inline: true },
    { name: 'Pending Deletions', value: pendingInfractions.toString(), inline: true },
    { name: 'Loaded', value: `<t:${Math.floor(stats.loadedAt.getTime() / 1000)}:R>`, inline: true }
  ];
}

function readList(interaction: ChatInputCommandInteraction): LexiconList {
  return interaction.options.getString('list') === 'exceptions' ? 'exceptions' : 'banned';
}

export function createLexiconCommand({ lexicon, db }: LexiconCommandDependencies): BotCommand {
  const data = new SlashCommandBuilder()
    .setName('lexicon')
    .setDescription('Manage the moderation word lists')
    .addSubcommand(subcommand =>
      subcommand
        .setName('reload')
        .setDescription('Reload banned words and exceptions from disk')
    )
    .addSubcommand(subcommand =>
      subcommand
        .setName('add')
        .setDescription('Add a word to a list')
        .addStringOption(option =>
          option.setName('word')
            .setDescription('Word to add')
            .setRequired(true)
        )
        .addStringOption(option =>
          option.setName('list')
            .setDescription('Which list to change (default: banned)')
            .addChoices(
              { name: 'banned', value: 'banned' },
              { name: 'exceptions', value: 'exceptions' }
            )
        )
    )
    .addSubcommand(subcommand =>
      subcommand
        .setName('remove')
        .setDescription('Remove a word from a list')
        .addStringOption(option =>
          option.setName('word')
            .setDescription('Word to remove')
            .setRequired(true)
        )
        .addStringOption(option =>
          option.setName('list')
            .setDescription('Which list to change (default: banned)')
            .addChoices(
              { name: 'banned', value: 'banned' },
              { name: 'exceptions', value: 'exceptions' }
            )
        )
    )
    .addSubcommand(subcommand =>
      subcommand
        .setName('status')
        .setDescription('Show lexicon and pending deletion counts')
    )
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageMessages);

  return {
    data,

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const subcommand = interaction.options.getSubcommand();
      await interaction.deferReply({ ephemeral: true });

      switch (subcommand) {
        case 'reload':
          await interaction.editReply({ content: await runLexiconAction({ type: 'reload' }, lexicon) });
          break;
        case 'add':
        case 'remove':
          await interaction.editReply({
            content: await runLexiconAction(
              { type: subcommand, list: readList(interaction), word: interaction.options.getString('word', true) },
              lexicon
            )
          });
          break;
        case 'status': {
          const embed = new EmbedBuilder()
            .setTitle('Lexicon Status')
            .setColor(0x0099ff)
            .addFields(buildStatusFields(lexicon.getStats(), db.countPendingInfractions()))
            .setTimestamp();
          await interaction.editReply({ embeds: [embed] });
          break;
        }
        default:
          await interaction.editReply({ content: 'Unknown subcommand!' });
      }
    }
  };
}
