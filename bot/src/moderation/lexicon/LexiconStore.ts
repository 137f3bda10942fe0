import fs from 'fs/promises';
import path from 'path';
import { ILogger } from '../../core/interfaces/ILogger';
import { ErrorHandler } from '../../utils/ErrorHandler';
import { LexiconError, toError } from '../../utils/errors';
import { Tokenizer } from '../text/Tokenizer';
import { PhoneticIndex } from './PhoneticIndex';

export type LexiconList = 'banned' | 'exceptions';

export interface LexiconPaths {
  bannedWordsPath: string;
  exceptionsPath: string;
}

/**
 * One complete, immutable view of the lexicon. A classification call holds a
 * single snapshot for its whole duration.
 */
export interface LexiconSnapshot {
  readonly version: number;
  readonly loadedAt: Date;
  /** Banned words with exceptions already removed. */
  readonly bannedWords: ReadonlySet<string>;
  readonly exceptions: ReadonlySet<string>;
  readonly bannedStems: ReadonlySet<string>;
  readonly phoneticIndex: PhoneticIndex;
}

export interface LexiconStats {
  version: number;
  loadedAt: Date;
  bannedWords: number;
  exceptions: number;
  phoneticCodes: number;
}

export function normalizeLexiconWord(word: string): string {
  return word.normalize('NFKC').trim().toLowerCase();
}

/**
 * Newline-delimited words; blank lines and lines starting with `#` are skipped.
 */
export function parseWordList(content: string): Set<string> {
  const words = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const word = normalizeLexiconWord(line);
    if (word && !word.startsWith('#')) {
      words.add(word);
    }
  }
  return words;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class LexiconStore {
  private snapshot: LexiconSnapshot;
  private version = 0;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(
    private paths: LexiconPaths,
    private tokenizer: Tokenizer,
    private logger: ILogger,
    private errorHandler?: ErrorHandler
  ) {
    this.snapshot = this.buildSnapshot(new Set(), new Set());
  }

  current(): LexiconSnapshot {
    return this.snapshot;
  }

  contains(stemmedToken: string, snapshot: LexiconSnapshot = this.snapshot): boolean {
    return snapshot.bannedStems.has(stemmedToken);
  }

  /**
   * Reads both sources. Never throws: a missing or unreadable source yields an
   * empty set and is logged.
   */
  async load(paths: LexiconPaths = this.paths): Promise<{ banned: Set<string>; exceptions: Set<string> }> {
    const [banned, exceptions] = await Promise.all([
      this.readWordFile(paths.bannedWordsPath, 'banned'),
      this.readWordFile(paths.exceptionsPath, 'exceptions')
    ]);
    return { banned, exceptions };
  }

  /**
   * Rebuilds the snapshot from disk and swaps it in. Reloads and edits run
   * one at a time; classification never waits on them.
   */
  reload(): Promise<LexiconSnapshot> {
    return this.serialize(() => this.rebuild());
  }

  async addWord(list: LexiconList, rawWord: string): Promise<boolean> {
    const word = this.requireWord(rawWord);

    return this.serialize(async () => {
      const filePath = this.pathFor(list);
      const content = await this.readRaw(filePath);

      if (parseWordList(content).has(word)) {
        return false;
      }

      const prefix = content.length > 0 && !content.endsWith('\n') ? '\n' : '';
      try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.appendFile(filePath, `${prefix}${word}\n`, 'utf8');
      } catch (error) {
        throw new LexiconError(`Failed to add "${word}" to ${filePath}`, { cause: error });
      }

      this.logger.info('Lexicon word added', { component: 'lexicon_store', list, word });
      await this.rebuild();
      return true;
    });
  }

  async removeWord(list: LexiconList, rawWord: string): Promise<boolean> {
    const word = this.requireWord(rawWord);

    return this.serialize(async () => {
      const filePath = this.pathFor(list);
      const content = await this.readRaw(filePath);
      const lines = content.split(/\r?\n/).filter(line => line.length > 0);
      const kept = lines.filter(line => normalizeLexiconWord(line) !== word);

      if (kept.length === lines.length) {
        return false;
      }

      try {
        await fs.writeFile(filePath, kept.length > 0 ? `${kept.join('\n')}\n` : '', 'utf8');
      } catch (error) {
        throw new LexiconError(`Failed to remove "${word}" from ${filePath}`, { cause: error });
      }

      this.logger.info('Lexicon word removed', { component: 'lexicon_store', list, word });
      await this.rebuild();
      return true;
    });
  }

  getStats(): LexiconStats {
    const snapshot = this.snapshot;
    return {
      version: snapshot.version,
      loadedAt: snapshot.loadedAt,
      bannedWords: snapshot.bannedWords.size,
      exceptions: snapshot.exceptions.size,
      phoneticCodes: snapshot.phoneticIndex.size
    };
  }

  private async rebuild(): Promise<LexiconSnapshot> {
    const { banned, exceptions } = await this.load();
    const next = this.buildSnapshot(banned, exceptions);
    this.snapshot = next;

    this.logger.info('Lexicon loaded', {
      component: 'lexicon_store',
      version: next.version,
      bannedWords: next.bannedWords.size,
      exceptions: next.exceptions.size,
      phoneticCodes: next.phoneticIndex.size
    });

    return next;
  }

  private buildSnapshot(banned: ReadonlySet<string>, exceptions: ReadonlySet<string>): LexiconSnapshot {
    const bannedWords = new Set<string>();
    for (const word of banned) {
      if (!exceptions.has(word)) {
        bannedWords.add(word);
      }
    }

    const bannedStems = new Set<string>();
    for (const word of bannedWords) {
      bannedStems.add(this.tokenizer.stem(word));
    }

    return Object.freeze({
      version: this.version++,
      loadedAt: new Date(),
      bannedWords,
      exceptions: new Set(exceptions),
      bannedStems,
      phoneticIndex: PhoneticIndex.build(bannedWords)
    });
  }

  private async readWordFile(filePath: string, list: LexiconList): Promise<Set<string>> {
    try {
      return parseWordList(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn('Lexicon source not found', { component: 'lexicon_store', list, filePath });
      } else if (this.errorHandler) {
        this.errorHandler.handleConfigurationError(
          `Failed to read lexicon source: ${toError(error).message}`,
          filePath,
          { component: 'lexicon_store', metadata: { list } }
        );
      } else {
        this.logger.error('Failed to read lexicon source', { list, filePath, error: String(error) });
      }
      return new Set();
    }
  }

  private async readRaw(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return '';
      }
      throw new LexiconError(`Failed to read ${filePath}`, { cause: error });
    }
  }

  private requireWord(rawWord: string): string {
    const word = normalizeLexiconWord(rawWord);
    if (!word || word.startsWith('#') || /\r|\n/.test(word)) {
      throw new LexiconError(`Invalid lexicon word: "${rawWord}"`);
    }
    return word;
  }

  private pathFor(list: LexiconList): string {
    return list === 'banned' ? this.paths.bannedWordsPath : this.paths.exceptionsPath;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    this.writeQueue = run.catch(() => undefined);
    return run;
  }
}
