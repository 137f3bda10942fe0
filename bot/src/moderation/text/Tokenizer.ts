import { PorterStemmer, RegexpTokenizer } from 'natural';

/**
 * Splits text into lowercase word tokens and reduces them to Porter stems.
 * The same instance is used for lexicon words and message tokens so both
 * sides of a lookup go through identical normalization.
 */
export class Tokenizer {
  // Anything that is not a letter, combining mark or digit separates tokens.
  private splitter = new RegexpTokenizer({ pattern: /[^\p{L}\p{M}\p{N}]+/u });

  tokenize(text: string): string[] {
    if (!text) {
      return [];
    }

    const normalized = text.normalize('NFKC').toLowerCase();
    return this.splitter.tokenize(normalized).filter(token => token.length > 0);
  }

  stem(token: string): string {
    return PorterStemmer.stem(token);
  }
}
