import { ILogger } from '../core/interfaces/ILogger';
import {
  CleanVerdict,
  IClassificationPipeline,
  LexiconVerdict,
  PhoneticVerdict,
  Verdict
} from '../core/interfaces/IClassificationPipeline';
import { ErrorHandler, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import { toError } from '../utils/errors';
import { BayesianClassifier } from './classifier/BayesianClassifier';
import { LexiconSnapshot, LexiconStore } from './lexicon/LexiconStore';
import { phoneticCode } from './lexicon/PhoneticIndex';
import { Tokenizer } from './text/Tokenizer';

const NOT_FLAGGED: CleanVerdict = { isFlagged: false };

/**
 * Runs the detectors in order (lexicon, phonetic, statistical) and returns
 * the first hit. Each call reads one lexicon snapshot, so a reload in the
 * middle of a classification is never observed.
 */
export class ClassificationPipeline implements IClassificationPipeline {
  constructor(
    private lexicon: LexiconStore,
    private classifier: BayesianClassifier,
    private tokenizer: Tokenizer,
    private logger: ILogger,
    private errorHandler?: ErrorHandler
  ) {}

  classify(rawText: string): Verdict {
    try {
      const tokens = this.tokenizer.tokenize(rawText);
      if (tokens.length === 0) {
        return NOT_FLAGGED;
      }

      const snapshot = this.lexicon.current();

      return this.checkLexicon(tokens, snapshot)
        ?? this.checkPhonetic(tokens, snapshot)
        ?? this.checkStatistical(tokens);
    } catch (error) {
      this.reportFailure(error, rawText);
      return NOT_FLAGGED;
    }
  }

  /**
   * Stemmed tokens against the banned stems. Tokens that are exception words
   * themselves are not considered.
   */
  checkLexicon(tokens: readonly string[], snapshot: LexiconSnapshot = this.lexicon.current()): LexiconVerdict | null {
    for (const token of tokens) {
      if (snapshot.exceptions.has(token)) continue;

      if (this.lexicon.contains(this.tokenizer.stem(token), snapshot)) {
        return { isFlagged: true, reason: 'LEXICON', matchedToken: token };
      }
    }
    return null;
  }

  /**
   * Raw tokens whose phonetic code matches any code in the lexicon index.
   */
  checkPhonetic(tokens: readonly string[], snapshot: LexiconSnapshot = this.lexicon.current()): PhoneticVerdict | null {
    for (const token of tokens) {
      const code = phoneticCode(token);
      if (code && snapshot.phoneticIndex.hasCode(code)) {
        return { isFlagged: true, reason: 'PHONETIC', matchedToken: token, phoneticCode: code };
      }
    }
    return null;
  }

  checkStatistical(tokens: readonly string[]): Verdict {
    const score = this.classifier.score(tokens);
    if (this.classifier.isSpam(score)) {
      return { isFlagged: true, reason: 'STATISTICAL', score };
    }
    return { isFlagged: false, score };
  }

  private reportFailure(error: unknown, rawText: string): void {
    const context = {
      component: 'classification_pipeline',
      operation: 'classify',
      metadata: { textLength: rawText.length }
    };

    if (this.errorHandler) {
      this.errorHandler.handleError(toError(error), ErrorCategory.UNKNOWN, ErrorSeverity.MEDIUM, context);
    } else {
      this.logger.error('Classification failed', { ...context, error: String(error) });
    }
  }
}
