import fs from 'fs/promises';
import { ILogger } from '../../core/interfaces/ILogger';
import { isRecord } from '../../config/ConfigValidator';
import { ErrorHandler } from '../../utils/ErrorHandler';
import { ModelFormatError, toError } from '../../utils/errors';

export interface ClassifierModel {
  readonly hamCounts: ReadonlyMap<string, number>;
  readonly spamCounts: ReadonlyMap<string, number>;
  readonly totalHam: number;
  readonly totalSpam: number;
}

export const DEFAULT_SPAM_THRESHOLD = 0.9;

export const EMPTY_MODEL: ClassifierModel = Object.freeze({
  hamCounts: new Map<string, number>(),
  spamCounts: new Map<string, number>(),
  totalHam: 0,
  totalSpam: 0
});

function sum(counts: ReadonlyMap<string, number>): number {
  let total = 0;
  for (const count of counts.values()) total += count;
  return total;
}

function readCounts(raw: unknown, field: string): Map<string, number> {
  if (raw === undefined) {
    return new Map();
  }
  if (!isRecord(raw)) {
    throw new ModelFormatError(`${field} must be an object of token counts`);
  }

  const counts = new Map<string, number>();
  for (const [token, count] of Object.entries(raw)) {
    if (typeof count !== 'number' || !Number.isFinite(count) || count < 0) {
      throw new ModelFormatError(`${field}.${token} must be a non-negative number`);
    }
    counts.set(token, count);
  }
  return counts;
}

function readTotal(raw: unknown, field: string, derived: number): number {
  if (raw === undefined) {
    return derived;
  }
  if (typeof raw !== 'number' || !Number.isFinite(raw) || raw < 0) {
    throw new ModelFormatError(`${field} must be a non-negative number`);
  }
  return raw;
}

/**
 * Parses the on-disk snapshot format:
 * `{ ham_counts, spam_counts, total_ham, total_spam }`. Missing totals are
 * derived from the counts.
 */
export function parseClassifierModel(raw: unknown): ClassifierModel {
  if (!isRecord(raw)) {
    throw new ModelFormatError('Classifier model must be a JSON object');
  }

  const hamCounts = readCounts(raw['ham_counts'], 'ham_counts');
  const spamCounts = readCounts(raw['spam_counts'], 'spam_counts');

  return Object.freeze({
    hamCounts,
    spamCounts,
    totalHam: readTotal(raw['total_ham'], 'total_ham', sum(hamCounts)),
    totalSpam: readTotal(raw['total_spam'], 'total_spam', sum(spamCounts))
  });
}

/**
 * Two-class naive Bayes with add-one smoothing over a read-only model.
 */
export class BayesianClassifier {
  private model: ClassifierModel = EMPTY_MODEL;

  constructor(
    private logger: ILogger,
    private threshold: number = DEFAULT_SPAM_THRESHOLD,
    private errorHandler?: ErrorHandler
  ) {}

  /**
   * Loads a snapshot from disk. A missing or malformed file leaves the empty
   * model in place, under which every score is 0.5.
   */
  async loadModel(filePath: string): Promise<ClassifierModel> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.warn('Classifier model not found, using empty model', {
          component: 'bayesian_classifier',
          filePath
        });
      } else {
        this.reportLoadFailure(error, filePath);
      }
      this.model = EMPTY_MODEL;
      return this.model;
    }

    try {
      this.setModel(parseClassifierModel(JSON.parse(content)));
    } catch (error) {
      this.reportLoadFailure(error, filePath);
      this.model = EMPTY_MODEL;
      return this.model;
    }

    this.logger.info('Classifier model loaded', {
      component: 'bayesian_classifier',
      filePath,
      hamTokens: this.model.hamCounts.size,
      spamTokens: this.model.spamCounts.size,
      totalHam: this.model.totalHam,
      totalSpam: this.model.totalSpam
    });

    return this.model;
  }

  setModel(model: ClassifierModel): void {
    const hamSum = sum(model.hamCounts);
    const spamSum = sum(model.spamCounts);

    if (hamSum !== model.totalHam || spamSum !== model.totalSpam) {
      this.logger.warn('Classifier totals do not match token counts', {
        component: 'bayesian_classifier',
        totalHam: model.totalHam,
        hamSum,
        totalSpam: model.totalSpam,
        spamSum
      });
    }

    this.model = model;
  }

  getThreshold(): number {
    return this.threshold;
  }

  /**
   * Probability in [0, 1] that the tokens are spam. An empty token list scores
   * 0.5; if both class products underflow to zero the score is 0.
   */
  score(tokens: readonly string[]): number {
    const { hamCounts, spamCounts, totalHam, totalSpam } = this.model;
    let spam = 1.0;
    let ham = 1.0;

    for (const token of tokens) {
      spam *= ((spamCounts.get(token) ?? 0) + 1) / (totalSpam + 2);
      ham *= ((hamCounts.get(token) ?? 0) + 1) / (totalHam + 2);
    }

    if (spam + ham === 0) {
      return 0.0;
    }
    return spam / (spam + ham);
  }

  isSpam(score: number): boolean {
    return score > this.threshold;
  }

  private reportLoadFailure(error: unknown, filePath: string): void {
    const context = { component: 'bayesian_classifier', operation: 'load_model' };
    if (this.errorHandler) {
      this.errorHandler.handleParsingError(toError(error), filePath, context);
    } else {
      this.logger.error('Failed to load classifier model', { ...context, filePath, error: String(error) });
    }
  }
}
