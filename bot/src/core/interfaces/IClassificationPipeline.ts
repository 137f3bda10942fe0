export interface CleanVerdict {
  isFlagged: false;
  /** Present when the statistical step ran. */
  score?: number;
}

export interface LexiconVerdict {
  isFlagged: true;
  reason: 'LEXICON';
  matchedToken: string;
}

export interface PhoneticVerdict {
  isFlagged: true;
  reason: 'PHONETIC';
  matchedToken: string;
  phoneticCode: string;
}

export interface StatisticalVerdict {
  isFlagged: true;
  reason: 'STATISTICAL';
  score: number;
}

export type FlaggedVerdict = LexiconVerdict | PhoneticVerdict | StatisticalVerdict;

export type Verdict = CleanVerdict | FlaggedVerdict;

export interface IClassificationPipeline {
  classify(rawText: string): Verdict;
}
