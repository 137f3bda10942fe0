/**
 * ClassificationPipeline Unit Tests
 * Lexicon: darn, heck, scam (exception: scams). Model: see TEST_MODEL.
 */

import { describe, test, expect, beforeAll, afterAll, beforeEach, jest } from '@jest/globals';
import { ClassificationPipeline } from '../../bot/src/moderation/ClassificationPipeline';
import { BayesianClassifier } from '../../bot/src/moderation/classifier/BayesianClassifier';
import { LexiconStore } from '../../bot/src/moderation/lexicon/LexiconStore';
import { Tokenizer } from '../../bot/src/moderation/text/Tokenizer';
import { ErrorCategory, ErrorHandler } from '../../bot/src/utils/ErrorHandler';
import { Logger } from '../../bot/src/utils/Logger';
import {
  TEST_MODEL,
  createTempDir,
  createTestErrorHandler,
  createTestLogger,
  removeTempDir,
  writeLexicon
} from '../setup';

describe('ClassificationPipeline', () => {
  let dir: string;
  let logger: Logger;
  let errorHandler: ErrorHandler;
  let lexicon: LexiconStore;
  let classifier: BayesianClassifier;
  let pipeline: ClassificationPipeline;
  const tokenizer = new Tokenizer();

  beforeAll(() => {
    dir = createTempDir();
  });

  afterAll(() => {
    removeTempDir(dir);
  });

  beforeEach(async () => {
    logger = createTestLogger();
    errorHandler = createTestErrorHandler(logger);
    lexicon = new LexiconStore(writeLexicon(dir, ['darn', 'heck', 'scam'], ['scams']), tokenizer, logger, errorHandler);
    await lexicon.reload();
    classifier = new BayesianClassifier(logger, 0.9, errorHandler);
    classifier.setModel(TEST_MODEL);
    pipeline = new ClassificationPipeline(lexicon, classifier, tokenizer, logger, errorHandler);
  });

  describe('classify', () => {
    test('flags a banned word by its stem', () => {
      expect(pipeline.classify('stop scamming people')).toEqual({
        isFlagged: true,
        reason: 'LEXICON',
        matchedToken: 'scamming'
      });
    });

    test('flags an exact banned word regardless of case and punctuation', () => {
      expect(pipeline.classify('Well, DARN it!')).toEqual({
        isFlagged: true,
        reason: 'LEXICON',
        matchedToken: 'darn'
      });
    });

    test('flags a word that sounds like a banned word', () => {
      expect(pipeline.classify('what a dorn day')).toEqual({
        isFlagged: true,
        reason: 'PHONETIC',
        matchedToken: 'dorn',
        phoneticCode: 'D650'
      });
    });

    test('flags spam by score', () => {
      const verdict = pipeline.classify('FREE money');

      expect(verdict.isFlagged).toBe(true);
      expect(verdict).toEqual({ isFlagged: true, reason: 'STATISTICAL', score: 6860 / 7004 });
    });

    test('lets ordinary text through with its score', () => {
      const spam = 1 / 1728;
      const ham = 45 / 2744;
      const verdict = pipeline.classify('hello meeting today');

      expect(verdict.isFlagged).toBe(false);
      expect(verdict.score).toBeCloseTo(spam / (spam + ham), 10);
    });

    test('does not flag an exception word even though its stem is banned', () => {
      const verdict = pipeline.classify('these scams');

      expect(verdict.isFlagged).toBe(false);
    });

    test('stops at the first detector that matches', () => {
      expect(pipeline.classify('free money darn')).toMatchObject({ reason: 'LEXICON', matchedToken: 'darn' });
      expect(pipeline.classify('free money dorn')).toMatchObject({ reason: 'PHONETIC', matchedToken: 'dorn' });
    });

    test('returns not flagged for empty and punctuation-only text', () => {
      expect(pipeline.classify('')).toEqual({ isFlagged: false });
      expect(pipeline.classify('?!... ---')).toEqual({ isFlagged: false });
    });

    test('returns not flagged for non-Latin text', () => {
      expect(pipeline.classify('привет мир').isFlagged).toBe(false);
    });

    test('never throws; an internal failure yields not flagged', () => {
      jest.spyOn(classifier, 'score').mockImplementation(() => {
        throw new Error('model exploded');
      });

      expect(pipeline.classify('free money')).toEqual({ isFlagged: false });
      expect(errorHandler.getErrors({ category: ErrorCategory.UNKNOWN })).toHaveLength(1);
    });

    test('sees lexicon changes after a reload', async () => {
      expect(pipeline.classify('blast').isFlagged).toBe(false);

      writeLexicon(dir, ['darn', 'heck', 'scam', 'blast'], ['scams']);
      await lexicon.reload();

      expect(pipeline.classify('blast')).toEqual({ isFlagged: true, reason: 'LEXICON', matchedToken: 'blast' });
    });
  });

  describe('individual detectors', () => {
    test('checkLexicon skips exception words', () => {
      expect(pipeline.checkLexicon(['scams'])).toBeNull();
      expect(pipeline.checkLexicon(['heck'])).toEqual({ isFlagged: true, reason: 'LEXICON', matchedToken: 'heck' });
    });

    test('checkLexicon reads the snapshot it is given', async () => {
      const before = lexicon.current();
      writeLexicon(dir, ['heck']);
      await lexicon.reload();

      expect(pipeline.checkLexicon(['darn'], before)).toMatchObject({ reason: 'LEXICON' });
      expect(pipeline.checkLexicon(['darn'])).toBeNull();
    });

    test('checkPhonetic matches any code collision with the lexicon', () => {
      expect(pipeline.checkPhonetic(['hello', 'skin'])).toEqual({
        isFlagged: true,
        reason: 'PHONETIC',
        matchedToken: 'skin',
        phoneticCode: 'S250'
      });
      expect(pipeline.checkPhonetic(['hello'])).toBeNull();
    });

    test('checkStatistical always carries the score', () => {
      expect(pipeline.checkStatistical([])).toEqual({ isFlagged: false, score: 0.5 });
      expect(pipeline.checkStatistical(['free', 'money'])).toMatchObject({ isFlagged: true, reason: 'STATISTICAL' });
    });
  });
});
