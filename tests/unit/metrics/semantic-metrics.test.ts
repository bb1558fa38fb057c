/**
 * Unit Tests for SemanticMetrics
 *
 * Tests cover:
 * - TF-IDF similarity and the word-overlap fallback
 * - Density, coherence and complexity
 * - Key concept extraction
 */

import { describe, it, expect, jest } from '@jest/globals';
import { SemanticMetrics } from '../../../src/metrics/SemanticMetrics.js';
import { TfidfVectorizer } from '../../../src/metrics/tfidf.js';
import { Logger } from '../../../src/core/logger.js';

describe('SemanticMetrics', () => {
  const metrics = new SemanticMetrics();

  describe('compareTexts', () => {
    it('should return 0 when either text is empty', () => {
      expect(metrics.compareTexts('', 'apple')).toEqual({ score: 0, method: 'tfidf' });
      expect(metrics.compareTexts('apple', '')).toEqual({ score: 0, method: 'tfidf' });
    });

    it('should score identical texts as 1', () => {
      const result = metrics.compareTexts('apple banana', 'apple banana');

      expect(result.method).toBe('tfidf');
      expect(result.score).toBeCloseTo(1, 10);
    });

    it('should score any text with words as near-identical to itself', () => {
      const texts = [
        'apple banana',
        'Summarize the quarterly report in three bullet points.',
        'the of',
        'x',
        'Analizza il testo seguente e riassumi i punti principali.',
        '1. Read the file.\n2. Summarize the file.',
      ];

      for (const text of texts) {
        expect(metrics.calculateSimilarity(text, text)).toBeGreaterThanOrEqual(0.95);
      }
    });

    it('should score whitespace-only text as 0 against itself', () => {
      expect(metrics.compareTexts('   ', '   ')).toEqual({ score: 0, method: 'jaccard' });
    });

    it('should score disjoint texts as 0', () => {
      expect(metrics.calculateSimilarity('apple banana', 'cherry date')).toBe(0);
    });

    it('should ignore stop words', () => {
      expect(metrics.calculateSimilarity('the apple', 'an apple')).toBeCloseTo(1, 10);
    });

    it('should fall back to word overlap for stop-word-only texts', () => {
      expect(metrics.compareTexts('the of', 'the of')).toEqual({ score: 1, method: 'jaccard' });
      expect(metrics.compareTexts('the of', 'the and').score).toBeCloseTo(1 / 3, 10);
    });

    it('should log unexpected vectorizer failures', () => {
      class BrokenVectorizer extends TfidfVectorizer {
        fitTransform(): never {
          throw new Error('broken');
        }
      }
      const warn = jest.fn<Logger['warn']>();
      const logger: Logger = {
        debug: jest.fn(),
        info: jest.fn(),
        warn,
        error: jest.fn(),
        prompt: jest.fn(),
      };
      const broken = new SemanticMetrics({ vectorizer: new BrokenVectorizer(), logger });

      expect(broken.compareTexts('apple pie', 'apple tart')).toEqual({
        score: 1 / 3,
        method: 'jaccard',
      });
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('content measures', () => {
    it('should compute semantic density from lexical diversity', () => {
      expect(metrics.calculateSemanticDensity('a a b b')).toBe(1);
      expect(metrics.calculateSemanticDensity('a a a a')).toBe(0.5);
      expect(metrics.calculateSemanticDensity('')).toBe(0);
    });

    it('should count connectives per sentence', () => {
      expect(metrics.calculateCoherence('One thing. Therefore another.')).toBe(0.5);
      expect(metrics.calculateCoherence('Just one sentence.')).toBe(1);
    });

    it('should combine sentence and word length into complexity', () => {
      // sentence 2/20 = 0.1, lexical (5 - 3) / 5 = 0.4
      expect(metrics.calculateComplexity('Cats sleep.')).toBeCloseTo(0.25, 10);
    });
  });

  describe('extractKeyConcepts', () => {
    it('should rank by TF-IDF weight, then alphabetically', () => {
      expect(metrics.extractKeyConcepts('apple apple banana')).toEqual([
        'apple',
        'apple apple',
        'apple banana',
        'banana',
      ]);
    });

    it('should fall back to rare words without a vocabulary', () => {
      expect(metrics.extractKeyConcepts('the of the')).toEqual(['of', 'the']);
    });

    it('should return nothing for blank text', () => {
      expect(metrics.extractKeyConcepts('   ')).toEqual([]);
    });

    it('should bundle every measure in analyzeSemanticContent', () => {
      const analysis = metrics.analyzeSemanticContent('Cats sleep.');

      expect(analysis.semanticDensity).toBe(1);
      expect(analysis.coherenceScore).toBe(1);
      expect(analysis.keyConcepts).toEqual(['cats', 'cats sleep', 'sleep']);
    });
  });
});
