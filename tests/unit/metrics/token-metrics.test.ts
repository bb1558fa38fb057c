/**
 * Unit Tests for TokenMetrics
 *
 * Tests cover:
 * - Token analysis and redundancy
 * - Verbosity and repetition scores
 * - Reduction potential
 * - Per-family token estimates
 */

import { describe, it, expect } from '@jest/globals';
import { TokenMetrics } from '../../../src/metrics/TokenMetrics.js';

describe('TokenMetrics', () => {
  const metrics = new TokenMetrics();

  describe('analyzeTokens', () => {
    it('should count word tokens and their distribution', () => {
      const analysis = metrics.analyzeTokens('The cat and the hat.');

      expect(analysis.totalTokens).toBe(5);
      expect(analysis.uniqueTokens).toBe(4);
      expect(analysis.averageTokenLength).toBe(3);
      expect(analysis.tokenDistribution).toEqual({ the: 2, cat: 1, and: 1, hat: 1 });
      expect(analysis.redundancyScore).toBeCloseTo(0.2, 10);
    });

    it('should return zeros for empty text', () => {
      expect(metrics.analyzeTokens('')).toEqual({
        totalTokens: 0,
        uniqueTokens: 0,
        averageTokenLength: 0,
        tokenDistribution: {},
        redundancyScore: 0,
      });
    });
  });

  describe('calculateVerbosity', () => {
    it('should be 0 for empty text', () => {
      expect(metrics.calculateVerbosity('')).toBe(0);
    });

    it('should combine stop-word ratio and word length', () => {
      // (1 + 0 + (3 - 5) / 10) / 3
      expect(metrics.calculateVerbosity('the the the the')).toBeCloseTo(0.8 / 3, 10);
    });

    it('should count fillers', () => {
      // stop 0, filler 1/2, avg length 5: (0 + 0.5 + 0) / 3
      expect(metrics.calculateVerbosity('really good')).toBeCloseTo(0.5 / 3, 10);
    });

    it('should never go below 0', () => {
      expect(metrics.calculateVerbosity('ok go')).toBe(0);
    });
  });

  describe('calculateRepetition', () => {
    it('should be 0 for a single sentence', () => {
      expect(metrics.calculateRepetition('Cats sleep.')).toBe(0);
    });

    it('should compare adjacent sentences', () => {
      expect(metrics.calculateRepetition('Cats sleep. Cats sleep.')).toBe(1);
    });
  });

  describe('calculateReductionPotential', () => {
    it('should average redundancy, verbosity and repetition', () => {
      // redundancy 0.5, verbosity 0, repetition 1
      expect(metrics.calculateReductionPotential('Cats sleep. Cats sleep.')).toBeCloseTo(0.5, 10);
    });
  });

  describe('estimateTokenCount', () => {
    it('should use characters for gpt and claude', () => {
      expect(metrics.estimateTokenCount('abcdefghijklmn')).toBe(3);
      expect(metrics.estimateTokenCount('abcdefghijklmn', 'claude')).toBe(3);
    });

    it('should use a denser ratio for llama', () => {
      expect(metrics.estimateTokenCount('abcdefghijklmn', 'llama')).toBe(4);
    });

    it('should count words for other models', () => {
      expect(metrics.estimateTokenCount('one two three', 'mistral')).toBe(3);
    });
  });
});
