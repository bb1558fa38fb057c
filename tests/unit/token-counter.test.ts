/**
 * Unit Tests for TokenCounter
 *
 * Tests cover:
 * - Token counting with tiktoken encodings
 * - Special-token rejection
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { TokenCounter, isSupportedEncoding } from '../../src/core/token-counter.js';

describe('TokenCounter', () => {
  let tokenCounter: TokenCounter;

  beforeEach(() => {
    tokenCounter = new TokenCounter();
  });

  afterEach(() => {
    tokenCounter.free();
  });

  describe('Basic Token Counting', () => {
    it('should count tokens in simple text', () => {
      const result = tokenCounter.count('Hello, world!');

      expect(result.tokens).toBe(4);
      expect(result.characters).toBe(13);
    });

    it('should count tokens in empty string', () => {
      expect(tokenCounter.count('')).toEqual({ tokens: 0, characters: 0 });
    });

    it('should default to cl100k_base', () => {
      expect(tokenCounter.encodingName).toBe('cl100k_base');
    });

    it('should reject special-token markers', () => {
      expect(() => tokenCounter.count('<|endoftext|>')).toThrow();
    });
  });

  describe('isSupportedEncoding', () => {
    it('should accept tiktoken encodings only', () => {
      expect(isSupportedEncoding('o200k_base')).toBe(true);
      expect(isSupportedEncoding('claude')).toBe(false);
      expect(isSupportedEncoding(undefined)).toBe(false);
    });
  });
});
