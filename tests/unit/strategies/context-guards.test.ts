/**
 * Unit Tests for context guards
 */

import { describe, it, expect } from '@jest/globals';
import { compileGuards, contextWindow, isGuarded } from '../../../src/strategies/context-guards.js';
import { InvalidConfigurationError } from '../../../src/core/errors.js';

describe('context guards', () => {
  it('should compile case-insensitive patterns', () => {
    const [guard] = compileGuards(['\\bvery\\s+important\\b']);

    expect(guard.flags).toBe('iu');
    expect(guard.test('VERY important')).toBe(true);
  });

  it('should reject invalid patterns', () => {
    expect(() => compileGuards(['('])).toThrow(InvalidConfigurationError);
  });

  it('should build a two-word window on each side', () => {
    const words = ['A', 'b', 'c', 'd', 'e', 'f'];

    expect(contextWindow(words, 3)).toBe('b c d e f');
    expect(contextWindow(words, 0)).toBe('a b c');
  });

  it('should guard words whose window matches', () => {
    const guards = compileGuards(['\\bvery\\s+important\\b']);
    const words = ['this', 'is', 'very', 'important', 'stuff'];

    expect(isGuarded(guards, words, 2)).toBe(true);
    expect(isGuarded(guards, ['this', 'is', 'very', 'good'], 2)).toBe(false);
  });
});
