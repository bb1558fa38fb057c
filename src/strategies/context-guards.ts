import { InvalidConfigurationError } from '../core/errors.js';

/**
 * Guards that keep an otherwise removable word when the words around it
 * match one of a list of patterns ("very important", "a lot of", ...).
 *
 * The window spans two words either side of the candidate, joined with
 * single spaces and lower-cased.
 */

export const GUARD_WINDOW_RADIUS = 2;

export function compileGuards(sources: readonly string[]): RegExp[] {
  return sources.map((source) => {
    try {
      return new RegExp(source, 'iu');
    } catch {
      throw new InvalidConfigurationError(`Invalid context pattern: ${source}`, [
        `customParams.contextPatterns: ${source}`,
      ]);
    }
  });
}

export function contextWindow(
  words: readonly string[],
  index: number,
  radius = GUARD_WINDOW_RADIUS
): string {
  return words
    .slice(Math.max(0, index - radius), Math.min(words.length, index + radius + 1))
    .join(' ')
    .toLowerCase();
}

export function isGuarded(
  guards: readonly RegExp[],
  words: readonly string[],
  index: number
): boolean {
  const window = contextWindow(words, index);
  return guards.some((guard) => guard.test(window));
}
