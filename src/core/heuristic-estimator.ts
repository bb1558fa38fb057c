import { ITokenCounter, TokenCountResult } from '../interfaces/ITokenCounter.js';

/**
 * Weighted corrections applied on top of the chars/4 base estimate.
 */
export interface HeuristicWeights {
  /** Words longer than this many characters count as long words. */
  longWordLength: number;
  /** Extra tokens per long word. */
  longWordWeight: number;
  /** Extra tokens per character that is neither a word character nor whitespace. */
  punctuationWeight: number;
  /** Extra tokens per digit or symbol character. */
  specialWeight: number;
  /** Extra tokens per markup tag such as `<context>`. */
  markupWeight: number;
}

export const GPT_HEURISTIC_WEIGHTS: Readonly<HeuristicWeights> = Object.freeze({
  longWordLength: 8,
  longWordWeight: 0.5,
  punctuationWeight: 0.3,
  specialWeight: 0.2,
  markupWeight: 0,
});

export const CLAUDE_HEURISTIC_WEIGHTS: Readonly<HeuristicWeights> = Object.freeze({
  longWordLength: 10,
  longWordWeight: 0.3,
  punctuationWeight: 0.25,
  specialWeight: 0.15,
  markupWeight: 0.5,
});

const CHARS_PER_TOKEN = 4;
const PUNCTUATION = /[^\p{L}\p{N}_\s]/gu;
const SPECIAL = /[0-9@#$%^&*()_+={}[\]|;:,.<>?/~`]/g;
const MARKUP_TAG = /<[^<>]+>/g;

/**
 * Character/word heuristic token estimator.
 *
 * Used wherever an exact tokenizer is unavailable. Deterministic, never
 * throws, and never decreases when text is appended to.
 */
export class HeuristicTokenEstimator implements ITokenCounter {
  constructor(
    private readonly weights: Readonly<HeuristicWeights> = GPT_HEURISTIC_WEIGHTS
  ) {}

  count(text: string): TokenCountResult {
    return {
      tokens: this.estimate(text),
      characters: text.length,
    };
  }

  countBatch(texts: string[]): TokenCountResult {
    return texts.reduce<TokenCountResult>(
      (total, text) => {
        const result = this.count(text);
        return {
          tokens: total.tokens + result.tokens,
          characters: total.characters + result.characters,
        };
      },
      { tokens: 0, characters: 0 }
    );
  }

  /**
   * @returns 0 for the empty string, otherwise at least 1
   */
  estimate(text: string): number {
    if (text.length === 0) {
      return 0;
    }

    const { longWordLength, longWordWeight, punctuationWeight, specialWeight, markupWeight } =
      this.weights;

    const base = text.length / CHARS_PER_TOKEN;
    const words = text.split(/\s+/).filter((word) => word.length > 0);
    const longWords = words.filter((word) => word.length > longWordLength).length;
    const punctuation = text.match(PUNCTUATION)?.length ?? 0;
    const special = text.match(SPECIAL)?.length ?? 0;
    const markup = markupWeight > 0 ? (text.match(MARKUP_TAG)?.length ?? 0) : 0;

    const total =
      base +
      longWords * longWordWeight +
      punctuation * punctuationWeight +
      special * specialWeight +
      markup * markupWeight;

    return Math.max(1, Math.floor(total));
  }
}
