import lexicon from './data/text-metrics-lexicon.json';
import { splitSentences, textJaccard } from '../utils/text-utils.js';

export interface TokenAnalysis {
  totalTokens: number;
  uniqueTokens: number;
  averageTokenLength: number;
  tokenDistribution: Record<string, number>;
  /** 1 - unique/total; 0 for empty text. */
  redundancyScore: number;
}

export type EstimateModelType = 'gpt' | 'claude' | 'llama' | (string & {});

const VERBOSITY_STOP_WORDS: ReadonlySet<string> = new Set(lexicon.verbosityStopWords);
const FILLERS: ReadonlySet<string> = new Set(lexicon.fillers);

function clamp01(value: number): number {
  return Math.max(0, Math.min(value, 1));
}

/**
 * Lexical statistics over a text's word tokens.
 *
 * These are coarse word-level measures used for estimates and reports, not
 * model token counts; use an adapter for those.
 */
export class TokenMetrics {
  analyzeTokens(text: string): TokenAnalysis {
    const tokens = this.tokenize(text);
    const totalTokens = tokens.length;
    const tokenDistribution: Record<string, number> = {};
    for (const token of tokens) {
      tokenDistribution[token] = (tokenDistribution[token] ?? 0) + 1;
    }
    const uniqueTokens = Object.keys(tokenDistribution).length;

    if (totalTokens === 0) {
      return {
        totalTokens,
        uniqueTokens,
        averageTokenLength: 0,
        tokenDistribution,
        redundancyScore: 0,
      };
    }

    const totalLength = tokens.reduce((sum, token) => sum + token.length, 0);
    return {
      totalTokens,
      uniqueTokens,
      averageTokenLength: totalLength / totalTokens,
      tokenDistribution,
      redundancyScore: 1 - uniqueTokens / totalTokens,
    };
  }

  /**
   * Mean of redundancy, verbosity and sentence repetition, capped at 1.
   */
  calculateReductionPotential(text: string): number {
    const redundancy = this.analyzeTokens(text).redundancyScore;
    const verbosity = this.calculateVerbosity(text);
    const repetition = this.calculateRepetition(text);
    return Math.min((redundancy + verbosity + repetition) / 3, 1);
  }

  /**
   * `(stopWordRatio + fillerRatio + (avgWordLength - 5) / 10) / 3`, clamped
   * to [0, 1].
   */
  calculateVerbosity(text: string): number {
    const words = text.split(/\s+/).filter((word) => word.length > 0);
    if (words.length === 0) {
      return 0;
    }

    const averageWordLength =
      words.reduce((sum, word) => sum + word.length, 0) / words.length;
    const lowered = words.map((word) => word.toLowerCase());
    const stopWordRatio =
      lowered.filter((word) => VERBOSITY_STOP_WORDS.has(word)).length / words.length;
    const fillerRatio = lowered.filter((word) => FILLERS.has(word)).length / words.length;

    return clamp01((stopWordRatio + fillerRatio + (averageWordLength - 5) / 10) / 3);
  }

  /**
   * Mean word-set Jaccard similarity of adjacent sentences; 0 with fewer
   * than two sentences.
   */
  calculateRepetition(text: string): number {
    const sentences = splitSentences(text);
    if (sentences.length < 2) {
      return 0;
    }

    let total = 0;
    for (let i = 0; i < sentences.length - 1; i++) {
      total += textJaccard(sentences[i], sentences[i + 1]);
    }
    return total / (sentences.length - 1);
  }

  /**
   * Rough per-family token estimate for when no adapter is at hand.
   */
  estimateTokenCount(text: string, modelType: EstimateModelType = 'gpt'): number {
    switch (modelType.toLowerCase()) {
      case 'gpt':
      case 'claude':
        return Math.floor(text.length / 4);
      case 'llama':
        return Math.floor(text.length / 3.5);
      default:
        return text.split(/\s+/).filter((word) => word.length > 0).length;
    }
  }

  private tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
      .split(/\s+/)
      .filter((token) => token.length > 1);
  }
}
