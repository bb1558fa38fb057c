import lexicon from './lexicon/semantic-compression.json';
import { BaseStrategy } from './BaseStrategy.js';
import { compileGuards, isGuarded } from './context-guards.js';
import { OptimizationConfigInput, semanticCompressionParamsSchema } from '../validation/schemas.js';
import {
  collapseWhitespace,
  countMatches,
  filterWords,
  normalizeWord,
  normalizedWords,
  replaceMatches,
  splitSentences,
  textJaccard,
  wholeWordPattern,
} from '../utils/text-utils.js';

interface PhraseRule {
  pattern: RegExp;
  replacement: string;
}

function compileRules(entries: ReadonlyArray<{ phrase: string; replacement: string }>): PhraseRule[] {
  return entries.map(({ phrase, replacement }) => {
    const base = wholeWordPattern(phrase);
    // Deleted lead-ins take a trailing comma with them.
    const pattern =
      replacement === '' ? new RegExp(`${base.source},?[ \\t]*`, base.flags) : base;
    return { pattern, replacement };
  });
}

const FILLERS: ReadonlySet<string> = new Set(lexicon.fillers);
const HEDGES: ReadonlySet<string> = new Set(lexicon.hedges);
const DEFAULT_GUARDS = compileGuards(lexicon.guards);
const VERBOSE_PHRASES = compileRules(lexicon.verbosePhrases);
const NOMINALIZATIONS = compileRules(lexicon.nominalizations);

const MIN_LENGTH = 20;
const MAX_ESTIMATE = 0.4;
// Sentences shorter than this never count as duplicates ("1.", "Yes.").
const MIN_DEDUPE_WORDS = 3;

/**
 * Removes filler words, rewrites verbose constructions and drops sentences
 * that repeat an earlier one.
 *
 * Passes, in order:
 * 1. filler removal (hedges too in aggressive mode), guarded by context
 *    patterns and never touching the first or last word
 * 2. verbose phrase table, then nominalization table
 * 3. near-duplicate sentence removal (word-set Jaccard above the threshold)
 * 4. whitespace and punctuation normalization
 *
 * Custom params: `contextPatterns` (extra guard regex sources),
 * `sentenceSimilarityThreshold` (default 0.7).
 */
export class SemanticCompressionStrategy extends BaseStrategy {
  readonly name = 'semantic-compression';
  protected readonly description =
    'Removes filler words, verbose phrasing and repeated sentences';

  private readonly guards: RegExp[];
  private readonly fillers: ReadonlySet<string>;
  private readonly sentenceSimilarityThreshold: number;

  constructor(config: OptimizationConfigInput = {}) {
    super(config);
    const params = this.params(semanticCompressionParamsSchema);
    this.guards = [...DEFAULT_GUARDS, ...compileGuards(params.contextPatterns)];
    this.fillers = this.config.aggressiveMode ? new Set([...FILLERS, ...HEDGES]) : FILLERS;
    this.sentenceSimilarityThreshold = params.sentenceSimilarityThreshold;
  }

  protected transform(text: string): string {
    let optimized = this.removeFillers(text);
    optimized = this.applyRules(optimized, VERBOSE_PHRASES);
    optimized = this.applyRules(optimized, NOMINALIZATIONS);
    optimized = this.removeRepeatedSentences(optimized);
    return this.normalize(optimized);
  }

  estimateReduction(text: string): number {
    if (!this.canApply(text)) {
      return 0;
    }

    const totalWords = this.wordCount(text);
    const fillerRatio = this.countFillers(text) / totalWords;
    const phraseRatio = this.countPhraseMatches(text) / totalWords;

    const estimate =
      fillerRatio * 0.3 +
      this.redundancyScore(text) * 0.2 +
      this.verbosityScore(text) * 0.15 +
      phraseRatio * 0.5;
    return this.capEstimate(estimate, MAX_ESTIMATE);
  }

  canApply(text: string): boolean {
    if (typeof text !== 'string' || text.trim().length < MIN_LENGTH) {
      return false;
    }
    return (
      this.countFillers(text) > 0 ||
      this.countPhraseMatches(text) > 0 ||
      this.redundancyScore(text) > 0.1 ||
      this.verbosityScore(text) > 0.1
    );
  }

  private isFiller(word: string): boolean {
    return this.fillers.has(normalizeWord(word));
  }

  private removeFillers(text: string): string {
    return filterWords(text, (words, index) => {
      const word = words[index];
      if (!this.isFiller(word) || !this.isBareWord(word)) {
        return true;
      }
      if (index === 0 || index === words.length - 1) {
        return true;
      }
      return isGuarded(this.guards, words, index);
    });
  }

  private applyRules(text: string, rules: readonly PhraseRule[]): string {
    return rules.reduce(
      (current, rule) => replaceMatches(current, rule.pattern, rule.replacement),
      text
    );
  }

  /**
   * Drop sentences too similar to an earlier kept sentence. Line breaks
   * between surviving sentences are kept.
   */
  private removeRepeatedSentences(text: string): string {
    const kept: string[] = [];
    const lines: string[] = [];

    for (const line of text.split('\n')) {
      if (line.trim() === '') {
        lines.push('');
        continue;
      }

      const survivors = splitSentences(line).filter((sentence) => {
        if (normalizedWords(sentence).length < MIN_DEDUPE_WORDS) {
          return true;
        }
        const repeated = kept.some(
          (earlier) => textJaccard(sentence, earlier) > this.sentenceSimilarityThreshold
        );
        if (!repeated) {
          kept.push(sentence);
        }
        return !repeated;
      });

      if (survivors.length > 0) {
        const indent = line.match(/^[ \t]*/)?.[0] ?? '';
        lines.push(indent + survivors.join(' '));
      }
    }

    return lines.join('\n');
  }

  private normalize(text: string): string {
    const punctuated = text
      .replace(/\.{2,}/g, '.')
      .replace(/([,;:!?])\1+/g, '$1')
      .replace(/[ \t]+([,.;:!?])/g, '$1')
      .replace(/([,;])(?=\p{L})/gu, '$1 ')
      .replace(/(^|\n)[ \t]*[,;][ \t]*/g, '$1');
    return collapseWhitespace(punctuated, this.config.preserveStructure);
  }

  private countFillers(text: string): number {
    return text
      .split(/\s+/)
      .filter((word) => word.length > 0 && this.isFiller(word)).length;
  }

  private countPhraseMatches(text: string): number {
    return [...VERBOSE_PHRASES, ...NOMINALIZATIONS].reduce(
      (count, rule) => count + countMatches(text, rule.pattern),
      0
    );
  }

  /**
   * Mean pairwise Jaccard similarity of the text's sentences.
   */
  private redundancyScore(text: string): number {
    const sentences = splitSentences(text);
    if (sentences.length < 2) {
      return 0;
    }

    let total = 0;
    let pairs = 0;
    for (let i = 0; i < sentences.length; i++) {
      for (let j = i + 1; j < sentences.length; j++) {
        total += textJaccard(sentences[i], sentences[j]);
        pairs++;
      }
    }
    return total / pairs;
  }

  /**
   * `(fillerRatio + verboseRatio + (avgWordLength - 5) / 10) / 3`, floored at 0.
   */
  private verbosityScore(text: string): number {
    const words = text.split(/\s+/).filter((word) => word.length > 0);
    if (words.length === 0) {
      return 0;
    }
    const averageWordLength =
      words.reduce((sum, word) => sum + word.length, 0) / words.length;
    const fillerRatio = this.countFillers(text) / words.length;
    const verboseRatio =
      VERBOSE_PHRASES.reduce((count, rule) => count + countMatches(text, rule.pattern), 0) /
      words.length;
    return Math.max(0, (fillerRatio + verboseRatio + (averageWordLength - 5) / 10) / 3);
  }
}
