import lexicon from './lexicon/token-reduction.json';
import { BaseStrategy } from './BaseStrategy.js';
import { compileGuards, isGuarded } from './context-guards.js';
import { OptimizationConfigInput, tokenReductionParamsSchema } from '../validation/schemas.js';
import {
  collapseWhitespace,
  countMatches,
  filterWords,
  normalizeWord,
  replaceMatches,
  wholeWordPattern,
} from '../utils/text-utils.js';

interface Rule {
  pattern: RegExp;
  replacement: string;
}

function compileTable(table: Readonly<Record<string, string>>): Rule[] {
  return Object.entries(table).map(([from, to]) => ({
    pattern: wholeWordPattern(from),
    replacement: to,
  }));
}

const ABBREVIATIONS = compileTable(lexicon.abbreviations);
const CONTRACTIONS = compileTable(lexicon.contractions);
const SYMBOLS = compileTable(lexicon.symbols);
const AGGRESSIVE_SYMBOLS = compileTable(lexicon.aggressiveSymbols);
const NUMBER_WORDS = compileTable(lexicon.numberWords);
const REMOVABLE_WORDS: ReadonlySet<string> = new Set(lexicon.removableWords);
const AGGRESSIVE_REMOVABLE_WORDS: ReadonlySet<string> = new Set(lexicon.aggressiveRemovableWords);
const ESSENTIAL_GUARDS = compileGuards(lexicon.essentialPatterns);

const MONTH_DATE = new RegExp(
  `\\b(${lexicon.months.join('|')})\\s+(\\d{1,2}),?\\s+(\\d{4})\\b`,
  'gi'
);

const MIN_LENGTH = 10;
const MAX_ESTIMATE = 0.35;

export interface TokenReductionPasses {
  abbreviations: boolean;
  contractions: boolean;
  symbols: boolean;
  elision: boolean;
  numbers: boolean;
}

function applyRules(text: string, rules: readonly Rule[]): string {
  return rules.reduce(
    (current, rule) => replaceMatches(current, rule.pattern, rule.replacement),
    text
  );
}

function countRules(text: string, rules: readonly Rule[]): number {
  return rules.reduce((count, rule) => count + countMatches(text, rule.pattern), 0);
}

/**
 * Shortens wording without restructuring: abbreviations, contractions,
 * symbols, article/preposition elision and digits for number words.
 *
 * Abbreviation and contraction run before elision, which works on the
 * already-shortened word stream. Elision never drops the first word, nor a
 * word whose neighbours match an essential pattern ("the most", "a lot").
 *
 * Custom params (all default true): `abbreviations`, `contractions`,
 * `symbols`, `elision`, `numbers`; plus `contextPatterns`.
 */
export class TokenReductionStrategy extends BaseStrategy {
  readonly name = 'token-reduction';
  protected readonly description =
    'Applies abbreviations, contractions, symbols and article elision';

  readonly passes: Readonly<TokenReductionPasses>;
  private readonly guards: RegExp[];
  private readonly symbols: readonly Rule[];
  private readonly removable: ReadonlySet<string>;

  constructor(config: OptimizationConfigInput = {}) {
    super(config);
    const { contextPatterns, ...passes } = this.params(tokenReductionParamsSchema);
    this.passes = Object.freeze(passes);
    this.guards = [...ESSENTIAL_GUARDS, ...compileGuards(contextPatterns)];

    const aggressive = this.config.aggressiveMode;
    this.symbols = aggressive ? [...SYMBOLS, ...AGGRESSIVE_SYMBOLS] : SYMBOLS;
    this.removable = aggressive
      ? new Set([...REMOVABLE_WORDS, ...AGGRESSIVE_REMOVABLE_WORDS])
      : REMOVABLE_WORDS;
  }

  protected transform(text: string): string {
    let optimized = text;

    if (this.passes.abbreviations) {
      optimized = applyRules(optimized, ABBREVIATIONS);
    }
    if (this.passes.contractions) {
      optimized = applyRules(optimized, CONTRACTIONS);
    }
    if (this.passes.symbols) {
      optimized = applyRules(optimized, this.symbols);
    }
    if (this.passes.elision) {
      optimized = this.elide(optimized);
    }
    if (this.passes.numbers) {
      optimized = this.normalizeNumbers(optimized);
    }

    return this.compact(optimized);
  }

  estimateReduction(text: string): number {
    if (!this.canApply(text)) {
      return 0;
    }

    const counts = this.passCounts(text);
    const totalWords = this.wordCount(text);
    const estimate =
      (counts.abbreviations * 0.25 +
        counts.contractions * 0.15 +
        counts.symbols * 0.3 +
        counts.elision * 1.0 +
        counts.numbers * 0.2) /
      totalWords;
    return this.capEstimate(estimate, MAX_ESTIMATE);
  }

  canApply(text: string): boolean {
    if (typeof text !== 'string' || text.trim().length < MIN_LENGTH) {
      return false;
    }
    return Object.values(this.passCounts(text)).some((count) => count > 0);
  }

  /**
   * Candidate count per enabled pass; disabled passes count 0.
   */
  passCounts(text: string): Record<keyof TokenReductionPasses, number> {
    return {
      abbreviations: this.passes.abbreviations ? countRules(text, ABBREVIATIONS) : 0,
      contractions: this.passes.contractions ? countRules(text, CONTRACTIONS) : 0,
      symbols: this.passes.symbols ? countRules(text, this.symbols) : 0,
      elision: this.passes.elision ? this.countRemovable(text) : 0,
      numbers: this.passes.numbers
        ? countRules(text, NUMBER_WORDS) + countMatches(text, MONTH_DATE)
        : 0,
    };
  }

  private isRemovable(word: string): boolean {
    return this.removable.has(normalizeWord(word)) && this.isBareWord(word);
  }

  private elide(text: string): string {
    return filterWords(
      text,
      (words, index) =>
        index === 0 || !this.isRemovable(words[index]) || isGuarded(this.guards, words, index)
    );
  }

  private countRemovable(text: string): number {
    const words = text.split(/\s+/).filter((word) => word.length > 0);
    return words.filter((word, index) => index > 0 && this.isRemovable(word)).length;
  }

  private normalizeNumbers(text: string): string {
    const withDigits = applyRules(text, NUMBER_WORDS);
    return withDigits.replace(
      MONTH_DATE,
      (_match, month: string, day: string, year: string) =>
        `${lexicon.months.indexOf(month.toLowerCase()) + 1}/${day}/${year}`
    );
  }

  private compact(text: string): string {
    const tightened = text
      .replace(/[ \t]+([,.!?;:])/g, '$1')
      .replace(/\([ \t]+/g, '(')
      .replace(/[ \t]+\)/g, ')')
      .replace(/(\d)[ \t]+%/g, '$1%');
    return collapseWhitespace(tightened, this.config.preserveStructure);
  }
}
