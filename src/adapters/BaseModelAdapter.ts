import { LRUCache } from 'lru-cache';
import {
  AdapterFamily,
  IModelAdapter,
  ModelInfo,
  ModelProfile,
  ModelSuggestion,
  OptimizationSuggestions,
  TokenizerMode,
} from '../interfaces/IModelAdapter.js';
import { HeuristicTokenEstimator, HeuristicWeights } from '../core/heuristic-estimator.js';
import { TokenCounter, isSupportedEncoding } from '../core/token-counter.js';
import { Logger, createLogger } from '../core/logger.js';
import { describeError } from '../core/errors.js';
import { collapseWhitespace } from '../utils/text-utils.js';
import { ProfileOverrides } from './model-catalog.js';

export interface ModelAdapterOptions {
  /**
   * Use the family's exact tokenizer when one exists.
   * @default true
   */
  useExactTokenizer?: boolean;

  /**
   * Maximum number of memoized token counts.
   * @default 500
   */
  cacheSize?: number;

  /** Replace pricing/context fields or merge custom params. */
  profileOverrides?: ProfileOverrides;

  logger?: Logger;
}

const CONTEXT_WARNING_RATIO = 0.8;
const COST_WARNING_USD = 0.01;
const DEFAULT_CACHE_SIZE = 500;

const COURTESY_PREAMBLE = /\b(?:please|kindly)\s+(?:could|would|can)\s+you\s+/gi;

/**
 * Shared behavior for model-family adapters.
 *
 * Subclasses supply the catalog profile, heuristic weights and
 * family-specific suggestions and clean-ups. Counting goes through the
 * exact tokenizer when the profile names a tiktoken encoding and falls
 * back to the heuristic estimator otherwise.
 */
export abstract class BaseModelAdapter implements IModelAdapter {
  protected readonly logger: Logger;
  private readonly heuristic: HeuristicTokenEstimator;
  private readonly cache: LRUCache<string, number>;
  private exactCounter: TokenCounter | null;
  private degraded = false;

  protected constructor(
    readonly family: AdapterFamily,
    readonly profile: Readonly<ModelProfile>,
    weights: Readonly<HeuristicWeights>,
    options: ModelAdapterOptions = {}
  ) {
    this.logger = options.logger ?? createLogger(`adapter:${family}`);
    this.heuristic = new HeuristicTokenEstimator(weights);
    this.cache = new LRUCache<string, number>({
      max: options.cacheSize ?? DEFAULT_CACHE_SIZE,
    });
    this.exactCounter =
      options.useExactTokenizer === false ? null : this.createExactCounter();
  }

  /**
   * `heuristic` once any count has been estimated, including texts the
   * exact tokenizer rejected.
   */
  get tokenizerMode(): TokenizerMode {
    return this.exactCounter && !this.degraded ? 'exact' : 'heuristic';
  }

  countTokens(text: string): number {
    if (text.length === 0) {
      return 0;
    }

    const cleaned = collapseWhitespace(text, false);
    const cached = this.cache.get(cleaned);
    if (cached !== undefined) {
      return cached;
    }

    const tokens = Math.max(1, this.countCleaned(cleaned));
    this.cache.set(cleaned, tokens);
    return tokens;
  }

  calculateCost(inputTokens: number, outputTokens = 0): number {
    const inputCost = (inputTokens / 1000) * this.profile.costPer1kInputTokens;
    const outputCost = (outputTokens / 1000) * this.profile.costPer1kOutputTokens;
    return inputCost + outputCost;
  }

  calculateCostReduction(tokenDelta: number): number {
    return (tokenDelta * this.profile.costPer1kInputTokens) / 1000;
  }

  estimateContextUsage(text: string): number {
    return this.countTokens(text) / this.profile.maxContextLength;
  }

  canFitInContext(text: string, reserveTokens = 1000): boolean {
    return this.countTokens(text) + reserveTokens <= this.profile.maxContextLength;
  }

  suggestOptimizations(text: string): OptimizationSuggestions {
    const currentTokens = this.countTokens(text);
    const contextUsage = currentTokens / this.profile.maxContextLength;
    const estimatedCost = this.calculateCost(currentTokens);
    const suggestions: ModelSuggestion[] = [];

    if (contextUsage > CONTEXT_WARNING_RATIO) {
      suggestions.push({
        type: 'context_warning',
        message: `Prompt uses more than ${CONTEXT_WARNING_RATIO * 100}% of the available context`,
        severity: 'high',
      });
    }

    if (estimatedCost > COST_WARNING_USD) {
      suggestions.push({
        type: 'cost_optimization',
        message: `Estimated cost: $${estimatedCost.toFixed(4)}. Consider optimizing to reduce cost`,
        severity: 'medium',
      });
    }

    suggestions.push(...this.familySuggestions(text, currentTokens));

    return {
      currentTokens,
      contextUsagePercent: contextUsage * 100,
      estimatedCost,
      suggestions,
    };
  }

  getModelInfo(): ModelInfo {
    return {
      modelName: this.profile.modelName,
      maxContextLength: this.profile.maxContextLength,
      costPer1kInput: this.profile.costPer1kInputTokens,
      costPer1kOutput: this.profile.costPer1kOutputTokens,
      adapterFamily: this.family,
      tokenizerMode: this.tokenizerMode,
    };
  }

  abstract optimizeForModel(text: string): string;

  free(): void {
    if (this.exactCounter) {
      this.exactCounter.free();
      this.exactCounter = null;
    }
    this.cache.clear();
  }

  /**
   * Hints beyond the generic context and cost warnings.
   */
  protected abstract familySuggestions(
    text: string,
    currentTokens: number
  ): ModelSuggestion[];

  /**
   * Remove "please could you" style openers, keeping the first letter's case.
   */
  protected stripCourtesyPreamble(text: string): string {
    const stripped = text.replace(COURTESY_PREAMBLE, '');
    return restoreLeadingCapital(text, stripped);
  }

  protected customFlag(name: string): boolean {
    return this.profile.customParams[name] === true;
  }

  private createExactCounter(): TokenCounter | null {
    const encoding = this.profile.tokenizerName;
    if (!isSupportedEncoding(encoding)) {
      return null;
    }

    try {
      return new TokenCounter(encoding);
    } catch (error) {
      this.logger.warn('Exact tokenizer unavailable, using heuristic estimate', {
        model: this.profile.modelName,
        encoding,
        error: describeError(error),
      });
      return null;
    }
  }

  private countCleaned(cleaned: string): number {
    if (!this.exactCounter) {
      return this.heuristic.estimate(cleaned);
    }

    try {
      return this.exactCounter.count(cleaned).tokens;
    } catch (error) {
      const context = { model: this.profile.modelName, error: describeError(error) };
      if (this.degraded) {
        this.logger.debug('Tokenizer rejected text, using heuristic estimate', context);
      } else {
        this.degraded = true;
        this.logger.warn('Tokenizer rejected text, using heuristic estimate', context);
      }
      return this.heuristic.estimate(cleaned);
    }
  }
}

/**
 * When a clean-up removed the opening words, capitalize the new opening
 * if the original text started with a capital.
 */
export function restoreLeadingCapital(original: string, updated: string): string {
  const first = original.trimStart().charAt(0);
  const trimmed = updated.trimStart();
  if (first === '' || first !== first.toUpperCase() || first === first.toLowerCase()) {
    return updated;
  }
  const leading = updated.slice(0, updated.length - trimmed.length);
  return leading + trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
}
