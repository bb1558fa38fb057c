import { IOptimizationStrategy } from '../strategies/IOptimizationStrategy.js';
import { IModelAdapter, TokenizerMode } from '../interfaces/IModelAdapter.js';
import { SemanticMetrics, SimilarityMethod } from '../metrics/SemanticMetrics.js';
import { Logger, createLogger } from '../core/logger.js';
import { describeError } from '../core/errors.js';
import { fractionSchema, optimizeOptionsSchema } from '../validation/schemas.js';
import { validateConfig } from '../validation/validator.js';

/**
 * Outcome of one pipeline step:
 * - `accepted`: output kept, similarity at or above the threshold
 * - `rejected`: output discarded, similarity below the threshold
 * - `skipped`: not run (not applicable, target reached) or no change
 * - `failed`: the strategy threw; text left unchanged
 */
export type StepOutcome = 'accepted' | 'rejected' | 'skipped' | 'failed';

/**
 * Result from a single strategy in the optimization pipeline.
 */
export interface StrategyStep {
  /**
   * Name of the strategy (or `model-specific` for the adapter step)
   */
  strategyName: string;

  outcome: StepOutcome;

  /**
   * Tokens in the current text before this step
   */
  tokensIn: number;

  /**
   * Tokens after this step; equals tokensIn unless the step was accepted
   */
  tokensOut: number;

  /**
   * Similarity of the proposed text to the original prompt
   */
  similarity?: number;

  /**
   * Error message when the strategy threw
   */
  error?: string;
}

export interface OptimizationMetadata {
  originalTokens: number;
  optimizedTokens: number;
  /**
   * Fraction of tokens saved, 0 when the prompt had no tokens
   */
  reductionPercentage: number;
  /**
   * How tokens were counted; `word-count` when no adapter was supplied
   */
  tokenCountMode: TokenizerMode | 'word-count';
  similarityMethod: SimilarityMethod;
  /**
   * Whether `targetReduction` was reached; true when no target was set
   */
  targetReached: boolean;
}

/**
 * Complete, frozen result of one optimization.
 */
export interface OptimizationResult {
  readonly originalPrompt: string;
  readonly optimizedPrompt: string;
  /**
   * originalTokens - optimizedTokens (negative when the prompt grew)
   */
  readonly tokenReduction: number;
  /**
   * Similarity of the optimized prompt to the original, in [0, 1]
   */
  readonly semanticSimilarity: number;
  /**
   * Input-side USD saved
   */
  readonly costReduction: number;
  readonly optimizationTimeMs: number;
  /**
   * Strategies whose output passed the meaning-preservation gate, in order
   */
  readonly strategiesUsed: readonly string[];
  readonly steps: readonly StrategyStep[];
  readonly metadata: Readonly<OptimizationMetadata>;
}

export interface OptimizeOptions {
  /**
   * Stop running strategies once this fraction of tokens has been removed
   */
  targetReduction?: number;
  /**
   * Run only these strategies (pipeline order is kept)
   */
  strategies?: string[];
  /**
   * Run the adapter's model-specific clean-ups as a final gated step
   */
  applyModelOptimizations?: boolean;
  /**
   * Checked between steps; an aborted signal rejects with an AbortError
   */
  signal?: AbortSignal;
}

export interface PromptOptimizerOptions {
  /**
   * Minimum similarity to the original prompt for a step to be kept
   * @default 0.85
   */
  preserveMeaningThreshold?: number;
  logger?: Logger;
  semanticMetrics?: SemanticMetrics;
}

export const MODEL_SPECIFIC_STEP = 'model-specific';

/** USD per token when no adapter prices the prompt. */
const GENERIC_COST_PER_TOKEN = 0.000001;

function wordCount(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) {
      throw reason;
    }
    const error = new Error('Optimization aborted');
    error.name = 'AbortError';
    throw error;
  }
}

/**
 * Runs a pipeline of strategies behind a meaning-preservation gate.
 *
 * Each applicable strategy proposes a rewrite of the current text. The
 * proposal is compared with the ORIGINAL prompt, not the previous step, so
 * small losses cannot add up unnoticed; it is kept only when the
 * similarity reaches the threshold. A strategy that throws is recorded as
 * `failed` and the pipeline carries on.
 *
 * @example
 * ```typescript
 * const adapter = createAdapter('gpt-4');
 * const optimizer = new PromptOptimizer(createDefaultStrategies(), adapter);
 *
 * const result = await optimizer.optimize(prompt, { targetReduction: 0.2 });
 * console.log(`Saved ${result.tokenReduction} tokens ($${result.costReduction})`);
 * result.steps.forEach((step) => {
 *   console.log(`  ${step.strategyName}: ${step.outcome}`);
 * });
 * ```
 */
export class PromptOptimizer {
  readonly preserveMeaningThreshold: number;
  private readonly strategies: IOptimizationStrategy[];
  private readonly logger: Logger;
  private readonly semanticMetrics: SemanticMetrics;

  /**
   * @param strategies - Ordered strategies to apply
   * @param adapter - Model adapter for token counts and pricing
   */
  constructor(
    strategies: IOptimizationStrategy[],
    private readonly adapter?: IModelAdapter,
    options: PromptOptimizerOptions = {}
  ) {
    this.strategies = [...strategies];
    this.preserveMeaningThreshold = validateConfig(
      fractionSchema,
      options.preserveMeaningThreshold ?? 0.85,
      'preserveMeaningThreshold'
    );
    this.logger = options.logger ?? createLogger('optimizer');
    this.semanticMetrics = options.semanticMetrics ?? new SemanticMetrics({ logger: this.logger });
  }

  /**
   * Optimize a prompt through the strategy pipeline.
   *
   * @throws {InvalidConfigurationError} If the options are invalid
   * @throws {Error} AbortError when `options.signal` is aborted
   */
  async optimize(prompt: string, options: OptimizeOptions = {}): Promise<OptimizationResult> {
    const { signal, ...rest } = options;
    const validated = validateConfig(optimizeOptionsSchema, rest, 'optimize options');
    throwIfAborted(signal);

    const startTime = Date.now();
    const originalTokens = this.countTokens(prompt);
    const target = validated.targetReduction;
    const steps: StrategyStep[] = [];
    const strategiesUsed: string[] = [];
    let similarityMethod: SimilarityMethod = 'tfidf';
    let current = prompt;
    let currentTokens = originalTokens;

    this.logger.prompt('original', prompt);

    const gate = (name: string, propose: () => string): void => {
      const tokensIn = currentTokens;
      let candidate: string;
      try {
        candidate = propose();
      } catch (error) {
        this.logger.warn('Strategy failed, keeping previous text', {
          strategy: name,
          error: describeError(error),
        });
        steps.push({
          strategyName: name,
          outcome: 'failed',
          tokensIn,
          tokensOut: tokensIn,
          error: describeError(error),
        });
        return;
      }

      if (candidate === current) {
        steps.push({ strategyName: name, outcome: 'skipped', tokensIn, tokensOut: tokensIn });
        return;
      }

      const comparison = this.semanticMetrics.compareTexts(prompt, candidate);
      if (comparison.method === 'jaccard') {
        similarityMethod = 'jaccard';
      }

      if (comparison.score >= this.preserveMeaningThreshold) {
        current = candidate;
        currentTokens = this.countTokens(candidate);
        strategiesUsed.push(name);
        steps.push({
          strategyName: name,
          outcome: 'accepted',
          tokensIn,
          tokensOut: currentTokens,
          similarity: comparison.score,
        });
        this.logger.debug('Step accepted', { strategy: name, similarity: comparison.score });
      } else {
        steps.push({
          strategyName: name,
          outcome: 'rejected',
          tokensIn,
          tokensOut: tokensIn,
          similarity: comparison.score,
        });
        this.logger.debug('Step rejected', { strategy: name, similarity: comparison.score });
      }
    };

    for (const strategy of this.selectStrategies(validated.strategies)) {
      throwIfAborted(signal);

      if (this.reachedTarget(originalTokens, currentTokens, target)) {
        steps.push({
          strategyName: strategy.name,
          outcome: 'skipped',
          tokensIn: currentTokens,
          tokensOut: currentTokens,
        });
        continue;
      }

      let applicable: boolean;
      try {
        applicable = strategy.canApply(current);
      } catch (error) {
        gate(strategy.name, () => {
          throw error;
        });
        continue;
      }

      if (!applicable) {
        steps.push({
          strategyName: strategy.name,
          outcome: 'skipped',
          tokensIn: currentTokens,
          tokensOut: currentTokens,
        });
        continue;
      }

      gate(strategy.name, () => strategy.apply(current));
    }

    const adapter = this.adapter;
    if (validated.applyModelOptimizations && adapter) {
      throwIfAborted(signal);
      gate(MODEL_SPECIFIC_STEP, () => adapter.optimizeForModel(current));
    }

    const optimizedTokens = currentTokens;
    const tokenReduction = originalTokens - optimizedTokens;
    // Unchanged text is identical to itself; skip the float round trip.
    const semanticSimilarity =
      current === prompt && prompt.length > 0
        ? 1
        : this.semanticMetrics.calculateSimilarity(prompt, current);

    this.logger.prompt('optimized', current);
    this.logger.info('Optimization complete', {
      originalTokens,
      optimizedTokens,
      strategiesUsed,
    });

    return Object.freeze({
      originalPrompt: prompt,
      optimizedPrompt: current,
      tokenReduction,
      semanticSimilarity,
      costReduction: this.costOf(tokenReduction),
      optimizationTimeMs: Date.now() - startTime,
      strategiesUsed: Object.freeze(strategiesUsed),
      steps: Object.freeze(steps.map((step) => Object.freeze(step))),
      metadata: Object.freeze({
        originalTokens,
        optimizedTokens,
        reductionPercentage: originalTokens > 0 ? tokenReduction / originalTokens : 0,
        tokenCountMode: this.adapter ? this.adapter.tokenizerMode : 'word-count',
        similarityMethod,
        targetReached: this.reachedTarget(originalTokens, optimizedTokens, target ?? 0),
      }),
    });
  }

  /**
   * Optimize several prompts independently. Results keep the input order.
   */
  async batchOptimize(
    prompts: readonly string[],
    options: OptimizeOptions = {}
  ): Promise<OptimizationResult[]> {
    return Promise.all(prompts.map((prompt) => this.optimize(prompt, options)));
  }

  addStrategy(strategy: IOptimizationStrategy): void {
    this.strategies.push(strategy);
  }

  /**
   * @returns true when a strategy with that name was removed
   */
  removeStrategy(name: string): boolean {
    const index = this.strategies.findIndex((strategy) => strategy.name === name);
    if (index === -1) {
      return false;
    }
    this.strategies.splice(index, 1);
    return true;
  }

  /**
   * Get the ordered list of strategies in this optimizer's pipeline.
   *
   * @returns Array of strategy names in execution order
   */
  getStrategyNames(): string[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  getStrategyCount(): number {
    return this.strategies.length;
  }

  private selectStrategies(names: readonly string[] | undefined): IOptimizationStrategy[] {
    if (!names) {
      return [...this.strategies];
    }
    const unknown = names.filter((name) => !this.strategies.some((s) => s.name === name));
    if (unknown.length > 0) {
      this.logger.warn('Ignoring unknown strategies', { strategies: unknown });
    }
    return this.strategies.filter((strategy) => names.includes(strategy.name));
  }

  private countTokens(text: string): number {
    return this.adapter ? this.adapter.countTokens(text) : wordCount(text);
  }

  private costOf(tokens: number): number {
    return this.adapter
      ? this.adapter.calculateCostReduction(tokens)
      : tokens * GENERIC_COST_PER_TOKEN;
  }

  private reachedTarget(
    originalTokens: number,
    currentTokens: number,
    target: number | undefined
  ): boolean {
    if (target === undefined) {
      return false;
    }
    if (originalTokens === 0) {
      return target === 0;
    }
    return (originalTokens - currentTokens) / originalTokens >= target;
  }
}
