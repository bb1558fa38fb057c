/**
 * Interface for prompt optimization strategies.
 *
 * Strategies are stateless text transformers. Each one proposes a rewrite;
 * the PromptOptimizer decides whether the rewrite preserves enough meaning
 * to keep.
 *
 * @example
 * ```typescript
 * class UppercaseStrategy extends BaseStrategy {
 *   readonly name = 'uppercase';
 *   protected readonly description = 'Upper-cases the prompt';
 *
 *   protected transform(text: string): string {
 *     return text.toUpperCase();
 *   }
 *
 *   estimateReduction(): number {
 *     return 0.01;
 *   }
 *
 *   canApply(text: string): boolean {
 *     return text !== text.toUpperCase();
 *   }
 * }
 * ```
 */

import { OptimizationConfig } from '../validation/schemas.js';

export interface StrategyMetadata {
  name: string;
  description: string;
  config: OptimizationConfig;
}

export interface IOptimizationStrategy {
  /**
   * Unique name identifying this strategy.
   * Used for selection, logging and result tracking.
   */
  readonly name: string;

  readonly config: OptimizationConfig;

  /**
   * Rewrite the prompt.
   *
   * @throws {InvalidPromptError} When the prompt is empty or whitespace only
   */
  apply(text: string): string;

  /**
   * Expected fraction of tokens this strategy would remove. May be negative
   * for strategies that add structure.
   */
  estimateReduction(text: string): number;

  /**
   * Whether `apply` is expected to change the text at all.
   */
  canApply(text: string): boolean;

  getMetadata(): StrategyMetadata;
}
