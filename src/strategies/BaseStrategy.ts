import { z } from 'zod';
import { IOptimizationStrategy, StrategyMetadata } from './IOptimizationStrategy.js';
import {
  OptimizationConfig,
  OptimizationConfigInput,
  optimizationConfigSchema,
} from '../validation/schemas.js';
import { validateConfig } from '../validation/validator.js';
import { InvalidPromptError } from '../core/errors.js';
import { normalizedWords } from '../utils/text-utils.js';

/**
 * Validate and freeze a strategy configuration.
 *
 * @throws {InvalidConfigurationError} If a field is out of range or unknown
 */
export function createOptimizationConfig(
  input: OptimizationConfigInput = {}
): OptimizationConfig {
  const parsed = validateConfig(optimizationConfigSchema, input, 'strategy config');
  return Object.freeze({
    ...parsed,
    customParams: Object.freeze({ ...parsed.customParams }),
  });
}

/**
 * Base class for the built-in strategies: config validation, input
 * validation and metadata. Subclasses implement `transform`.
 */
export abstract class BaseStrategy implements IOptimizationStrategy {
  abstract readonly name: string;
  protected abstract readonly description: string;
  readonly config: OptimizationConfig;

  constructor(config: OptimizationConfigInput = {}) {
    this.config = createOptimizationConfig(config);
  }

  apply(text: string): string {
    if (typeof text !== 'string' || text.trim().length === 0) {
      throw new InvalidPromptError();
    }
    return this.transform(text);
  }

  abstract estimateReduction(text: string): number;

  abstract canApply(text: string): boolean;

  getMetadata(): StrategyMetadata {
    return {
      name: this.name,
      description: this.description,
      config: this.config,
    };
  }

  protected abstract transform(text: string): string;

  /**
   * Parse this strategy's section of `customParams`, applying defaults.
   */
  protected params<T extends z.ZodTypeAny>(schema: T): z.infer<T> {
    return validateConfig(schema, this.config.customParams, `${this.name} customParams`);
  }

  /**
   * Cap an estimate at the strategy's ceiling and at `config.targetReduction`.
   */
  protected capEstimate(estimate: number, ceiling: number): number {
    return Math.min(estimate, ceiling, this.config.targetReduction ?? ceiling);
  }

  protected wordCount(text: string): number {
    return text.split(/\s+/).filter((word) => word.length > 0).length;
  }

  /**
   * True when every character of the word is a letter, so removing it
   * cannot drop attached punctuation.
   */
  protected isBareWord(word: string): boolean {
    return normalizedWords(word).join('') === word.toLowerCase();
  }
}
