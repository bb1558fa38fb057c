/**
 * prompt-condenser: shrink LLM prompts through a gated pipeline of text
 * strategies.
 *
 * @example
 * ```typescript
 * import { ConfigManager, createOptimizerFromConfig } from 'prompt-condenser';
 *
 * const { optimizer, optimizeOptions } = createOptimizerFromConfig(new ConfigManager().get());
 * const result = await optimizer.optimize(prompt, optimizeOptions);
 * ```
 */

export * from './adapters/index.js';
export * from './interfaces/IModelAdapter.js';
export * from './interfaces/ITokenCounter.js';
export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/config.js';
export * from './core/heuristic-estimator.js';
export * from './core/token-counter.js';
export * from './metrics/TokenMetrics.js';
export * from './metrics/SemanticMetrics.js';
export * from './metrics/tfidf.js';
export * from './strategies/IOptimizationStrategy.js';
export * from './strategies/BaseStrategy.js';
export * from './strategies/SemanticCompressionStrategy.js';
export * from './strategies/TokenReductionStrategy.js';
export * from './strategies/StructuralOptimizationStrategy.js';
export * from './strategies/registry.js';
export * from './services/PromptOptimizer.js';
export * from './services/optimizer-factory.js';
export * from './validation/schemas.js';
export * from './validation/validator.js';
