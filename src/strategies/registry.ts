import { IOptimizationStrategy } from './IOptimizationStrategy.js';
import { SemanticCompressionStrategy } from './SemanticCompressionStrategy.js';
import { TokenReductionStrategy } from './TokenReductionStrategy.js';
import { StructuralOptimizationStrategy } from './StructuralOptimizationStrategy.js';
import { OptimizationConfigInput, STRATEGY_NAMES, StrategyName } from '../validation/schemas.js';
import { InvalidConfigurationError } from '../core/errors.js';

const FACTORIES: Record<StrategyName, (config: OptimizationConfigInput) => IOptimizationStrategy> = {
  'semantic-compression': (config) => new SemanticCompressionStrategy(config),
  'token-reduction': (config) => new TokenReductionStrategy(config),
  'structural-optimization': (config) => new StructuralOptimizationStrategy(config),
};

export function isStrategyName(name: unknown): name is StrategyName {
  return typeof name === 'string' && STRATEGY_NAMES.some((known) => known === name);
}

/**
 * Build a built-in strategy by name.
 *
 * @throws {InvalidConfigurationError} For an unknown name or invalid config
 */
export function createStrategy(
  name: string,
  config: OptimizationConfigInput = {}
): IOptimizationStrategy {
  if (!isStrategyName(name)) {
    throw new InvalidConfigurationError(`Unknown strategy: ${name}`, [
      `strategies: expected one of ${STRATEGY_NAMES.join(', ')}`,
    ]);
  }
  return FACTORIES[name](config);
}

/**
 * The built-in strategies in default pipeline order, sharing one config.
 */
export function createDefaultStrategies(
  config: OptimizationConfigInput = {},
  names: readonly string[] = STRATEGY_NAMES
): IOptimizationStrategy[] {
  return names.map((name) => createStrategy(name, config));
}
