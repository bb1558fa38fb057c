import { createAdapter } from '../adapters/index.js';
import { IModelAdapter } from '../interfaces/IModelAdapter.js';
import { createDefaultStrategies } from '../strategies/registry.js';
import { Logger, createLogger, isLogLevel } from '../core/logger.js';
import { PromptCondenserConfig } from '../validation/schemas.js';
import { OptimizeOptions, PromptOptimizer } from './PromptOptimizer.js';

export interface ConfiguredOptimizer {
  optimizer: PromptOptimizer;
  adapter: IModelAdapter;
  /** Per-call defaults from the `optimizer` section. */
  optimizeOptions: OptimizeOptions;
}

/**
 * Wire adapter, strategies and coordinator from a loaded configuration.
 *
 * @throws {InvalidConfigurationError} For an unknown model family or strategy
 */
export function createOptimizerFromConfig(
  config: PromptCondenserConfig,
  logger?: Logger
): ConfiguredOptimizer {
  const level = isLogLevel(config.logging.level) ? config.logging.level : undefined;
  const log = logger ?? createLogger('optimizer', level);

  const adapter = createAdapter(config.model.name, {
    useExactTokenizer: config.model.useExactTokenizer,
    logger: log,
  });
  const strategies = createDefaultStrategies(
    {
      aggressiveMode: config.strategies.aggressiveMode,
      preserveStructure: config.strategies.preserveStructure,
      customParams: config.strategies.customParams,
    },
    config.optimizer.strategies
  );
  const optimizer = new PromptOptimizer(strategies, adapter, {
    preserveMeaningThreshold: config.optimizer.preserveMeaningThreshold,
    logger: log,
  });

  const optimizeOptions: OptimizeOptions = {
    applyModelOptimizations: config.optimizer.applyModelOptimizations,
  };
  if (config.optimizer.targetReduction !== undefined) {
    optimizeOptions.targetReduction = config.optimizer.targetReduction;
  }

  return { optimizer, adapter, optimizeOptions };
}
