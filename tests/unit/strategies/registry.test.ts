/**
 * Unit Tests for the strategy registry
 */

import { describe, it, expect } from '@jest/globals';
import {
  createStrategy,
  createDefaultStrategies,
  isStrategyName,
} from '../../../src/strategies/registry.js';
import { TokenReductionStrategy } from '../../../src/strategies/TokenReductionStrategy.js';
import { STRATEGY_NAMES } from '../../../src/validation/schemas.js';
import { InvalidConfigurationError } from '../../../src/core/errors.js';

describe('strategy registry', () => {
  it('should build strategies by name with the given config', () => {
    const strategy = createStrategy('token-reduction', { aggressiveMode: true });

    expect(strategy).toBeInstanceOf(TokenReductionStrategy);
    expect(strategy.config.aggressiveMode).toBe(true);
  });

  it('should reject unknown names', () => {
    expect(() => createStrategy('summarization')).toThrow(InvalidConfigurationError);
    expect(isStrategyName('summarization')).toBe(false);
    expect(isStrategyName('semantic-compression')).toBe(true);
  });

  it('should build the default pipeline in order', () => {
    expect(createDefaultStrategies().map((s) => s.name)).toEqual([...STRATEGY_NAMES]);
  });

  it('should build a subset in the order given', () => {
    expect(
      createDefaultStrategies({}, ['structural-optimization', 'semantic-compression']).map(
        (s) => s.name
      )
    ).toEqual(['structural-optimization', 'semantic-compression']);
  });
});
