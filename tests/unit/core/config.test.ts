/**
 * Unit Tests for ConfigManager and createOptimizerFromConfig
 *
 * Tests cover:
 * - Defaults when no file exists
 * - Merging a file over defaults
 * - Invalid files and environment overrides
 * - Updates and copies
 * - Wiring an optimizer from a config
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigManager, defaultConfig } from '../../../src/core/config.js';
import { createOptimizerFromConfig } from '../../../src/services/optimizer-factory.js';
import { InvalidConfigurationError } from '../../../src/core/errors.js';
import { Logger, silentLogger } from '../../../src/core/logger.js';

const ENV_KEYS = [
  'PROMPT_CONDENSER_CONFIG',
  'PROMPT_CONDENSER_MODEL',
  'PROMPT_CONDENSER_LOG_LEVEL',
] as const;

function mockLogger() {
  const warn = jest.fn<Logger['warn']>();
  const logger: Logger = { ...silentLogger, warn };
  return { logger, warn };
}

describe('ConfigManager', () => {
  let dir: string;
  const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'prompt-condenser-'));
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  const writeConfig = (content: string): string => {
    const path = join(dir, 'config.json');
    writeFileSync(path, content);
    return path;
  };

  describe('Loading', () => {
    it('should use defaults when the file does not exist', () => {
      const manager = new ConfigManager(join(dir, 'missing.json'), silentLogger);

      expect(manager.get()).toEqual(defaultConfig());
      expect(manager.get().model.name).toBe('gpt-3.5-turbo');
    });

    it('should merge the file over defaults', () => {
      const path = writeConfig(
        JSON.stringify({ model: { name: 'claude-3-haiku' }, optimizer: { targetReduction: 0.3 } })
      );

      const config = new ConfigManager(path, silentLogger).get();

      expect(config.model).toEqual({ name: 'claude-3-haiku', useExactTokenizer: true });
      expect(config.optimizer.targetReduction).toBe(0.3);
      expect(config.optimizer.preserveMeaningThreshold).toBe(0.85);
    });

    it('should fall back to defaults for an invalid file', () => {
      const { logger, warn } = mockLogger();
      const path = writeConfig(JSON.stringify({ optimizer: { preserveMeaningThreshold: 5 } }));

      const config = new ConfigManager(path, logger).get();

      expect(config).toEqual(defaultConfig());
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should fall back to defaults for malformed JSON', () => {
      const { logger, warn } = mockLogger();
      const path = writeConfig('{ not json');

      expect(new ConfigManager(path, logger).get()).toEqual(defaultConfig());
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should read the path from the environment', () => {
      const path = writeConfig(JSON.stringify({ logging: { level: 'warn' } }));
      process.env.PROMPT_CONDENSER_CONFIG = path;

      const manager = new ConfigManager(undefined, silentLogger);

      expect(manager.getConfigPath()).toBe(path);
      expect(manager.get().logging.level).toBe('warn');
    });
  });

  describe('Environment Overrides', () => {
    it('should override the model and log level', () => {
      process.env.PROMPT_CONDENSER_MODEL = 'gpt-4';
      process.env.PROMPT_CONDENSER_LOG_LEVEL = 'DEBUG';

      const config = new ConfigManager(join(dir, 'missing.json'), silentLogger).get();

      expect(config.model.name).toBe('gpt-4');
      expect(config.logging.level).toBe('debug');
    });

    it('should ignore an invalid override', () => {
      const { logger, warn } = mockLogger();
      process.env.PROMPT_CONDENSER_LOG_LEVEL = 'loud';

      const config = new ConfigManager(join(dir, 'missing.json'), logger).get();

      expect(config.logging.level).toBe('info');
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('Updates', () => {
    it('should merge updates section by section', () => {
      const manager = new ConfigManager(join(dir, 'missing.json'), silentLogger);

      manager.update({ strategies: { aggressiveMode: true } });

      expect(manager.get().strategies).toEqual({
        aggressiveMode: true,
        preserveStructure: true,
        customParams: {},
      });
    });

    it('should keep the current config when an update is invalid', () => {
      const manager = new ConfigManager(join(dir, 'missing.json'), silentLogger);

      expect(() => manager.update({ optimizer: { preserveMeaningThreshold: -1 } })).toThrow(
        InvalidConfigurationError
      );
      expect(manager.get().optimizer.preserveMeaningThreshold).toBe(0.85);
    });

    it('should hand out copies', () => {
      const manager = new ConfigManager(join(dir, 'missing.json'), silentLogger);

      manager.get().optimizer.strategies.pop();

      expect(manager.get().optimizer.strategies).toHaveLength(3);
    });
  });
});

describe('createOptimizerFromConfig', () => {
  it('should wire adapter, strategies and per-call options', () => {
    const config = defaultConfig();
    config.model.useExactTokenizer = false;
    config.optimizer.strategies = ['token-reduction'];
    config.optimizer.targetReduction = 0.1;

    const { optimizer, adapter, optimizeOptions } = createOptimizerFromConfig(
      config,
      silentLogger
    );

    expect(adapter.family).toBe('openai');
    expect(adapter.tokenizerMode).toBe('heuristic');
    expect(optimizer.getStrategyNames()).toEqual(['token-reduction']);
    expect(optimizer.preserveMeaningThreshold).toBe(0.85);
    expect(optimizeOptions).toEqual({ applyModelOptimizations: false, targetReduction: 0.1 });
  });

  it('should reject unsupported model families', () => {
    const config = defaultConfig();
    config.model.name = 'llama-3';

    expect(() => createOptimizerFromConfig(config, silentLogger)).toThrow(
      InvalidConfigurationError
    );
  });
});
