/**
 * Configuration management for prompt-condenser
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import {
  FileConfigInput,
  PromptCondenserConfig,
  fileConfigSchema,
} from '../validation/schemas.js';
import { validateConfig } from '../validation/validator.js';
import { describeError } from './errors.js';
import { Logger, createLogger } from './logger.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.prompt-condenser', 'config.json');

export function defaultConfig(): PromptCondenserConfig {
  return validateConfig(fileConfigSchema, {}, 'default config');
}

/**
 * Loads `config.json`, merges it section by section over the defaults and
 * validates the result.
 *
 * Path resolution: explicit path, then PROMPT_CONDENSER_CONFIG, then
 * `~/.prompt-condenser/config.json`. PROMPT_CONDENSER_MODEL and
 * PROMPT_CONDENSER_LOG_LEVEL override the file.
 */
export class ConfigManager {
  private config: PromptCondenserConfig;
  private readonly configPath: string;

  constructor(
    configPath?: string,
    private readonly logger: Logger = createLogger('config')
  ) {
    this.configPath =
      configPath || process.env.PROMPT_CONDENSER_CONFIG || DEFAULT_CONFIG_PATH;
    this.config = this.applyEnvironment(this.loadConfig());
  }

  private loadConfig(): PromptCondenserConfig {
    if (!existsSync(this.configPath)) {
      return defaultConfig();
    }

    try {
      const fileContent = readFileSync(this.configPath, 'utf-8');
      const userConfig: unknown = JSON.parse(fileContent);
      return validateConfig(fileConfigSchema, userConfig, this.configPath);
    } catch (error) {
      this.logger.warn('Failed to load config, using defaults', {
        path: this.configPath,
        error: describeError(error),
      });
      return defaultConfig();
    }
  }

  private applyEnvironment(config: PromptCondenserConfig): PromptCondenserConfig {
    const model = process.env.PROMPT_CONDENSER_MODEL?.trim();
    const level = process.env.PROMPT_CONDENSER_LOG_LEVEL?.trim().toLowerCase();
    const overrides: FileConfigInput = {};
    if (model) {
      overrides.model = { name: model };
    }
    if (level) {
      overrides.logging = { level };
    }

    try {
      return this.mergeConfig(config, overrides);
    } catch (error) {
      this.logger.warn('Ignoring invalid environment override', {
        error: describeError(error),
      });
      return config;
    }
  }

  private mergeConfig(
    base: PromptCondenserConfig,
    updates: FileConfigInput
  ): PromptCondenserConfig {
    return validateConfig(
      fileConfigSchema,
      {
        optimizer: { ...base.optimizer, ...updates.optimizer },
        strategies: {
          ...base.strategies,
          ...updates.strategies,
          customParams: {
            ...base.strategies.customParams,
            ...updates.strategies?.customParams,
          },
        },
        model: { ...base.model, ...updates.model },
        logging: { ...base.logging, ...updates.logging },
      },
      'config update'
    );
  }

  getConfigPath(): string {
    return this.configPath;
  }

  get(): PromptCondenserConfig {
    return structuredClone(this.config);
  }

  /**
   * @throws {InvalidConfigurationError} If the merged config is invalid; the
   * current config is left as it was
   */
  update(updates: FileConfigInput): void {
    this.config = this.mergeConfig(this.config, updates);
  }
}
