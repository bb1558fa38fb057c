/**
 * Zod schemas for strategy configuration, optimizer options and the
 * configuration file.
 */

import { z } from 'zod';
import { isLogLevel } from '../core/logger.js';

/** A ratio in [0, 1]. */
export const fractionSchema = z.number().min(0).max(1);
const fraction = fractionSchema;

const regexSource = z.string().refine(
  (source) => {
    try {
      new RegExp(source, 'iu');
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

export const optimizationConfigSchema = z
  .object({
    aggressiveMode: z.boolean().default(false),
    preserveStructure: z.boolean().default(true),
    /** Upper bound for `estimateReduction`; the pipeline target lives in the optimize options. */
    targetReduction: fraction.optional(),
    customParams: z.record(z.unknown()).default({}),
  })
  .strict();

export type OptimizationConfigInput = z.input<typeof optimizationConfigSchema>;

export type OptimizationConfig = Readonly<
  Omit<z.output<typeof optimizationConfigSchema>, 'customParams'> & {
    customParams: Readonly<Record<string, unknown>>;
  }
>;

/** Custom params shared by strategies that delete words. */
export const contextGuardParamsSchema = z.object({
  contextPatterns: z.array(regexSource).default([]),
});

export const semanticCompressionParamsSchema = contextGuardParamsSchema.extend({
  sentenceSimilarityThreshold: fraction.default(0.7),
});

export const tokenReductionParamsSchema = contextGuardParamsSchema.extend({
  abbreviations: z.boolean().default(true),
  contractions: z.boolean().default(true),
  symbols: z.boolean().default(true),
  elision: z.boolean().default(true),
  numbers: z.boolean().default(true),
});

export const structuralParamsSchema = z.object({
  sectionHeaders: z.boolean().default(true),
});

export const STRATEGY_NAMES = [
  'semantic-compression',
  'token-reduction',
  'structural-optimization',
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

export const optimizeOptionsSchema = z.object({
  targetReduction: fraction.optional(),
  strategies: z.array(z.string().min(1)).optional(),
  applyModelOptimizations: z.boolean().optional(),
});

const logLevel = z.string().refine(isLogLevel, {
  message: 'Expected one of debug, info, warn, error, silent',
});

export const fileConfigSchema = z.object({
  optimizer: z
    .object({
      preserveMeaningThreshold: fraction.default(0.85),
      strategies: z.array(z.enum(STRATEGY_NAMES)).default([...STRATEGY_NAMES]),
      targetReduction: fraction.optional(),
      applyModelOptimizations: z.boolean().default(false),
    })
    .default({}),
  strategies: z
    .object({
      aggressiveMode: z.boolean().default(false),
      preserveStructure: z.boolean().default(true),
      customParams: z.record(z.unknown()).default({}),
    })
    .default({}),
  model: z
    .object({
      name: z.string().min(1).default('gpt-3.5-turbo'),
      useExactTokenizer: z.boolean().default(true),
    })
    .default({}),
  logging: z
    .object({
      level: logLevel.default('info'),
    })
    .default({}),
});

export type FileConfigInput = z.input<typeof fileConfigSchema>;
export type PromptCondenserConfig = z.output<typeof fileConfigSchema>;
