import { ModelProfile } from '../interfaces/IModelAdapter.js';

/**
 * Static pricing and context-window catalog, USD per 1K tokens.
 */

function profile(
  entry: Omit<ModelProfile, 'specialTokens' | 'customParams'> &
    Partial<Pick<ModelProfile, 'specialTokens' | 'customParams'>>
): Readonly<ModelProfile> {
  return Object.freeze({
    ...entry,
    specialTokens: Object.freeze({ ...entry.specialTokens }),
    customParams: Object.freeze({ ...entry.customParams }),
  });
}

const OPENAI_SPECIAL_TOKENS = {
  endOfText: '<|endoftext|>',
};

export const OPENAI_DEFAULT_MODEL = 'gpt-3.5-turbo';

export const OPENAI_MODELS: Readonly<Record<string, Readonly<ModelProfile>>> =
  Object.freeze({
    'gpt-3.5-turbo': profile({
      modelName: 'gpt-3.5-turbo',
      maxContextLength: 4096,
      costPer1kInputTokens: 0.0015,
      costPer1kOutputTokens: 0.002,
      tokenizerName: 'cl100k_base',
      specialTokens: OPENAI_SPECIAL_TOKENS,
    }),
    'gpt-3.5-turbo-16k': profile({
      modelName: 'gpt-3.5-turbo-16k',
      maxContextLength: 16384,
      costPer1kInputTokens: 0.003,
      costPer1kOutputTokens: 0.004,
      tokenizerName: 'cl100k_base',
      specialTokens: OPENAI_SPECIAL_TOKENS,
    }),
    'gpt-4': profile({
      modelName: 'gpt-4',
      maxContextLength: 8192,
      costPer1kInputTokens: 0.03,
      costPer1kOutputTokens: 0.06,
      tokenizerName: 'cl100k_base',
      specialTokens: OPENAI_SPECIAL_TOKENS,
    }),
    'gpt-4-turbo': profile({
      modelName: 'gpt-4-turbo',
      maxContextLength: 128000,
      costPer1kInputTokens: 0.01,
      costPer1kOutputTokens: 0.03,
      tokenizerName: 'cl100k_base',
      specialTokens: OPENAI_SPECIAL_TOKENS,
    }),
    'gpt-4o': profile({
      modelName: 'gpt-4o',
      maxContextLength: 128000,
      costPer1kInputTokens: 0.005,
      costPer1kOutputTokens: 0.015,
      tokenizerName: 'o200k_base',
      specialTokens: OPENAI_SPECIAL_TOKENS,
    }),
    'gpt-4o-mini': profile({
      modelName: 'gpt-4o-mini',
      maxContextLength: 128000,
      costPer1kInputTokens: 0.00015,
      costPer1kOutputTokens: 0.0006,
      tokenizerName: 'o200k_base',
      specialTokens: OPENAI_SPECIAL_TOKENS,
    }),
  });

export const CLAUDE_DEFAULT_MODEL = 'claude-3-sonnet';

// No public tokenizer: `tokenizerName` is a label only.
const CLAUDE_CUSTOM_PARAMS = {
  useXmlTags: false,
  encourageReasoning: false,
};

export const CLAUDE_MODELS: Readonly<Record<string, Readonly<ModelProfile>>> =
  Object.freeze({
    'claude-2': profile({
      modelName: 'claude-2',
      maxContextLength: 100000,
      costPer1kInputTokens: 0.008,
      costPer1kOutputTokens: 0.024,
      tokenizerName: 'claude',
      customParams: CLAUDE_CUSTOM_PARAMS,
    }),
    'claude-2.1': profile({
      modelName: 'claude-2.1',
      maxContextLength: 200000,
      costPer1kInputTokens: 0.008,
      costPer1kOutputTokens: 0.024,
      tokenizerName: 'claude',
      customParams: CLAUDE_CUSTOM_PARAMS,
    }),
    'claude-3-haiku': profile({
      modelName: 'claude-3-haiku',
      maxContextLength: 200000,
      costPer1kInputTokens: 0.00025,
      costPer1kOutputTokens: 0.00125,
      tokenizerName: 'claude',
      customParams: CLAUDE_CUSTOM_PARAMS,
    }),
    'claude-3-sonnet': profile({
      modelName: 'claude-3-sonnet',
      maxContextLength: 200000,
      costPer1kInputTokens: 0.003,
      costPer1kOutputTokens: 0.015,
      tokenizerName: 'claude',
      customParams: CLAUDE_CUSTOM_PARAMS,
    }),
    'claude-3-opus': profile({
      modelName: 'claude-3-opus',
      maxContextLength: 200000,
      costPer1kInputTokens: 0.015,
      costPer1kOutputTokens: 0.075,
      tokenizerName: 'claude',
      customParams: CLAUDE_CUSTOM_PARAMS,
    }),
    'claude-3.5-sonnet': profile({
      modelName: 'claude-3.5-sonnet',
      maxContextLength: 200000,
      costPer1kInputTokens: 0.003,
      costPer1kOutputTokens: 0.015,
      tokenizerName: 'claude',
      customParams: CLAUDE_CUSTOM_PARAMS,
    }),
  });

/**
 * Profile overrides a caller may pass to an adapter. `customParams` is
 * merged over the catalog entry's; every other field replaces it.
 */
export type ProfileOverrides = Partial<
  Omit<ModelProfile, 'modelName' | 'specialTokens'>
>;

/**
 * Look up a model in a family catalog, falling back to the family default.
 *
 * @returns the resolved profile and whether the requested name was known
 */
export function resolveProfile(
  catalog: Readonly<Record<string, Readonly<ModelProfile>>>,
  defaultModel: string,
  modelName: string,
  overrides: ProfileOverrides = {}
): { profile: Readonly<ModelProfile>; known: boolean } {
  const known = Object.prototype.hasOwnProperty.call(catalog, modelName);
  const base = known ? catalog[modelName] : catalog[defaultModel];
  if (base === undefined) {
    throw new Error(`Model catalog has no entry for default model "${defaultModel}"`);
  }

  return {
    known,
    profile: profile({
      ...base,
      ...overrides,
      specialTokens: base.specialTokens,
      customParams: { ...base.customParams, ...overrides.customParams },
    }),
  };
}

export function listModels(
  catalog: Readonly<Record<string, Readonly<ModelProfile>>>
): string[] {
  return Object.keys(catalog);
}
