import { IModelAdapter } from '../interfaces/IModelAdapter.js';
import { InvalidConfigurationError } from '../core/errors.js';
import { ModelAdapterOptions } from './BaseModelAdapter.js';
import { OpenAIAdapter } from './OpenAIAdapter.js';
import { ClaudeAdapter } from './ClaudeAdapter.js';

export { BaseModelAdapter, ModelAdapterOptions } from './BaseModelAdapter.js';
export { OpenAIAdapter } from './OpenAIAdapter.js';
export { ClaudeAdapter } from './ClaudeAdapter.js';
export {
  OPENAI_MODELS,
  OPENAI_DEFAULT_MODEL,
  CLAUDE_MODELS,
  CLAUDE_DEFAULT_MODEL,
  ProfileOverrides,
  listModels,
} from './model-catalog.js';

/**
 * Build the adapter for a model name, choosing the family from its prefix
 * (`gpt-*` or `claude-*`).
 *
 * @throws {InvalidConfigurationError} When the name matches no family
 */
export function createAdapter(
  modelName: string,
  options: ModelAdapterOptions = {}
): IModelAdapter {
  const normalized = modelName.trim().toLowerCase();

  if (normalized.startsWith('claude')) {
    return new ClaudeAdapter(normalized, options);
  }
  if (normalized.startsWith('gpt')) {
    return new OpenAIAdapter(normalized, options);
  }

  throw new InvalidConfigurationError(`No adapter for model "${modelName}"`, [
    'model.name: expected a gpt-* or claude-* model',
  ]);
}
