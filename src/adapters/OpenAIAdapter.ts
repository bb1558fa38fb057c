import { BaseModelAdapter, ModelAdapterOptions, restoreLeadingCapital } from './BaseModelAdapter.js';
import { OPENAI_DEFAULT_MODEL, OPENAI_MODELS, resolveProfile } from './model-catalog.js';
import { GPT_HEURISTIC_WEIGHTS } from '../core/heuristic-estimator.js';
import { ModelSuggestion } from '../interfaces/IModelAdapter.js';
import { countMatches } from '../utils/text-utils.js';

const CHAT_PREAMBLES: RegExp[] = [
  /\bI would like you to\s*/gi,
  /\bcould you please\s*/gi,
  /\bwould you mind\s*/gi,
  /,?\s*\bif possible\b/gi,
];

const THANKS_SENTENCE = /\b(?:thank you|thanks)\b[^.!\n]*[.!]\s*/gi;
const SPECIAL_TOKEN = /<\|[^|>]*\|>/g;

/**
 * Adapter for OpenAI GPT chat models.
 *
 * Counts with the model's tiktoken encoding (cl100k_base or o200k_base).
 *
 * @example
 * ```typescript
 * const adapter = new OpenAIAdapter('gpt-4');
 * adapter.countTokens('Summarize the report.');
 * adapter.calculateCost(1000, 500); // 0.06
 * adapter.free();
 * ```
 */
export class OpenAIAdapter extends BaseModelAdapter {
  constructor(modelName: string = OPENAI_DEFAULT_MODEL, options: ModelAdapterOptions = {}) {
    const { profile, known } = resolveProfile(
      OPENAI_MODELS,
      OPENAI_DEFAULT_MODEL,
      modelName,
      options.profileOverrides
    );
    super('openai', profile, GPT_HEURISTIC_WEIGHTS, options);

    if (!known) {
      this.logger.warn('Unknown OpenAI model, using default profile', {
        requested: modelName,
        model: profile.modelName,
      });
    }
  }

  optimizeForModel(text: string): string {
    let optimized = this.stripCourtesyPreamble(text);

    for (const pattern of CHAT_PREAMBLES) {
      optimized = optimized.replace(pattern, '');
    }
    optimized = optimized.replace(THANKS_SENTENCE, '');
    optimized = optimized.replace(SPECIAL_TOKEN, '');

    // Spaces before punctuation and around apostrophes cost extra tokens.
    optimized = optimized
      .replace(/[ \t]+([,.!?;:])/g, '$1')
      .replace(/[ \t]+'[ \t]*([st])\b/g, "'$1");

    optimized = optimized
      .split(/\n\s*\n/)
      .map((section) => section.replace(/[ \t]{2,}/g, ' ').trim())
      .filter((section) => section.length > 0)
      .join('\n\n');

    return restoreLeadingCapital(text, optimized).trim();
  }

  protected familySuggestions(text: string, currentTokens: number): ModelSuggestion[] {
    const suggestions: ModelSuggestion[] = [];
    const model = this.profile.modelName;

    if (model === 'gpt-4' && currentTokens > 6000) {
      suggestions.push({
        type: 'model_recommendation',
        message: 'Consider gpt-4-turbo for long prompts to reduce cost',
        severity: 'medium',
      });
    }

    if (model === 'gpt-3.5-turbo' && currentTokens > 3000) {
      suggestions.push({
        type: 'context_warning',
        message: 'Prompt is close to the gpt-3.5-turbo limit. Consider gpt-3.5-turbo-16k',
        severity: 'high',
      });
    }

    if (countMatches(text, /\bplease\b/i) > 2) {
      suggestions.push({
        type: 'format_optimization',
        message: 'Reduce repeated courtesy words ("please") for a more efficient prompt',
        severity: 'low',
      });
    }

    return suggestions;
  }
}
