import { BaseModelAdapter, ModelAdapterOptions, restoreLeadingCapital } from './BaseModelAdapter.js';
import { CLAUDE_DEFAULT_MODEL, CLAUDE_MODELS, resolveProfile } from './model-catalog.js';
import { CLAUDE_HEURISTIC_WEIGHTS } from '../core/heuristic-estimator.js';
import { ModelSuggestion } from '../interfaces/IModelAdapter.js';
import { wholeWordPattern } from '../utils/text-utils.js';

const DIRECT_INSTRUCTION_OPENERS: RegExp[] = [
  /\bI would like you to\s+/gi,
  /\bI need you to\s+/gi,
  /\b(?:can|could) you\s+/gi,
];

const MARKUP_TAG = /<[^<>]+>/;
const STEP_BY_STEP = /step[- ]by[- ]step/i;
const REASONING_PROMPT = '\n\nThink step by step.';

const ANALYSIS_KEYWORDS = [
  'analyze',
  'explain',
  'reasoning',
  'why',
  'analizza',
  'spiega',
  'ragionamento',
  'perché',
].map(wholeWordPattern);

type SectionTag = 'context' | 'example' | 'instruction';

function sectionTag(section: string, index: number): SectionTag | null {
  const lower = section.toLowerCase();
  if (index === 0 || lower.includes('context') || lower.includes('background')) {
    return 'context';
  }
  if (lower.includes('example') || lower.includes('instance')) {
    return 'example';
  }
  if (lower.includes('instruction') || lower.includes('task')) {
    return 'instruction';
  }
  return null;
}

function splitSections(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((section) => section.trim())
    .filter((section) => section.length > 0);
}

function hasAnalysisRequest(text: string): boolean {
  return ANALYSIS_KEYWORDS.some((pattern) => {
    pattern.lastIndex = 0;
    return pattern.test(text);
  });
}

/**
 * Adapter for Anthropic Claude models.
 *
 * Claude publishes no tokenizer, so counts always come from the heuristic
 * estimator with Claude weights (markup tags are weighted).
 *
 * Profile custom params:
 * - `useXmlTags`: wrap the sections of multi-part prompts in
 *   `<context>`, `<example>` or `<instruction>` tags
 * - `encourageReasoning`: append a step-by-step cue to analysis requests
 */
export class ClaudeAdapter extends BaseModelAdapter {
  constructor(modelName: string = CLAUDE_DEFAULT_MODEL, options: ModelAdapterOptions = {}) {
    const { profile, known } = resolveProfile(
      CLAUDE_MODELS,
      CLAUDE_DEFAULT_MODEL,
      modelName,
      options.profileOverrides
    );
    super('claude', profile, CLAUDE_HEURISTIC_WEIGHTS, options);

    if (!known) {
      this.logger.warn('Unknown Claude model, using default profile', {
        requested: modelName,
        model: profile.modelName,
      });
    }
  }

  optimizeForModel(text: string): string {
    let optimized = this.stripCourtesyPreamble(text);
    for (const pattern of DIRECT_INSTRUCTION_OPENERS) {
      optimized = optimized.replace(pattern, '');
    }
    optimized = restoreLeadingCapital(text, optimized);

    if (this.customFlag('useXmlTags')) {
      optimized = this.addStructuralTags(optimized);
    }

    if (
      this.customFlag('encourageReasoning') &&
      hasAnalysisRequest(optimized) &&
      !STEP_BY_STEP.test(optimized)
    ) {
      optimized = optimized.trimEnd() + REASONING_PROMPT;
    }

    return optimized
      .replace(/\n{3,}/g, '\n\n')
      .replace(/ {2,}/g, ' ')
      .trim();
  }

  protected familySuggestions(text: string, currentTokens: number): ModelSuggestion[] {
    const suggestions: ModelSuggestion[] = [];

    if (currentTokens > 150000) {
      suggestions.push({
        type: 'context_warning',
        message: 'Very long prompt. Consider splitting it even though the context window allows it',
        severity: 'medium',
      });
    }

    if (text.split('\n\n').length > 3 && !MARKUP_TAG.test(text)) {
      suggestions.push({
        type: 'format_optimization',
        message: 'Consider XML tags such as <context>, <instruction> and <example> to structure the prompt',
        severity: 'low',
      });
    }

    if (this.profile.modelName === 'claude-3-opus' && currentTokens < 10000) {
      suggestions.push({
        type: 'cost_optimization',
        message: 'For short prompts, claude-3-sonnet or claude-3-haiku cost far less',
        severity: 'medium',
      });
    }

    if (hasAnalysisRequest(text) && !STEP_BY_STEP.test(text)) {
      suggestions.push({
        type: 'effectiveness_tip',
        message: 'Analytical tasks benefit from an explicit "think step by step" instruction',
        severity: 'low',
      });
    }

    return suggestions;
  }

  private addStructuralTags(text: string): string {
    if (MARKUP_TAG.test(text)) {
      return text;
    }

    const sections = splitSections(text);
    if (sections.length <= 2) {
      return text;
    }

    return sections
      .map((section, index) => {
        const tag = sectionTag(section, index);
        return tag ? `<${tag}>\n${section}\n</${tag}>` : section;
      })
      .join('\n\n');
  }
}
