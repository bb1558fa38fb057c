/**
 * Interface for model-family adapters: token counting, cost arithmetic and
 * family-specific prompt clean-ups.
 */

export type AdapterFamily = 'openai' | 'claude';

/**
 * `exact` when counts come from the family's published subword tokenizer,
 * `heuristic` when they come from the character/word estimator.
 */
export type TokenizerMode = 'exact' | 'heuristic';

export interface ModelProfile {
  readonly modelName: string;
  readonly maxContextLength: number;
  readonly costPer1kInputTokens: number;
  readonly costPer1kOutputTokens: number;
  /** tiktoken encoding name, or a family label when no public tokenizer exists */
  readonly tokenizerName?: string;
  readonly specialTokens: Readonly<Record<string, string>>;
  readonly customParams: Readonly<Record<string, unknown>>;
}

export type SuggestionType =
  | 'context_warning'
  | 'cost_optimization'
  | 'model_recommendation'
  | 'format_optimization'
  | 'effectiveness_tip';

export type SuggestionSeverity = 'low' | 'medium' | 'high';

export interface ModelSuggestion {
  type: SuggestionType;
  message: string;
  severity: SuggestionSeverity;
}

export interface OptimizationSuggestions {
  currentTokens: number;
  /** 0-100 */
  contextUsagePercent: number;
  /** USD for the prompt as input */
  estimatedCost: number;
  suggestions: ModelSuggestion[];
}

export interface ModelInfo {
  modelName: string;
  maxContextLength: number;
  costPer1kInput: number;
  costPer1kOutput: number;
  adapterFamily: AdapterFamily;
  tokenizerMode: TokenizerMode;
}

export interface IModelAdapter {
  readonly family: AdapterFamily;
  readonly profile: ModelProfile;
  readonly tokenizerMode: TokenizerMode;

  /**
   * Count tokens the way this model would. 0 for the empty string, at least
   * 1 for any other input.
   */
  countTokens(text: string): number;

  /**
   * Cost in USD of a call with the given input and output token counts.
   */
  calculateCost(inputTokens: number, outputTokens?: number): number;

  /**
   * Input-side USD saved by removing `tokenDelta` tokens.
   */
  calculateCostReduction(tokenDelta: number): number;

  /**
   * Fraction of the context window the text occupies (may exceed 1).
   */
  estimateContextUsage(text: string): number;

  canFitInContext(text: string, reserveTokens?: number): boolean;

  suggestOptimizations(text: string): OptimizationSuggestions;

  getModelInfo(): ModelInfo;

  /**
   * Family-specific clean-ups. The result is a proposal; callers decide
   * whether it preserves enough meaning to keep.
   */
  optimizeForModel(text: string): string;

  /**
   * Release tokenizer resources. Counting afterwards uses the heuristic.
   */
  free(): void;
}
