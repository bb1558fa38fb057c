/**
 * Interface for token counting functionality
 */

export interface TokenCountResult {
  tokens: number;
  characters: number;
}

export interface ITokenCounter {
  /**
   * Count tokens in text
   */
  count(text: string): TokenCountResult;
}
