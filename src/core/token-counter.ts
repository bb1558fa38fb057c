import { get_encoding, Tiktoken, TiktokenEncoding } from 'tiktoken';
import { ITokenCounter, TokenCountResult } from '../interfaces/ITokenCounter.js';

export const TIKTOKEN_ENCODINGS = [
  'cl100k_base',
  'o200k_base',
  'p50k_base',
  'r50k_base',
] as const satisfies readonly TiktokenEncoding[];

export type SupportedEncoding = (typeof TIKTOKEN_ENCODINGS)[number];

export function isSupportedEncoding(name: unknown): name is SupportedEncoding {
  return typeof name === 'string' && TIKTOKEN_ENCODINGS.some((known) => known === name);
}

/**
 * Exact subword token counter backed by a tiktoken BPE encoding.
 *
 * Construction loads the encoding's rank table, so create one instance per
 * adapter and call `free()` when done with it.
 */
export class TokenCounter implements ITokenCounter {
  private encoder: Tiktoken;

  constructor(readonly encodingName: SupportedEncoding = 'cl100k_base') {
    this.encoder = get_encoding(encodingName);
  }

  /**
   * Count tokens in text.
   *
   * Special-token markers such as `<|endoftext|>` are rejected by the
   * encoder; callers that accept arbitrary text should catch and fall back.
   */
  count(text: string): TokenCountResult {
    const tokens = this.encoder.encode(text);

    return {
      tokens: tokens.length,
      characters: text.length,
    };
  }

  /**
   * Free the encoder resources
   */
  free(): void {
    this.encoder.free();
  }
}
