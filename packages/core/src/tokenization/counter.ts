/**
 * Token counting
 * Counts tokens under the BPE encodings used by current OpenAI models.
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';
import type { TokenScheme } from '../models/index.js';

export const DEFAULT_TOKEN_SCHEME: TokenScheme = 'o200k_base';
export const GPT4_TOKEN_SCHEME: TokenScheme = 'cl100k_base';

const encoders = new Map<TokenScheme, Tiktoken>();

function encoderFor(scheme: TokenScheme): Tiktoken {
  let encoder = encoders.get(scheme);
  if (!encoder) {
    encoder = getEncoding(scheme);
    encoders.set(scheme, encoder);
  }
  return encoder;
}

/**
 * Count the tokens in `text`.
 * Special-token markers in source files are counted as ordinary text.
 */
export function countTokens(text: string, scheme: TokenScheme = DEFAULT_TOKEN_SCHEME): number {
  if (text.length === 0) return 0;
  return encoderFor(scheme).encode(text, [], []).length;
}

/** Counts for both supported schemes */
export interface TokenCounts {
  tokenCount: number;
  tokenCountGpt4: number;
}

export interface TokenCounter {
  count(text: string): TokenCounts;
}

export const tiktokenCounter: TokenCounter = {
  count(text) {
    return {
      tokenCount: countTokens(text, DEFAULT_TOKEN_SCHEME),
      tokenCountGpt4: countTokens(text, GPT4_TOKEN_SCHEME),
    };
  },
};
