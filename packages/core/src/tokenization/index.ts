export {
  countTokens,
  tiktokenCounter,
  DEFAULT_TOKEN_SCHEME,
  GPT4_TOKEN_SCHEME,
} from './counter.js';
export type { TokenCounts, TokenCounter } from './counter.js';
