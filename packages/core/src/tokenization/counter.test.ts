import { describe, it, expect } from 'vitest';
import { countTokens, tiktokenCounter } from './counter.js';

describe('countTokens', () => {
  it('returns 0 for empty text', () => {
    expect(countTokens('')).toBe(0);
    expect(countTokens('', 'cl100k_base')).toBe(0);
  });

  it('counts a short phrase under both schemes', () => {
    expect(countTokens('hello world', 'cl100k_base')).toBe(2);
    expect(countTokens('hello world', 'o200k_base')).toBe(2);
  });

  it('treats special token markers as plain text', () => {
    expect(() => countTokens('before <|endoftext|> after')).not.toThrow();
    expect(countTokens('before <|endoftext|> after')).toBeGreaterThan(3);
  });

  it('grows with the amount of text', () => {
    const one = countTokens("print('line')\n");
    const many = countTokens("print('line')\n".repeat(100));
    expect(many).toBeGreaterThan(one * 50);
  });
});

describe('tiktokenCounter', () => {
  it('reports both schemes', () => {
    expect(tiktokenCounter.count('hello world')).toEqual({
      tokenCount: 2,
      tokenCountGpt4: 2,
    });
  });
});
