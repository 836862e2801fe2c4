import type { ContextWindowUsage, FileAnalysis } from '../models/index.js';

/**
 * Context window sizes (tokens) of commonly used models.
 */
export const MODEL_CONTEXT_WINDOWS: Readonly<Record<string, number>> = {
  'gpt-4': 8192,
  'gpt-3.5-turbo': 16385,
  'gpt-4-32k': 32768,
  'gpt-4-turbo': 128000,
  'gpt-4o': 128000,
  'claude-3.5-sonnet': 200000,
  'gemini-1.5-flash': 1048576,
  'gemini-1.5-pro': 2097152,
};

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Share of each known model's context window taken by `tokenCount`,
 * smallest window first.
 */
export function getContextWindowSummary(
  tokenCount: number,
  windows: Readonly<Record<string, number>> = MODEL_CONTEXT_WINDOWS,
): ContextWindowUsage[] {
  return Object.entries(windows)
    .map(([model, limit]) => ({
      model,
      limit,
      tokenCount,
      percentage: roundTo((tokenCount / limit) * 100, 2),
      exceeded: tokenCount > limit,
    }))
    .sort((a, b) => a.limit - b.limit || a.model.localeCompare(b.model));
}

export function analyzeContextWindows(
  tokenCount: number,
  windows: Readonly<Record<string, number>> = MODEL_CONTEXT_WINDOWS,
): FileAnalysis['contextAnalysis'] {
  const result: FileAnalysis['contextAnalysis'] = {};
  for (const { model, ...usage } of getContextWindowSummary(tokenCount, windows)) {
    result[model] = usage;
  }
  return result;
}
