import { z } from 'zod';

export const TokenSchemeSchema = z.enum(['o200k_base', 'cl100k_base']);

// One row of the context window table
export const ContextWindowUsageSchema = z.object({
  model: z.string(),
  limit: z.number().int().positive(),
  tokenCount: z.number().int().nonnegative(),
  percentage: z.number().nonnegative(),
  exceeded: z.boolean(),
});

// Statistics for a single file
export const FileAnalysisSchema = z.object({
  filePath: z.string(),
  fileSize: z.number().int().nonnegative(),
  lineCount: z.number().int().nonnegative(),
  nonEmptyLineCount: z.number().int().nonnegative(),
  charCount: z.number().int().nonnegative(),
  wordCount: z.number().int().nonnegative(),
  /** Token count under the o200k_base encoding */
  tokenCount: z.number().int().nonnegative(),
  /** Token count under the cl100k_base encoding (GPT-4) */
  tokenCountGpt4: z.number().int().nonnegative(),
  avgTokensPerLine: z.number().nonnegative(),
  smallLinesCount: z.number().int().nonnegative(),
  smallLinesPercentage: z.number().nonnegative(),
  contextAnalysis: z.record(ContextWindowUsageSchema.omit({ model: true })),
});

// Types
export type TokenScheme = z.infer<typeof TokenSchemeSchema>;
export type ContextWindowUsage = z.infer<typeof ContextWindowUsageSchema>;
export type FileAnalysis = z.infer<typeof FileAnalysisSchema>;
