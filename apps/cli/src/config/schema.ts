import { z } from 'zod';
import { ReportLayoutSchema } from '@tokentally/core';

// Defaults for `tokentally collect`
export const CollectConfigSchema = z.object({
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  // Empty means the built-in extension catalog
  fileTypes: z.array(z.string()).default([]),
  output: z.string().default('collected_code.txt'),
  layout: ReportLayoutSchema.default('standard'),
});

// Report cache
export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  directory: z.string().default('.code_cache'),
});

// Console output
export const OutputConfigSchema = z.object({
  colors: z.boolean().default(true),
});

// Full config schema
export const TokentallyConfigSchema = z.object({
  collect: CollectConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

// Types
export type CollectConfig = z.infer<typeof CollectConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type TokentallyConfig = z.infer<typeof TokentallyConfigSchema>;
export type TokentallyConfigInput = z.input<typeof TokentallyConfigSchema>;

// Helper for config files: `export default defineConfig({ ... })`
export function defineConfig(config: TokentallyConfigInput): TokentallyConfig {
  return TokentallyConfigSchema.parse(config);
}
