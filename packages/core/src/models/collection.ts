import { z } from 'zod';

// Pattern set controlling which files take part in a collection run
export const PatternSetSchema = z.object({
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  fileTypes: z.array(z.string()).default([]),
});

// Report layouts
export const ReportLayoutSchema = z.enum(['standard', 'indexed']);

// Cache entry as held in memory
export const CacheEntrySchema = z.object({
  key: z.string().min(1),
  reportFileName: z.string().min(1),
  projectPath: z.string(),
  createdAt: z.string().datetime({ offset: true }),
  fileCount: z.number().int().nonnegative(),
});

// Cache entry as persisted in the index document (unknown fields are stripped)
export const PersistedCacheEntrySchema = z.object({
  file: z.string().min(1),
  project_path: z.string(),
  created_at: z.string().datetime({ offset: true }),
  file_count: z.number().int().nonnegative(),
});

// Types
export type PatternSet = z.infer<typeof PatternSetSchema>;
export type PatternSetInput = z.input<typeof PatternSetSchema>;
export type ReportLayout = z.infer<typeof ReportLayoutSchema>;
export type CacheEntry = z.infer<typeof CacheEntrySchema>;
export type PersistedCacheEntry = z.infer<typeof PersistedCacheEntrySchema>;

/** Absolute file paths, strictly ascending, no duplicates */
export type ScanResult = readonly string[];

// Helper to fill in missing pattern lists
export function normalizePatternSet(input: PatternSetInput = {}): PatternSet {
  return PatternSetSchema.parse(input);
}

export function toPersistedEntry(entry: CacheEntry): PersistedCacheEntry {
  return {
    file: entry.reportFileName,
    project_path: entry.projectPath,
    created_at: entry.createdAt,
    file_count: entry.fileCount,
  };
}

export function fromPersistedEntry(key: string, persisted: PersistedCacheEntry): CacheEntry {
  return {
    key,
    reportFileName: persisted.file,
    projectPath: persisted.project_path,
    createdAt: persisted.created_at,
    fileCount: persisted.file_count,
  };
}
