// Collection models
export {
  PatternSetSchema,
  ReportLayoutSchema,
  CacheEntrySchema,
  PersistedCacheEntrySchema,
  normalizePatternSet,
  toPersistedEntry,
  fromPersistedEntry,
} from './collection.js';

export type {
  PatternSet,
  PatternSetInput,
  ReportLayout,
  CacheEntry,
  PersistedCacheEntry,
  ScanResult,
} from './collection.js';

// Analysis models
export {
  TokenSchemeSchema,
  ContextWindowUsageSchema,
  FileAnalysisSchema,
} from './analysis.js';

export type {
  TokenScheme,
  ContextWindowUsage,
  FileAnalysis,
} from './analysis.js';
