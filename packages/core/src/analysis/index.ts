export {
  MODEL_CONTEXT_WINDOWS,
  getContextWindowSummary,
  analyzeContextWindows,
} from './context-windows.js';
export { formatBytes } from './format.js';
export {
  FileAnalyzer,
  SMALL_LINE_THRESHOLD,
  computeTextStats,
  splitLines,
} from './file-analyzer.js';
export type { FileAnalyzerOptions, TextStats } from './file-analyzer.js';
