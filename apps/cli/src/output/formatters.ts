import chalk from 'chalk';
import Table from 'cli-table3';
import {
  formatBytes,
  type CacheEntry,
  type ContextWindowUsage,
  type FileAnalysis,
} from '@tokentally/core';

// Context usage colour: green under half, yellow up to the limit, red beyond
function usageColor(usage: ContextWindowUsage): (text: string) => string {
  if (usage.exceeded) return chalk.red;
  if (usage.percentage >= 50) return chalk.yellow;
  return chalk.green;
}

// Format cache entry table
export function formatCacheTable(entries: CacheEntry[]): string {
  if (entries.length === 0) {
    return chalk.dim('No cache entries.');
  }

  const table = new Table({
    head: [
      chalk.bold('Key'),
      chalk.bold('Project'),
      chalk.bold('Files'),
      chalk.bold('Created'),
    ],
    style: { head: [], border: [] },
  });

  for (const entry of entries) {
    table.push([entry.key, entry.projectPath, String(entry.fileCount), entry.createdAt]);
  }

  return table.toString();
}

// Format per-file statistics
export function formatAnalysisTable(analysis: FileAnalysis): string {
  const table = new Table({
    head: [chalk.bold('Metric'), chalk.bold('Value')],
    style: { head: [], border: [] },
  });

  table.push(
    ['File', analysis.filePath],
    ['Size', formatBytes(analysis.fileSize)],
    ['Lines', `${analysis.lineCount} (${analysis.nonEmptyLineCount} non-empty)`],
    ['Characters', String(analysis.charCount)],
    ['Words', String(analysis.wordCount)],
    ['Tokens (o200k_base)', String(analysis.tokenCount)],
    ['Tokens (cl100k_base)', String(analysis.tokenCountGpt4)],
    ['Avg tokens/line', analysis.avgTokensPerLine.toFixed(2)],
    ['Small lines', `${analysis.smallLinesCount} (${analysis.smallLinesPercentage.toFixed(2)}%)`],
  );

  return table.toString();
}

// Format context window usage
export function formatContextTable(summary: ContextWindowUsage[]): string {
  if (summary.length === 0) {
    return chalk.dim('No models configured.');
  }

  const table = new Table({
    head: [
      chalk.bold('Model'),
      chalk.bold('Context'),
      chalk.bold('Usage'),
      chalk.bold('Status'),
    ],
    style: { head: [], border: [] },
  });

  for (const usage of summary) {
    const color = usageColor(usage);
    table.push([
      usage.model,
      usage.limit.toLocaleString('en-US'),
      color(`${usage.percentage.toFixed(2)}%`),
      usage.exceeded ? chalk.red('exceeds') : chalk.green('fits'),
    ]);
  }

  return table.toString();
}
