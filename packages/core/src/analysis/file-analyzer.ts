/**
 * File Analyzer
 * Size, line and token statistics for a single file, plus how much of each
 * model's context window the file would take.
 */

import { readFile } from 'fs/promises';
import { FileAnalysisError, errorCode } from '../errors.js';
import type { FileAnalysis } from '../models/index.js';
import { tiktokenCounter, type TokenCounter } from '../tokenization/index.js';
import { analyzeContextWindows, roundTo, MODEL_CONTEXT_WINDOWS } from './context-windows.js';

/** Non-empty lines shorter than this (after trimming) count as small */
export const SMALL_LINE_THRESHOLD = 10;

export interface FileAnalyzerOptions {
  counter?: TokenCounter;
  contextWindows?: Readonly<Record<string, number>>;
}

export interface TextStats {
  lineCount: number;
  nonEmptyLineCount: number;
  charCount: number;
  wordCount: number;
  smallLinesCount: number;
}

// Lines as an editor shows them: a trailing newline does not open a new line
export function splitLines(content: string): string[] {
  if (content.length === 0) return [];
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function computeTextStats(content: string): TextStats {
  const lines = splitLines(content);
  const nonEmpty = lines.filter((line) => line.trim().length > 0);
  return {
    lineCount: lines.length,
    nonEmptyLineCount: nonEmpty.length,
    charCount: Array.from(content).length,
    wordCount: content.split(/\s+/).filter(Boolean).length,
    smallLinesCount: nonEmpty.filter((line) => line.trim().length < SMALL_LINE_THRESHOLD).length,
  };
}

export class FileAnalyzer {
  private counter: TokenCounter;
  private contextWindows: Readonly<Record<string, number>>;

  constructor(options: FileAnalyzerOptions = {}) {
    this.counter = options.counter ?? tiktokenCounter;
    this.contextWindows = options.contextWindows ?? MODEL_CONTEXT_WINDOWS;
  }

  async analyzeFile(filePath: string): Promise<FileAnalysis> {
    let raw: Buffer;
    try {
      raw = await readFile(filePath);
    } catch (error) {
      throw new FileAnalysisError(
        filePath,
        errorCode(error) === 'ENOENT' ? 'FILE_NOT_FOUND' : 'FILE_READ_FAILED',
        error,
      );
    }

    return this.analyzeContent(filePath, raw);
  }

  analyzeContent(filePath: string, raw: Buffer): FileAnalysis {
    const content = raw.toString('utf-8');
    const stats = computeTextStats(content);
    const { tokenCount, tokenCountGpt4 } = this.counter.count(content);

    return {
      filePath,
      fileSize: raw.byteLength,
      ...stats,
      tokenCount,
      tokenCountGpt4,
      avgTokensPerLine: stats.lineCount > 0 ? roundTo(tokenCount / stats.lineCount, 2) : 0,
      smallLinesPercentage:
        stats.lineCount > 0 ? roundTo((stats.smallLinesCount / stats.lineCount) * 100, 2) : 0,
      contextAnalysis: analyzeContextWindows(tokenCount, this.contextWindows),
    };
  }
}
