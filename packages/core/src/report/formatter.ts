// packages/core/src/report/formatter.ts
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, relative, sep } from 'path';
import { ReportWriteError, describeCause } from '../errors.js';
import type { ReportLayout, ScanResult } from '../models/index.js';

export const REPORT_TITLE = '# Code Collection Report';

/**
 * Outcome of writing one report
 */
export interface ReportSummary {
  outputPath: string;
  fileCount: number;
  /** Files whose content could not be read and were replaced by a marker */
  unreadableFiles: string[];
}

/**
 * Turns a scan result into a report file on disk
 */
export interface ReportFormatter {
  readonly layout: ReportLayout;
  write(files: ScanResult, projectRoot: string, outputPath: string): Promise<ReportSummary>;
}

export interface ReportSection {
  index: number;
  relativePath: string;
  content: string;
}

export function renderHeader(projectRoot: string, fileCount: number): string {
  return [REPORT_TITLE, `Project Path: ${projectRoot}`, `File Count: ${fileCount}`, ''].join('\n');
}

function withTrailingNewline(content: string): string {
  return content.length === 0 || content.endsWith('\n') ? content : `${content}\n`;
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

export abstract class BaseReportFormatter implements ReportFormatter {
  abstract readonly layout: ReportLayout;

  /** Render the heading of one file section (without its content) */
  protected abstract renderSectionHeading(section: ReportSection): string;

  async write(files: ScanResult, projectRoot: string, outputPath: string): Promise<ReportSummary> {
    const parts: string[] = [renderHeader(projectRoot, files.length)];
    const unreadableFiles: string[] = [];

    for (const [index, file] of files.entries()) {
      let content: string;
      try {
        content = await readFile(file, 'utf-8');
      } catch (error) {
        unreadableFiles.push(file);
        content = `[unreadable: ${describeCause(error)}]`;
      }

      const section: ReportSection = {
        index: index + 1,
        relativePath: toPosix(relative(projectRoot, file)),
        content,
      };
      parts.push(`\n${this.renderSectionHeading(section)}${withTrailingNewline(content)}`);
    }

    try {
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, parts.join(''), 'utf-8');
    } catch (error) {
      throw new ReportWriteError(outputPath, error);
    }

    return { outputPath, fileCount: files.length, unreadableFiles };
  }
}
