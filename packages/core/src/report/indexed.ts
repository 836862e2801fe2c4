import { BaseReportFormatter, type ReportSection } from './formatter.js';

/**
 * Each file under a numbered `####### [idx:N]` marker, for consumers that
 * split the report back into files.
 */
export class IndexedReportFormatter extends BaseReportFormatter {
  readonly layout = 'indexed' as const;

  protected renderSectionHeading({ index, relativePath }: ReportSection): string {
    return `####### [idx:${index}] ${relativePath} #######\n`;
  }
}
