import { BaseReportFormatter, type ReportSection } from './formatter.js';

export const SECTION_RULE = '='.repeat(80);

/**
 * Each file framed by rules with a `## File:` heading
 */
export class StandardReportFormatter extends BaseReportFormatter {
  readonly layout = 'standard' as const;

  protected renderSectionHeading({ relativePath }: ReportSection): string {
    return `${SECTION_RULE}\n## File: ${relativePath}\n${SECTION_RULE}\n`;
  }
}
