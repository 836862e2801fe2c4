import type { ReportLayout } from '../models/index.js';
import type { ReportFormatter } from './formatter.js';
import { IndexedReportFormatter } from './indexed.js';
import { StandardReportFormatter } from './standard.js';

export {
  BaseReportFormatter,
  REPORT_TITLE,
  renderHeader,
} from './formatter.js';
export type { ReportFormatter, ReportSummary, ReportSection } from './formatter.js';
export { StandardReportFormatter, SECTION_RULE } from './standard.js';
export { IndexedReportFormatter } from './indexed.js';

export function createReportFormatter(layout: ReportLayout = 'standard'): ReportFormatter {
  switch (layout) {
    case 'standard':
      return new StandardReportFormatter();
    case 'indexed':
      return new IndexedReportFormatter();
  }
}
