import type { GitGradeReport, ReportFormat } from "./domain.js";
import { createReport } from "./report.js";
import { renderMarkdownReport, renderTextReport } from "./renderers.js";

export {
  REPORT_SCHEMA_VERSION,
  describeGrade,
  type AuthorKeyMetrics,
  type AuthorReportItem,
  type GitGradeReport,
  type ReportFormat,
} from "./domain.js";
export type { CreateReportOptions } from "./report.js";

export { createReport };

export const formatReport = (report: GitGradeReport, format: ReportFormat): string => {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }

  if (format === "md") {
    return renderMarkdownReport(report);
  }

  return renderTextReport(report);
};
