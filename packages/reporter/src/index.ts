import type { ReportFormat, ScanReport } from "./domain.js";
import { renderHtmlReport, renderMarkdownReport, renderTextReport } from "./renderers.js";

export {
  REPORT_SCHEMA_VERSION,
  type ReportFormat,
  type ScanReport,
  type ScanReportTotals,
} from "./domain.js";
export { createScanReport, type CreateScanReportOptions } from "./report.js";
export { escapeHtml } from "./renderers.js";

export const formatReport = (report: ScanReport, format: ReportFormat): string => {
  switch (format) {
    case "json":
      return JSON.stringify(report, null, 2);
    case "md":
      return renderMarkdownReport(report);
    case "html":
      return renderHtmlReport(report);
    case "text":
      return renderTextReport(report);
  }
};
