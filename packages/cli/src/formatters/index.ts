import { sortResults, type ScanReport } from "@chartcheck/core";
import type { OutputFormat } from "../types.js";
import { formatJunit } from "./junit.js";
import { formatPretty } from "./pretty.js";
import { formatJson, formatYaml } from "./structured.js";

export { formatEnvironments } from "./environments.js";
export { formatJunit, escapeXml } from "./junit.js";
export { formatPretty, detailLines, formatDuration, DETAIL_WIDTH, type PrettyOptions } from "./pretty.js";
export { formatJson, formatYaml, toReportEntries, type ReportEntry } from "./structured.js";
export { renderTable, wrapText, pad, visibleWidth } from "./table.js";

/**
 * Render a scan report, charts ordered by path
 */
export function formatReport(report: ScanReport, format: OutputFormat, options: { color: boolean }): string {
  const results = sortResults(report.results);

  switch (format) {
    case "pretty":
      return formatPretty(results, report.durationMs, options);
    case "json":
      return formatJson(results);
    case "yaml":
      return formatYaml(results);
    case "junit":
      return formatJunit(results, report.durationMs);
  }
}
