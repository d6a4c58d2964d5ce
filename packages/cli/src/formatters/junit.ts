import type { ChartResult } from "@chartcheck/core";

const SUITE_NAME = "chartcheck";

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * JUnit XML report, one test case per chart
 */
export function formatJunit(results: readonly ChartResult[], durationMs: number): string {
  const failures = results.filter((result) => !result.success).length;
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<testsuite name="${SUITE_NAME}" tests="${results.length}" failures="${failures}" time="${(durationMs / 1000).toFixed(3)}">`,
  ];

  for (const result of results) {
    lines.push(`  <testcase name="${escapeXml(result.path)}" classname="${SUITE_NAME}" time="0">`);
    if (result.success) {
      lines.push(`    <system-out>${escapeXml(`Chart ${result.path} scanned successfully`)}</system-out>`);
    } else {
      lines.push(
        `    <failure message="Chart scan failed" type="ScanError">${escapeXml(result.errors.join("\n"))}</failure>`
      );
    }
    lines.push("  </testcase>");
  }

  lines.push("</testsuite>");
  return lines.join("\n");
}
