import chalk, { Chalk } from "chalk";
import type { ChartResult } from "@chartcheck/core";
import { renderTable, wrapText } from "./table.js";

export const DETAIL_WIDTH = 120;

export interface PrettyOptions {
  color: boolean;
}

/**
 * One "• " bullet per diagnostic, continuation lines indented
 */
export function detailLines(diagnostics: readonly string[]): string[] {
  return diagnostics.flatMap((diagnostic) =>
    diagnostic
      .split("\n")
      .flatMap((line) => wrapText(line, DETAIL_WIDTH))
      .map((line, index) => (index === 0 ? `• ${line}` : `  ${line}`))
  );
}

export function formatDuration(durationMs: number): string {
  return `${(durationMs / 1000).toFixed(2)}s`;
}

export function formatPretty(
  results: readonly ChartResult[],
  durationMs: number,
  options: PrettyOptions
): string {
  const c = options.color ? chalk : new Chalk({ level: 0 });

  const rows = results.map((result) => [
    result.name,
    result.success ? c.green("✔") : c.red("✘"),
    detailLines(result.errors).join("\n"),
  ]);
  const valid = results.filter((result) => result.success).length;

  return [
    renderTable(["Chart Name", "Success", "Details"], rows),
    "",
    `Summary: ${valid} valid charts, ${results.length - valid} invalid charts scanned in ${formatDuration(durationMs)}`,
  ].join("\n");
}
