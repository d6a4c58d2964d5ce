import YAML from "yaml";
import { toPlainValue, type ChartResult, type PlainValue } from "@chartcheck/core";

/**
 * Serialized form of a chart result
 */
export interface ReportEntry {
  chartPath: string;
  name: string;
  success: boolean;
  errors: string[];
  undefinedValues: string[];
  values: PlainValue;
}

export function toReportEntries(results: readonly ChartResult[]): ReportEntry[] {
  return results.map((result) => ({
    chartPath: result.path,
    name: result.name,
    success: result.success,
    errors: [...result.errors],
    undefinedValues: [...result.undefinedValues],
    values: toPlainValue(result.values),
  }));
}

export function formatJson(results: readonly ChartResult[]): string {
  return JSON.stringify(toReportEntries(results), null, 2);
}

export function formatYaml(results: readonly ChartResult[]): string {
  return YAML.stringify(toReportEntries(results)).trimEnd();
}
