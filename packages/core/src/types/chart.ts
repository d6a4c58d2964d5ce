import type { ValueMapping } from './values.js';

/**
 * One occurrence of a `{{ .Values.<path> }}` placeholder in a template
 */
export interface ValueReference {
  /** Dotted path after `.Values.` */
  readonly name: string;
  /** Template file the placeholder was found in */
  readonly file: string;
  /** 1-based line number */
  readonly line: number;
  /** The matched placeholder text */
  readonly fullText: string;
}

/**
 * Outcome of scanning a single chart
 */
export interface ChartResult {
  readonly path: string;
  /** `name` from Chart.yaml, or the path when the manifest could not be read */
  readonly name: string;
  readonly success: boolean;
  /** Every diagnostic, undefined-value messages last */
  readonly errors: readonly string[];
  readonly values: ValueMapping;
  readonly undefinedValues: readonly string[];
}

/**
 * Outcome of scanning a set of charts
 */
export interface ScanReport {
  readonly results: ChartResult[];
  readonly invalidCharts: number;
  readonly durationMs: number;
}

/**
 * Per-chart processing stages, in order
 */
export const CHART_STAGES = [
  'pending',
  'dependencies-resolved',
  'linted',
  'templates-parsed',
  'values-loaded',
  'resolved',
  'done',
] as const;

export type ChartStage = (typeof CHART_STAGES)[number];
