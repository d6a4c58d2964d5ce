import type { ChartResult } from '../types/index.js';

/**
 * Shared sink for concurrently scanned charts.
 *
 * `record` is synchronous, so each call runs to completion on the event loop
 * before any other chart's continuation; it is the only place the result
 * list and the failure count change.
 */
export class ScanResultCollector {
  private readonly results: ChartResult[] = [];
  private invalid = 0;

  record(result: ChartResult): void {
    this.results.push(result);
    if (!result.success) {
      this.invalid += 1;
    }
  }

  get invalidCharts(): number {
    return this.invalid;
  }

  get size(): number {
    return this.results.length;
  }

  snapshot(): ChartResult[] {
    return [...this.results];
  }
}

/**
 * Results ordered by chart path
 */
export function sortResults(results: readonly ChartResult[]): ChartResult[] {
  return [...results].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
