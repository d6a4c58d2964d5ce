import { describe, it, expect } from 'vitest';
import { ScanResultCollector, sortResults } from '../../src/chart/collector.js';
import { emptyMapping, type ChartResult } from '../../src/types/index.js';

function result(path: string, success: boolean): ChartResult {
  return { path, name: path, success, errors: success ? [] : ['boom'], values: emptyMapping(), undefinedValues: [] };
}

describe('ScanResultCollector', () => {
  it('should count failures as results are recorded', () => {
    const collector = new ScanResultCollector();

    collector.record(result('b', false));
    collector.record(result('a', true));
    collector.record(result('c', false));

    expect(collector.size).toBe(3);
    expect(collector.invalidCharts).toBe(2);
    expect(collector.snapshot().map((r) => r.path)).toEqual(['b', 'a', 'c']);
  });

  it('should hand out copies of the result list', () => {
    const collector = new ScanResultCollector();
    collector.record(result('a', true));

    collector.snapshot().pop();

    expect(collector.size).toBe(1);
  });
});

describe('sortResults', () => {
  it('should order by chart path without touching the input', () => {
    const input = [result('web', true), result('api', false), result('db', true)];

    expect(sortResults(input).map((r) => r.path)).toEqual(['api', 'db', 'web']);
    expect(input.map((r) => r.path)).toEqual(['web', 'api', 'db']);
  });
});
