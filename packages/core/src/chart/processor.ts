/**
 * Chart processor
 *
 * Runs one chart through dependency resolution, the values precheck, lint,
 * template extraction, values loading and reference resolution. Dependency and
 * precheck failures end the scan early; everything after that accumulates.
 */

import { ConfigError, errorMessage } from '../errors.js';
import { emptyMapping, type ChartResult, type ChartStage, type ScanReport } from '../types/index.js';
import { parseTemplates } from '../templates/walker.js';
import { findUndefinedValues } from '../values/resolver.js';
import { findMissingValuesFiles, loadChartValues } from './chart-values.js';
import { ScanResultCollector } from './collector.js';
import { resolveDependencies } from './dependencies.js';
import { HelmCli, parseErrorLogs, type HelmClient } from './helm.js';

/**
 * Minimal logger the processor reports progress to
 */
export interface ScanLogger {
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface ChartProcessorOptions {
  helm?: HelmClient;
  logger?: ScanLogger;
  /** Called on every stage transition of every chart */
  onStage?: (chartPath: string, stage: ChartStage) => void;
}

export class ChartProcessor {
  private readonly helm: HelmClient;
  private readonly logger?: ScanLogger;
  private readonly onStage?: (chartPath: string, stage: ChartStage) => void;

  constructor(options: ChartProcessorOptions = {}) {
    this.helm = options.helm ?? new HelmCli();
    this.logger = options.logger;
    this.onStage = options.onStage;
  }

  /**
   * Scan every chart concurrently. Result order is completion order.
   */
  async scanCharts(chartPaths: readonly string[], valuesFiles: readonly string[] = []): Promise<ScanReport> {
    const startedAt = Date.now();
    const collector = new ScanResultCollector();

    await Promise.all(
      chartPaths.map(async (chartPath) => {
        const result = await this.scanChart(chartPath, valuesFiles);
        collector.record(result);
      })
    );

    return {
      results: collector.snapshot(),
      invalidCharts: collector.invalidCharts,
      durationMs: Date.now() - startedAt,
    };
  }

  /**
   * Scan a single chart. Never rejects: every failure ends up in `errors`.
   */
  async scanChart(chartPath: string, valuesFiles: readonly string[] = []): Promise<ChartResult> {
    if (chartPath.trim().length === 0) {
      return this.finish(chartPath, failure(chartPath, chartPath, [new ConfigError('Chart path is empty').message]));
    }

    this.enter(chartPath, 'pending');
    try {
      return this.finish(chartPath, await this.process(chartPath, valuesFiles));
    } catch (err) {
      return this.finish(chartPath, failure(chartPath, chartPath, [`Unexpected error: ${errorMessage(err)}`]));
    }
  }

  private async process(chartPath: string, valuesFiles: readonly string[]): Promise<ChartResult> {
    const dependencies = await resolveDependencies(chartPath, this.helm);
    const name = dependencies.manifest?.name ?? chartPath;

    try {
      if (dependencies.errors.length > 0) {
        return failure(chartPath, name, dependencies.errors);
      }
      this.enter(chartPath, 'dependencies-resolved');

      const missing = await findMissingValuesFiles(valuesFiles);
      if (missing.length > 0) {
        return failure(
          chartPath,
          name,
          missing.map((file) => new ConfigError(`Values file does not exist: ${file}`).message)
        );
      }

      const lintErrors = await this.lint(chartPath, valuesFiles);
      this.enter(chartPath, 'linted');

      const templates = await parseTemplates(chartPath);
      this.enter(chartPath, 'templates-parsed');

      const loaded = await loadChartValues(chartPath, valuesFiles);
      this.enter(chartPath, 'values-loaded');

      const undefinedValues = findUndefinedValues(templates.references, loaded.values);
      this.enter(chartPath, 'resolved');

      const errors = [...lintErrors, ...templates.errors, ...loaded.errors, ...undefinedValues];
      return {
        path: chartPath,
        name,
        success: errors.length === 0,
        errors,
        values: loaded.values,
        undefinedValues,
      };
    } finally {
      await dependencies.cleanup();
    }
  }

  private async lint(chartPath: string, valuesFiles: readonly string[]): Promise<string[]> {
    try {
      const result = await this.helm.lint(chartPath, valuesFiles);
      return result.success ? [] : parseErrorLogs(result.output);
    } catch (err) {
      return [errorMessage(err)];
    }
  }

  private enter(chartPath: string, stage: ChartStage): void {
    this.logger?.debug(`${chartPath}: ${stage}`);
    this.onStage?.(chartPath, stage);
  }

  private finish(chartPath: string, result: ChartResult): ChartResult {
    this.logger?.debug(`${chartPath}: done`, { success: result.success, errors: result.errors.length });
    this.onStage?.(chartPath, 'done');
    return result;
  }
}

function failure(chartPath: string, name: string, errors: string[]): ChartResult {
  return {
    path: chartPath,
    name,
    success: false,
    errors,
    values: emptyMapping(),
    undefinedValues: [],
  };
}
