export { ChartProcessor, type ChartProcessorOptions, type ScanLogger } from './processor.js';
export { ScanResultCollector, sortResults } from './collector.js';
export { resolveDependencies, type DependencyResolution } from './dependencies.js';
export { loadChartValues, findMissingValuesFiles, type LoadedChartValues } from './chart-values.js';
export { findChartDirs } from './finder.js';
export {
  HelmCli,
  parseErrorLogs,
  ERROR_MARKER,
  type HelmClient,
  type HelmCliOptions,
  type ToolRunResult,
} from './helm.js';
export { readChartManifest, CHART_MANIFEST, CHART_VALUES_FILE, type ChartManifest } from './manifest.js';
export { renderChart, releaseNameFor, isValidReleaseName, type RenderChartOptions } from './render.js';
