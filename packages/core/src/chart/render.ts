import path from 'node:path';
import { ConfigError, ExternalToolError } from '../errors.js';
import { resolveDependencies } from './dependencies.js';
import { HelmCli, type HelmClient } from './helm.js';

const RELEASE_NAME_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;

export function isValidReleaseName(name: string): boolean {
  return RELEASE_NAME_PATTERN.test(name);
}

/**
 * Release name for a chart: its directory name, or the current directory's
 * name when the chart path is `.`
 */
export function releaseNameFor(chartPath: string, cwd: string = process.cwd()): string {
  const base = path.basename(path.normalize(chartPath));
  const name = base === '.' || base === '' ? path.basename(cwd) : base;
  return name.trim();
}

export interface RenderChartOptions {
  helm?: HelmClient;
  cwd?: string;
}

/**
 * Render a chart with `helm template` and return the manifests
 *
 * @throws ConfigError for an empty path or a chart name helm would reject
 * @throws ExternalToolError when dependencies or templating fail
 */
export async function renderChart(
  chartPath: string,
  valuesFiles: readonly string[],
  options: RenderChartOptions = {}
): Promise<string> {
  if (chartPath.trim().length === 0) {
    throw new ConfigError('chart path is empty');
  }

  const helm = options.helm ?? new HelmCli();
  const releaseName = releaseNameFor(chartPath, options.cwd);
  if (!isValidReleaseName(releaseName)) {
    throw new ConfigError(`invalid release name: ${releaseName}`, {
      suggestion: 'Chart directory names must be lowercase alphanumerics, "-" or "."',
    });
  }

  const dependencies = await resolveDependencies(chartPath, helm);
  try {
    if (dependencies.errors.length > 0) {
      throw new ExternalToolError(`error building dependencies: ${dependencies.errors.join('; ')}`, {
        tool: 'helm',
      });
    }

    const result = await helm.template(releaseName, chartPath, valuesFiles);
    if (!result.success) {
      throw new ExternalToolError(`error running helm template: exit code ${result.exitCode}`, {
        tool: 'helm',
        exitCode: result.exitCode,
        output: result.output,
      });
    }
    return result.stdout;
  } finally {
    await dependencies.cleanup();
  }
}
