import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { errorMessage } from '../errors.js';
import { exists, removePath } from '../utils/fs.js';
import { parseErrorLogs, type HelmClient } from './helm.js';
import { readChartManifest, type ChartManifest } from './manifest.js';

const VENDORED_CHARTS_DIR = 'charts';
const LOCK_FILE = 'Chart.lock';

export interface DependencyResolution {
  manifest?: ChartManifest;
  /** Non-empty when the chart cannot be scanned any further */
  errors: string[];
  /** Remove `charts/` and `Chart.lock` if the update created them */
  cleanup(): Promise<void>;
}

/**
 * Read Chart.yaml and, when it declares dependencies, run
 * `helm dependency update` against a throwaway repository cache.
 *
 * The cache directory is gone by the time this returns. Artefacts the update
 * writes into the chart stay until the caller runs `cleanup()`.
 */
export async function resolveDependencies(
  chartPath: string,
  helm: HelmClient
): Promise<DependencyResolution> {
  let manifest: ChartManifest;
  try {
    manifest = await readChartManifest(chartPath);
  } catch (err) {
    return { errors: [`Error reading Chart.yaml: ${errorMessage(err)}`], cleanup: noop };
  }

  if (manifest.dependencyCount === 0) {
    return { manifest, errors: [], cleanup: noop };
  }

  const artefacts = [path.join(chartPath, VENDORED_CHARTS_DIR), path.join(chartPath, LOCK_FILE)];
  const preexisting = await Promise.all(artefacts.map((artefact) => exists(artefact)));
  const created = artefacts.filter((_, index) => preexisting[index] !== true);
  const cleanup = async (): Promise<void> => {
    await Promise.all(created.map((artefact) => removePath(artefact)));
  };

  let cacheDir: string;
  try {
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chartcheck-'));
  } catch (err) {
    return { manifest, errors: [`Error creating temp cache dir: ${errorMessage(err)}`], cleanup };
  }

  try {
    const result = await helm.updateDependencies(chartPath, cacheDir);
    if (!result.success) {
      return {
        manifest,
        errors: [
          `Error updating dependencies: helm exited with code ${result.exitCode}`,
          ...parseErrorLogs(result.output),
        ],
        cleanup,
      };
    }
  } catch (err) {
    return { manifest, errors: [`Error updating dependencies: ${errorMessage(err)}`], cleanup };
  } finally {
    await removePath(cacheDir);
  }

  return { manifest, errors: [], cleanup };
}

async function noop(): Promise<void> {
  // nothing was created
}
