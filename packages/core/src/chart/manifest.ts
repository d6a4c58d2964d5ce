import fs from 'node:fs/promises';
import path from 'node:path';
import { LoadError, errorMessage } from '../errors.js';
import { parseValues } from '../values/loader.js';

export const CHART_MANIFEST = 'Chart.yaml';
export const CHART_VALUES_FILE = 'values.yaml';

/**
 * The parts of Chart.yaml the scanner cares about
 */
export interface ChartManifest {
  name?: string;
  /** Number of entries under `dependencies` */
  dependencyCount: number;
}

/**
 * Read `<chart>/Chart.yaml`
 *
 * @throws LoadError when the manifest cannot be read
 * @throws ParseError when it is not a YAML mapping
 */
export async function readChartManifest(chartPath: string): Promise<ChartManifest> {
  const manifestPath = path.join(chartPath, CHART_MANIFEST);

  let content: string;
  try {
    content = await fs.readFile(manifestPath, 'utf8');
  } catch (error) {
    throw new LoadError(errorMessage(error), { source: manifestPath, cause: error });
  }

  const manifest = parseValues(content, manifestPath);

  const name = manifest.entries.get('name');
  const dependencies = manifest.entries.get('dependencies');

  return {
    name: name?.kind === 'scalar' && typeof name.value === 'string' ? name.value : undefined,
    dependencyCount: dependencies?.kind === 'sequence' ? dependencies.items.length : 0,
  };
}
