import path from 'node:path';
import { errorMessage } from '../errors.js';
import { emptyMapping, type ValueMapping } from '../types/index.js';
import { statIfExists } from '../utils/fs.js';
import { loadValuesFile } from '../values/loader.js';
import { mergeValues } from '../values/merge.js';
import { CHART_VALUES_FILE } from './manifest.js';

export interface LoadedChartValues {
  values: ValueMapping;
  errors: string[];
}

/**
 * Load the chart's own values.yaml followed by the operator's files and merge
 * them in that order. A file that fails to load contributes nothing.
 */
export async function loadChartValues(
  chartPath: string,
  valuesFiles: readonly string[]
): Promise<LoadedChartValues> {
  const values = emptyMapping();
  const errors: string[] = [];
  const chartValuesFile = path.join(chartPath, CHART_VALUES_FILE);

  try {
    const stat = await statIfExists(chartValuesFile);
    if (stat !== null) {
      try {
        mergeValues(values, await loadValuesFile(chartValuesFile));
      } catch (err) {
        errors.push(`Error loading ${CHART_VALUES_FILE}: ${errorMessage(err)}`);
      }
    }
  } catch (err) {
    errors.push(`Error checking ${CHART_VALUES_FILE}: ${errorMessage(err)}`);
  }

  const chartValuesPath = path.resolve(chartValuesFile);
  for (const valuesFile of valuesFiles) {
    if (path.resolve(valuesFile) === chartValuesPath) {
      continue;
    }

    try {
      mergeValues(values, await loadValuesFile(valuesFile));
    } catch (err) {
      errors.push(`Error loading additional values file ${valuesFile}: ${errorMessage(err)}`);
    }
  }

  return { values, errors };
}

/**
 * Operator-supplied values files that do not exist
 */
export async function findMissingValuesFiles(valuesFiles: readonly string[]): Promise<string[]> {
  const checks = await Promise.all(
    valuesFiles.map(async (file) => {
      try {
        return (await statIfExists(file)) === null ? file : undefined;
      } catch {
        // present but not stat-able; loading reports the real problem
        return undefined;
      }
    })
  );
  return checks.filter((file): file is string => file !== undefined);
}
