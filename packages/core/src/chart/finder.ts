import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { WalkError, errorMessage } from '../errors.js';
import { CHART_MANIFEST } from './manifest.js';

/**
 * Every directory under `root` (root included) that holds a Chart.yaml file,
 * in lexical walk order
 *
 * @throws WalkError when a directory cannot be read
 */
export async function findChartDirs(root: string): Promise<string[]> {
  if (root.length === 0) {
    return [];
  }

  const chartDirs: string[] = [];
  await walk(root, chartDirs);
  return chartDirs;
}

async function walk(dir: string, chartDirs: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new WalkError(`Error walking ${dir}: ${errorMessage(err)}`, { path: dir, cause: err });
  }

  if (entries.some((entry) => entry.isFile() && entry.name === CHART_MANIFEST)) {
    chartDirs.push(dir);
  }

  const subdirs = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
  for (const name of subdirs) {
    await walk(path.join(dir, name), chartDirs);
  }
}
