import fs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import { WalkError, errorMessage, errorCode } from '../errors.js';
import type { ValueReference } from '../types/index.js';
import { extractReferences } from './extractor.js';

export const TEMPLATES_DIR = 'templates';

const TEMPLATE_EXTENSIONS = new Set(['.yaml', '.yml']);

export interface TemplateScan {
  references: ValueReference[];
  errors: string[];
}

export function isTemplateFile(fileName: string): boolean {
  return TEMPLATE_EXTENSIONS.has(path.extname(fileName));
}

/**
 * Extract references from every template under `<chart>/templates`
 *
 * A missing templates directory yields nothing. Unreadable entries and
 * malformed templates become diagnostics and the walk carries on.
 */
export async function parseTemplates(chartPath: string): Promise<TemplateScan> {
  const scan: TemplateScan = { references: [], errors: [] };
  const templatesDir = path.join(chartPath, TEMPLATES_DIR);

  let stat: Stats;
  try {
    stat = await fs.stat(templatesDir);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return scan;
    }
    scan.errors.push(`Error accessing templates directory: ${errorMessage(err)}`);
    return scan;
  }

  if (!stat.isDirectory()) {
    scan.errors.push(`Expected templates to be a directory but found a file: ${templatesDir}`);
    return scan;
  }

  await walkDirectory(templatesDir, scan);
  return scan;
}

async function walkDirectory(dir: string, scan: TemplateScan): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    const walkError = new WalkError(`Error accessing file ${dir}: ${errorMessage(err)}`, {
      path: dir,
      cause: err,
    });
    scan.errors.push(walkError.message);
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walkDirectory(entryPath, scan);
      continue;
    }
    if (!isTemplateFile(entry.name)) {
      continue;
    }

    try {
      const content = await fs.readFile(entryPath, 'utf8');
      scan.references.push(...extractReferences(content, entryPath));
    } catch (err) {
      scan.errors.push(`Error parsing template file ${entryPath}: ${errorMessage(err)}`);
    }
  }
}
