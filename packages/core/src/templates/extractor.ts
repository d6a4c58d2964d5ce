/**
 * Placeholder extraction
 *
 * Only the plain lookup form `{{ .Values.<path> }}` is recognised. Pipelines,
 * function calls, control structures and `{{-`/`-}}` trim markers are left
 * alone: they are neither references nor errors.
 */

import { ParseError } from '../errors.js';
import type { ValueReference } from '../types/index.js';

const VALUE_PLACEHOLDER = /\{\{\s*\.Values\.([a-zA-Z0-9_.[\]-]*)\s*\}\}/g;

/**
 * Extract every value reference from one template's text
 *
 * @param content template text
 * @param file path recorded on each reference
 * @throws ParseError when a placeholder has an empty path; nothing is returned for the file
 */
export function extractReferences(content: string, file: string): ValueReference[] {
  const references: ValueReference[] = [];
  const lines = content.split('\n');

  lines.forEach((line, index) => {
    for (const match of line.matchAll(VALUE_PLACEHOLDER)) {
      const fullText = match[0];
      const name = (match[1] ?? '').trim();
      if (name.length === 0) {
        throw new ParseError(`empty value reference: ${fullText}`, {
          source: file,
          line: index + 1,
          column: (match.index ?? 0) + 1,
        });
      }

      references.push({ name, file, line: index + 1, fullText });
    }
  });

  return references;
}
