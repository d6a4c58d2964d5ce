/**
 * Values file loading
 */

import fs from 'node:fs/promises';
import { parseAllDocuments, YAMLError } from 'yaml';
import { LoadError, ParseError, errorMessage } from '../errors.js';
import { emptyMapping, toValueNode, type ValueMapping } from '../types/index.js';

/**
 * Parse values YAML into a mapping
 *
 * `<<` merge keys are expanded. Only the first document of a multi-document
 * stream is read.
 *
 * @param content YAML text
 * @param source file path used in error messages
 * @returns the top-level mapping; empty for an empty or `null` document
 * @throws ParseError on invalid YAML or a non-mapping top level
 */
export function parseValues(content: string, source?: string): ValueMapping {
  if (!content.trim()) {
    return emptyMapping();
  }

  let parsed: unknown;
  try {
    const [doc] = parseAllDocuments(content, { merge: true });
    if (!doc) {
      return emptyMapping();
    }

    const firstError = doc.errors[0];
    if (firstError) {
      throw new ParseError(firstError.message, {
        source,
        line: getLineFromError(firstError),
        column: getColumnFromError(firstError),
      });
    }

    parsed = doc.toJS();
  } catch (error) {
    if (error instanceof ParseError) {
      throw error;
    }
    if (error instanceof YAMLError) {
      throw new ParseError(error.message, { source, cause: error });
    }
    throw new ParseError(errorMessage(error), { source, cause: error });
  }

  if (parsed === null || parsed === undefined) {
    return emptyMapping();
  }

  const node = toValueNode(parsed);
  if (node.kind !== 'mapping') {
    throw new ParseError(`values must be a mapping at the top level, found a ${node.kind}`, { source });
  }

  return node;
}

/**
 * Read and parse a values file
 *
 * @throws LoadError when the file cannot be read
 * @throws ParseError when the content is not a valid values document
 */
export async function loadValuesFile(filePath: string): Promise<ValueMapping> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new LoadError(errorMessage(error), { source: filePath, cause: error });
  }

  return parseValues(content, filePath);
}

function getLineFromError(error: YAMLError): number | undefined {
  return error.linePos?.[0]?.line;
}

function getColumnFromError(error: YAMLError): number | undefined {
  return error.linePos?.[0]?.col;
}
