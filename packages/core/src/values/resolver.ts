import type { ValueMapping, ValueNode, ValueReference } from '../types/index.js';

/**
 * Check that the dotted path of a reference exists in the merged values.
 *
 * Every segment but the last must name a mapping; the last only has to be a
 * key, whatever its value (null included). Segments are matched as literal
 * keys: `items[0]` looks up a key named `items[0]`, it does not index a
 * sequence.
 */
export function resolveReference(reference: ValueReference, values: ValueMapping): boolean {
  if (reference.name.length === 0) {
    return false;
  }

  const segments = reference.name.split('.');
  let current: ValueNode = values;
  for (const segment of segments) {
    if (current.kind !== 'mapping') {
      return false;
    }
    const next = current.entries.get(segment);
    if (next === undefined) {
      return false;
    }
    current = next;
  }

  return true;
}

export function formatUndefinedValue(reference: ValueReference): string {
  return `Undefined value: '${reference.name}' referenced in ${reference.file} at line ${reference.line}`;
}

/**
 * Diagnostics for every reference that does not resolve, in reference order
 */
export function findUndefinedValues(
  references: readonly ValueReference[],
  values: ValueMapping
): string[] {
  return references
    .filter((reference) => !resolveReference(reference, values))
    .map((reference) => formatUndefinedValue(reference));
}
