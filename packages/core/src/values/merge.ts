import { cloneValue, emptyMapping, type ValueMapping } from '../types/index.js';

/**
 * Deep-merge `source` into `target`.
 *
 * Mappings present on both sides merge key by key; any other pairing takes
 * the source value whole, so sequences are replaced rather than concatenated.
 * `source` is never modified and values copied out of it are cloned, so
 * later edits to `source` cannot reach `target`.
 */
export function mergeValues(target: ValueMapping, source: ValueMapping): void {
  for (const [key, value] of source.entries) {
    const existing = target.entries.get(key);
    if (existing?.kind === 'mapping' && value.kind === 'mapping') {
      mergeValues(existing, value);
      continue;
    }
    target.entries.set(key, cloneValue(value));
  }
}

/**
 * Merge mappings in precedence order (lowest first) into a new mapping
 */
export function mergeValueSets(sources: readonly ValueMapping[]): ValueMapping {
  const merged = emptyMapping();
  for (const source of sources) {
    mergeValues(merged, source);
  }
  return merged;
}
