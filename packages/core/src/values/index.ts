export { parseValues, loadValuesFile } from './loader.js';
export { mergeValues, mergeValueSets } from './merge.js';
export { resolveReference, findUndefinedValues, formatUndefinedValue } from './resolver.js';
