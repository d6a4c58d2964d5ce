/**
 * Value document model
 *
 * Parsed values files are held as a tagged union so that merge and resolution
 * can switch exhaustively on `kind` instead of probing untyped objects.
 */

/**
 * Scalar leaf
 */
export interface ScalarValue {
  readonly kind: 'scalar';
  readonly value: string | number | boolean | null;
}

/**
 * Ordered list of values
 */
export interface SequenceValue {
  readonly kind: 'sequence';
  readonly items: ValueNode[];
}

/**
 * Keyed mapping of values
 */
export interface MappingValue {
  readonly kind: 'mapping';
  readonly entries: Map<string, ValueNode>;
}

export type ValueNode = ScalarValue | SequenceValue | MappingValue;

/**
 * The merged (or loaded) values of a chart
 */
export type ValueMapping = MappingValue;

/**
 * Plain data as produced by a YAML/JSON parser or consumed by a serializer
 */
export type PlainValue = string | number | boolean | null | PlainValue[] | PlainObject;

export interface PlainObject {
  [key: string]: PlainValue;
}

export function scalar(value: ScalarValue['value']): ScalarValue {
  return { kind: 'scalar', value };
}

export function sequence(items: ValueNode[] = []): SequenceValue {
  return { kind: 'sequence', items };
}

export function mapping(entries?: Iterable<readonly [string, ValueNode]>): MappingValue {
  return { kind: 'mapping', entries: new Map(entries) };
}

export function emptyMapping(): MappingValue {
  return mapping();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert parser output into a ValueNode.
 *
 * Anything that is not a JSON primitive, array or plain object (dates,
 * bigints, binary blobs from YAML tags) is kept as its string form.
 */
export function toValueNode(input: unknown): ValueNode {
  if (input === null || input === undefined) {
    return scalar(null);
  }

  if (typeof input === 'string' || typeof input === 'number' || typeof input === 'boolean') {
    return scalar(input);
  }

  if (Array.isArray(input)) {
    return sequence(input.map((item) => toValueNode(item)));
  }

  if (input instanceof Map) {
    const entries: Array<[string, ValueNode]> = [];
    for (const [key, value] of input) {
      entries.push([String(key), toValueNode(value)]);
    }
    return mapping(entries);
  }

  if (input instanceof Date) {
    return scalar(input.toISOString());
  }

  if (isRecord(input) && Object.getPrototypeOf(input) === Object.prototype) {
    return mapping(Object.entries(input).map(([key, value]) => [key, toValueNode(value)] as const));
  }

  return scalar(String(input));
}

/**
 * Convert a ValueNode back into plain data for JSON/YAML output
 */
export function toPlainValue(node: ValueNode): PlainValue {
  switch (node.kind) {
    case 'scalar':
      return node.value;
    case 'sequence':
      return node.items.map((item) => toPlainValue(item));
    case 'mapping': {
      const out: PlainObject = {};
      for (const [key, value] of node.entries) {
        out[key] = toPlainValue(value);
      }
      return out;
    }
  }
}

/**
 * Deep copy of a value tree; scalars are immutable and shared
 */
export function cloneValue<T extends ValueNode>(node: T): T;
export function cloneValue(node: ValueNode): ValueNode {
  switch (node.kind) {
    case 'scalar':
      return node;
    case 'sequence':
      return sequence(node.items.map((item) => cloneValue(item)));
    case 'mapping': {
      const entries: Array<[string, ValueNode]> = [];
      for (const [key, value] of node.entries) {
        entries.push([key, cloneValue(value)]);
      }
      return mapping(entries);
    }
  }
}
