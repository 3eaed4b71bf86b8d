import type {
  AttributeDelta,
  AttributeDeltaInput,
  AttributeType,
  AttributeValue,
  Attributes,
  AttributesInput,
  JsonValue,
} from './index.js';
import { attributeNameProblem } from './ids.js';

export const ATTRIBUTE_TYPES = [
  'bool',
  'int',
  'float',
  'string',
  'bytes',
  'vec3',
  'quat',
  'color',
  'mat4',
  'float32Array',
  'uint32Array',
  'json',
] as const satisfies readonly AttributeType[];

const ATTRIBUTE_TYPE_SET: ReadonlySet<string> = new Set(ATTRIBUTE_TYPES);

export function isAttributeType(value: unknown): value is AttributeType {
  return typeof value === 'string' && ATTRIBUTE_TYPE_SET.has(value);
}

/**
 * Shorthand constructors for attribute values.
 */
export const attr = {
  bool: (value: boolean): AttributeValue => ({ type: 'bool', value }),
  int: (value: number): AttributeValue => ({ type: 'int', value }),
  float: (value: number): AttributeValue => ({ type: 'float', value }),
  string: (value: string): AttributeValue => ({ type: 'string', value }),
  bytes: (value: Uint8Array): AttributeValue => ({ type: 'bytes', value }),
  vec3: (x: number, y: number, z: number): AttributeValue => ({ type: 'vec3', value: [x, y, z] }),
  quat: (w: number, x: number, y: number, z: number): AttributeValue => ({ type: 'quat', value: [w, x, y, z] }),
  color: (r: number, g: number, b: number): AttributeValue => ({ type: 'color', value: [r, g, b] }),
  mat4: (value: ArrayLike<number>): AttributeValue => ({ type: 'mat4', value: Array.from(value) }),
  float32Array: (value: Float32Array | ArrayLike<number>): AttributeValue => ({
    type: 'float32Array',
    value: value instanceof Float32Array ? value : Float32Array.from(value),
  }),
  uint32Array: (value: Uint32Array | ArrayLike<number>): AttributeValue => ({
    type: 'uint32Array',
    value: value instanceof Uint32Array ? value : Uint32Array.from(value),
  }),
  json: (value: JsonValue): AttributeValue => ({ type: 'json', value }),
};

function isFiniteNumbers(values: readonly unknown[], length: number): boolean {
  return values.length === length && values.every((v) => typeof v === 'number' && Number.isFinite(v));
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function jsonProblem(value: unknown, path: string, depth: number): string | null {
  if (depth > 64) return `${path}: json nesting too deep`;
  if (value === null || typeof value === 'boolean' || typeof value === 'string') return null;
  if (typeof value === 'number') return Number.isFinite(value) ? null : `${path}: json numbers must be finite`;
  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i += 1) {
      const problem = jsonProblem(value[i], `${path}[${i}]`, depth + 1);
      if (problem) return problem;
    }
    return null;
  }
  if (typeof value === 'object' && isPlainObject(value)) {
    for (const [key, v] of Object.entries(value)) {
      const problem = jsonProblem(v, `${path}.${key}`, depth + 1);
      if (problem) return problem;
    }
    return null;
  }
  return `${path}: not a json value`;
}

export function isJsonValue(value: unknown): value is JsonValue {
  return jsonProblem(value, '$', 0) === null;
}

/**
 * Returns a description of what is wrong with `value`, or `null` when it is well-formed.
 */
export function attributeValueProblem(value: AttributeValue): string | null {
  switch (value.type) {
    case 'bool':
      return typeof value.value === 'boolean' ? null : 'bool attribute must hold a boolean';
    case 'int':
      return Number.isSafeInteger(value.value) ? null : `int attribute must be a safe integer, got: ${value.value}`;
    case 'float':
      return typeof value.value === 'number' ? null : 'float attribute must hold a number';
    case 'string':
      return typeof value.value === 'string' ? null : 'string attribute must hold a string';
    case 'bytes':
      return value.value instanceof Uint8Array ? null : 'bytes attribute must hold a Uint8Array';
    case 'vec3':
      return isFiniteNumbers(value.value, 3) ? null : 'vec3 attribute must hold 3 finite numbers';
    case 'quat':
      return isFiniteNumbers(value.value, 4) ? null : 'quat attribute must hold 4 finite numbers';
    case 'color':
      return value.value.length === 3 && value.value.every((c) => Number.isInteger(c) && c >= 0 && c <= 255)
        ? null
        : 'color attribute must hold 3 integers in [0, 255]';
    case 'mat4':
      return isFiniteNumbers(value.value, 16) ? null : 'mat4 attribute must hold 16 finite numbers';
    case 'float32Array':
      return value.value instanceof Float32Array ? null : 'float32Array attribute must hold a Float32Array';
    case 'uint32Array':
      return value.value instanceof Uint32Array ? null : 'uint32Array attribute must hold a Uint32Array';
    case 'json':
      return jsonProblem(value.value, '$', 0);
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

function jsonEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((v, i) => jsonEqual(v, b[i] ?? null));
  }
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object' || Array.isArray(b)) return false;
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((k) => k in b && jsonEqual(a[k] ?? null, b[k] ?? null));
}

function arrayEqual(a: ArrayLike<number>, b: ArrayLike<number>): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (!Object.is(a[i], b[i])) return false;
  }
  return true;
}

export function attributeValuesEqual(a: AttributeValue, b: AttributeValue): boolean {
  switch (a.type) {
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return a.type === b.type && Object.is(a.value, b.value);
    case 'json':
      return b.type === 'json' && jsonEqual(a.value, b.value);
    case 'bytes':
      return b.type === 'bytes' && arrayEqual(a.value, b.value);
    case 'vec3':
      return b.type === 'vec3' && arrayEqual(a.value, b.value);
    case 'quat':
      return b.type === 'quat' && arrayEqual(a.value, b.value);
    case 'color':
      return b.type === 'color' && arrayEqual(a.value, b.value);
    case 'mat4':
      return b.type === 'mat4' && arrayEqual(a.value, b.value);
    case 'float32Array':
      return b.type === 'float32Array' && arrayEqual(a.value, b.value);
    case 'uint32Array':
      return b.type === 'uint32Array' && arrayEqual(a.value, b.value);
    default: {
      const _exhaustive: never = a;
      return _exhaustive;
    }
  }
}

/**
 * Deep copy, so records held by the store never alias caller-owned buffers.
 */
export function cloneAttributeValue(value: AttributeValue): AttributeValue {
  switch (value.type) {
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return { ...value };
    case 'bytes':
      return { type: 'bytes', value: new Uint8Array(value.value) };
    case 'vec3':
      return { type: 'vec3', value: [value.value[0], value.value[1], value.value[2]] };
    case 'quat':
      return { type: 'quat', value: [value.value[0], value.value[1], value.value[2], value.value[3]] };
    case 'color':
      return { type: 'color', value: [value.value[0], value.value[1], value.value[2]] };
    case 'mat4':
      return { type: 'mat4', value: value.value.slice() };
    case 'float32Array':
      return { type: 'float32Array', value: value.value.slice() };
    case 'uint32Array':
      return { type: 'uint32Array', value: value.value.slice() };
    case 'json':
      return { type: 'json', value: structuredClone(value.value) };
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

function normalizeJson(value: JsonValue): JsonValue {
  if (typeof value === 'number') return Object.is(value, -0) ? 0 : value;
  if (value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map(normalizeJson);
  return Object.fromEntries(Object.entries(value).map(([key, item]): [string, JsonValue] => [key, normalizeJson(item)]));
}

/**
 * Copy of `value` in the form it takes after a trip over the wire: CBOR integers carry no sign
 * for zero, so `-0` in `int` and `json` values becomes `0`.
 */
export function normalizeAttributeValue(value: AttributeValue): AttributeValue {
  switch (value.type) {
    case 'int':
      return { type: 'int', value: Object.is(value.value, -0) ? 0 : value.value };
    case 'json':
      return { type: 'json', value: normalizeJson(value.value) };
    default:
      return cloneAttributeValue(value);
  }
}

export function cloneAttributes(attributes: Attributes): Attributes {
  const out: Attributes = new Map();
  for (const [name, value] of attributes) out.set(name, cloneAttributeValue(value));
  return out;
}

function entriesOf<V>(input: Map<string, V> | Record<string, V>): [string, V][] {
  return input instanceof Map ? Array.from(input.entries()) : Object.entries(input);
}

/**
 * Validate and copy caller-supplied attributes. Throws on the first problem found.
 */
export function toAttributes(input: AttributesInput = new Map()): Attributes {
  const out: Attributes = new Map();
  for (const [name, value] of entriesOf(input)) {
    const nameIssue = attributeNameProblem(name);
    if (nameIssue) throw new Error(nameIssue);
    const valueIssue = attributeValueProblem(value);
    if (valueIssue) throw new Error(`attribute ${JSON.stringify(name)}: ${valueIssue}`);
    out.set(name, normalizeAttributeValue(value));
  }
  return out;
}

export function toAttributeDelta(input: AttributeDeltaInput): AttributeDelta {
  const out: AttributeDelta = new Map();
  for (const [name, value] of entriesOf(input)) {
    const nameIssue = attributeNameProblem(name);
    if (nameIssue) throw new Error(nameIssue);
    if (value === null) {
      out.set(name, null);
      continue;
    }
    const valueIssue = attributeValueProblem(value);
    if (valueIssue) throw new Error(`attribute ${JSON.stringify(name)}: ${valueIssue}`);
    out.set(name, normalizeAttributeValue(value));
  }
  return out;
}
