export type NodeId = string;
export type Revision = number;
export type Seq = number;

export const NODE_KINDS = [
  'group',
  'frame',
  'mesh',
  'pointCloud',
  'image',
  'camera',
  'label',
  'grid',
  'light',
  'control',
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type AttributeValue =
  | { type: 'bool'; value: boolean }
  | { type: 'int'; value: number }
  | { type: 'float'; value: number }
  | { type: 'string'; value: string }
  | { type: 'bytes'; value: Uint8Array }
  | { type: 'vec3'; value: [number, number, number] }
  /** Rotation quaternion, `wxyz` order. */
  | { type: 'quat'; value: [number, number, number, number] }
  /** RGB, each channel an integer in `[0, 255]`. */
  | { type: 'color'; value: [number, number, number] }
  /** 4x4 matrix, 16 numbers in column-major order. */
  | { type: 'mat4'; value: number[] }
  | { type: 'float32Array'; value: Float32Array }
  | { type: 'uint32Array'; value: Uint32Array }
  | { type: 'json'; value: JsonValue };

export type AttributeType = AttributeValue['type'];

export type AttributeOf<T extends AttributeType> = Extract<AttributeValue, { type: T }>;

/**
 * Ordered attribute set. Insertion order is preserved on the wire and in snapshots.
 */
export type Attributes = Map<string, AttributeValue>;

/**
 * Partial attribute change: `null` removes the attribute.
 */
export type AttributeDelta = Map<string, AttributeValue | null>;

export type AttributesInput = Attributes | Record<string, AttributeValue>;
export type AttributeDeltaInput = AttributeDelta | Record<string, AttributeValue | null>;

export type NodeRecord = {
  id: NodeId;
  parent: NodeId | null;
  kind: NodeKind;
  attributes: Attributes;
  /** Per-identifier version, bumped on every change to this node. */
  revision: Revision;
  /** Store-wide sequence number of the last change to this node. */
  seq: Seq;
};

export type ControlValueOrigin = 'server' | 'client';

const NODE_KIND_SET: ReadonlySet<string> = new Set(NODE_KINDS);

export function isNodeKind(value: unknown): value is NodeKind {
  return typeof value === 'string' && NODE_KIND_SET.has(value);
}

export * from './ids.js';
export * from './attributes.js';
