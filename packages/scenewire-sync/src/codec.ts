import { decode as cborDecode, encode as cborEncode } from "cborg";

import type {
  AttributeDelta,
  AttributeValue,
  Attributes,
  ControlValueOrigin,
} from "@scenewire/interface";
import {
  attributeNameProblem,
  attributeValueProblem,
  identifierProblem,
  isAttributeType,
  isJsonValue,
  isNodeKind,
} from "@scenewire/interface";

import { errorMessage, malformed } from "./errors.js";
import type { SceneMessage, SceneMessageType } from "./types.js";

/**
 * Frame layout (header is big-endian):
 * `"SW" || u8 version || u8 kind || u64 seq || u64 revision || u16 idLen || u32 payloadLen || id || payload`
 *
 * The payload is CBOR. Numeric vectors and typed arrays travel inside it as little-endian byte
 * strings so their width never depends on CBOR's shortest-float rules.
 */
export const FRAME_MAGIC = new Uint8Array([0x53, 0x57]);
export const FRAME_VERSION = 1;
export const FRAME_HEADER_BYTES = 26;
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024;

const MAX_ID_BYTES = 0xffff;

const KIND_CODES = {
  createNode: 1,
  updateNode: 2,
  removeNode: 3,
  controlValue: 4,
  bootstrapComplete: 5,
} as const satisfies Record<SceneMessageType, number>;

const KIND_BY_CODE = new Map<number, SceneMessageType>([
  [KIND_CODES.createNode, "createNode"],
  [KIND_CODES.updateNode, "updateNode"],
  [KIND_CODES.removeNode, "removeNode"],
  [KIND_CODES.controlValue, "controlValue"],
  [KIND_CODES.bootstrapComplete, "bootstrapComplete"],
]);

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

export type FrameHeader = {
  type: SceneMessageType;
  seq: number;
  revision: number;
  idLength: number;
  payloadLength: number;
  frameLength: number;
};

function u64ToNumber(v: bigint, field: string): number {
  if (v > BigInt(Number.MAX_SAFE_INTEGER)) throw malformed(`${field} too large for number: ${v}`);
  return Number(v);
}

function u64FromNumber(v: number, field: string): bigint {
  if (!Number.isSafeInteger(v) || v < 0) throw new Error(`${field} must be a safe non-negative integer, got: ${v}`);
  return BigInt(v);
}

function f64le(values: readonly number[]): Uint8Array {
  const out = new Uint8Array(values.length * 8);
  const view = new DataView(out.buffer);
  values.forEach((v, i) => view.setFloat64(i * 8, v, true));
  return out;
}

function readF64le(bytes: Uint8Array, field: string): number[] {
  if (bytes.byteLength % 8 !== 0) throw malformed(`${field}: byte length ${bytes.byteLength} is not a multiple of 8`);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out: number[] = [];
  for (let i = 0; i < bytes.byteLength; i += 8) out.push(view.getFloat64(i, true));
  return out;
}

function f32ArrayToBytes(values: Float32Array): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const view = new DataView(out.buffer);
  for (let i = 0; i < values.length; i += 1) view.setFloat32(i * 4, values[i] ?? 0, true);
  return out;
}

function u32ArrayToBytes(values: Uint32Array): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const view = new DataView(out.buffer);
  for (let i = 0; i < values.length; i += 1) view.setUint32(i * 4, values[i] ?? 0, true);
  return out;
}

function bytesToF32Array(bytes: Uint8Array, field: string): Float32Array {
  if (bytes.byteLength % 4 !== 0) throw malformed(`${field}: byte length ${bytes.byteLength} is not a multiple of 4`);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out = new Float32Array(bytes.byteLength / 4);
  for (let i = 0; i < out.length; i += 1) out[i] = view.getFloat32(i * 4, true);
  return out;
}

function bytesToU32Array(bytes: Uint8Array, field: string): Uint32Array {
  if (bytes.byteLength % 4 !== 0) throw malformed(`${field}: byte length ${bytes.byteLength} is not a multiple of 4`);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out = new Uint32Array(bytes.byteLength / 4);
  for (let i = 0; i < out.length; i += 1) out[i] = view.getUint32(i * 4, true);
  return out;
}

function toWireValue(value: AttributeValue): [string, unknown] {
  switch (value.type) {
    case "bool":
    case "int":
    case "string":
      return [value.type, value.value];
    case "float":
      return [value.type, f64le([value.value])];
    case "bytes":
      return [value.type, value.value];
    case "vec3":
    case "quat":
    case "mat4":
      return [value.type, f64le(value.value)];
    case "color":
      return [value.type, new Uint8Array(value.value)];
    case "float32Array":
      return [value.type, f32ArrayToBytes(value.value)];
    case "uint32Array":
      return [value.type, u32ArrayToBytes(value.value)];
    case "json":
      return [value.type, value.value];
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

function expectBytes(data: unknown, field: string): Uint8Array {
  if (!(data instanceof Uint8Array)) throw malformed(`${field} must be bstr`);
  return data;
}

function fixedF64(data: unknown, field: string, n: number): number[] {
  const values = readF64le(expectBytes(data, field), field);
  if (values.length !== n) throw malformed(`${field} must hold ${n} numbers, got ${values.length}`);
  return values;
}

function fromWireValue(tag: unknown, data: unknown, field: string): AttributeValue {
  if (!isAttributeType(tag)) throw malformed(`${field}: unknown attribute type ${JSON.stringify(tag)}`);

  let value: AttributeValue;
  switch (tag) {
    case "bool":
      if (typeof data !== "boolean") throw malformed(`${field} must be bool`);
      value = { type: tag, value: data };
      break;
    case "int":
      if (typeof data !== "number") throw malformed(`${field} must be int`);
      value = { type: tag, value: data };
      break;
    case "float": {
      const [v] = fixedF64(data, field, 1);
      value = { type: tag, value: v ?? 0 };
      break;
    }
    case "string":
      if (typeof data !== "string") throw malformed(`${field} must be tstr`);
      value = { type: tag, value: data };
      break;
    case "bytes":
      value = { type: tag, value: new Uint8Array(expectBytes(data, field)) };
      break;
    case "vec3": {
      const [x = 0, y = 0, z = 0] = fixedF64(data, field, 3);
      value = { type: tag, value: [x, y, z] };
      break;
    }
    case "quat": {
      const [w = 0, x = 0, y = 0, z = 0] = fixedF64(data, field, 4);
      value = { type: tag, value: [w, x, y, z] };
      break;
    }
    case "mat4":
      value = { type: tag, value: fixedF64(data, field, 16) };
      break;
    case "color": {
      const bytes = expectBytes(data, field);
      if (bytes.length !== 3) throw malformed(`${field} must hold 3 bytes`);
      value = { type: tag, value: [bytes[0] ?? 0, bytes[1] ?? 0, bytes[2] ?? 0] };
      break;
    }
    case "float32Array":
      value = { type: tag, value: bytesToF32Array(expectBytes(data, field), field) };
      break;
    case "uint32Array":
      value = { type: tag, value: bytesToU32Array(expectBytes(data, field), field) };
      break;
    case "json":
      if (!isJsonValue(data)) throw malformed(`${field} must be a json value`);
      value = { type: tag, value: data };
      break;
    default: {
      const _exhaustive: never = tag;
      return _exhaustive;
    }
  }

  const problem = attributeValueProblem(value);
  if (problem) throw malformed(`${field}: ${problem}`);
  return value;
}

function expectArray(value: unknown, field: string, length?: number): unknown[] {
  if (!Array.isArray(value)) throw malformed(`${field} must be an array`);
  if (length !== undefined && value.length !== length) {
    throw malformed(`${field} must have ${length} items, got ${value.length}`);
  }
  return value;
}

function expectName(value: unknown, field: string): string {
  const problem = attributeNameProblem(value);
  if (problem || typeof value !== "string") throw malformed(`${field}: ${problem ?? "invalid name"}`);
  return value;
}

function encodeAttributes(attributes: Attributes): unknown[] {
  return Array.from(attributes, ([name, value]) => [name, ...toWireValue(value)]);
}

function decodeAttributes(value: unknown): Attributes {
  const out: Attributes = new Map();
  for (const [i, entry] of expectArray(value, "attributes").entries()) {
    const [name, tag, data] = expectArray(entry, `attributes[${i}]`, 3);
    const attrName = expectName(name, `attributes[${i}].name`);
    if (out.has(attrName)) throw malformed(`duplicate attribute ${JSON.stringify(attrName)}`);
    out.set(attrName, fromWireValue(tag, data, `attributes[${i}]`));
  }
  return out;
}

function encodeDelta(delta: AttributeDelta): unknown[] {
  return Array.from(delta, ([name, value]) => (value === null ? [name] : [name, ...toWireValue(value)]));
}

function decodeDelta(value: unknown): AttributeDelta {
  const out: AttributeDelta = new Map();
  for (const [i, entry] of expectArray(value, "delta").entries()) {
    const items = expectArray(entry, `delta[${i}]`);
    if (items.length !== 1 && items.length !== 3) throw malformed(`delta[${i}] must have 1 or 3 items`);
    const attrName = expectName(items[0], `delta[${i}].name`);
    if (out.has(attrName)) throw malformed(`duplicate attribute ${JSON.stringify(attrName)}`);
    out.set(attrName, items.length === 1 ? null : fromWireValue(items[1], items[2], `delta[${i}]`));
  }
  return out;
}

function decodeOrigin(value: unknown): ControlValueOrigin {
  if (value !== "server" && value !== "client") throw malformed(`invalid control origin: ${JSON.stringify(value)}`);
  return value;
}

function encodePayload(msg: SceneMessage): unknown[] {
  switch (msg.type) {
    case "createNode":
      return [msg.parent, msg.kind, encodeAttributes(msg.attributes)];
    case "updateNode":
      return [encodeDelta(msg.delta)];
    case "removeNode":
      return [];
    case "controlValue":
      return [toWireValue(msg.value), msg.origin];
    case "bootstrapComplete":
      return [msg.nodeCount];
    default: {
      const _exhaustive: never = msg;
      return _exhaustive;
    }
  }
}

export function encodeMessage(msg: SceneMessage): Uint8Array {
  const id = msg.type === "bootstrapComplete" ? "" : msg.id;
  const revision = msg.type === "bootstrapComplete" ? 0 : msg.revision;
  const idBytes = textEncoder.encode(id);
  if (idBytes.length > MAX_ID_BYTES) throw new Error(`identifier too long for frame: ${idBytes.length} bytes`);
  const payload = cborEncode(encodePayload(msg));

  const out = new Uint8Array(FRAME_HEADER_BYTES + idBytes.length + payload.length);
  const view = new DataView(out.buffer);
  out.set(FRAME_MAGIC, 0);
  view.setUint8(2, FRAME_VERSION);
  view.setUint8(3, KIND_CODES[msg.type]);
  view.setBigUint64(4, u64FromNumber(msg.seq, "seq"), false);
  view.setBigUint64(12, u64FromNumber(revision, "revision"), false);
  view.setUint16(20, idBytes.length, false);
  view.setUint32(22, payload.length, false);
  out.set(idBytes, FRAME_HEADER_BYTES);
  out.set(payload, FRAME_HEADER_BYTES + idBytes.length);
  return out;
}

/**
 * Parse and validate a frame header. Returns `null` when fewer than `FRAME_HEADER_BYTES` are
 * available.
 */
export function readFrameHeader(
  bytes: Uint8Array,
  maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES
): FrameHeader | null {
  if (bytes.byteLength < FRAME_HEADER_BYTES) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (bytes[0] !== FRAME_MAGIC[0] || bytes[1] !== FRAME_MAGIC[1]) throw malformed("bad frame magic");
  const version = view.getUint8(2);
  if (version !== FRAME_VERSION) throw malformed(`unsupported frame version: ${version}`);
  const code = view.getUint8(3);
  const type = KIND_BY_CODE.get(code);
  if (!type) throw malformed(`unknown message kind: ${code}`);

  const seq = u64ToNumber(view.getBigUint64(4, false), "seq");
  const revision = u64ToNumber(view.getBigUint64(12, false), "revision");
  const idLength = view.getUint16(20, false);
  const payloadLength = view.getUint32(22, false);
  const frameLength = FRAME_HEADER_BYTES + idLength + payloadLength;
  if (frameLength > maxFrameBytes) {
    throw malformed(`frame of ${frameLength} bytes exceeds limit of ${maxFrameBytes} bytes`);
  }
  return { type, seq, revision, idLength, payloadLength, frameLength };
}

function decodeCbor(bytes: Uint8Array): unknown {
  try {
    return cborDecode(bytes);
  } catch (err) {
    throw malformed(`payload is not valid CBOR: ${errorMessage(err)}`, { cause: err });
  }
}

function decodeIdentifier(bytes: Uint8Array): string {
  let id: string;
  try {
    id = textDecoder.decode(bytes);
  } catch (err) {
    throw malformed("identifier is not valid UTF-8", { cause: err });
  }
  return id;
}

/**
 * Decode exactly one frame. Any defect (header, truncation, trailing bytes, payload shape) is a
 * `MALFORMED_MESSAGE` error.
 */
export function decodeMessage(bytes: Uint8Array, maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES): SceneMessage {
  const header = readFrameHeader(bytes, maxFrameBytes);
  if (!header) throw malformed(`truncated frame header: ${bytes.byteLength} bytes`);
  if (bytes.byteLength < header.frameLength) {
    throw malformed(`truncated frame: expected ${header.frameLength} bytes, got ${bytes.byteLength}`);
  }
  if (bytes.byteLength > header.frameLength) {
    throw malformed(`trailing bytes after frame: expected ${header.frameLength} bytes, got ${bytes.byteLength}`);
  }

  const idStart = FRAME_HEADER_BYTES;
  const payloadStart = idStart + header.idLength;
  const id = decodeIdentifier(bytes.subarray(idStart, payloadStart));
  const payload = expectArray(decodeCbor(bytes.subarray(payloadStart, header.frameLength)), "payload");
  const { seq, revision } = header;

  if (header.type === "bootstrapComplete") {
    if (id !== "") throw malformed("bootstrapComplete must not carry an identifier");
    const [nodeCount] = expectArray(payload, "bootstrapComplete payload", 1);
    if (typeof nodeCount !== "number" || !Number.isSafeInteger(nodeCount) || nodeCount < 0) {
      throw malformed("bootstrapComplete nodeCount must be a non-negative integer");
    }
    return { type: "bootstrapComplete", seq, nodeCount };
  }

  const idIssue = identifierProblem(id);
  if (idIssue) throw malformed(idIssue, { identifier: id });

  switch (header.type) {
    case "createNode": {
      const [parent, kind, attributes] = expectArray(payload, "createNode payload", 3);
      let parentId: string | null = null;
      if (parent !== null) {
        if (typeof parent !== "string") throw malformed("parent must be tstr or null", { identifier: id });
        const parentIssue = identifierProblem(parent);
        if (parentIssue) throw malformed(`parent ${parentIssue}`, { identifier: id });
        parentId = parent;
      }
      if (!isNodeKind(kind)) throw malformed(`unknown node kind: ${JSON.stringify(kind)}`, { identifier: id });
      return { type: "createNode", id, parent: parentId, kind, attributes: decodeAttributes(attributes), revision, seq };
    }
    case "updateNode": {
      const [delta] = expectArray(payload, "updateNode payload", 1);
      return { type: "updateNode", id, delta: decodeDelta(delta), revision, seq };
    }
    case "removeNode":
      expectArray(payload, "removeNode payload", 0);
      return { type: "removeNode", id, revision, seq };
    case "controlValue": {
      const [value, origin] = expectArray(payload, "controlValue payload", 2);
      const [tag, data] = expectArray(value, "controlValue value", 2);
      return {
        type: "controlValue",
        id,
        value: fromWireValue(tag, data, "controlValue value"),
        origin: decodeOrigin(origin),
        revision,
        seq,
      };
    }
    default: {
      const _exhaustive: never = header.type;
      return _exhaustive;
    }
  }
}
