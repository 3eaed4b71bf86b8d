import { expect, test } from "vitest";
import { encode as cborEncode } from "cborg";

import type { AttributeValue } from "@scenewire/interface";
import { attr, toAttributes } from "@scenewire/interface";

import { FRAME_HEADER_BYTES, decodeMessage, encodeMessage, readFrameHeader } from "../src/codec.js";
import { SceneErrorCode, SceneSyncError } from "../src/errors.js";
import type { CreateNodeMessage, SceneMessage } from "../src/types.js";

function rawFrame(kind: number, id: string, payload: Uint8Array, header: { magic?: number; version?: number } = {}) {
  const idBytes = new TextEncoder().encode(id);
  const out = new Uint8Array(FRAME_HEADER_BYTES + idBytes.length + payload.length);
  const view = new DataView(out.buffer);
  view.setUint8(0, header.magic ?? 0x53);
  view.setUint8(1, 0x57);
  view.setUint8(2, header.version ?? 1);
  view.setUint8(3, kind);
  view.setBigUint64(4, 1n, false);
  view.setBigUint64(12, 1n, false);
  view.setUint16(20, idBytes.length, false);
  view.setUint32(22, payload.length, false);
  out.set(idBytes, FRAME_HEADER_BYTES);
  out.set(payload, FRAME_HEADER_BYTES + idBytes.length);
  return out;
}

function expectMalformed(fn: () => unknown, fragment: string): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(SceneSyncError);
  if (!(caught instanceof SceneSyncError)) return;
  expect(caught.code).toBe(SceneErrorCode.MALFORMED_MESSAGE);
  expect(caught.message).toContain(fragment);
}

const everyAttributeType: CreateNodeMessage = {
  type: "createNode",
  id: "/world/robot",
  parent: "/world",
  kind: "mesh",
  attributes: new Map([
    ["visible", attr.bool(true)],
    ["count", attr.int(-42)],
    ["opacity", attr.float(0.1)],
    ["name", attr.string("robot ✓")],
    ["blob", attr.bytes(new Uint8Array([0, 1, 254, 255]))],
    ["position", attr.vec3(1.5, -2, 1e-9)],
    ["rotation", attr.quat(1, 0, 0, 0)],
    ["color", attr.color(255, 128, 0)],
    ["transform", attr.mat4([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0.25, 0.5, 0.75, 1])],
    ["vertices", attr.float32Array([0.5, -1.25, 3])],
    ["indices", attr.uint32Array([0, 1, 4294967295])],
    ["meta", attr.json({ tags: ["a", "b"], scale: 2.5, extra: null, nested: { ok: true } })],
  ]),
  revision: 3,
  seq: 17,
};

test("round trips every attribute type exactly", () => {
  expect(decodeMessage(encodeMessage(everyAttributeType))).toEqual(everyAttributeType);
});

test("int and json zero lose their sign on the wire, so attributes are normalized first", () => {
  const negative: CreateNodeMessage = {
    type: "createNode",
    id: "/zero",
    parent: null,
    kind: "label",
    attributes: new Map([["n", attr.int(-0)]]),
    revision: 1,
    seq: 1,
  };
  const decoded = decodeMessage(encodeMessage(negative));
  expect(decoded.type === "createNode" ? Object.is(decoded.attributes.get("n")?.value, 0) : false).toBe(true);

  const normalized: CreateNodeMessage = {
    ...negative,
    attributes: toAttributes({ n: attr.int(-0), doc: attr.json([-0, { z: -0 }]) }),
  };
  expect(decodeMessage(encodeMessage(normalized))).toEqual(normalized);
});

test("round trips each message kind", () => {
  const messages: SceneMessage[] = [
    { type: "createNode", id: "/root", parent: null, kind: "group", attributes: new Map(), revision: 1, seq: 1 },
    {
      type: "updateNode",
      id: "/root",
      delta: new Map<string, AttributeValue | null>([
        ["label", attr.string("hi")],
        ["old", null],
      ]),
      revision: 2,
      seq: 2,
    },
    { type: "removeNode", id: "/root", revision: 3, seq: 3 },
    { type: "controlValue", id: "/gui/speed", value: attr.float(0.5), origin: "client", revision: 0, seq: 0 },
    { type: "bootstrapComplete", seq: 12, nodeCount: 4 },
  ];
  for (const message of messages) expect(decodeMessage(encodeMessage(message))).toEqual(message);
});

test("header carries magic, version, kind, seq, revision and lengths", () => {
  const bytes = encodeMessage({ type: "removeNode", id: "/a", revision: 7, seq: 300 });
  expect(Array.from(bytes.subarray(0, 4))).toEqual([0x53, 0x57, 1, 3]);
  expect(readFrameHeader(bytes)).toEqual({
    type: "removeNode",
    seq: 300,
    revision: 7,
    idLength: 2,
    payloadLength: 1,
    frameLength: FRAME_HEADER_BYTES + 2 + 1,
  });
  expect(readFrameHeader(bytes.subarray(0, FRAME_HEADER_BYTES - 1))).toBeNull();
});

test("large payloads round trip", () => {
  const big = new Uint8Array(2 * 1024 * 1024);
  for (let i = 0; i < big.length; i += 1) big[i] = i % 251;
  const message: CreateNodeMessage = {
    type: "createNode",
    id: "/image",
    parent: null,
    kind: "image",
    attributes: new Map([["data", attr.bytes(big)]]),
    revision: 1,
    seq: 1,
  };
  expect(decodeMessage(encodeMessage(message))).toEqual(message);
});

test("rejects malformed frames", () => {
  const good = encodeMessage({ type: "removeNode", id: "/a", revision: 1, seq: 1 });

  expectMalformed(() => decodeMessage(rawFrame(3, "/a", cborEncode([]), { magic: 0x00 })), "bad frame magic");
  expectMalformed(() => decodeMessage(rawFrame(3, "/a", cborEncode([]), { version: 2 })), "unsupported frame version: 2");
  expectMalformed(() => decodeMessage(rawFrame(9, "/a", cborEncode([]))), "unknown message kind: 9");
  expectMalformed(() => decodeMessage(good.subarray(0, 10)), "truncated frame header: 10 bytes");
  expectMalformed(
    () => decodeMessage(good.subarray(0, good.length - 1)),
    `truncated frame: expected ${good.length} bytes, got ${good.length - 1}`
  );
  const trailing = new Uint8Array(good.length + 1);
  trailing.set(good);
  expectMalformed(() => decodeMessage(trailing), "trailing bytes after frame");
  expectMalformed(() => decodeMessage(rawFrame(3, "/a", new Uint8Array([0xff]))), "payload is not valid CBOR");
  expectMalformed(() => decodeMessage(rawFrame(1, "/a", cborEncode([null, "teapot", []]))), 'unknown node kind: "teapot"');
  expectMalformed(() => decodeMessage(rawFrame(3, "/a", cborEncode([1]))), "removeNode payload must have 0 items, got 1");
  expectMalformed(() => decodeMessage(rawFrame(3, "", cborEncode([]))), "identifier must not be empty");
  expectMalformed(
    () => decodeMessage(rawFrame(4, "/a", cborEncode([["float", new Uint8Array(3)], "client"]))),
    "byte length 3 is not a multiple of 8"
  );
  expectMalformed(
    () => decodeMessage(rawFrame(4, "/a", cborEncode([["float", new Uint8Array(8)], "peer"]))),
    'invalid control origin: "peer"'
  );
  expectMalformed(
    () => decodeMessage(rawFrame(1, "/a", cborEncode([null, "group", [["x", "vec9", 1]]]))),
    'unknown attribute type "vec9"'
  );
});

test("rejects frames over the size limit from the header alone", () => {
  const bytes = encodeMessage({
    type: "createNode",
    id: "/blob",
    parent: null,
    kind: "group",
    attributes: new Map([["data", attr.bytes(new Uint8Array(100))]]),
    revision: 1,
    seq: 1,
  });
  expectMalformed(() => readFrameHeader(bytes.subarray(0, FRAME_HEADER_BYTES), 64), "exceeds limit of 64 bytes");
});

test("encoding refuses values the header cannot carry", () => {
  expect(() => encodeMessage({ type: "removeNode", id: "/a", revision: -1, seq: 1 })).toThrow(
    "revision must be a safe non-negative integer, got: -1"
  );
});
