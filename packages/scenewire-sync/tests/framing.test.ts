import { expect, test } from "vitest";

import { attr } from "@scenewire/interface";

import { encodeMessage } from "../src/codec.js";
import { SceneErrorCode, isSceneSyncError } from "../src/errors.js";
import { FrameReader, concatBytes } from "../src/framing.js";
import type { SceneMessage } from "../src/types.js";

const root: SceneMessage = {
  type: "createNode",
  id: "/a",
  parent: null,
  kind: "frame",
  attributes: new Map(),
  revision: 1,
  seq: 1,
};

const messages: SceneMessage[] = [
  root,
  {
    type: "createNode",
    id: "/a/points",
    parent: "/a",
    kind: "pointCloud",
    attributes: new Map([["points", attr.float32Array([1, 2, 3, 4, 5, 6])]]),
    revision: 1,
    seq: 2,
  },
  { type: "updateNode", id: "/a", delta: new Map([["label", attr.string("frame a")]]), revision: 2, seq: 3 },
  { type: "removeNode", id: "/a/points", revision: 2, seq: 4 },
  { type: "bootstrapComplete", seq: 4, nodeCount: 1 },
];

const stream = concatBytes(messages.map(encodeMessage));

function splitEvery(bytes: Uint8Array, size: number): Uint8Array[] {
  const out: Uint8Array[] = [];
  for (let offset = 0; offset < bytes.length; offset += size) out.push(bytes.subarray(offset, offset + size));
  return out;
}

test("reassembles frames from any chunk size", () => {
  for (const size of [1, 2, 7, 26, 27, 64, stream.length]) {
    const reader = new FrameReader();
    const decoded = splitEvery(stream, size).flatMap((chunk) => reader.push(chunk));
    expect(decoded).toEqual(messages);
    expect(reader.bufferedBytes).toBe(0);
  }
});

test("keeps a partial frame buffered until it completes", () => {
  const first = encodeMessage(root);
  const reader = new FrameReader();
  expect(reader.push(first.subarray(0, 30))).toEqual([]);
  expect(reader.bufferedBytes).toBe(30);
  expect(reader.push(first.subarray(30))).toEqual([root]);
});

test("rejects an oversized frame as soon as its header arrives and stays failed", () => {
  const reader = new FrameReader({ maxFrameBytes: 40 });
  const big = encodeMessage({
    type: "createNode",
    id: "/big",
    parent: null,
    kind: "image",
    attributes: new Map([["data", attr.bytes(new Uint8Array(64))]]),
    revision: 1,
    seq: 1,
  });

  let first: unknown;
  try {
    reader.push(big.subarray(0, 26));
  } catch (err) {
    first = err;
  }
  expect(isSceneSyncError(first, SceneErrorCode.MALFORMED_MESSAGE)).toBe(true);
  expect(() => reader.push(new Uint8Array(0))).toThrow(/exceeds limit of 40 bytes/);
});

test("rejects garbage in the stream", () => {
  const reader = new FrameReader();
  expect(() => reader.push(new Uint8Array(26).fill(0x41))).toThrow("MALFORMED_MESSAGE: bad frame magic");
});
