import { expect, test } from "vitest";

import { attr } from "@scenewire/interface";

import { SceneErrorCode } from "../src/errors.js";
import type { SceneSyncError } from "../src/errors.js";
import { createSceneServer } from "../src/scene.js";
import { createInMemoryDuplex } from "../src/transport.js";
import type { ByteStreamTransport } from "../src/transport.js";
import { byId, connectClient, tick, waitUntil, withTimeout } from "./harness.js";

test("remove of a subtree reaches the client children first and leaves nothing behind", async () => {
  const scene = createSceneServer();
  const { client, received, errors } = connectClient(scene);
  await withTimeout(client.ready, 2_000, "bootstrap");

  const a = scene.createNode({ id: "A", kind: "group" });
  scene.createNode({ id: "B", parent: "A", kind: "mesh" });
  scene.getHandle("B")?.update({ color: attr.color(255, 0, 0) });
  a.remove();

  await waitUntil(() => client.lastSeq === scene.store.seq);
  expect(received.map((m) => (m.type === "bootstrapComplete" ? [m.type] : [m.type, m.id]))).toEqual([
    ["bootstrapComplete"],
    ["createNode", "A"],
    ["createNode", "B"],
    ["updateNode", "B"],
    ["removeNode", "B"],
    ["removeNode", "A"],
  ]);
  const update = received[3];
  expect(update?.type === "updateNode" ? update.delta : undefined).toEqual(new Map([["color", attr.color(255, 0, 0)]]));
  expect(client.nodes.size).toBe(0);
  expect(errors).toEqual([]);
  scene.close();
});

test("a client's control value reaches the other clients but not the sender", async () => {
  const scene = createSceneServer();
  const slider = scene.registerControl({ id: "/gui/slider", spec: { type: "slider", initial: 0, min: 0, max: 10 } });
  const one = connectClient(scene, { id: "one" });
  const two = connectClient(scene, { id: "two" });
  await withTimeout(Promise.all([one.client.ready, two.client.ready]), 2_000, "bootstrap");

  await one.client.sendControlValue("/gui/slider", attr.float(5));
  await waitUntil(() => two.received.some((m) => m.type === "controlValue"));
  await scene.flush();

  const controlMessages = two.received.filter((m) => m.type === "controlValue");
  expect(controlMessages).toEqual([
    { type: "controlValue", id: "/gui/slider", value: attr.float(5), origin: "client", revision: 2, seq: 2 },
  ]);
  expect(one.received.filter((m) => m.type === "controlValue")).toEqual([]);
  expect(slider.value).toBe(5);
  expect(one.client.nodes.get("/gui/slider")?.attributes.get("value")).toEqual(attr.float(5));
  expect(two.client.nodes.get("/gui/slider")?.attributes.get("value")).toEqual(attr.float(5));
  scene.close();
});

test("an overflowing session is dropped while the others receive every mutation", async () => {
  const sessionErrors: SceneSyncError[] = [];
  const scene = createSceneServer({
    limits: { maxQueuedMessages: 5 },
    onSessionError: (err) => sessionErrors.push(err),
  });
  scene.createNode({ id: "/world", kind: "frame" });

  const healthy = connectClient(scene, { id: "healthy" });
  await withTimeout(healthy.client.ready, 2_000, "bootstrap");

  // A consumer whose writes never complete.
  const [serverEnd] = createInMemoryDuplex();
  const stalled: ByteStreamTransport = { ...serverEnd, send: () => new Promise<void>(() => {}) };
  const slow = scene.connectClient(stalled, { id: "slow" });

  // The producer never waits for the slow consumer; the healthy one drains between bursts.
  for (let i = 0; i < 50; i += 1) {
    scene.createNode({ id: `/world/n${i}`, parent: "/world", kind: "label", attributes: { i: attr.int(i) } });
    if (i % 4 === 3) await tick();
  }

  expect(slow.state).toBe("closed");
  expect(sessionErrors.map((e) => [e.code, e.sessionId])).toEqual([[SceneErrorCode.QUEUE_OVERFLOW, "slow"]]);
  expect(scene.sessions().map((s) => s.id)).toEqual(["healthy"]);

  await waitUntil(() => healthy.client.lastSeq === scene.store.seq);
  expect(healthy.client.nodes).toEqual(byId(scene.store.snapshot().records));
  expect(healthy.errors).toEqual([]);
  expect(scene.store.size).toBe(51);
  scene.close();
});

test("a producer value racing a client value leaves every client on the value the server applied last", async () => {
  const scene = createSceneServer();
  const speed = scene.registerControl({ id: "/gui/speed", spec: { type: "slider", initial: 0, min: 0, max: 10 } });
  const one = connectClient(scene, { id: "one" });
  const two = connectClient(scene, { id: "two" });
  await withTimeout(Promise.all([one.client.ready, two.client.ready]), 2_000, "bootstrap");

  // The client's value is still in flight when the producer sets its own.
  const sent = one.client.sendControlValue("/gui/speed", attr.float(5));
  speed.setValue(7);
  await sent;
  await waitUntil(() => one.client.lastSeq === scene.store.seq && two.client.lastSeq === scene.store.seq);
  await scene.flush();

  expect(speed.value).toBe(5);
  expect(one.received.filter((m) => m.type === "controlValue")).toEqual([
    { type: "controlValue", id: "/gui/speed", value: attr.float(7), origin: "server", revision: 2, seq: 2 },
    { type: "controlValue", id: "/gui/speed", value: attr.float(5), origin: "client", revision: 3, seq: 3 },
  ]);
  for (const { client, errors } of [one, two]) {
    expect(errors).toEqual([]);
    expect(client.nodes.get("/gui/speed")?.attributes.get("value")).toEqual(attr.float(5));
  }
  scene.close();
});

test("successive values from one client are not sent back to it", async () => {
  const scene = createSceneServer();
  const speed = scene.registerControl({ id: "/gui/speed", spec: { type: "slider", initial: 0, min: 0, max: 10 } });
  const one = connectClient(scene, { id: "one" });
  const two = connectClient(scene, { id: "two" });
  await withTimeout(Promise.all([one.client.ready, two.client.ready]), 2_000, "bootstrap");

  await one.client.sendControlValue("/gui/speed", attr.float(3));
  await waitUntil(() => speed.value === 3);
  await one.client.sendControlValue("/gui/speed", attr.float(4));
  await waitUntil(() => two.client.lastSeq === scene.store.seq);
  await scene.flush();

  expect(one.received.filter((m) => m.type === "controlValue")).toEqual([]);
  expect(two.received.filter((m) => m.type === "controlValue").map((m) => m.revision)).toEqual([2, 3]);
  expect(one.client.nodes.get("/gui/speed")?.attributes.get("value")).toEqual(attr.float(4));
  expect(two.client.nodes.get("/gui/speed")?.attributes.get("value")).toEqual(attr.float(4));
  scene.close();
});

test("bursts larger than the queue bound reach healthy clients in full", async () => {
  const sessionErrors: SceneSyncError[] = [];
  const scene = createSceneServer({
    limits: { maxQueuedMessages: 10 },
    onSessionError: (err) => sessionErrors.push(err),
  });
  const one = connectClient(scene, { id: "one" });
  const two = connectClient(scene, { id: "two", chunkBytes: 7 });
  await withTimeout(Promise.all([one.client.ready, two.client.ready]), 2_000, "bootstrap");
  const synced = () => one.client.lastSeq === scene.store.seq && two.client.lastSeq === scene.store.seq;

  // One synchronous burst.
  const world = scene.createNode({ id: "/world", kind: "frame" });
  for (let i = 0; i < 50; i += 1) world.child({ name: `n${i}`, kind: "label", attributes: { i: attr.int(i) } });
  await waitUntil(synced);

  // An atomic block spanning several ticks.
  await scene.atomic(async () => {
    for (let i = 0; i < 50; i += 1) scene.getHandle(`/world/n${i}`)?.update({ seen: attr.bool(true) });
    await tick();
    for (let i = 0; i < 20; i += 1) scene.getHandle(`/world/n${i}`)?.update({ again: attr.bool(true) });
  });
  await waitUntil(synced);

  expect(sessionErrors).toEqual([]);
  expect(scene.sessions().map((s) => s.id)).toEqual(["one", "two"]);
  const expected = byId(scene.store.snapshot().records);
  for (const { client, received, errors } of [one, two]) {
    expect(errors).toEqual([]);
    expect(received.filter((m) => m.type !== "bootstrapComplete")).toHaveLength(121);
    expect(client.nodes).toEqual(expected);
  }
  scene.close();
});

test("a disconnect hook may change the scene when a session overflows", async () => {
  const sessionErrors: SceneSyncError[] = [];
  const scene = createSceneServer({
    limits: { maxQueuedMessages: 5 },
    onSessionError: (err) => sessionErrors.push(err),
  });
  const status = scene.createNode({ id: "/status", kind: "label" });
  scene.onClientDisconnect((session) => {
    status.update({ dropped: attr.string(session.id) });
  });

  const healthy = connectClient(scene, { id: "healthy" });
  await withTimeout(healthy.client.ready, 2_000, "bootstrap");
  const [serverEnd] = createInMemoryDuplex();
  const stalled: ByteStreamTransport = { ...serverEnd, send: () => new Promise<void>(() => {}) };
  const slow = scene.connectClient(stalled, { id: "slow" });

  for (let i = 0; i < 20; i += 1) {
    scene.createNode({ id: `/n${i}`, kind: "label" });
    if (i % 4 === 3) await tick();
  }

  expect(slow.state).toBe("closed");
  expect(sessionErrors.map((e) => [e.code, e.sessionId])).toEqual([[SceneErrorCode.QUEUE_OVERFLOW, "slow"]]);
  expect(status.attribute("dropped")).toEqual(attr.string("slow"));
  await waitUntil(() => healthy.client.lastSeq === scene.store.seq);
  expect(healthy.client.nodes.get("/status")?.attributes.get("dropped")).toEqual(attr.string("slow"));
  scene.close();
});

test("a session is dropped when its waiting bytes exceed the bound", async () => {
  const sessionErrors: SceneSyncError[] = [];
  const scene = createSceneServer({
    limits: { maxQueuedBytes: 2048 },
    onSessionError: (err) => sessionErrors.push(err),
  });
  const [serverEnd] = createInMemoryDuplex();
  const stalled: ByteStreamTransport = { ...serverEnd, send: () => new Promise<void>(() => {}) };
  const slow = scene.connectClient(stalled, { id: "slow" });

  // Two frames of about 650 bytes per tick.
  for (let i = 0; i < 12; i += 1) {
    scene.createNode({ id: `/blob${i}`, kind: "mesh", attributes: { data: attr.bytes(new Uint8Array(600)) } });
    if (i % 2 === 1) await tick();
  }

  expect(slow.state).toBe("closed");
  expect(sessionErrors.map((e) => [e.code, e.sessionId])).toEqual([[SceneErrorCode.QUEUE_OVERFLOW, "slow"]]);
  expect(sessionErrors[0]?.message).toMatch(/\(4 frames, \d+ bytes waiting\)$/);
  scene.close();
});
