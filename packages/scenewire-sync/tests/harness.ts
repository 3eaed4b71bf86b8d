import type { NodeId, NodeRecord } from "@scenewire/interface";

import { SceneClient } from "../src/client.js";
import type { SceneServer } from "../src/scene.js";
import type { SceneSession } from "../src/session.js";
import { createInMemoryDuplex } from "../src/transport.js";
import type { SceneMessage } from "../src/types.js";

type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (err: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  const timeout = deferred<never>();
  const timer = setTimeout(() => timeout.reject(new Error(`timeout after ${ms}ms: ${label}`)), ms);
  try {
    return await Promise.race([promise, timeout.promise]);
  } finally {
    clearTimeout(timer);
  }
}

export async function tick(): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, 0));
}

export async function waitUntil(
  predicate: () => boolean,
  opts: { timeoutMs?: number; intervalMs?: number; message?: string } = {}
): Promise<void> {
  const timeoutMs = opts.timeoutMs ?? 2_000;
  const intervalMs = opts.intervalMs ?? 5;
  const start = Date.now();
  while (!predicate()) {
    if (Date.now() - start > timeoutMs) throw new Error(opts.message ?? `waitUntil timeout after ${timeoutMs}ms`);
    await new Promise<void>((resolve) => setTimeout(resolve, intervalMs));
  }
}

export type ConnectedClient = {
  session: SceneSession;
  client: SceneClient;
  /** Every message the client applied, in arrival order. */
  received: SceneMessage[];
  errors: Error[];
};

export function connectClient(scene: SceneServer, opts: { id?: string; chunkBytes?: number } = {}): ConnectedClient {
  const [serverEnd, clientEnd] = createInMemoryDuplex({ chunkBytes: opts.chunkBytes });
  const received: SceneMessage[] = [];
  const errors: Error[] = [];
  const client = new SceneClient({ transport: clientEnd, onError: (err) => errors.push(err) });
  client.onMessage((message) => received.push(message));
  const session = scene.connectClient(serverEnd, { id: opts.id });
  return { session, client, received, errors };
}

/** Records of a mirror or snapshot keyed by id, for order-insensitive comparison. */
export function byId(records: Iterable<NodeRecord>): Map<NodeId, NodeRecord> {
  const out = new Map<NodeId, NodeRecord>();
  for (const record of records) out.set(record.id, record);
  return out;
}
