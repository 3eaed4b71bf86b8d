import type { NodeId, Seq } from "@scenewire/interface";

import type { MutationMessage, MutationSink, PublishOptions } from "./types.js";

/**
 * One encoded mutation as handed to every session, with what a session queue needs to coalesce it.
 */
export type OutboundFrame = {
  bytes: Uint8Array;
  type: MutationMessage["type"];
  id: NodeId;
  seq: Seq;
  /** Parent of a created node; `null` for every other message. */
  parent: NodeId | null;
};

/**
 * What the scheduler needs from a session: an ordered, non-throwing enqueue.
 */
export interface BroadcastTarget {
  readonly id: string;
  enqueue(frame: OutboundFrame): boolean;
  resume(): void;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Fans store mutations out to every live session. The store encodes each mutation once; the frame
 * is appended to each session queue in store order, which keeps per-identifier order on every
 * session.
 */
export class BroadcastScheduler implements MutationSink {
  private readonly targets = new Map<string, BroadcastTarget>();
  private holds = 0;
  private publishedCount = 0;

  get size(): number {
    return this.targets.size;
  }

  get published(): number {
    return this.publishedCount;
  }

  /** True while an `atomic` block is open; sessions keep queueing but do not write. */
  get held(): boolean {
    return this.holds > 0;
  }

  add(target: BroadcastTarget): void {
    this.targets.set(target.id, target);
  }

  delete(id: string): boolean {
    return this.targets.delete(id);
  }

  has(id: string): boolean {
    return this.targets.has(id);
  }

  publish(message: MutationMessage, bytes: Uint8Array, opts: PublishOptions = {}): void {
    const frame: OutboundFrame = {
      bytes,
      type: message.type,
      id: message.id,
      seq: message.seq,
      parent: message.type === "createNode" ? message.parent : null,
    };
    this.publishedCount += 1;
    for (const target of this.targets.values()) {
      if (target.id === opts.excludeSessionId) continue;
      target.enqueue(frame);
    }
  }

  /**
   * Run `fn` with session writes held, so everything it publishes leaves together. Accepts sync and
   * async functions; holds nest.
   */
  atomic<T>(fn: () => T): T {
    this.holds += 1;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.release();
      throw err;
    }
    if (isPromiseLike(result)) {
      const release = () => this.release();
      result.then(release, release);
      return result;
    }
    this.release();
    return result;
  }

  private release(): void {
    this.holds -= 1;
    if (this.holds > 0) return;
    for (const target of this.targets.values()) target.resume();
  }
}
