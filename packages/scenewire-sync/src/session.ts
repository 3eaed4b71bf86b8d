import type { NodeId, Seq } from "@scenewire/interface";

import { DEFAULT_MAX_FRAME_BYTES } from "./codec.js";
import { SceneErrorCode, SceneSyncError, errorMessage, malformed, withSession } from "./errors.js";
import { FrameReader, concatBytes } from "./framing.js";
import type { BroadcastTarget, OutboundFrame } from "./scheduler.js";
import type { ByteStreamTransport, CloseInfo, Unsubscribe } from "./transport.js";
import type { SceneMessage } from "./types.js";

export type SessionState = "connecting" | "connected" | "closing" | "closed";

/**
 * Queue bounds are checked when the session gets a chance to write. Only live frames that were
 * already queued at the previous chance count; frames queued in the current tick, or while writes
 * are held, do not.
 */
export type SessionLimits = {
  /** Live frames allowed to wait in the outbound queue before the session is dropped. */
  maxQueuedMessages: number;
  /** Live bytes allowed to wait in the outbound queue before the session is dropped. */
  maxQueuedBytes: number;
  /** Upper bound for one coalesced transport write (a single larger frame is still sent whole). */
  maxWriteBytes: number;
  /** Largest frame accepted in either direction. */
  maxFrameBytes: number;
};

export const DEFAULT_SESSION_LIMITS: SessionLimits = {
  maxQueuedMessages: 10_000,
  maxQueuedBytes: 64 * 1024 * 1024,
  maxWriteBytes: 1024 * 1024,
  maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
};

export type SessionStats = {
  queuedFrames: number;
  queuedBytes: number;
  liveQueuedFrames: number;
  liveQueuedBytes: number;
  sentFrames: number;
  sentBytes: number;
  receivedFrames: number;
  /** Waiting frames dropped because a newer frame for the same node superseded them. */
  coalescedFrames: number;
};

export type SceneSessionOptions = {
  id: string;
  transport: ByteStreamTransport;
  limits?: Partial<SessionLimits>;
  /** Writes pause while this returns true (see `BroadcastScheduler.atomic`). */
  isHeld?: () => boolean;
  onMessage: (session: SceneSession, message: SceneMessage) => void;
  onError: (session: SceneSession, err: SceneSyncError) => void;
  onClosed: (session: SceneSession, info: CloseInfo) => void;
  debug?: boolean;
  log?: (line: string) => void;
};

type QueuedFrame = {
  bytes: Uint8Array;
  seq: Seq;
  /** Queue position, used to tell waiting frames from fresh ones. */
  ordinal: number;
  /** The mutation a live frame carries; `null` for bootstrap frames. */
  mutation: OutboundFrame | null;
  dropped: boolean;
};

const LIMIT_NAMES = ["maxQueuedMessages", "maxQueuedBytes", "maxWriteBytes", "maxFrameBytes"] as const satisfies readonly (keyof SessionLimits)[];

export function resolveLimits(overrides: Partial<SessionLimits> = {}): SessionLimits {
  const limits: SessionLimits = { ...DEFAULT_SESSION_LIMITS };
  for (const name of LIMIT_NAMES) {
    const value = overrides[name];
    if (value === undefined) continue;
    if (!Number.isSafeInteger(value) || value <= 0) throw new Error(`invalid ${name}: ${value}`);
    limits[name] = value;
  }
  return limits;
}

/**
 * Server side of one client connection: an ordered outbound queue drained with one write in
 * flight, and an inbound frame reader.
 *
 * A live frame starts waiting once a drain chance passes without it being written. Waiting frames
 * count against the queue bounds and may be coalesced: a newer control value replaces a waiting
 * one for the same node, and removing a node whose creation is still waiting drops the creation,
 * everything queued for its subtree since, and the removal itself. Revisions stay increasing per
 * node; the client only skips intermediate ones.
 */
export class SceneSession implements BroadcastTarget {
  readonly id: string;
  readonly connectedAt = Date.now();

  private stateValue: SessionState = "connecting";
  private cursorValue: Seq = 0;
  private deliveredValue: Seq = 0;

  private queue: QueuedFrame[] = [];
  private head = 0;
  private nextOrdinal = 0;
  private queuedFrames = 0;
  private queuedBytes = 0;
  private liveFrames = 0;
  private liveBytes = 0;
  private waitingMark = 0;
  private waitingFrames = 0;
  private waitingBytes = 0;
  /** Untaken live frames per node, oldest first. */
  private pendingById = new Map<NodeId, QueuedFrame[]>();
  private sentFrames = 0;
  private sentBytes = 0;
  private receivedFrames = 0;
  private coalescedFrames = 0;

  private writing = false;
  private drainScheduled = false;

  private readonly limits: SessionLimits;
  private readonly transport: ByteStreamTransport;
  private readonly reader: FrameReader;
  private readonly detach: Unsubscribe[] = [];
  private readonly log: (line: string) => void;

  constructor(private readonly opts: SceneSessionOptions) {
    this.id = opts.id;
    this.transport = opts.transport;
    this.limits = resolveLimits(opts.limits);
    this.reader = new FrameReader({ maxFrameBytes: this.limits.maxFrameBytes });
    const debug = Boolean(opts.debug);
    const log = opts.log ?? ((line: string) => console.debug(line));
    this.log = debug ? log : () => {};

    this.detach.push(this.transport.onMessage((chunk) => this.receive(chunk)));
    this.detach.push(this.transport.onClose((info) => this.close(info)));
  }

  get state(): SessionState {
    return this.stateValue;
  }

  /** Seq of the newest mutation queued for this client (bootstrap included). */
  get cursor(): Seq {
    return this.cursorValue;
  }

  /** Every mutation up to this seq was handed to the transport or coalesced away. */
  get delivered(): Seq {
    return this.deliveredValue;
  }

  stats(): SessionStats {
    return {
      queuedFrames: this.queuedFrames,
      queuedBytes: this.queuedBytes,
      liveQueuedFrames: this.liveFrames,
      liveQueuedBytes: this.liveBytes,
      sentFrames: this.sentFrames,
      sentBytes: this.sentBytes,
      receivedFrames: this.receivedFrames,
      coalescedFrames: this.coalescedFrames,
    };
  }

  /**
   * Queue the bootstrap replay and go live. Bootstrap frames never count against the queue bound.
   */
  bootstrap(frames: readonly { bytes: Uint8Array; seq: Seq }[], snapshotSeq: Seq): void {
    if (this.stateValue !== "connecting") throw new Error(`session ${this.id} already bootstrapped`);
    for (const frame of frames) this.push(frame.bytes, frame.seq, null);
    this.cursorValue = snapshotSeq;
    this.stateValue = "connected";
    this.log(`[scenewire:session ${this.id}] bootstrap queued: ${frames.length} frames at seq ${snapshotSeq}`);
    this.scheduleDrain();
  }

  /**
   * Queue one live frame. Frames at or below the cursor are already covered and are dropped.
   * Never throws and never closes the session synchronously: overflow is detected at the next
   * drain chance and reported through `onError`.
   */
  enqueue(frame: OutboundFrame): boolean {
    if (this.stateValue !== "connected") return false;
    if (frame.seq <= this.cursorValue) return false;
    this.cursorValue = frame.seq;
    if (!this.coalesce(frame)) this.push(frame.bytes, frame.seq, frame);
    this.scheduleDrain();
    return true;
  }

  resume(): void {
    this.scheduleDrain();
  }

  /**
   * Feed raw bytes received from the client.
   */
  receive(chunk: Uint8Array): void {
    if (this.stateValue === "closing" || this.stateValue === "closed") return;
    let messages: SceneMessage[];
    try {
      messages = this.reader.push(chunk);
    } catch (err) {
      const reported =
        err instanceof SceneSyncError
          ? withSession(err, this.id)
          : malformed(errorMessage(err), { sessionId: this.id, cause: err });
      this.opts.onError(this, reported);
      return;
    }
    for (const message of messages) {
      if (this.state === "closing" || this.state === "closed") return;
      this.receivedFrames += 1;
      this.opts.onMessage(this, message);
    }
  }

  /**
   * Close the session. Idempotent; pending frames are discarded.
   */
  close(info: CloseInfo = {}): void {
    if (this.stateValue === "closing" || this.stateValue === "closed") return;
    this.stateValue = "closing";
    for (const off of this.detach.splice(0)) off();
    this.queue = [];
    this.head = 0;
    this.queuedFrames = 0;
    this.queuedBytes = 0;
    this.liveFrames = 0;
    this.liveBytes = 0;
    this.waitingFrames = 0;
    this.waitingBytes = 0;
    this.pendingById.clear();
    try {
      this.transport.close(info);
    } catch (err) {
      this.log(`[scenewire:session ${this.id}] transport close failed: ${errorMessage(err)}`);
    }
    this.stateValue = "closed";
    this.log(`[scenewire:session ${this.id}] closed${info.reason ? `: ${info.reason}` : ""}`);
    this.opts.onClosed(this, info);
  }

  private push(bytes: Uint8Array, seq: Seq, mutation: OutboundFrame | null): void {
    const frame: QueuedFrame = { bytes, seq, ordinal: this.nextOrdinal++, mutation, dropped: false };
    this.queue.push(frame);
    this.queuedFrames += 1;
    this.queuedBytes += bytes.length;
    if (!mutation) return;
    this.liveFrames += 1;
    this.liveBytes += bytes.length;
    const pending = this.pendingById.get(mutation.id);
    if (pending) pending.push(frame);
    else this.pendingById.set(mutation.id, [frame]);
  }

  private isWaiting(frame: QueuedFrame): boolean {
    return frame.ordinal < this.waitingMark;
  }

  /**
   * Fold `next` into the waiting frames it supersedes. Returns true when `next` itself is absorbed
   * and must not be queued.
   */
  private coalesce(next: OutboundFrame): boolean {
    const pending = this.pendingById.get(next.id);
    if (!pending) return false;

    if (next.type === "controlValue") {
      for (const frame of pending.slice()) {
        if (frame.mutation?.type === "controlValue" && this.isWaiting(frame)) this.drop(frame);
      }
      return false;
    }
    if (next.type !== "removeNode") return false;

    let created: QueuedFrame | undefined;
    for (let i = pending.length - 1; i >= 0; i--) {
      const frame = pending[i];
      if (frame?.mutation?.type === "createNode") {
        created = frame;
        break;
      }
    }
    if (created && this.isWaiting(created)) {
      this.cullSubtree(created, next.id);
      return true;
    }
    for (const frame of pending.slice()) {
      const type = frame.mutation?.type;
      if ((type === "updateNode" || type === "controlValue") && this.isWaiting(frame)) this.drop(frame);
    }
    return false;
  }

  /**
   * The client never saw `id` created: drop its creation and every later frame for it or for
   * descendants created after it.
   */
  private cullSubtree(created: QueuedFrame, id: NodeId): void {
    const culled = new Set<NodeId>([id]);
    const start = this.queue.indexOf(created, this.head);
    this.drop(created);
    for (let i = start + 1; i < this.queue.length; i++) {
      const frame = this.queue[i];
      const mutation = frame?.mutation;
      if (!frame || !mutation || frame.dropped) continue;
      if (mutation.type === "createNode") {
        if (mutation.parent !== null && culled.has(mutation.parent)) culled.add(mutation.id);
        else culled.delete(mutation.id);
      }
      if (culled.has(mutation.id)) this.drop(frame);
    }
  }

  private drop(frame: QueuedFrame): void {
    frame.dropped = true;
    this.release(frame);
    this.coalescedFrames += 1;
  }

  /** Remove a frame from the counters once it is written or dropped. */
  private release(frame: QueuedFrame): void {
    this.queuedFrames -= 1;
    this.queuedBytes -= frame.bytes.length;
    const { mutation } = frame;
    if (!mutation) return;
    this.liveFrames -= 1;
    this.liveBytes -= frame.bytes.length;
    if (this.isWaiting(frame)) {
      this.waitingFrames -= 1;
      this.waitingBytes -= frame.bytes.length;
    }
    const pending = this.pendingById.get(mutation.id);
    if (!pending) return;
    const index = pending.indexOf(frame);
    if (index >= 0) pending.splice(index, 1);
    if (pending.length === 0) this.pendingById.delete(mutation.id);
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    queueMicrotask(() => {
      this.drainScheduled = false;
      this.drainChance();
    });
  }

  /**
   * Runs once per tick in which frames were queued. Outside the store's apply path, so closing an
   * overflowed session here is safe for hooks that mutate the scene.
   */
  private drainChance(): void {
    if (this.stateValue !== "connected") return;
    if (!this.opts.isHeld?.()) {
      if (this.writing && this.overflowed()) return;
      this.waitingMark = this.nextOrdinal;
      this.waitingFrames = this.liveFrames;
      this.waitingBytes = this.liveBytes;
    }
    if (!this.writing) void this.drain();
  }

  private overflowed(): boolean {
    if (this.waitingFrames <= this.limits.maxQueuedMessages && this.waitingBytes <= this.limits.maxQueuedBytes) {
      return false;
    }
    const err = new SceneSyncError(
      SceneErrorCode.QUEUE_OVERFLOW,
      `outbound queue exceeded (${this.waitingFrames} frames, ${this.waitingBytes} bytes waiting)`,
      { sessionId: this.id }
    );
    this.opts.onError(this, err);
    return true;
  }

  private takeBatch(): QueuedFrame[] {
    const batch: QueuedFrame[] = [];
    let bytes = 0;
    while (this.head < this.queue.length) {
      const next = this.queue[this.head];
      if (!next) break;
      if (next.dropped) {
        this.head += 1;
        continue;
      }
      if (batch.length > 0 && bytes + next.bytes.length > this.limits.maxWriteBytes) break;
      batch.push(next);
      bytes += next.bytes.length;
      this.head += 1;
    }
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
    for (const frame of batch) this.release(frame);
    return batch;
  }

  private async drain(): Promise<void> {
    if (this.writing) return;
    this.writing = true;
    try {
      while (this.stateValue === "connected" && this.queuedFrames > 0) {
        if (this.opts.isHeld?.()) return;
        const batch = this.takeBatch();
        const bytes = concatBytes(batch.map((f) => f.bytes));
        try {
          await this.transport.send(bytes);
        } catch (err) {
          if (this.stateValue !== "connected") return;
          this.opts.onError(
            this,
            new SceneSyncError(SceneErrorCode.SESSION_CLOSED, `send failed: ${errorMessage(err)}`, {
              sessionId: this.id,
              cause: err,
            })
          );
          return;
        }
        this.sentFrames += batch.length;
        this.sentBytes += bytes.length;
        const last = batch[batch.length - 1];
        if (last && last.seq > this.deliveredValue) this.deliveredValue = last.seq;
        // Whatever is left below the cursor was coalesced away.
        if (this.queuedFrames === 0) this.deliveredValue = this.cursorValue;
      }
    } finally {
      this.writing = false;
    }
  }
}
