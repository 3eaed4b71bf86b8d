import type { AttributeValue, NodeId, NodeRecord, Revision, Seq } from "@scenewire/interface";
import { cloneAttributeValue } from "@scenewire/interface";

import { encodeMessage } from "./codec.js";
import { SceneErrorCode, SceneSyncError, errorMessage, malformed } from "./errors.js";
import { FrameReader } from "./framing.js";
import type { ByteStreamTransport, CloseInfo, Unsubscribe } from "./transport.js";
import type { BootstrapCompleteMessage, ControlValueMessage, SceneMessage } from "./types.js";

export type SceneClientOptions = {
  transport: ByteStreamTransport;
  maxFrameBytes?: number;
  onError?: (err: SceneSyncError) => void;
  debug?: boolean;
  log?: (line: string) => void;
};

function deferred<T>() {
  let resolve!: (value: T) => void;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Client-side replica of a scene, built from the server's message stream.
 *
 * Messages that would break per-identifier revision order are reported through `onError` and not
 * applied.
 */
export class SceneClient {
  readonly nodes = new Map<NodeId, NodeRecord>();
  readonly ready: Promise<BootstrapCompleteMessage>;
  readonly closed: Promise<CloseInfo>;

  private readonly revisions = new Map<NodeId, Revision>();
  private readonly handlers = new Set<(message: SceneMessage) => void>();
  private readonly reader: FrameReader;
  private readonly detach: Unsubscribe[] = [];
  private readonly resolveReady: (message: BootstrapCompleteMessage) => void;
  private readonly resolveClosed: (info: CloseInfo) => void;
  private readonly log: (line: string) => void;
  private bootstrapped = false;
  private isClosed = false;
  private lastSeqValue: Seq = 0;

  constructor(private readonly opts: SceneClientOptions) {
    this.reader = new FrameReader({ maxFrameBytes: opts.maxFrameBytes });
    const ready = deferred<BootstrapCompleteMessage>();
    const closed = deferred<CloseInfo>();
    this.ready = ready.promise;
    this.resolveReady = ready.resolve;
    this.closed = closed.promise;
    this.resolveClosed = closed.resolve;
    const log = opts.log ?? ((line: string) => console.debug(line));
    this.log = opts.debug ? log : () => {};

    this.detach.push(opts.transport.onMessage((chunk) => this.receive(chunk)));
    this.detach.push(opts.transport.onClose((info) => this.handleClose(info)));
  }

  get isReady(): boolean {
    return this.bootstrapped;
  }

  /** Highest seq applied so far. */
  get lastSeq(): Seq {
    return this.lastSeqValue;
  }

  /** Last revision seen for `id`, including removals. */
  revisionOf(id: NodeId): Revision | undefined {
    return this.revisions.get(id);
  }

  onMessage(handler: (message: SceneMessage) => void): Unsubscribe {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  /**
   * Send a control value to the server. The local mirror takes the value right away; the server
   * answers with its authoritative value if it rejects or adjusts it.
   */
  async sendControlValue(id: NodeId, value: AttributeValue): Promise<void> {
    if (this.isClosed) throw new SceneSyncError(SceneErrorCode.SESSION_CLOSED, "client is closed");
    // The revision tells the server which value this one replaces.
    const revision = this.revisions.get(id) ?? 0;
    const message: ControlValueMessage = { type: "controlValue", id, value, origin: "client", revision, seq: 0 };
    const bytes = encodeMessage(message);
    this.nodes.get(id)?.attributes.set("value", cloneAttributeValue(value));
    await this.opts.transport.send(bytes);
  }

  close(info: CloseInfo = {}): void {
    if (this.isClosed) return;
    this.opts.transport.close(info);
    this.handleClose(info);
  }

  private handleClose(info: CloseInfo): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const off of this.detach.splice(0)) off();
    this.log(`[scenewire:client] closed${info.reason ? `: ${info.reason}` : ""}`);
    this.resolveClosed(info);
  }

  private receive(chunk: Uint8Array): void {
    if (this.isClosed) return;
    let messages: SceneMessage[];
    try {
      messages = this.reader.push(chunk);
    } catch (err) {
      this.report(err instanceof SceneSyncError ? err : malformed(errorMessage(err), { cause: err }));
      this.close({ reason: SceneErrorCode.MALFORMED_MESSAGE });
      return;
    }
    for (const message of messages) {
      if (!this.apply(message)) continue;
      for (const handler of Array.from(this.handlers)) handler(message);
    }
  }

  private apply(message: SceneMessage): boolean {
    if (message.type === "bootstrapComplete") {
      if (this.bootstrapped) {
        this.report(malformed("duplicate bootstrapComplete"));
        return false;
      }
      this.bootstrapped = true;
      this.lastSeqValue = Math.max(this.lastSeqValue, message.seq);
      this.log(`[scenewire:client] bootstrap complete: ${message.nodeCount} nodes at seq ${message.seq}`);
      this.resolveReady(message);
      return true;
    }

    const last = this.revisions.get(message.id) ?? 0;
    if (message.revision <= last) {
      this.report(
        new SceneSyncError(
          SceneErrorCode.MALFORMED_MESSAGE,
          `${message.type} for ${message.id} at revision ${message.revision} after revision ${last}`,
          { identifier: message.id }
        )
      );
      return false;
    }

    switch (message.type) {
      case "createNode": {
        if (this.nodes.has(message.id)) {
          this.report(
            new SceneSyncError(SceneErrorCode.DUPLICATE_IDENTIFIER, `node already exists: ${message.id}`, {
              identifier: message.id,
            })
          );
          return false;
        }
        if (message.parent !== null && !this.nodes.has(message.parent)) {
          this.report(
            new SceneSyncError(SceneErrorCode.INVALID_PARENT, `parent does not exist: ${message.parent}`, {
              identifier: message.id,
            })
          );
          return false;
        }
        this.nodes.set(message.id, {
          id: message.id,
          parent: message.parent,
          kind: message.kind,
          attributes: message.attributes,
          revision: message.revision,
          seq: message.seq,
        });
        break;
      }
      case "updateNode": {
        const node = this.nodes.get(message.id);
        if (!node) {
          this.report(this.unknown(message.id));
          return false;
        }
        for (const [name, value] of message.delta) {
          if (value === null) node.attributes.delete(name);
          else node.attributes.set(name, value);
        }
        node.revision = message.revision;
        node.seq = message.seq;
        break;
      }
      case "removeNode": {
        if (!this.nodes.delete(message.id)) {
          this.report(this.unknown(message.id));
          return false;
        }
        break;
      }
      case "controlValue": {
        const node = this.nodes.get(message.id);
        if (!node) {
          this.report(this.unknown(message.id));
          return false;
        }
        node.attributes.set("value", message.value);
        node.revision = message.revision;
        node.seq = message.seq;
        break;
      }
      default: {
        const _exhaustive: never = message;
        return _exhaustive;
      }
    }

    this.revisions.set(message.id, message.revision);
    this.lastSeqValue = Math.max(this.lastSeqValue, message.seq);
    return true;
  }

  private unknown(id: NodeId): SceneSyncError {
    return new SceneSyncError(SceneErrorCode.UNKNOWN_IDENTIFIER, `no such node: ${id}`, { identifier: id });
  }

  private report(err: SceneSyncError): void {
    if (this.opts.onError) this.opts.onError(err);
    else console.error("scenewire: client error", { code: err.code, message: err.message });
  }
}
