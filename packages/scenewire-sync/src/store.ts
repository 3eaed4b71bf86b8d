import type {
  AttributeDelta,
  AttributeDeltaInput,
  AttributeValue,
  Attributes,
  AttributesInput,
  ControlValueOrigin,
  NodeId,
  NodeKind,
  NodeRecord,
  Revision,
  Seq,
} from "@scenewire/interface";
import {
  attributeValueProblem,
  cloneAttributeValue,
  cloneAttributes,
  identifierProblem,
  isNodeKind,
  normalizeAttributeValue,
  toAttributeDelta,
  toAttributes,
} from "@scenewire/interface";

import { DEFAULT_MAX_FRAME_BYTES, encodeMessage } from "./codec.js";
import { SceneErrorCode, SceneSyncError, errorMessage } from "./errors.js";
import type {
  ControlValueMessage,
  CreateNodeMessage,
  MutationMessage,
  MutationSink,
  PublishOptions,
  RemoveNodeMessage,
  UpdateNodeMessage,
} from "./types.js";

/** Attributes of `control` nodes that only the control value path may write. */
export const CONTROL_RESERVED_ATTRIBUTES = ["value", "valueType", "controlType"] as const;

export type SceneStoreOptions = {
  sink?: MutationSink;
  /**
   * Largest frame a mutation, or the bootstrap record of the node it leaves behind, may encode to.
   * Mutations over the limit are rejected before anything changes.
   */
  maxFrameBytes?: number;
};

export type CreateNodeInput = {
  id: NodeId;
  parent?: NodeId | null;
  kind: NodeKind;
  attributes?: AttributesInput;
};

export type StoreSnapshot = {
  /** Store seq the snapshot reflects: every mutation with seq <= this value is included. */
  seq: Seq;
  /** Live records, every parent before its children. */
  records: NodeRecord[];
};

/**
 * Guards a mutation against a node that was removed and re-created under the same identifier.
 */
export type MutationGuard = {
  incarnation?: number;
};

type StoredNode = {
  record: NodeRecord;
  children: Set<NodeId>;
  incarnation: number;
};

function cloneRecord(record: NodeRecord): NodeRecord {
  return { ...record, attributes: cloneAttributes(record.attributes) };
}

function invalidValue(message: string, identifier: string, cause?: unknown): SceneSyncError {
  return new SceneSyncError(SceneErrorCode.INVALID_VALUE, message, { identifier, cause });
}

/**
 * Authoritative scene state. Every mutation goes through one apply path that validates, encodes,
 * writes, stamps `revision`/`seq`, and hands the resulting message and frame to the sink before
 * returning. Nothing is written unless every frame of the mutation encodes within the frame limit.
 * The sink must not call back into the store.
 */
export class SceneStore {
  private readonly nodes = new Map<NodeId, StoredNode>();
  /** Last revision of removed identifiers, so a re-created node keeps counting upwards. */
  private readonly retiredRevisions = new Map<NodeId, Revision>();
  private seqValue = 0;
  private nextIncarnation = 1;
  private applying = false;
  private sink: MutationSink | null;
  private readonly maxFrameBytes: number;

  constructor(opts: SceneStoreOptions = {}) {
    this.sink = opts.sink ?? null;
    const maxFrameBytes = opts.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    if (!Number.isSafeInteger(maxFrameBytes) || maxFrameBytes <= 0) {
      throw new Error(`invalid maxFrameBytes: ${maxFrameBytes}`);
    }
    this.maxFrameBytes = maxFrameBytes;
  }

  setSink(sink: MutationSink | null): void {
    this.sink = sink;
  }

  get seq(): Seq {
    return this.seqValue;
  }

  get size(): number {
    return this.nodes.size;
  }

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  get(id: NodeId): NodeRecord | undefined {
    const node = this.nodes.get(id);
    return node ? cloneRecord(node.record) : undefined;
  }

  getAttribute(id: NodeId, name: string): AttributeValue | undefined {
    const value = this.nodes.get(id)?.record.attributes.get(name);
    return value ? cloneAttributeValue(value) : undefined;
  }

  incarnationOf(id: NodeId): number | undefined {
    return this.nodes.get(id)?.incarnation;
  }

  children(id: NodeId): NodeId[] {
    const node = this.nodes.get(id);
    if (!node) throw this.unknown(id);
    return Array.from(node.children);
  }

  ids(): NodeId[] {
    return Array.from(this.nodes.keys());
  }

  create(input: CreateNodeInput): NodeRecord {
    const { id, kind } = input;
    const parent = input.parent ?? null;

    const idIssue = identifierProblem(id);
    if (idIssue) throw new SceneSyncError(SceneErrorCode.INVALID_IDENTIFIER, idIssue, { identifier: String(id) });
    if (!isNodeKind(kind)) throw invalidValue(`unknown node kind: ${String(kind)}`, id);
    if (this.nodes.has(id)) {
      throw new SceneSyncError(SceneErrorCode.DUPLICATE_IDENTIFIER, `node already exists: ${id}`, { identifier: id });
    }
    const parentNode = parent === null ? null : this.nodes.get(parent);
    if (parentNode === undefined) {
      throw new SceneSyncError(SceneErrorCode.INVALID_PARENT, `parent does not exist: ${String(parent)}`, {
        identifier: id,
      });
    }

    let attributes: Attributes;
    try {
      attributes = toAttributes(input.attributes);
    } catch (err) {
      throw invalidValue(errorMessage(err), id, err);
    }

    return this.apply(() => {
      const revision = (this.retiredRevisions.get(id) ?? 0) + 1;
      const seq = this.seqValue + 1;
      const message: CreateNodeMessage = {
        type: "createNode",
        id,
        parent,
        kind,
        attributes: cloneAttributes(attributes),
        revision,
        seq,
      };
      const frame = this.encodeFrame(message);

      this.retiredRevisions.delete(id);
      this.seqValue = seq;
      const record: NodeRecord = { id, parent, kind, attributes, revision, seq };
      this.nodes.set(id, { record, children: new Set(), incarnation: this.nextIncarnation++ });
      parentNode?.children.add(id);

      this.sink?.publish(message, frame);
      return cloneRecord(record);
    });
  }

  /**
   * Merge `delta` into the node's attributes (`null` removes an attribute). An empty delta changes
   * nothing and returns `null`.
   */
  update(id: NodeId, deltaInput: AttributeDeltaInput, guard: MutationGuard = {}): UpdateNodeMessage | null {
    const node = this.live(id, guard);

    let delta: AttributeDelta;
    try {
      delta = toAttributeDelta(deltaInput);
    } catch (err) {
      throw invalidValue(errorMessage(err), id, err);
    }
    if (delta.size === 0) return null;

    if (node.record.kind === "control") {
      for (const name of CONTROL_RESERVED_ATTRIBUTES) {
        if (delta.has(name)) throw invalidValue(`attribute "${name}" of a control is set through its value path`, id);
      }
    }

    return this.apply(() => {
      const { record } = node;
      const attributes = new Map(record.attributes);
      for (const [name, value] of delta) {
        if (value === null) attributes.delete(name);
        else attributes.set(name, value);
      }

      const published: AttributeDelta = new Map();
      for (const [name, value] of delta) published.set(name, value === null ? null : cloneAttributeValue(value));
      const message: UpdateNodeMessage = {
        type: "updateNode",
        id,
        delta: published,
        revision: record.revision + 1,
        seq: this.seqValue + 1,
      };
      const frame = this.encodeFrame(message);
      this.checkRecordFits(record, attributes, message);

      record.attributes = attributes;
      record.revision = message.revision;
      record.seq = message.seq;
      this.seqValue = message.seq;

      this.sink?.publish(message, frame);
      return message;
    });
  }

  /**
   * Remove `id` and its subtree. Returns removed identifiers in removal order: descendants before
   * their ancestors, siblings in creation order.
   */
  remove(id: NodeId, guard: MutationGuard = {}): NodeId[] {
    this.live(id, guard);

    return this.apply(() => {
      const order = this.postOrder(id);
      const removals: { message: RemoveNodeMessage; frame: Uint8Array }[] = [];
      for (const removedId of order) {
        const node = this.nodes.get(removedId);
        if (!node) continue;
        const message: RemoveNodeMessage = {
          type: "removeNode",
          id: removedId,
          revision: node.record.revision + 1,
          seq: this.seqValue + removals.length + 1,
        };
        removals.push({ message, frame: this.encodeFrame(message) });
      }

      const parentId = this.nodes.get(id)?.record.parent ?? null;
      if (parentId !== null) this.nodes.get(parentId)?.children.delete(id);
      for (const { message } of removals) {
        this.nodes.delete(message.id);
        this.retiredRevisions.set(message.id, message.revision);
        this.seqValue = message.seq;
      }

      for (const { message, frame } of removals) this.sink?.publish(message, frame);
      return order;
    });
  }

  /**
   * Write the `value` attribute of a control node. The value must keep the control's value type.
   */
  setControlValue(
    id: NodeId,
    value: AttributeValue,
    origin: ControlValueOrigin,
    opts: MutationGuard & PublishOptions = {}
  ): ControlValueMessage {
    const node = this.live(id, opts);
    if (node.record.kind !== "control") throw invalidValue(`node is not a control: ${id}`, id);

    const problem = attributeValueProblem(value);
    if (problem) throw invalidValue(problem, id);
    const current = node.record.attributes.get("value");
    if (current && current.type !== value.type) {
      throw invalidValue(`control value must be ${current.type}, got ${value.type}`, id);
    }
    const stored = normalizeAttributeValue(value);

    return this.apply(() => {
      const { record } = node;
      const message: ControlValueMessage = {
        type: "controlValue",
        id,
        value: cloneAttributeValue(stored),
        origin,
        revision: record.revision + 1,
        seq: this.seqValue + 1,
      };
      const frame = this.encodeFrame(message);
      const attributes = new Map(record.attributes);
      attributes.set("value", stored);
      this.checkRecordFits(record, attributes, message);

      record.attributes = attributes;
      record.revision = message.revision;
      record.seq = message.seq;
      this.seqValue = message.seq;

      this.sink?.publish(message, frame, { excludeSessionId: opts.excludeSessionId });
      return message;
    });
  }

  snapshot(): StoreSnapshot {
    if (this.applying) throw new Error("snapshot taken during a store mutation");
    // Map order is creation order, and a parent always exists before its children are created.
    return { seq: this.seqValue, records: Array.from(this.nodes.values(), (n) => cloneRecord(n.record)) };
  }

  /**
   * Messages that rebuild the current state on an empty replica, in a valid order.
   */
  snapshotMessages(): { seq: Seq; messages: CreateNodeMessage[] } {
    const { seq, records } = this.snapshot();
    return {
      seq,
      messages: records.map((r) => ({
        type: "createNode",
        id: r.id,
        parent: r.parent,
        kind: r.kind,
        attributes: r.attributes,
        revision: r.revision,
        seq: r.seq,
      })),
    };
  }

  private apply<T>(fn: () => T): T {
    if (this.applying) throw new Error("reentrant store mutation (a mutation sink wrote to the store)");
    this.applying = true;
    try {
      return fn();
    } finally {
      this.applying = false;
    }
  }

  private encodeFrame(message: MutationMessage): Uint8Array {
    let frame: Uint8Array;
    try {
      frame = encodeMessage(message);
    } catch (err) {
      throw invalidValue(`cannot encode ${message.type}: ${errorMessage(err)}`, message.id, err);
    }
    if (frame.length > this.maxFrameBytes) {
      throw invalidValue(
        `${message.type} frame of ${frame.length} bytes exceeds limit of ${this.maxFrameBytes} bytes`,
        message.id
      );
    }
    return frame;
  }

  /** The node must still fit one frame when a late joiner receives it whole. */
  private checkRecordFits(record: NodeRecord, attributes: Attributes, message: MutationMessage): void {
    const bootstrap: CreateNodeMessage = {
      type: "createNode",
      id: record.id,
      parent: record.parent,
      kind: record.kind,
      attributes,
      revision: message.revision,
      seq: message.seq,
    };
    try {
      this.encodeFrame(bootstrap);
    } catch (err) {
      if (!(err instanceof SceneSyncError)) throw err;
      throw invalidValue(`node would no longer fit one frame: ${err.detail}`, record.id, err);
    }
  }

  private unknown(id: NodeId): SceneSyncError {
    return new SceneSyncError(SceneErrorCode.UNKNOWN_IDENTIFIER, `no such node: ${id}`, { identifier: id });
  }

  private live(id: NodeId, guard: MutationGuard): StoredNode {
    const node = this.nodes.get(id);
    if (!node) throw this.unknown(id);
    if (guard.incarnation !== undefined && guard.incarnation !== node.incarnation) {
      throw new SceneSyncError(SceneErrorCode.UNKNOWN_IDENTIFIER, `node was removed: ${id}`, { identifier: id });
    }
    return node;
  }

  private postOrder(rootId: NodeId): NodeId[] {
    const out: NodeId[] = [];
    const stack: { id: NodeId; expanded: boolean }[] = [{ id: rootId, expanded: false }];
    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      if (!top) break;
      if (top.expanded) {
        stack.pop();
        out.push(top.id);
        continue;
      }
      top.expanded = true;
      const children = Array.from(this.nodes.get(top.id)?.children ?? []);
      // Reverse so the first-created child is visited first.
      for (let i = children.length - 1; i >= 0; i -= 1) {
        const child = children[i];
        if (child !== undefined) stack.push({ id: child, expanded: false });
      }
    }
    return out;
  }
}
