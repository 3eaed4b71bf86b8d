import type {
  AttributeDeltaInput,
  AttributeValue,
  Attributes,
  AttributesInput,
  NodeId,
  NodeKind,
  NodeRecord,
  Revision,
} from "@scenewire/interface";
import { joinNodePath } from "@scenewire/interface";

import { controlCodec } from "./controls.js";
import type { ControlRegistry, ControlState, ControlType, ControlValueTypes } from "./controls.js";
import { SceneErrorCode, SceneSyncError } from "./errors.js";
import type { SceneStore } from "./store.js";
import type { Unsubscribe } from "./transport.js";
import type { UpdateNodeMessage } from "./types.js";

export type HandleContext = {
  store: SceneStore;
  controls: ControlRegistry;
};

export type ChildNodeInput = {
  /** Path segment appended to the parent identifier. */
  name: string;
  kind: NodeKind;
  attributes?: AttributesInput;
};

/**
 * Producer-side reference to one node. A handle is bound to the node it was created for: once
 * that node is removed, the handle stays dead even if the identifier is created again.
 */
export class NodeHandle {
  constructor(
    protected readonly ctx: HandleContext,
    readonly id: NodeId,
    readonly kind: NodeKind,
    protected readonly incarnation: number
  ) {}

  get exists(): boolean {
    return this.ctx.store.incarnationOf(this.id) === this.incarnation;
  }

  get record(): NodeRecord {
    const record = this.exists ? this.ctx.store.get(this.id) : undefined;
    if (!record) throw this.gone();
    return record;
  }

  get revision(): Revision {
    return this.record.revision;
  }

  get parent(): NodeId | null {
    return this.record.parent;
  }

  get attributes(): Attributes {
    return this.record.attributes;
  }

  attribute(name: string): AttributeValue | undefined {
    if (!this.exists) throw this.gone();
    return this.ctx.store.getAttribute(this.id, name);
  }

  children(): NodeId[] {
    if (!this.exists) throw this.gone();
    return this.ctx.store.children(this.id);
  }

  update(delta: AttributeDeltaInput): UpdateNodeMessage | null {
    return this.ctx.store.update(this.id, delta, { incarnation: this.incarnation });
  }

  /**
   * Remove this node and its subtree; returns the removed identifiers, descendants first.
   */
  remove(): NodeId[] {
    const removed = this.ctx.store.remove(this.id, { incarnation: this.incarnation });
    this.ctx.controls.forget(removed);
    return removed;
  }

  child(input: ChildNodeInput): NodeHandle {
    if (!this.exists) throw this.gone();
    const id = joinNodePath(this.id, input.name);
    const record = this.ctx.store.create({ id, parent: this.id, kind: input.kind, attributes: input.attributes });
    return bindNodeHandle(this.ctx, record);
  }

  protected gone(): SceneSyncError {
    return new SceneSyncError(SceneErrorCode.UNKNOWN_IDENTIFIER, `node was removed: ${this.id}`, {
      identifier: this.id,
    });
  }
}

export type ControlValueEvent = {
  sessionId: string;
  revision: Revision;
};

export class ControlHandle<K extends ControlType> extends NodeHandle {
  constructor(
    ctx: HandleContext,
    id: NodeId,
    incarnation: number,
    readonly controlType: K
  ) {
    super(ctx, id, "control", incarnation);
  }

  get value(): ControlValueTypes[K] {
    const value = this.exists ? this.ctx.controls.valueOf(this.id, this.controlType) : undefined;
    if (value === undefined) throw this.gone();
    return value;
  }

  get state(): ControlState {
    return this.ctx.controls.state(this.id);
  }

  /**
   * Set the value from the producer side; every session receives it.
   */
  setValue(value: ControlValueTypes[K]): void {
    this.ctx.controls.setValue(this.id, this.controlType, value, { incarnation: this.incarnation });
  }

  /**
   * Called once per value a client sends, after it is applied and broadcast.
   */
  onValue(callback: (value: ControlValueTypes[K], event: ControlValueEvent) => unknown): Unsubscribe {
    if (!this.exists) throw this.gone();
    const codec = controlCodec(this.controlType);
    return this.ctx.controls.onValue(this.id, (event) => {
      const value = codec.fromAttribute(event.value);
      if (value === undefined) return undefined;
      return callback(value, { sessionId: event.sessionId, revision: event.revision });
    });
  }
}

export function bindNodeHandle(ctx: HandleContext, record: NodeRecord): NodeHandle {
  const incarnation = ctx.store.incarnationOf(record.id);
  if (incarnation === undefined) {
    throw new SceneSyncError(SceneErrorCode.UNKNOWN_IDENTIFIER, `no such node: ${record.id}`, { identifier: record.id });
  }
  return new NodeHandle(ctx, record.id, record.kind, incarnation);
}

export function bindControlHandle<K extends ControlType>(
  ctx: HandleContext,
  id: NodeId,
  controlType: K
): ControlHandle<K> {
  const incarnation = ctx.store.incarnationOf(id);
  if (incarnation === undefined || ctx.controls.controlTypeOf(id) !== controlType) {
    throw new SceneSyncError(SceneErrorCode.UNKNOWN_IDENTIFIER, `no ${controlType} control: ${id}`, { identifier: id });
  }
  return new ControlHandle(ctx, id, incarnation, controlType);
}
