import type { AttributeValue, Attributes, NodeId, NodeRecord, Revision, Seq } from "@scenewire/interface";
import { attr, attributeValuesEqual } from "@scenewire/interface";

import { SceneErrorCode, SceneSyncError, errorMessage } from "./errors.js";
import type { SceneStore } from "./store.js";
import type { Unsubscribe } from "./transport.js";
import type { ControlValueMessage } from "./types.js";

export const CONTROL_TYPES = [
  "slider",
  "number",
  "text",
  "checkbox",
  "button",
  "dropdown",
  "rgb",
  "vector2",
  "vector3",
] as const;

export type ControlType = (typeof CONTROL_TYPES)[number];

export type ControlValueTypes = {
  slider: number;
  number: number;
  text: string;
  checkbox: boolean;
  button: boolean;
  dropdown: string;
  rgb: [number, number, number];
  vector2: [number, number];
  vector3: [number, number, number];
};

export type ControlState = "idle" | "serverSet" | "clientSet";

/**
 * Presentation and validation settings, stored as attributes of the control node so they can be
 * changed later through a plain attribute update.
 */
export type ControlSettings = {
  label?: string;
  hint?: string;
  order?: number;
  visible?: boolean;
  disabled?: boolean;
  min?: number;
  max?: number;
  step?: number;
  options?: readonly string[];
};

export type ControlSpec<K extends ControlType> = ControlSettings & {
  type: K;
  initial: ControlValueTypes[K];
};

type Checked<T> = { ok: true; value: T } | { ok: false; problem: string };

export type ControlCodec<K extends ControlType> = {
  toAttribute(value: ControlValueTypes[K]): AttributeValue;
  /** `undefined` when the attribute has the wrong type or shape. */
  fromAttribute(value: AttributeValue): ControlValueTypes[K] | undefined;
  /** Validate against the settings; may adjust the value (clamping). */
  check(value: ControlValueTypes[K], settings: ControlSettings): Checked<ControlValueTypes[K]>;
};

const CONTROL_TYPE_SET: ReadonlySet<string> = new Set(CONTROL_TYPES);

function isControlType(value: unknown): value is ControlType {
  return typeof value === "string" && CONTROL_TYPE_SET.has(value);
}

function numberFrom(value: AttributeValue): number | undefined {
  if (value.type === "float" || value.type === "int") return value.value;
  return undefined;
}

function checkNumber(value: number, settings: ControlSettings): Checked<number> {
  if (!Number.isFinite(value)) return { ok: false, problem: `value must be a finite number, got ${value}` };
  let out = value;
  if (settings.min !== undefined && out < settings.min) out = settings.min;
  if (settings.max !== undefined && out > settings.max) out = settings.max;
  return { ok: true, value: out };
}

function float32Tuple(value: AttributeValue, length: number): number[] | undefined {
  if (value.type !== "float32Array" || value.value.length !== length) return undefined;
  return Array.from(value.value);
}

/** Vectors travel as float32, so a component must stay finite after narrowing. */
function checkFloat32<T extends number[]>(value: T): Checked<T> {
  return Float32Array.from(value).every((v) => Number.isFinite(v))
    ? { ok: true, value }
    : { ok: false, problem: "components must be finite 32-bit floats" };
}

const numberCodec: ControlCodec<"slider"> & ControlCodec<"number"> = {
  toAttribute: (value) => attr.float(value),
  fromAttribute: numberFrom,
  check: checkNumber,
};

const boolCodec: ControlCodec<"checkbox"> & ControlCodec<"button"> = {
  toAttribute: (value) => attr.bool(value),
  fromAttribute: (value) => (value.type === "bool" ? value.value : undefined),
  check: (value) => ({ ok: true, value }),
};

export const CONTROL_CODECS: { [K in ControlType]: ControlCodec<K> } = {
  slider: numberCodec,
  number: numberCodec,
  text: {
    toAttribute: (value) => attr.string(value),
    fromAttribute: (value) => (value.type === "string" ? value.value : undefined),
    check: (value) => ({ ok: true, value }),
  },
  checkbox: boolCodec,
  button: boolCodec,
  dropdown: {
    toAttribute: (value) => attr.string(value),
    fromAttribute: (value) => (value.type === "string" ? value.value : undefined),
    check: (value, settings) =>
      settings.options?.includes(value)
        ? { ok: true, value }
        : { ok: false, problem: `not one of the options: ${JSON.stringify(value)}` },
  },
  rgb: {
    toAttribute: (value) => attr.color(value[0], value[1], value[2]),
    fromAttribute: (value) => (value.type === "color" ? [value.value[0], value.value[1], value.value[2]] : undefined),
    check: (value) =>
      value.every((c) => Number.isInteger(c) && c >= 0 && c <= 255)
        ? { ok: true, value }
        : { ok: false, problem: "rgb channels must be integers in [0, 255]" },
  },
  vector2: {
    toAttribute: (value) => attr.float32Array(value),
    fromAttribute: (value) => {
      const v = float32Tuple(value, 2);
      return v ? [v[0] ?? 0, v[1] ?? 0] : undefined;
    },
    check: checkFloat32,
  },
  vector3: {
    toAttribute: (value) => attr.float32Array(value),
    fromAttribute: (value) => {
      const v = float32Tuple(value, 3);
      return v ? [v[0] ?? 0, v[1] ?? 0, v[2] ?? 0] : undefined;
    },
    check: checkFloat32,
  },
};

export function controlCodec<K extends ControlType>(type: K): ControlCodec<K> {
  return CONTROL_CODECS[type];
}

function settingsToAttributes(settings: ControlSettings): Attributes {
  const out: Attributes = new Map();
  if (settings.label !== undefined) out.set("label", attr.string(settings.label));
  if (settings.hint !== undefined) out.set("hint", attr.string(settings.hint));
  if (settings.order !== undefined) out.set("order", attr.float(settings.order));
  out.set("visible", attr.bool(settings.visible ?? true));
  out.set("disabled", attr.bool(settings.disabled ?? false));
  if (settings.min !== undefined) out.set("min", attr.float(settings.min));
  if (settings.max !== undefined) out.set("max", attr.float(settings.max));
  if (settings.step !== undefined) out.set("step", attr.float(settings.step));
  if (settings.options !== undefined) out.set("options", attr.json([...settings.options]));
  return out;
}

/**
 * Read settings back from a control node's attributes; attributes of the wrong type are ignored.
 */
export function readControlSettings(attributes: Attributes): ControlSettings {
  const str = (name: string) => {
    const v = attributes.get(name);
    return v?.type === "string" ? v.value : undefined;
  };
  const num = (name: string) => {
    const v = attributes.get(name);
    return v ? numberFrom(v) : undefined;
  };
  const bool = (name: string) => {
    const v = attributes.get(name);
    return v?.type === "bool" ? v.value : undefined;
  };
  const optionsAttr = attributes.get("options");
  const options =
    optionsAttr?.type === "json" && Array.isArray(optionsAttr.value)
      ? optionsAttr.value.filter((o): o is string => typeof o === "string")
      : undefined;

  return {
    label: str("label"),
    hint: str("hint"),
    order: num("order"),
    visible: bool("visible"),
    disabled: bool("disabled"),
    min: num("min"),
    max: num("max"),
    step: num("step"),
    options,
  };
}

function validateSpec<K extends ControlType>(id: NodeId, spec: ControlSpec<K>): void {
  const invalid = (message: string) => new SceneSyncError(SceneErrorCode.INVALID_VALUE, message, { identifier: id });
  if (!isControlType(spec.type)) throw invalid(`unknown control type: ${String(spec.type)}`);
  for (const name of ["min", "max", "step", "order"] as const) {
    const v = spec[name];
    if (v !== undefined && !Number.isFinite(v)) throw invalid(`invalid ${name}: ${v}`);
  }
  if (spec.min !== undefined && spec.max !== undefined && spec.min > spec.max) {
    throw invalid(`min ${spec.min} is greater than max ${spec.max}`);
  }
  if (spec.step !== undefined && spec.step <= 0) throw invalid(`invalid step: ${spec.step}`);
  if (spec.type === "slider" && (spec.min === undefined || spec.max === undefined)) {
    throw invalid("slider needs min and max");
  }
  if (spec.type === "dropdown" && (!spec.options || spec.options.length === 0)) {
    throw invalid("dropdown needs at least one option");
  }
}

export type ControlEvent = {
  id: NodeId;
  value: AttributeValue;
  sessionId: string;
  revision: Revision;
  seq: Seq;
};

export type ControlCallback = (event: ControlEvent) => unknown;

export type CallbackErrorContext = {
  identifier: NodeId;
  sessionId: string;
};

export type RejectedValueContext = {
  identifier: NodeId;
  sessionId: string;
  reason: string;
};

export type ControlRegistryOptions = {
  store: SceneStore;
  onCallbackError?: (err: SceneSyncError, ctx: CallbackErrorContext) => void;
  onRejectedValue?: (ctx: RejectedValueContext) => void;
  onStateChange?: (id: NodeId, state: ControlState) => void;
  debug?: boolean;
  log?: (line: string) => void;
};

export type RegisterControlInput<K extends ControlType> = {
  id: NodeId;
  parent?: NodeId | null;
  spec: ControlSpec<K>;
};

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

/**
 * Control values, their validation, and the callback table for values clients send.
 *
 * Callbacks never run inside the store's apply path: accepted client values are queued and
 * dispatched from a microtask, one event at a time in arrival order.
 */
export class ControlRegistry {
  private readonly store: SceneStore;
  private readonly callbacks = new Map<NodeId, Set<ControlCallback>>();
  private readonly states = new Map<NodeId, ControlState>();
  private readonly pendingDispatches = new Map<NodeId, number>();
  /** Last client write kept from its sender, with the revision the sender based it on. */
  private readonly clientWrites = new Map<NodeId, { sessionId: string; revision: Revision; base: Revision }>();
  private readonly queue: ControlEvent[] = [];
  private readonly inflight = new Set<Promise<void>>();
  private dispatchScheduled = false;
  private readonly log: (line: string) => void;

  constructor(private readonly opts: ControlRegistryOptions) {
    this.store = opts.store;
    const log = opts.log ?? ((line: string) => console.debug(line));
    this.log = opts.debug ? log : () => {};
  }

  register<K extends ControlType>(input: RegisterControlInput<K>): NodeRecord {
    const { id, spec } = input;
    validateSpec(id, spec);
    const codec = controlCodec(spec.type);
    const checked = codec.check(spec.initial, spec);
    if (!checked.ok) {
      throw new SceneSyncError(SceneErrorCode.INVALID_VALUE, `initial value: ${checked.problem}`, { identifier: id });
    }

    const attributes = settingsToAttributes(spec);
    attributes.set("controlType", attr.string(spec.type));
    const value = codec.toAttribute(checked.value);
    attributes.set("valueType", attr.string(value.type));
    attributes.set("value", value);

    const record = this.store.create({ id, parent: input.parent ?? null, kind: "control", attributes });
    this.states.set(id, "idle");
    return record;
  }

  controlTypeOf(id: NodeId): ControlType | undefined {
    const v = this.store.getAttribute(id, "controlType");
    return v?.type === "string" && isControlType(v.value) ? v.value : undefined;
  }

  /** Current value, or `undefined` when `id` is not a control of type `type`. */
  valueOf<K extends ControlType>(id: NodeId, type: K): ControlValueTypes[K] | undefined {
    if (this.controlTypeOf(id) !== type) return undefined;
    const raw = this.store.getAttribute(id, "value");
    return raw ? controlCodec(type).fromAttribute(raw) : undefined;
  }

  state(id: NodeId): ControlState {
    return this.states.get(id) ?? "idle";
  }

  /**
   * Producer write: validate, store with origin `server`, broadcast to every session.
   */
  setValue<K extends ControlType>(
    id: NodeId,
    type: K,
    value: ControlValueTypes[K],
    guard: { incarnation?: number } = {}
  ): ControlValueMessage {
    const record = this.store.get(id);
    if (!record || (guard.incarnation !== undefined && this.store.incarnationOf(id) !== guard.incarnation)) {
      throw new SceneSyncError(SceneErrorCode.UNKNOWN_IDENTIFIER, `no such control: ${id}`, { identifier: id });
    }
    const actual = this.controlTypeOf(id);
    if (actual !== type) {
      throw new SceneSyncError(SceneErrorCode.INVALID_VALUE, `control ${id} is ${String(actual)}, not ${type}`, {
        identifier: id,
      });
    }
    const checked = controlCodec(type).check(value, readControlSettings(record.attributes));
    if (!checked.ok) throw new SceneSyncError(SceneErrorCode.INVALID_VALUE, checked.problem, { identifier: id });

    this.setState(id, "serverSet");
    try {
      return this.store.setControlValue(id, controlCodec(type).toAttribute(checked.value), "server", guard);
    } finally {
      this.setState(id, "idle");
    }
  }

  /**
   * Apply a value sent by a client. Accepted values reach every other session and queue one
   * callback dispatch; rejected ones are answered by re-publishing the authoritative value.
   *
   * `message.revision` is the last revision the sender saw. The sender is skipped only when it was
   * current, so its optimistic value is already the applied one. Otherwise a newer value is on its
   * way to it and the applied value is sent back after it.
   */
  applyClientValue(sessionId: string, message: ControlValueMessage): void {
    const { id } = message;
    const type = this.controlTypeOf(id);
    const record = type === undefined ? undefined : this.store.get(id);
    if (type === undefined || !record) {
      this.log(`[scenewire:controls] ignoring value for unknown control ${id} from session ${sessionId}`);
      return;
    }

    const codec = controlCodec(type);
    const settings = readControlSettings(record.attributes);
    const decoded = codec.fromAttribute(message.value);
    let problem: string | null = null;
    let accepted: AttributeValue | null = null;
    if (decoded === undefined) problem = `expected a ${type} value, got ${message.value.type}`;
    else if (settings.disabled) problem = "control is disabled";
    else {
      const checked = codec.check(decoded, settings);
      if (checked.ok) accepted = codec.toAttribute(checked.value);
      else problem = checked.problem;
    }

    if (!accepted) {
      this.reject(id, sessionId, problem ?? "rejected");
      return;
    }

    // A clamped value goes back to the sender too, so its optimistic value is corrected.
    const echo = !attributeValuesEqual(accepted, message.value) || !this.senderIsCurrent(sessionId, message, record);
    this.setState(id, "clientSet");
    let applied: ControlValueMessage;
    try {
      applied = this.store.setControlValue(id, accepted, "client", echo ? {} : { excludeSessionId: sessionId });
    } catch (err) {
      this.settle(id);
      throw err;
    }
    if (echo) this.clientWrites.delete(id);
    else this.clientWrites.set(id, { sessionId, revision: applied.revision, base: message.revision });

    this.pendingDispatches.set(id, (this.pendingDispatches.get(id) ?? 0) + 1);
    this.queue.push({ id, value: applied.value, sessionId, revision: applied.revision, seq: applied.seq });
    this.scheduleDispatch();
  }

  onValue(id: NodeId, callback: ControlCallback): Unsubscribe {
    let set = this.callbacks.get(id);
    if (!set) {
      set = new Set();
      this.callbacks.set(id, set);
    }
    set.add(callback);
    return () => {
      const current = this.callbacks.get(id);
      if (!current) return;
      current.delete(callback);
      if (current.size === 0) this.callbacks.delete(id);
    };
  }

  /** Drop callbacks and state of removed controls. */
  forget(ids: Iterable<NodeId>): void {
    for (const id of ids) {
      this.clientWrites.delete(id);
      this.callbacks.delete(id);
      this.states.delete(id);
      this.pendingDispatches.delete(id);
    }
  }

  /**
   * Resolves once every queued dispatch ran and every async callback settled.
   */
  async flush(): Promise<void> {
    while (this.dispatchScheduled || this.queue.length > 0 || this.inflight.size > 0) {
      if (this.inflight.size > 0) await Promise.all(this.inflight);
      else await Promise.resolve();
    }
  }

  /**
   * A sender skipped on its previous write never receives that revision, so it stays current as
   * long as it keeps basing writes on the same one.
   */
  private senderIsCurrent(sessionId: string, message: ControlValueMessage, record: NodeRecord): boolean {
    if (message.revision === record.revision) return true;
    const last = this.clientWrites.get(message.id);
    return (
      last !== undefined &&
      last.sessionId === sessionId &&
      last.revision === record.revision &&
      last.base === message.revision
    );
  }

  private reject(id: NodeId, sessionId: string, reason: string): void {
    const ctx: RejectedValueContext = { identifier: id, sessionId, reason };
    if (this.opts.onRejectedValue) this.opts.onRejectedValue(ctx);
    else console.warn("scenewire: rejected control value", ctx);

    const current = this.store.getAttribute(id, "value");
    if (!current) return;
    this.setState(id, "serverSet");
    try {
      this.store.setControlValue(id, current, "server");
    } finally {
      this.setState(id, "idle");
    }
  }

  private scheduleDispatch(): void {
    if (this.dispatchScheduled) return;
    this.dispatchScheduled = true;
    queueMicrotask(() => {
      this.dispatchScheduled = false;
      this.drainQueue();
    });
  }

  private drainQueue(): void {
    for (;;) {
      const event = this.queue.shift();
      if (!event) return;
      this.dispatch(event);
      this.settle(event.id);
    }
  }

  private dispatch(event: ControlEvent): void {
    const callbacks = Array.from(this.callbacks.get(event.id) ?? []);
    for (const callback of callbacks) {
      try {
        const result = callback(event);
        if (isPromiseLike(result)) {
          const tracked = Promise.resolve(result).then(
            () => {},
            (err: unknown) => this.reportCallbackError(err, event)
          );
          this.inflight.add(tracked);
          void tracked.finally(() => this.inflight.delete(tracked));
        }
      } catch (err) {
        this.reportCallbackError(err, event);
      }
    }
  }

  private settle(id: NodeId): void {
    const pending = (this.pendingDispatches.get(id) ?? 1) - 1;
    if (pending > 0) {
      this.pendingDispatches.set(id, pending);
      return;
    }
    this.pendingDispatches.delete(id);
    if (this.store.has(id)) this.setState(id, "idle");
  }

  private setState(id: NodeId, state: ControlState): void {
    if (this.states.get(id) === state) return;
    this.states.set(id, state);
    this.opts.onStateChange?.(id, state);
  }

  private reportCallbackError(cause: unknown, event: ControlEvent): void {
    const err = new SceneSyncError(SceneErrorCode.CALLBACK_FAILURE, errorMessage(cause), {
      identifier: event.id,
      sessionId: event.sessionId,
      cause,
    });
    const ctx: CallbackErrorContext = { identifier: event.id, sessionId: event.sessionId };
    if (!this.opts.onCallbackError) {
      console.error("scenewire: control callback failed", { ...ctx, message: err.message });
      return;
    }
    try {
      this.opts.onCallbackError(err, ctx);
    } catch (hookErr) {
      console.error("scenewire: onCallbackError handler failed", { ...ctx, err: hookErr });
    }
  }
}
