import type { NodeId } from "@scenewire/interface";

import { ControlRegistry } from "./controls.js";
import type {
  CallbackErrorContext,
  ControlState,
  ControlType,
  RegisterControlInput,
  RejectedValueContext,
} from "./controls.js";
import type { SceneSyncError } from "./errors.js";
import { bindControlHandle, bindNodeHandle } from "./handles.js";
import type { ControlHandle, HandleContext, NodeHandle } from "./handles.js";
import { ConnectionManager } from "./manager.js";
import type { AcceptOptions, SessionErrorContext } from "./manager.js";
import { BroadcastScheduler } from "./scheduler.js";
import { resolveLimits } from "./session.js";
import type { SceneSession, SessionLimits } from "./session.js";
import { SceneStore } from "./store.js";
import type { CreateNodeInput } from "./store.js";
import type { ByteStreamTransport, CloseInfo, Unsubscribe } from "./transport.js";

export type SceneServerOptions = {
  limits?: Partial<SessionLimits>;
  onSessionError?: (err: SceneSyncError, ctx: SessionErrorContext) => void;
  onCallbackError?: (err: SceneSyncError, ctx: CallbackErrorContext) => void;
  onRejectedValue?: (ctx: RejectedValueContext) => void;
  onControlStateChange?: (id: NodeId, state: ControlState) => void;
  debug?: boolean;
  log?: (line: string) => void;
};

export type SceneServer = {
  readonly store: SceneStore;
  createNode: (input: CreateNodeInput) => NodeHandle;
  getHandle: (id: NodeId) => NodeHandle | undefined;
  registerControl: <K extends ControlType>(input: RegisterControlInput<K>) => ControlHandle<K>;
  getControl: <K extends ControlType>(id: NodeId, type: K) => ControlHandle<K> | undefined;
  connectClient: (transport: ByteStreamTransport, opts?: AcceptOptions) => SceneSession;
  disconnectClient: (sessionId: string, reason?: string) => boolean;
  onClientConnect: (handler: (session: SceneSession) => void) => Unsubscribe;
  onClientDisconnect: (handler: (session: SceneSession, info: CloseInfo) => void) => Unsubscribe;
  sessions: () => SceneSession[];
  /** Group mutations so each session writes them out together. */
  atomic: <T>(fn: () => T) => T;
  /** Wait for queued control callbacks. */
  flush: () => Promise<void>;
  close: () => void;
};

/**
 * Wire a store, broadcast scheduler, connection manager and control registry into one scene.
 */
export function createSceneServer(opts: SceneServerOptions = {}): SceneServer {
  const limits = resolveLimits(opts.limits);
  const scheduler = new BroadcastScheduler();
  // A frame must fit both the wire limit and an empty session queue.
  const store = new SceneStore({
    sink: scheduler,
    maxFrameBytes: Math.min(limits.maxFrameBytes, limits.maxQueuedBytes),
  });
  const controls = new ControlRegistry({
    store,
    onCallbackError: opts.onCallbackError,
    onRejectedValue: opts.onRejectedValue,
    onStateChange: opts.onControlStateChange,
    debug: opts.debug,
    log: opts.log,
  });
  const manager = new ConnectionManager({
    store,
    scheduler,
    limits,
    onControlValue: (session, message) => controls.applyClientValue(session.id, message),
    onSessionError: opts.onSessionError,
    debug: opts.debug,
    log: opts.log,
  });
  const ctx: HandleContext = { store, controls };

  return {
    store,
    createNode: (input) => bindNodeHandle(ctx, store.create(input)),
    getHandle: (id) => {
      const record = store.get(id);
      return record ? bindNodeHandle(ctx, record) : undefined;
    },
    registerControl: (input) => {
      controls.register(input);
      return bindControlHandle(ctx, input.id, input.spec.type);
    },
    getControl: (id, type) => (controls.controlTypeOf(id) === type ? bindControlHandle(ctx, id, type) : undefined),
    connectClient: (transport, acceptOpts) => manager.accept(transport, acceptOpts),
    disconnectClient: (sessionId, reason) => manager.disconnect(sessionId, reason),
    onClientConnect: (handler) => manager.onConnect(handler),
    onClientDisconnect: (handler) => manager.onDisconnect(handler),
    sessions: () => manager.sessions(),
    atomic: (fn) => scheduler.atomic(fn),
    flush: () => controls.flush(),
    close: () => manager.close(),
  };
}
