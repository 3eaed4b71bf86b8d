import { randomUUID } from "node:crypto";

import { encodeMessage } from "./codec.js";
import { SceneErrorCode, SceneSyncError, errorMessage, malformed, withSession } from "./errors.js";
import type { BroadcastScheduler } from "./scheduler.js";
import { SceneSession } from "./session.js";
import type { SessionLimits } from "./session.js";
import type { SceneStore } from "./store.js";
import type { ByteStreamTransport, CloseInfo, Unsubscribe } from "./transport.js";
import type { BootstrapCompleteMessage, ControlValueMessage, SceneMessage } from "./types.js";

export type SessionErrorContext = {
  sessionId: string;
};

export type ConnectionManagerOptions = {
  store: SceneStore;
  scheduler: BroadcastScheduler;
  limits?: Partial<SessionLimits>;
  /** Called for every control value a client sends. */
  onControlValue?: (session: SceneSession, message: ControlValueMessage) => void;
  onSessionError?: (err: SceneSyncError, ctx: SessionErrorContext) => void;
  debug?: boolean;
  log?: (line: string) => void;
};

export type AcceptOptions = {
  id?: string;
};

const CLOSE_NORMAL = 1000;
const CLOSE_PROTOCOL_ERROR = 1002;
const CLOSE_POLICY_VIOLATION = 1008;
const CLOSE_INTERNAL_ERROR = 1011;

function closeCodeFor(err: SceneSyncError): number {
  switch (err.code) {
    case SceneErrorCode.MALFORMED_MESSAGE:
      return CLOSE_PROTOCOL_ERROR;
    case SceneErrorCode.QUEUE_OVERFLOW:
      return CLOSE_POLICY_VIOLATION;
    default:
      return CLOSE_INTERNAL_ERROR;
  }
}

function describeInbound(message: SceneMessage): string {
  if (message.type === "controlValue") return `controlValue with origin "${message.origin}"`;
  return message.type;
}

/**
 * Owns the live sessions: bootstraps new ones from a store snapshot, registers them with the
 * scheduler, and tears them down on error or disconnect.
 */
export class ConnectionManager {
  private readonly sessionsById = new Map<string, SceneSession>();
  private readonly connectHandlers = new Set<(session: SceneSession) => void>();
  private readonly disconnectHandlers = new Set<(session: SceneSession, info: CloseInfo) => void>();
  private readonly log: (line: string) => void;
  private closed = false;

  constructor(private readonly opts: ConnectionManagerOptions) {
    const log = opts.log ?? ((line: string) => console.debug(line));
    this.log = opts.debug ? log : () => {};
  }

  get size(): number {
    return this.sessionsById.size;
  }

  get(id: string): SceneSession | undefined {
    return this.sessionsById.get(id);
  }

  sessions(): SceneSession[] {
    return Array.from(this.sessionsById.values());
  }

  onConnect(handler: (session: SceneSession) => void): Unsubscribe {
    this.connectHandlers.add(handler);
    return () => this.connectHandlers.delete(handler);
  }

  onDisconnect(handler: (session: SceneSession, info: CloseInfo) => void): Unsubscribe {
    this.disconnectHandlers.add(handler);
    return () => this.disconnectHandlers.delete(handler);
  }

  /**
   * Register a client. The bootstrap (current state, then a completion marker) is queued before the
   * session joins the broadcast, all in one synchronous step, so no mutation falls in between.
   */
  accept(transport: ByteStreamTransport, acceptOpts: AcceptOptions = {}): SceneSession {
    if (this.closed) throw new Error("connection manager is closed");
    const id = acceptOpts.id ?? randomUUID();
    if (this.sessionsById.has(id)) throw new Error(`session already exists: ${id}`);

    const session = new SceneSession({
      id,
      transport,
      limits: this.opts.limits,
      isHeld: () => this.opts.scheduler.held,
      onMessage: (s, message) => this.handleInbound(s, message),
      onError: (s, err) => this.fail(s, err),
      onClosed: (s, info) => this.handleClosed(s, info),
      debug: this.opts.debug,
      log: this.opts.log,
    });

    const { seq, messages } = this.opts.store.snapshotMessages();
    const frames = messages.map((m) => ({ bytes: encodeMessage(m), seq: m.seq }));
    const complete: BootstrapCompleteMessage = { type: "bootstrapComplete", seq, nodeCount: messages.length };
    frames.push({ bytes: encodeMessage(complete), seq });

    this.sessionsById.set(id, session);
    session.bootstrap(frames, seq);
    this.opts.scheduler.add(session);
    this.log(`[scenewire:manager] session ${id} connected (${messages.length} nodes at seq ${seq})`);

    for (const handler of Array.from(this.connectHandlers)) {
      try {
        handler(session);
      } catch (err) {
        console.error("scenewire: onConnect handler failed", { sessionId: id, err });
      }
    }
    return session;
  }

  /**
   * Close a session and drop its queue. Unknown or already closed sessions are ignored.
   */
  disconnect(id: string, reason = "disconnected"): boolean {
    const session = this.sessionsById.get(id);
    if (!session) return false;
    session.close({ code: CLOSE_NORMAL, reason });
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const session of this.sessions()) session.close({ code: CLOSE_NORMAL, reason: "server closing" });
  }

  private handleInbound(session: SceneSession, message: SceneMessage): void {
    if (message.type !== "controlValue" || message.origin !== "client") {
      this.fail(session, malformed(`unexpected ${describeInbound(message)} from client`, { sessionId: session.id }));
      return;
    }
    if (!this.opts.onControlValue) {
      this.log(`[scenewire:manager] session ${session.id}: control value for ${message.id} ignored (no handler)`);
      return;
    }
    try {
      this.opts.onControlValue(session, message);
    } catch (err) {
      // Store-level rejections of a client's value stay with that client.
      const reported =
        err instanceof SceneSyncError
          ? withSession(err, session.id)
          : new SceneSyncError(SceneErrorCode.INVALID_VALUE, errorMessage(err), {
              identifier: message.id,
              sessionId: session.id,
              cause: err,
            });
      this.report(reported, session);
    }
  }

  private fail(session: SceneSession, err: SceneSyncError): void {
    this.report(err, session);
    session.close({ code: closeCodeFor(err), reason: err.code });
  }

  private report(err: SceneSyncError, session: SceneSession): void {
    const ctx: SessionErrorContext = { sessionId: session.id };
    if (!this.opts.onSessionError) {
      console.error("scenewire: session error", { ...ctx, code: err.code, message: err.message });
      return;
    }
    try {
      this.opts.onSessionError(err, ctx);
    } catch (hookErr) {
      console.error("scenewire: onSessionError handler failed", { ...ctx, err: hookErr });
    }
  }

  private handleClosed(session: SceneSession, info: CloseInfo): void {
    if (this.sessionsById.get(session.id) !== session) return;
    this.sessionsById.delete(session.id);
    this.opts.scheduler.delete(session.id);
    this.log(`[scenewire:manager] session ${session.id} disconnected${info.reason ? `: ${info.reason}` : ""}`);

    for (const handler of Array.from(this.disconnectHandlers)) {
      try {
        handler(session, info);
      } catch (err) {
        console.error("scenewire: onDisconnect handler failed", { sessionId: session.id, err });
      }
    }
  }
}
