import http from "node:http";

import WebSocket, { WebSocketServer } from "ws";

import type { ByteStreamTransport, CloseInfo, SceneServer } from "@scenewire/sync";

function toUint8Array(data: WebSocket.RawData): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return Buffer.concat(data);
}

// Close codes outside 1000 and 3000-4999 are reserved and rejected by ws.
function closeCode(code: number | undefined): number {
  if (code === undefined) return 1000;
  if (code === 1000 || (code >= 1001 && code <= 1014 && code !== 1004 && code !== 1005 && code !== 1006)) return code;
  if (code >= 3000 && code <= 4999) return code;
  return 1000;
}

export function createWebSocketTransport(ws: WebSocket): ByteStreamTransport {
  return {
    send: (bytes) =>
      new Promise<void>((resolve, reject) => {
        try {
          ws.send(bytes, { binary: true }, (err) => (err ? reject(err) : resolve()));
        } catch (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
        }
      }),
    onMessage: (handler) => {
      const onMessage = (data: WebSocket.RawData) => handler(toUint8Array(data));
      ws.on("message", onMessage);
      return () => ws.off("message", onMessage);
    },
    close: (info: CloseInfo = {}) => {
      if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) return;
      // Reasons longer than 123 bytes do not fit a close frame.
      ws.close(closeCode(info.code), (info.reason ?? "").slice(0, 120));
    },
    onClose: (handler) => {
      const onClose = (code: number, reason: Buffer) => handler({ code, reason: reason.toString("utf8") });
      ws.on("close", onClose);
      return () => ws.off("close", onClose);
    },
  };
}

export type WebSocketSceneServerErrorContext = {
  sessionId?: string;
  remoteAddress?: string;
};

export type WebSocketSceneServerOptions = {
  scene: SceneServer;
  host?: string;
  port?: number;
  syncPath?: string;
  healthPath?: string;
  maxPayloadBytes?: number;
  onSocketError?: (err: unknown, ctx: WebSocketSceneServerErrorContext) => void;
  debug?: boolean;
  log?: (line: string) => void;
};

export type WebSocketSceneServerHandle = {
  host: string;
  port: number;
  syncPath: string;
  healthPath: string;
  close: () => Promise<void>;
};

/**
 * Serve a scene over WebSocket: each socket on `syncPath` becomes one client session; every other
 * HTTP path answers 404 except the health check.
 */
export async function startWebSocketSceneServer(opts: WebSocketSceneServerOptions): Promise<WebSocketSceneServerHandle> {
  const host = opts.host ?? "0.0.0.0";
  const port = Number(opts.port ?? 8080);
  const syncPath = opts.syncPath ?? "/scene";
  const healthPath = opts.healthPath ?? "/health";
  const maxPayloadBytes = Number(opts.maxPayloadBytes ?? 64 * 1024 * 1024);
  const log = opts.log ?? ((line: string) => console.debug(line));
  const debug = opts.debug ? log : () => {};

  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`invalid port: ${opts.port}`);
  if (!syncPath.startsWith("/")) throw new Error(`syncPath must start with "/": ${syncPath}`);
  if (!healthPath.startsWith("/")) throw new Error(`healthPath must start with "/": ${healthPath}`);
  if (syncPath === healthPath) throw new Error(`syncPath and healthPath must differ: ${syncPath}`);
  if (!Number.isFinite(maxPayloadBytes) || maxPayloadBytes <= 0) {
    throw new Error(`invalid maxPayloadBytes: ${opts.maxPayloadBytes}`);
  }

  const reportSocketError = (err: unknown, ctx: WebSocketSceneServerErrorContext) => {
    if (!opts.onSocketError) {
      console.error("scenewire: socket error", { ...ctx, err });
      return;
    }
    try {
      opts.onSocketError(err, ctx);
    } catch (hookErr) {
      console.error("scenewire: onSocketError handler failed", { ...ctx, err: hookErr });
    }
  };

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname === healthPath) {
      res.writeHead(200, { "content-type": "text/plain" });
      res.end("ok");
      return;
    }

    res.writeHead(404, { "content-type": "text/plain" });
    res.end("not found");
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: maxPayloadBytes });
  const sessionIds = new Set<string>();

  server.on("upgrade", (req, socket, head) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname !== syncPath) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws: WebSocket, req: http.IncomingMessage) => {
    const remoteAddress = req.socket.remoteAddress;
    let sessionId: string | undefined;

    ws.on("error", (err) => reportSocketError(err, { sessionId, remoteAddress }));

    try {
      const session = opts.scene.connectClient(createWebSocketTransport(ws));
      const id = session.id;
      sessionId = id;
      sessionIds.add(id);
      ws.once("close", () => sessionIds.delete(id));
      debug(`[scenewire:ws] session ${session.id} from ${remoteAddress ?? "unknown"}`);
    } catch (err) {
      reportSocketError(err, { remoteAddress });
      ws.close(1011, "failed to open session");
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, resolve);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address ? address.port : port;

  const close = async (): Promise<void> => {
    for (const id of Array.from(sessionIds)) opts.scene.disconnectClient(id, "server closing");
    for (const ws of wss.clients) ws.terminate();

    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return { host, port: actualPort, syncPath, healthPath, close };
}
