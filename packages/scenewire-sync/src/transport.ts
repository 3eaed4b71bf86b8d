export type Unsubscribe = () => void;

export interface DuplexTransport<M> {
  send(msg: M): Promise<void>;
  onMessage(handler: (msg: M) => void): Unsubscribe;
}

export type CloseInfo = {
  code?: number;
  reason?: string;
};

/**
 * A persistent, ordered, reliable byte stream to one client. Message boundaries of `onMessage`
 * carry no meaning: receivers reassemble frames themselves.
 */
export interface ByteStreamTransport extends DuplexTransport<Uint8Array> {
  close(info?: CloseInfo): void;
  onClose(handler: (info: CloseInfo) => void): Unsubscribe;
}

export type InMemoryDuplexOptions = {
  /** Re-chunk every write into pieces of at most this many bytes before delivery. */
  chunkBytes?: number;
};

function rechunk(bytes: Uint8Array, chunkBytes: number | undefined): Uint8Array[] {
  if (!chunkBytes || bytes.length <= chunkBytes) return [bytes];
  const out: Uint8Array[] = [];
  for (let offset = 0; offset < bytes.length; offset += chunkBytes) {
    out.push(bytes.slice(offset, offset + chunkBytes));
  }
  return out;
}

export function createInMemoryDuplex(
  opts: InMemoryDuplexOptions = {}
): [ByteStreamTransport, ByteStreamTransport] {
  if (opts.chunkBytes !== undefined && (!Number.isSafeInteger(opts.chunkBytes) || opts.chunkBytes <= 0)) {
    throw new Error(`invalid chunkBytes: ${opts.chunkBytes}`);
  }

  const messageHandlers = [new Set<(msg: Uint8Array) => void>(), new Set<(msg: Uint8Array) => void>()] as const;
  const closeHandlers = [new Set<(info: CloseInfo) => void>(), new Set<(info: CloseInfo) => void>()] as const;
  let closed = false;

  const closeBoth = (info: CloseInfo) => {
    if (closed) return;
    closed = true;
    queueMicrotask(() => {
      for (const handlers of closeHandlers) {
        for (const h of handlers) h(info);
        handlers.clear();
      }
      for (const handlers of messageHandlers) handlers.clear();
    });
  };

  const end = (self: 0 | 1): ByteStreamTransport => {
    const peer = self === 0 ? 1 : 0;
    return {
      async send(msg) {
        if (closed) throw new Error("transport closed");
        const chunks = rechunk(msg, opts.chunkBytes);
        queueMicrotask(() => {
          for (const chunk of chunks) {
            for (const h of messageHandlers[peer]) h(chunk);
          }
        });
      },
      onMessage(handler) {
        messageHandlers[self].add(handler);
        return () => messageHandlers[self].delete(handler);
      },
      close(info = {}) {
        closeBoth(info);
      },
      onClose(handler) {
        closeHandlers[self].add(handler);
        return () => closeHandlers[self].delete(handler);
      },
    };
  };

  return [end(0), end(1)];
}
