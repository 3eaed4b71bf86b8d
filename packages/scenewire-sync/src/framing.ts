import { DEFAULT_MAX_FRAME_BYTES, FRAME_HEADER_BYTES, decodeMessage, readFrameHeader } from "./codec.js";
import type { FrameHeader } from "./codec.js";
import { malformed } from "./errors.js";
import type { SceneMessage } from "./types.js";

export type FrameReaderOptions = {
  maxFrameBytes?: number;
};

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  if (parts.length === 1 && parts[0]) return parts[0];
  const total = parts.reduce((acc, p) => acc + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

/**
 * Splits a byte stream into frames. Chunks may cut frames anywhere or carry several frames;
 * the frame header's length fields decide boundaries.
 *
 * After the first malformed frame the reader stays failed: the stream position is unknown.
 */
export class FrameReader {
  private readonly maxFrameBytes: number;
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private header: FrameHeader | null = null;
  private failed: Error | null = null;

  constructor(opts: FrameReaderOptions = {}) {
    this.maxFrameBytes = opts.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    if (!Number.isSafeInteger(this.maxFrameBytes) || this.maxFrameBytes < FRAME_HEADER_BYTES) {
      throw new Error(`invalid maxFrameBytes: ${opts.maxFrameBytes}`);
    }
  }

  get bufferedBytes(): number {
    return this.buffered;
  }

  /**
   * Feed one chunk; returns the raw frames it completed, in stream order.
   */
  pushFrames(chunk: Uint8Array): Uint8Array[] {
    if (this.failed) throw this.failed;
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
    }

    const frames: Uint8Array[] = [];
    try {
      for (;;) {
        if (!this.header) {
          if (this.buffered < FRAME_HEADER_BYTES) break;
          this.header = readFrameHeader(this.peek(FRAME_HEADER_BYTES), this.maxFrameBytes);
          if (!this.header) break;
        }
        if (this.buffered < this.header.frameLength) break;
        frames.push(this.take(this.header.frameLength));
        this.header = null;
      }
    } catch (err) {
      this.failed = err instanceof Error ? err : malformed(String(err));
      this.chunks = [];
      this.buffered = 0;
      throw this.failed;
    }
    return frames;
  }

  /**
   * Feed one chunk; returns the decoded messages it completed, in stream order.
   */
  push(chunk: Uint8Array): SceneMessage[] {
    const frames = this.pushFrames(chunk);
    try {
      return frames.map((frame) => decodeMessage(frame, this.maxFrameBytes));
    } catch (err) {
      this.failed = err instanceof Error ? err : malformed(String(err));
      throw this.failed;
    }
  }

  private peek(n: number): Uint8Array {
    const parts: Uint8Array[] = [];
    let need = n;
    for (const c of this.chunks) {
      if (need <= 0) break;
      const part = c.length <= need ? c : c.subarray(0, need);
      parts.push(part);
      need -= part.length;
    }
    return concatBytes(parts);
  }

  private take(n: number): Uint8Array {
    const parts: Uint8Array[] = [];
    let need = n;
    while (need > 0) {
      const c = this.chunks[0];
      if (!c) throw new Error("FrameReader: buffer underrun");
      if (c.length <= need) {
        parts.push(c);
        this.chunks.shift();
        need -= c.length;
      } else {
        parts.push(c.subarray(0, need));
        this.chunks[0] = c.subarray(need);
        need = 0;
      }
    }
    this.buffered -= n;
    return concatBytes(parts);
  }
}
