import type { Duplex } from "node:stream";

import { errorWithCode } from "./errorCode";
import { pauseBestEffort, resumeBestEffort } from "./socketSafe";

const DEFAULT_HIGH_WATER_MARK_BYTES = 64 * 1024;

/**
 * Pull-style reads over a flowing Node socket.
 *
 * The handshake needs exact-length reads and the TCP upstream needs to fill a
 * caller-owned buffer; both are awkward with `data` events alone. Incoming
 * chunks are queued here and the socket is paused while more than
 * `highWaterMarkBytes` sit unread.
 *
 * Only one read may be pending at a time.
 */
export class SocketReader {
  private readonly chunks: Buffer[] = [];
  private bufferedBytes = 0;
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private pausedForBackpressure = false;

  constructor(
    private readonly socket: Duplex,
    private readonly highWaterMarkBytes = DEFAULT_HIGH_WATER_MARK_BYTES
  ) {
    socket.on("data", (chunk: Buffer) => {
      if (chunk.length === 0) return;
      this.chunks.push(chunk);
      this.bufferedBytes += chunk.length;
      if (this.bufferedBytes > this.highWaterMarkBytes && !this.pausedForBackpressure) {
        this.pausedForBackpressure = true;
        pauseBestEffort(socket);
      }
      this.notify();
    });
    socket.once("end", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("error", (err: Error) => {
      this.failure ??= err;
      this.notify();
    });
    socket.once("close", () => {
      // A socket destroyed locally closes without `end`; pending and later
      // reads observe that as a closed connection.
      if (!this.ended) {
        this.failure ??= errorWithCode("Socket is closed", "ERR_SOCKET_CLOSED");
      }
      this.notify();
    });
  }

  get buffered(): number {
    return this.bufferedBytes;
  }

  /**
   * Copies up to `target.length` bytes into `target`. Resolves with the number
   * of bytes copied; 0 means the peer ended the stream. Rejects once the socket
   * errored or was closed without an orderly end.
   */
  async readInto(target: Buffer): Promise<number> {
    if (target.length === 0) return 0;
    await this.waitForData();
    if (this.bufferedBytes === 0) return 0;

    let copied = 0;
    while (copied < target.length && this.chunks.length > 0) {
      const head = this.chunks[0];
      if (head === undefined) break;
      const n = head.copy(target, copied, 0, Math.min(head.length, target.length - copied));
      copied += n;
      if (n === head.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = head.subarray(n);
      }
    }
    this.consumed(copied);
    return copied;
  }

  /** Reads exactly `length` bytes; a stream that ends first is an error. */
  async readExact(length: number): Promise<Buffer> {
    const out = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      const n = await this.readInto(out.subarray(filled));
      if (n === 0) {
        throw errorWithCode(`Unexpected end of stream (wanted ${length} bytes, got ${filled})`, "ERR_SOCKS_TRUNCATED");
      }
      filled += n;
    }
    return out;
  }

  private async waitForData(): Promise<void> {
    while (this.bufferedBytes === 0) {
      if (this.failure) throw this.failure;
      if (this.ended) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private consumed(bytes: number): void {
    this.bufferedBytes -= bytes;
    if (this.pausedForBackpressure && this.bufferedBytes <= this.highWaterMarkBytes / 2) {
      this.pausedForBackpressure = false;
      resumeBestEffort(this.socket);
    }
  }
}
