import assert from "node:assert/strict";
import type { TestContext } from "node:test";
import net from "node:net";
import { Duplex } from "node:stream";

import type { OpenRelayStream } from "../config";
import { errorWithCode } from "../errorCode";
import { FrameQueue } from "../frameQueue";
import type { RelayStream, RelayStreamKind } from "../relayStream";
import { encodeSocksAddress, type SocksAddress } from "../socksAddress";
import { unrefBestEffort } from "../unrefSafe";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    const timeout = setTimeout(resolve, ms);
    unrefBestEffort(timeout);
  });
}

export async function waitFor(predicate: () => boolean, what: string, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`timeout waiting for ${what}`);
    await sleep(5);
  }
}

export function serverPort(server: net.Server): number {
  const addr = server.address();
  assert.ok(addr && typeof addr !== "string");
  return addr.port;
}

/**
 * Relay stream whose remote side is driven by the test: `deliver`, `end` and
 * `fail` feed the proxy, `sent` records what the proxy sent.
 */
export class MemoryRelayStream implements RelayStream {
  readonly peer = "memory:0";
  readonly sent: Buffer[] = [];
  closeSendCalls = 0;
  private readonly inbound = new FrameQueue();

  constructor(readonly kind: RelayStreamKind) {}

  send(frame: Buffer): Promise<void> {
    if (this.closeSendCalls > 0) {
      return Promise.reject(errorWithCode("send after closeSend", "ERR_STREAM_WRITE_AFTER_END"));
    }
    // Copy: the proxy reuses its read buffer once the send settles.
    this.sent.push(Buffer.from(frame));
    return Promise.resolve();
  }

  recv(signal?: AbortSignal): Promise<Buffer | null> {
    return this.inbound.next(signal);
  }

  closeSend(): void {
    this.closeSendCalls += 1;
  }

  deliver(frame: string | Buffer): void {
    this.inbound.push(typeof frame === "string" ? Buffer.from(frame, "utf8") : Buffer.from(frame));
  }

  end(): void {
    this.inbound.end();
  }

  fail(err: Error): void {
    this.inbound.fail(err);
  }

  sentText(): string[] {
    return this.sent.map((frame) => frame.toString("utf8"));
  }

  async waitForSent(count: number): Promise<Buffer[]> {
    await waitFor(() => this.sent.length >= count, `${count} sent frames`);
    return this.sent.slice(0, count);
  }
}

export interface MemoryStreams {
  openStream: OpenRelayStream;
  opened: MemoryRelayStream[];
  next: () => Promise<MemoryRelayStream>;
}

export function memoryStreams(): MemoryStreams {
  const opened: MemoryRelayStream[] = [];
  let taken = 0;
  return {
    opened,
    openStream: async (kind) => {
      const stream = new MemoryRelayStream(kind);
      opened.push(stream);
      return stream;
    },
    next: async () => {
      await waitFor(() => opened.length > taken, "a relay stream to be opened");
      const stream = opened[taken];
      assert.ok(stream);
      taken += 1;
      return stream;
    }
  };
}

/** Accumulates everything a socket receives and tracks when it closes. */
export class ByteCollector {
  private buffered = Buffer.alloc(0);
  closed = false;

  constructor(socket: net.Socket) {
    socket.on("data", (chunk: Buffer) => {
      this.buffered = Buffer.concat([this.buffered, chunk]);
    });
    socket.on("error", () => {
      // Resets are expected in several tests; `closed` is what they assert.
    });
    socket.once("close", () => {
      this.closed = true;
    });
  }

  get pending(): Buffer {
    return this.buffered;
  }

  async read(length: number): Promise<Buffer> {
    await waitFor(() => this.buffered.length >= length || this.closed, `${length} bytes from the proxy`);
    assert.ok(this.buffered.length >= length, `socket closed after ${this.buffered.length} of ${length} bytes`);
    const out = this.buffered.subarray(0, length);
    this.buffered = this.buffered.subarray(length);
    return Buffer.from(out);
  }

  async waitForClose(timeoutMs = 2_000): Promise<void> {
    await waitFor(() => this.closed, "socket close", timeoutMs);
  }
}

export async function connectTcp(port: number): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const socket = net.connect({ host: "127.0.0.1", port });
    socket.once("error", reject);
    socket.once("connect", () => {
      socket.off("error", reject);
      resolve(socket);
    });
  });
}

export const NO_AUTH_GREETING = Buffer.from([0x05, 0x01, 0x00]);

export function socksRequest(command: number, address: SocksAddress): Buffer {
  return Buffer.concat([Buffer.from([0x05, command, 0x00]), encodeSocksAddress(address)]);
}

/** Opens a client connection and completes no-auth negotiation. */
export async function socksClient(port: number): Promise<{ socket: net.Socket; rx: ByteCollector }> {
  const socket = await connectTcp(port);
  const rx = new ByteCollector(socket);
  socket.write(NO_AUTH_GREETING);
  assert.deepEqual(await rx.read(2), Buffer.from([0x05, 0x00]));
  return { socket, rx };
}

export type LogEntry = Record<string, unknown>;

/** Captures JSONL log lines for the duration of the test. */
export function captureLogs(t: TestContext): LogEntry[] {
  const entries: LogEntry[] = [];
  t.mock.method(console, "log", (...args: unknown[]) => {
    const line = args[0];
    if (typeof line !== "string") return;
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      entries.push(Object.fromEntries(Object.entries(parsed)));
    }
  });
  return entries;
}

export function logEvents(entries: LogEntry[], level?: string): string[] {
  return entries.filter((entry) => level === undefined || entry.level === level).map((entry) => String(entry.event));
}

/**
 * In-memory duplex standing in for a client socket: `feed` makes bytes
 * readable, `written` collects what the code under test wrote.
 */
export class FakeSocket extends Duplex {
  readonly written: Buffer[] = [];

  override _read(): void {
    // Data arrives through `feed`.
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.written.push(Buffer.from(chunk));
    callback();
  }

  feed(data: Buffer | number[]): void {
    this.push(Buffer.from(data));
  }

  finish(): void {
    this.push(null);
  }

  writtenBytes(): Buffer {
    return Buffer.concat(this.written);
  }
}
