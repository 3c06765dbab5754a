import type { BufferPool } from "./bufferPool";
import type { OpenRelayStream, RelayConfig } from "./config";
import type { RelayMetrics } from "./metrics";

/** What the listener hands each relay session besides the client socket. */
export interface RelaySessionContext {
  connId: number;
  config: RelayConfig;
  openStream: OpenRelayStream;
  pool: BufferPool;
  metrics: RelayMetrics;
  /** Stops the handshake deadline. Called once the request's address block is read. */
  requestParsed: () => void;
}

export function describeRemote(socket: { remoteAddress?: string; remotePort?: number }): string {
  return `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
}
