import type { LogLevel } from "./logger";
import { isLogLevel } from "./logger";
import type { RelayStream, RelayStreamKind } from "./relayStream";

export type OpenRelayStream = (kind: RelayStreamKind, signal: AbortSignal) => Promise<RelayStream>;

export interface RelayConfig {
  listenHost: string;
  listenPort: number;
  remoteUrl: string;
  handshakeTimeoutMs: number;
  connectTimeoutMs: number;
  bufferPoolCapacity: number;
  bufferSize: number;
  udpBindHost: string;
  udpIdleTimeoutMs: number;
  udpMaxQueuedDatagrams: number;
  wsMaxPayloadBytes: number;
  streamRecvHighWaterMark: number;
  metricsPort: number | null;
  logLevel: LogLevel;
  /**
   * Replaces the WebSocket dialer. Tests use it to put an in-memory stream
   * behind a session.
   */
  openStream?: OpenRelayStream;
}

const MAX_ENV_INT_LEN = 64;

function formatForError(value: string, maxLen = 128): string {
  if (value.length <= maxLen) return value;
  return `${value.slice(0, maxLen)}…(${value.length} chars)`;
}

function readEnvInt(name: string, fallback: number, opts?: { min?: number; max?: number }): number {
  const raw = process.env[name];
  if (raw === undefined) return fallback;
  const trimmed = raw.trim();
  if (trimmed === "") return fallback;
  if (trimmed.length > MAX_ENV_INT_LEN) {
    throw new Error(`Invalid ${name} (value too long)`);
  }
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${name}`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`Invalid ${name}`);
  }

  const min = opts?.min ?? 0;
  const max = opts?.max ?? Number.MAX_SAFE_INTEGER;
  if (parsed < min || parsed > max) {
    throw new Error(`Invalid ${name}=${parsed} (must be ${min}..${max})`);
  }
  return parsed;
}

function readEnvRemoteUrl(name: string, fallback: string): string {
  const raw = (process.env[name] ?? "").trim();
  const value = raw === "" ? fallback : raw;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid ${name}: ${formatForError(value)}`);
  }
  if (url.protocol !== "ws:" && url.protocol !== "wss:") {
    throw new Error(`Invalid ${name} (expected ws:// or wss:// URL, got ${formatForError(url.protocol)})`);
  }
  return url.toString();
}

function readEnvLogLevel(name: string, fallback: LogLevel): LogLevel {
  const raw = (process.env[name] ?? "").trim().toLowerCase();
  if (raw === "") return fallback;
  if (!isLogLevel(raw)) {
    throw new Error(`Invalid ${name}=${formatForError(raw)} (expected debug, info, warn or error)`);
  }
  return raw;
}

export function loadConfigFromEnv(): RelayConfig {
  const metricsPortRaw = (process.env.SOCKS_RELAY_METRICS_PORT ?? "").trim();

  return {
    listenHost: process.env.SOCKS_RELAY_LISTEN_HOST ?? "127.0.0.1",
    listenPort: readEnvInt("SOCKS_RELAY_PORT", 1080, { max: 65535 }),
    remoteUrl: readEnvRemoteUrl("SOCKS_RELAY_REMOTE_URL", "ws://127.0.0.1:8081"),
    handshakeTimeoutMs: readEnvInt("SOCKS_RELAY_HANDSHAKE_TIMEOUT_MS", 10_000, { min: 1 }),
    connectTimeoutMs: readEnvInt("SOCKS_RELAY_CONNECT_TIMEOUT_MS", 10_000, { min: 1 }),
    bufferPoolCapacity: readEnvInt("SOCKS_RELAY_BUFFER_POOL_CAPACITY", 2048),
    // 4096 bytes of payload plus 12 bytes of record header and tag.
    bufferSize: readEnvInt("SOCKS_RELAY_BUFFER_SIZE", 4108, { min: 1 }),
    udpBindHost: process.env.SOCKS_RELAY_UDP_BIND_HOST ?? "0.0.0.0",
    udpIdleTimeoutMs: readEnvInt("SOCKS_RELAY_UDP_IDLE_TIMEOUT_MS", 600_000, { min: 1 }),
    udpMaxQueuedDatagrams: readEnvInt("SOCKS_RELAY_UDP_MAX_QUEUED_DATAGRAMS", 256, { min: 1 }),
    wsMaxPayloadBytes: readEnvInt("SOCKS_RELAY_WS_MAX_PAYLOAD_BYTES", 1024 * 1024, { min: 1 }),
    streamRecvHighWaterMark: readEnvInt("SOCKS_RELAY_STREAM_RECV_HWM", 64, { min: 1 }),
    metricsPort:
      metricsPortRaw === "" ? null : readEnvInt("SOCKS_RELAY_METRICS_PORT", 0, { max: 65535 }),
    logLevel: readEnvLogLevel("SOCKS_RELAY_LOG_LEVEL", "info")
  };
}
