export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent =
  | "proxy_start"
  | "proxy_stop"
  | "socks_handshake_error"
  | "socks_unsupported_command"
  | "stream_open_error"
  | "stream_send_error"
  | "stream_recv_error"
  | "client_read_error"
  | "client_write_error"
  | "tcp_estab"
  | "tcp_close"
  | "udp_estab"
  | "udp_close"
  | "udp_bind_error"
  | "udp_socket_error"
  | "udp_datagram_invalid"
  | "udp_destination_mismatch"
  | "udp_drop_backpressure"
  | "udp_idle_timeout"
  | "udp_no_reply_address"
  | "stream_open_cancelled"
  | "udp_datagram_up"
  | "udp_datagram_down";

import { formatOneLineError, formatOneLineUtf8 } from "./text";

const MAX_LOG_ERROR_MESSAGE_BYTES = 512;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let minLevel: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function log(level: LogLevel, event: LogEvent, fields: Record<string, unknown> = {}): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
  const entry = {
    ts: new Date().toISOString(),
    level,
    event,
    ...fields
  };
  // JSONL structured logging.
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(entry));
}

export function formatError(err: unknown): { message: string; name?: string; code?: unknown } {
  if (err instanceof Error) {
    const safeMessage = formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES);
    const safeName = formatOneLineUtf8(err.name, 128) || "Error";
    return { name: safeName, message: safeMessage, code: "code" in err ? err.code : undefined };
  }
  return { message: formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES) };
}
