import type { WebSocket } from "ws";

import { formatOneLineUtf8 } from "./text";

// Close reasons share the 125-byte control frame with the 2-byte status code.
const MAX_CLOSE_REASON_BYTES = 123;

export function wsIsOpenSafe(ws: WebSocket | null | undefined): boolean {
  if (!ws) return false;
  try {
    return ws.readyState === ws.OPEN;
  } catch {
    return false;
  }
}

export function wsCloseSafe(ws: WebSocket, code?: number, reason?: unknown): void {
  try {
    if (typeof code !== "number") {
      ws.close();
      return;
    }
    const safeReason = reason === undefined ? "" : formatOneLineUtf8(reason, MAX_CLOSE_REASON_BYTES);
    if (!safeReason) {
      ws.close(code);
      return;
    }
    ws.close(code, safeReason);
  } catch {
    try {
      ws.terminate();
    } catch {
      // already torn down
    }
  }
}
