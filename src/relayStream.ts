import { WebSocket } from "ws";

import type { RelayConfig } from "./config";
import { errorWithCode } from "./errorCode";
import { FrameQueue } from "./frameQueue";
import { pauseBestEffort, resumeBestEffort } from "./socketSafe";
import { formatOneLineUtf8 } from "./text";
import { wsCloseSafe, wsIsOpenSafe } from "./wsClose";

export type RelayStreamKind = "tcp" | "udp";

/**
 * One bidirectional, message-delimited channel to the remote relay. A stream
 * carries exactly one client connection: its first outbound frame is the
 * destination as `host:port` text, later frames are raw payload.
 */
export interface RelayStream {
  /** Remote endpoint of the stream as `address:port`, when known. */
  readonly peer: string | null;
  /** Resolves once the frame has been handed to the transport. */
  send(frame: Buffer): Promise<void>;
  /**
   * Next inbound frame, or `null` at a clean end of stream. Rejects on a
   * transport error or when `signal` aborts.
   */
  recv(signal?: AbortSignal): Promise<Buffer | null>;
  /** Half-closes the send side. Idempotent. */
  closeSend(): void;
}

export function relayStreamUrl(remoteUrl: string, kind: RelayStreamKind): string {
  const url = new URL(remoteUrl);
  url.pathname = `${url.pathname.replace(/\/+$/, "")}/${kind}`;
  return url.toString();
}

export function rawDataToBuffer(data: Buffer | ArrayBuffer | Buffer[]): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

const CLEAN_CLOSE_CODES: ReadonlySet<number> = new Set([1000, 1005]);

export class WsRelayStream implements RelayStream {
  private readonly inbound = new FrameQueue();
  private sendClosed = false;
  private paused = false;

  constructor(
    private readonly ws: WebSocket,
    private readonly highWaterMark: number,
    readonly peer: string | null = null
  ) {
    ws.on("message", (data, isBinary) => {
      // The relay protocol is binary-only.
      if (!isBinary) return;
      this.inbound.push(rawDataToBuffer(data));
      if (this.inbound.length >= this.highWaterMark && !this.paused) {
        this.paused = true;
        pauseBestEffort(ws);
      }
    });
    ws.once("close", (code, reason) => {
      if (CLEAN_CLOSE_CODES.has(code)) {
        this.inbound.end();
        return;
      }
      const detail = reason.length > 0 ? ` (${formatOneLineUtf8(reason.toString("utf8"), 123)})` : "";
      this.inbound.fail(errorWithCode(`relay stream closed with code ${code}${detail}`, "ERR_RELAY_STREAM_CLOSED"));
    });
    ws.on("error", (err) => {
      this.inbound.fail(err);
    });
  }

  send(frame: Buffer): Promise<void> {
    if (this.sendClosed) {
      return Promise.reject(errorWithCode("relay stream send side is closed", "ERR_STREAM_WRITE_AFTER_END"));
    }
    if (!wsIsOpenSafe(this.ws)) {
      return Promise.reject(errorWithCode("relay stream is not open", "ERR_RELAY_STREAM_CLOSED"));
    }
    return new Promise<void>((resolve, reject) => {
      this.ws.send(frame, { binary: true }, (err) => (err ? reject(err) : resolve()));
    });
  }

  async recv(signal?: AbortSignal): Promise<Buffer | null> {
    const frame = await this.inbound.next(signal);
    if (this.paused && this.inbound.length <= this.highWaterMark / 2) {
      this.paused = false;
      resumeBestEffort(this.ws);
    }
    return frame;
  }

  closeSend(): void {
    if (this.sendClosed) return;
    this.sendClosed = true;
    if (this.paused) {
      // The peer's closing handshake has to be read to finish the close.
      this.paused = false;
      resumeBestEffort(this.ws);
    }
    // A close frame ends our direction; frames the peer already sent are still
    // delivered until its own close arrives.
    wsCloseSafe(this.ws, 1000, "end of stream");
  }
}

export type WsRelayStreamOptions = Pick<
  RelayConfig,
  "remoteUrl" | "connectTimeoutMs" | "wsMaxPayloadBytes" | "streamRecvHighWaterMark"
>;

/** Dials `<remoteUrl>/<kind>` and resolves once the WebSocket is open. */
export function openWsRelayStream(
  options: WsRelayStreamOptions,
  kind: RelayStreamKind,
  signal: AbortSignal
): Promise<WsRelayStream> {
  return new Promise<WsRelayStream>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const ws = new WebSocket(relayStreamUrl(options.remoteUrl, kind), {
      perMessageDeflate: false,
      maxPayload: options.wsMaxPayloadBytes,
      handshakeTimeout: options.connectTimeoutMs
    });
    let peer: string | null = null;

    const onAbort = () => {
      reject(signal.reason);
      ws.terminate();
    };
    // Stays attached after a failed dial: `ws` may report the same failure on
    // both the handshake and the teardown path.
    const onError = (err: Error) => {
      signal.removeEventListener("abort", onAbort);
      reject(err);
    };

    ws.once("upgrade", (res) => {
      const { remoteAddress, remotePort } = res.socket;
      if (remoteAddress !== undefined && remotePort !== undefined) {
        peer = `${remoteAddress}:${remotePort}`;
      }
    });
    ws.on("error", onError);
    ws.once("open", () => {
      signal.removeEventListener("abort", onAbort);
      ws.off("error", onError);
      resolve(new WsRelayStream(ws, options.streamRecvHighWaterMark, peer));
    });
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
