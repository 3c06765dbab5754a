import type { Socket } from "node:net";

import { isClosedConnectionError } from "./errorCode";
import { formatError, log } from "./logger";
import type { RelayStream } from "./relayStream";
import { describeRemote, type RelaySessionContext } from "./sessionContext";
import { destroyBestEffort } from "./socketSafe";
import type { SocketReader } from "./socketReader";
import { formatSocksAddress, readSocksAddress, type SocksAddress } from "./socksAddress";
import { SOCKS5_CONNECT_REPLY, writeAsync } from "./socksHandshake";

interface TcpSessionCounters {
  bytesUpstream: number;
  bytesDownstream: number;
}

/**
 * Serves one CONNECT request. The reader must be positioned at the request's
 * address block. Resolves once both directions have stopped, the client socket
 * is destroyed and the stream's send side is closed.
 */
export async function handleTcpConnect(socket: Socket, reader: SocketReader, ctx: RelaySessionContext): Promise<void> {
  const { connId, metrics } = ctx;

  let target: SocksAddress;
  try {
    target = await readSocksAddress(reader);
  } catch (err) {
    metrics.incSessionError("handshake");
    log("error", "socks_handshake_error", { connId, stage: "request_address", err: formatError(err) });
    destroyBestEffort(socket);
    return;
  } finally {
    ctx.requestParsed();
  }
  const targetText = formatSocksAddress(target);

  // The client is told it is connected before the remote leg exists. If the
  // stream cannot be opened it sees a reset, not a SOCKS error reply.
  try {
    await writeAsync(socket, SOCKS5_CONNECT_REPLY);
  } catch (err) {
    if (!isClosedConnectionError(err)) {
      log("error", "client_write_error", { connId, proto: "tcp", err: formatError(err) });
    }
    destroyBestEffort(socket);
    return;
  }

  const controller = new AbortController();
  const abortDial = () => controller.abort();
  socket.once("close", abortDial);
  if (socket.destroyed) abortDial();
  let stream: RelayStream;
  try {
    stream = await ctx.openStream("tcp", controller.signal);
  } catch (err) {
    if (!controller.signal.aborted) {
      metrics.incSessionError("stream");
      log("error", "stream_open_error", { connId, proto: "tcp", target: targetText, err: formatError(err) });
    }
    destroyBestEffort(socket);
    return;
  } finally {
    socket.off("close", abortDial);
  }
  if (controller.signal.aborted) {
    // The client left while the stream was being dialed.
    log("debug", "stream_open_cancelled", { connId, proto: "tcp", target: targetText });
    stream.closeSend();
    return;
  }

  metrics.sessionActiveInc("tcp");
  const client = describeRemote(socket);
  const counters: TcpSessionCounters = { bytesUpstream: 0, bytesDownstream: 0 };
  const buf = ctx.pool.get();
  let downstream: Promise<void> = Promise.resolve();

  try {
    try {
      await stream.send(Buffer.from(targetText, "utf8"));
    } catch (err) {
      metrics.incSessionError("stream");
      log("error", "stream_send_error", { connId, proto: "tcp", frame: "destination", err: formatError(err) });
      return;
    }
    log("debug", "tcp_estab", { connId, client, peer: stream.peer, target: targetText });

    downstream = pumpDownstream(stream, socket, controller.signal, ctx, counters);
    await pumpUpstream(stream, reader, buf, controller.signal, ctx, counters);
  } finally {
    ctx.pool.put(buf);
    controller.abort();
    stream.closeSend();
    destroyBestEffort(socket);
    await downstream;
    metrics.sessionActiveDec("tcp");
    log("debug", "tcp_close", { connId, client, peer: stream.peer, target: targetText, ...counters });
  }
}

/** Stream → client. Destroys the client socket when it stops, which ends the upstream read. */
async function pumpDownstream(
  stream: RelayStream,
  socket: Socket,
  signal: AbortSignal,
  ctx: RelaySessionContext,
  counters: TcpSessionCounters
): Promise<void> {
  const { connId, metrics } = ctx;
  for (;;) {
    let frame: Buffer | null;
    try {
      frame = await stream.recv(signal);
    } catch (err) {
      if (!signal.aborted) {
        metrics.incSessionError("stream");
        log("error", "stream_recv_error", { connId, proto: "tcp", err: formatError(err) });
      }
      break;
    }
    if (frame === null) break;

    try {
      await writeAsync(socket, frame);
    } catch (err) {
      if (!signal.aborted && !isClosedConnectionError(err)) {
        metrics.incSessionError("client");
        log("error", "client_write_error", { connId, proto: "tcp", err: formatError(err) });
      }
      break;
    }
    counters.bytesDownstream += frame.length;
    metrics.addBytesDownstream("tcp", frame.length);
  }
  destroyBestEffort(socket);
}

/** Client → stream, through the session's pooled buffer. */
async function pumpUpstream(
  stream: RelayStream,
  reader: SocketReader,
  buf: Buffer,
  signal: AbortSignal,
  ctx: RelaySessionContext,
  counters: TcpSessionCounters
): Promise<void> {
  const { connId, metrics } = ctx;
  for (;;) {
    let n: number;
    try {
      n = await reader.readInto(buf);
    } catch (err) {
      if (!isClosedConnectionError(err)) {
        metrics.incSessionError("client");
        log("error", "client_read_error", { connId, proto: "tcp", err: formatError(err) });
      }
      return;
    }
    if (n === 0) return;

    try {
      // The send settles before the next read refills `buf`.
      await stream.send(buf.subarray(0, n));
    } catch (err) {
      if (!signal.aborted && !isClosedConnectionError(err)) {
        metrics.incSessionError("stream");
        log("error", "stream_send_error", { connId, proto: "tcp", err: formatError(err) });
      }
      return;
    }
    counters.bytesUpstream += n;
    metrics.addBytesUpstream("tcp", n);
  }
}
