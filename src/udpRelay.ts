import dgram from "node:dgram";
import type { Socket } from "node:net";

import { errorWithCode, isClosedConnectionError } from "./errorCode";
import { formatError, log } from "./logger";
import type { RelayStream } from "./relayStream";
import { describeRemote, type RelaySessionContext } from "./sessionContext";
import { closeBestEffort, destroyBestEffort } from "./socketSafe";
import type { SocketReader } from "./socketReader";
import { decodeSocksAddress, encodeSocksAddress, formatSocksAddress, readSocksAddress, type SocksAddress } from "./socksAddress";
import { encodeUdpAssociateReply, writeAsync } from "./socksHandshake";

/*
 * SOCKS5 UDP request envelope (RFC 1928 §7):
 *
 * +----+------+------+----------+----------+----------+
 * |RSV | FRAG | ATYP | DST.ADDR | DST.PORT |   DATA   |
 * +----+------+------+----------+----------+----------+
 * | 2  |  1   |  1   | Variable |    2     | Variable |
 * +----+------+------+----------+----------+----------+
 */
const UDP_HEADER_PREFIX_BYTES = 3;

export interface UdpSource {
  readonly address: string;
  readonly port: number;
}

/** One inbound client datagram; never mutated once parsed. */
export interface UdpDatagram {
  readonly source: UdpSource;
  readonly destination: SocksAddress;
  readonly destinationText: string;
  readonly data: Buffer;
}

export function parseUdpDatagram(msg: Buffer, source: UdpSource): UdpDatagram {
  if (msg.length < UDP_HEADER_PREFIX_BYTES + 1) {
    throw errorWithCode(`UDP datagram too short (${msg.length} bytes)`, "ERR_SOCKS_UDP_HEADER");
  }
  const frag = msg.readUInt8(2);
  if (frag !== 0) {
    throw errorWithCode(`fragmented UDP datagram (FRAG=${frag}) is not supported`, "ERR_SOCKS_UDP_FRAGMENT");
  }
  const { address, bytesRead } = decodeSocksAddress(msg, UDP_HEADER_PREFIX_BYTES);
  return {
    source,
    destination: address,
    destinationText: formatSocksAddress(address),
    data: msg.subarray(UDP_HEADER_PREFIX_BYTES + bytesRead)
  };
}

export function encodeUdpDatagram(destination: SocksAddress, data: Buffer): Buffer {
  return Buffer.concat([Buffer.from([0x00, 0x00, 0x00]), encodeSocksAddress(destination), data]);
}

function bindUdpSocket(socket: dgram.Socket, host: string): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    socket.once("error", reject);
    socket.bind(0, host, () => {
      socket.off("error", reject);
      resolve(socket.address().port);
    });
  });
}

function sendDatagram(socket: dgram.Socket, data: Buffer, to: UdpSource): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    socket.send(data, to.port, to.address, (err) => (err ? reject(err) : resolve()));
  });
}

/** Association bookkeeping, written by the ordered writer alone. */
interface NatRecord {
  readonly destinationText: string;
  replyTo: UdpSource;
}

interface AssociationState {
  stream: RelayStream | null;
  nat: NatRecord | null;
  closed: boolean;
  closeReason: string;
  wakeWriter: (() => void) | null;
  bytesUpstream: number;
  bytesDownstream: number;
}

/**
 * Serves one UDP ASSOCIATE request. The reader must be positioned at the
 * request's address block. Resolves once the association is torn down: idle
 * timeout, control connection closed, stream ended, or an I/O error.
 */
export async function handleUdpAssociate(control: Socket, reader: SocketReader, ctx: RelaySessionContext): Promise<void> {
  const { connId, config, metrics } = ctx;
  const client = describeRemote(control);

  try {
    // The client's own idea of its source address is a hint only; the first
    // datagram names the real destination.
    await readSocksAddress(reader);
  } catch (err) {
    metrics.incSessionError("handshake");
    log("error", "socks_handshake_error", { connId, stage: "request_address", err: formatError(err) });
    destroyBestEffort(control);
    return;
  } finally {
    ctx.requestParsed();
  }

  const udp = dgram.createSocket("udp4");
  let boundPort: number;
  try {
    boundPort = await bindUdpSocket(udp, config.udpBindHost);
  } catch (err) {
    metrics.incSessionError("client");
    log("error", "udp_bind_error", { connId, host: config.udpBindHost, err: formatError(err) });
    closeBestEffort(udp);
    destroyBestEffort(control);
    return;
  }

  metrics.sessionActiveInc("udp");
  const controller = new AbortController();
  const queue: UdpDatagram[] = [];
  const state: AssociationState = {
    stream: null,
    nat: null,
    closed: false,
    closeReason: "",
    wakeWriter: null,
    bytesUpstream: 0,
    bytesDownstream: 0
  };

  const notifyWriter = () => {
    const wake = state.wakeWriter;
    state.wakeWriter = null;
    wake?.();
  };

  const teardown = (why: string) => {
    if (state.closed) return;
    state.closed = true;
    state.closeReason = why;
    clearTimeout(idleTimer);
    closeBestEffort(udp);
    controller.abort();
    state.stream?.closeSend();
    destroyBestEffort(control);
    queue.length = 0;
    notifyWriter();
  };

  const idleTimer = setTimeout(() => {
    log("debug", "udp_idle_timeout", { connId, client, idleTimeoutMs: config.udpIdleTimeoutMs });
    teardown("idle_timeout");
  }, config.udpIdleTimeoutMs);

  udp.on("error", (err) => {
    if (state.closed) return;
    metrics.incSessionError("client");
    log("error", "udp_socket_error", { connId, err: formatError(err) });
    teardown("udp_error");
  });

  udp.on("message", (msg, rinfo) => {
    if (state.closed) return;
    idleTimer.refresh();
    const source: UdpSource = { address: rinfo.address, port: rinfo.port };

    let datagram: UdpDatagram;
    try {
      datagram = parseUdpDatagram(msg, source);
    } catch (err) {
      metrics.incUdpDropped();
      log("warn", "udp_datagram_invalid", { connId, source: `${source.address}:${source.port}`, err: formatError(err) });
      return;
    }

    if (queue.length >= config.udpMaxQueuedDatagrams) {
      metrics.incUdpDropped();
      log("warn", "udp_drop_backpressure", {
        connId,
        queued: queue.length,
        limit: config.udpMaxQueuedDatagrams,
        droppedBytes: datagram.data.length
      });
      return;
    }
    queue.push(datagram);
    notifyWriter();
  });

  control.once("close", () => teardown("control_closed"));
  if (control.destroyed) teardown("control_closed");

  try {
    await writeAsync(control, encodeUdpAssociateReply(boundPort));
  } catch (err) {
    if (!isClosedConnectionError(err)) {
      log("error", "client_write_error", { connId, proto: "udp", err: formatError(err) });
    }
    teardown("reply_failed");
  }

  let stream: RelayStream | null = null;
  if (!state.closed) {
    try {
      stream = await ctx.openStream("udp", controller.signal);
    } catch (err) {
      if (!state.closed) {
        metrics.incSessionError("stream");
        log("error", "stream_open_error", { connId, proto: "udp", err: formatError(err) });
        teardown("stream_open_error");
      }
    }
  }
  state.stream = stream;
  // Torn down while the stream was being dialed.
  if (state.closed) stream?.closeSend();

  const forward = async (relay: RelayStream, datagram: UdpDatagram): Promise<void> => {
    let nat = state.nat;
    if (nat === null) {
      await relay.send(Buffer.from(datagram.destinationText, "utf8"));
      nat = { destinationText: datagram.destinationText, replyTo: datagram.source };
      state.nat = nat;
      log("debug", "udp_estab", { connId, client, peer: relay.peer, target: datagram.destinationText });
    } else if (datagram.destinationText !== nat.destinationText) {
      metrics.incUdpDropped();
      log("warn", "udp_destination_mismatch", {
        connId,
        bound: nat.destinationText,
        target: datagram.destinationText,
        droppedBytes: datagram.data.length
      });
      return;
    }
    nat.replyTo = datagram.source;
    await relay.send(datagram.data);
    log("debug", "udp_datagram_up", {
      connId,
      source: `${datagram.source.address}:${datagram.source.port}`,
      target: datagram.destinationText,
      bytes: datagram.data.length
    });
    state.bytesUpstream += datagram.data.length;
    metrics.addBytesUpstream("udp", datagram.data.length);
  };

  const runWriter = async (relay: RelayStream): Promise<void> => {
    while (!state.closed) {
      const datagram = queue.shift();
      if (datagram === undefined) {
        await new Promise<void>((resolve) => {
          state.wakeWriter = resolve;
        });
        continue;
      }
      try {
        await forward(relay, datagram);
      } catch (err) {
        if (!state.closed) {
          metrics.incSessionError("stream");
          log("error", "stream_send_error", { connId, proto: "udp", err: formatError(err) });
          teardown("stream_send_error");
        }
      }
    }
  };

  const runDownstream = async (relay: RelayStream): Promise<void> => {
    while (!state.closed) {
      let frame: Buffer | null;
      try {
        frame = await relay.recv(controller.signal);
      } catch (err) {
        if (!state.closed) {
          metrics.incSessionError("stream");
          log("error", "stream_recv_error", { connId, proto: "udp", err: formatError(err) });
          teardown("stream_recv_error");
        }
        return;
      }
      if (frame === null) {
        teardown("stream_end");
        return;
      }

      const replyTo = state.nat?.replyTo;
      if (replyTo === undefined) {
        metrics.incUdpDropped();
        log("warn", "udp_no_reply_address", { connId, droppedBytes: frame.length });
        continue;
      }
      try {
        await sendDatagram(udp, frame, replyTo);
      } catch (err) {
        if (!state.closed) {
          metrics.incSessionError("client");
          log("error", "client_write_error", { connId, proto: "udp", err: formatError(err) });
          teardown("udp_send_error");
        }
        return;
      }
      log("debug", "udp_datagram_down", {
        connId,
        target: state.nat?.destinationText ?? null,
        replyTo: `${replyTo.address}:${replyTo.port}`,
        bytes: frame.length
      });
      state.bytesDownstream += frame.length;
      metrics.addBytesDownstream("udp", frame.length);
    }
  };

  if (stream !== null && !state.closed) {
    await Promise.all([runWriter(stream), runDownstream(stream)]);
  }

  metrics.sessionActiveDec("udp");
  log("debug", "udp_close", {
    connId,
    client,
    target: state.nat?.destinationText ?? null,
    why: state.closeReason,
    bytesUpstream: state.bytesUpstream,
    bytesDownstream: state.bytesDownstream
  });
}
