import http from "node:http";
import net from "node:net";

import { BufferPool } from "./bufferPool";
import { loadConfigFromEnv, type OpenRelayStream, type RelayConfig } from "./config";
import { errorWithCode } from "./errorCode";
import { formatError, log, setLogLevel } from "./logger";
import { createRelayMetrics, type RelayMetrics } from "./metrics";
import { openWsRelayStream } from "./relayStream";
import { describeRemote, type RelaySessionContext } from "./sessionContext";
import { destroyBestEffort, destroyWithErrorBestEffort } from "./socketSafe";
import { SocketReader } from "./socketReader";
import { SocksCommand, socksHandshake } from "./socksHandshake";
import { handleTcpConnect } from "./tcpRelay";
import { handleUdpAssociate } from "./udpRelay";
import { unrefBestEffort } from "./unrefSafe";

export interface RunningSocksServer {
  server: net.Server;
  metricsServer: http.Server | null;
  config: RelayConfig;
  metrics: RelayMetrics;
  pool: BufferPool;
  listenAddress: string;
  close: () => Promise<void>;
}

function listen(server: net.Server, port: number, host: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

function formatAddress(server: net.Server): string {
  const addr = server.address();
  if (addr === null) return "unknown";
  if (typeof addr === "string") return addr;
  return addr.family === "IPv6" ? `[${addr.address}]:${addr.port}` : `${addr.address}:${addr.port}`;
}

function createMetricsServer(metrics: RelayMetrics): http.Server {
  return http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (req.method === "GET" && url.pathname === "/metrics") {
      const body = metrics.prometheusText();
      res.writeHead(200, {
        "content-type": "text/plain; version=0.0.4; charset=utf-8",
        "content-length": Buffer.byteLength(body)
      });
      res.end(body);
      return;
    }
    if (req.method === "GET" && url.pathname === "/healthz") {
      const body = JSON.stringify({ ok: true });
      res.writeHead(200, {
        "content-type": "application/json; charset=utf-8",
        "content-length": Buffer.byteLength(body)
      });
      res.end(body);
      return;
    }

    res.writeHead(404, { "content-type": "application/json; charset=utf-8" });
    res.end(JSON.stringify({ error: "not found" }));
  });
}

export async function startSocksServer(overrides: Partial<RelayConfig> = {}): Promise<RunningSocksServer> {
  const config: RelayConfig = { ...loadConfigFromEnv(), ...overrides };
  setLogLevel(config.logLevel);

  const metrics = createRelayMetrics();
  const pool = new BufferPool(config.bufferPoolCapacity, config.bufferSize);
  const openStream: OpenRelayStream =
    config.openStream ?? ((kind, signal) => openWsRelayStream(config, kind, signal));

  const sockets = new Set<net.Socket>();
  const sessions = new Set<Promise<void>>();
  let nextConnId = 1;

  const serveConnection = async (socket: net.Socket, connId: number): Promise<void> => {
    const reader = new SocketReader(socket);

    const handshakeTimer = setTimeout(() => {
      destroyWithErrorBestEffort(
        socket,
        errorWithCode(`SOCKS handshake timed out after ${config.handshakeTimeoutMs}ms`, "ETIMEDOUT")
      );
    }, config.handshakeTimeoutMs);
    unrefBestEffort(handshakeTimer);
    // The deadline covers the request's address block too; handlers clear it once that is read.
    const requestParsed = () => clearTimeout(handshakeTimer);
    const ctx: RelaySessionContext = { connId, config, openStream, pool, metrics, requestParsed };

    let command: number;
    try {
      command = await socksHandshake(reader, socket);
    } catch (err) {
      requestParsed();
      metrics.incSessionError("handshake");
      log("error", "socks_handshake_error", { connId, client: describeRemote(socket), err: formatError(err) });
      destroyBestEffort(socket);
      return;
    }

    try {
      switch (command) {
        case SocksCommand.CONNECT:
          await handleTcpConnect(socket, reader, ctx);
          return;
        case SocksCommand.UDP_ASSOCIATE:
          await handleUdpAssociate(socket, reader, ctx);
          return;
        default:
          metrics.incSessionError("handshake");
          log("error", "socks_unsupported_command", { connId, client: describeRemote(socket), command });
          destroyBestEffort(socket);
      }
    } finally {
      requestParsed();
    }
  };

  const server = net.createServer((socket) => {
    const connId = nextConnId++;
    sockets.add(socket);
    socket.once("close", () => sockets.delete(socket));
    socket.setNoDelay(true);

    const session: Promise<void> = serveConnection(socket, connId).then(
      () => {
        sessions.delete(session);
      },
      (err: unknown) => {
        sessions.delete(session);
        log("error", "socks_handshake_error", { connId, err: formatError(err) });
        destroyBestEffort(socket);
      }
    );
    sessions.add(session);
  });

  await listen(server, config.listenPort, config.listenHost);
  const listenAddress = formatAddress(server);

  let metricsServer: http.Server | null = null;
  if (config.metricsPort !== null) {
    metricsServer = createMetricsServer(metrics);
    await listen(metricsServer, config.metricsPort, config.listenHost);
  }

  log("info", "proxy_start", {
    listenAddress,
    remoteUrl: config.remoteUrl,
    metricsAddress: metricsServer ? formatAddress(metricsServer) : null
  });

  return {
    server,
    metricsServer,
    config,
    metrics,
    pool,
    listenAddress,
    close: async () => {
      const closing = closeServer(server);
      for (const socket of sockets) destroyBestEffort(socket);
      await closing;
      await Promise.all(sessions);
      if (metricsServer) await closeServer(metricsServer);
      log("info", "proxy_stop", { listenAddress });
    }
  };
}
