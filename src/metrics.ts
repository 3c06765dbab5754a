export type MetricsProto = "tcp" | "udp";
export type MetricsErrorKind = "handshake" | "stream" | "client";

export interface RelayMetrics {
  sessionActiveInc: (proto: MetricsProto) => void;
  sessionActiveDec: (proto: MetricsProto) => void;
  addBytesUpstream: (proto: MetricsProto, bytes: number) => void;
  addBytesDownstream: (proto: MetricsProto, bytes: number) => void;
  incUdpDropped: () => void;
  incSessionError: (kind: MetricsErrorKind) => void;
  snapshot: () => RelayMetricsSnapshot;
  prometheusText: () => string;
}

export interface RelayMetricsSnapshot {
  sessionsActive: Record<MetricsProto, number>;
  bytesUpstream: Record<MetricsProto, bigint>;
  bytesDownstream: Record<MetricsProto, bigint>;
  udpDatagramsDropped: bigint;
  sessionErrors: Record<MetricsErrorKind, bigint>;
}

export function createRelayMetrics(): RelayMetrics {
  const sessionsActive: Record<MetricsProto, number> = { tcp: 0, udp: 0 };
  const bytesUpstream: Record<MetricsProto, bigint> = { tcp: 0n, udp: 0n };
  const bytesDownstream: Record<MetricsProto, bigint> = { tcp: 0n, udp: 0n };
  const sessionErrors: Record<MetricsErrorKind, bigint> = { handshake: 0n, stream: 0n, client: 0n };
  let udpDatagramsDropped = 0n;

  const clampNonNegative = (n: number): number => (n < 0 ? 0 : n);

  const snapshot = (): RelayMetricsSnapshot => ({
    sessionsActive: { ...sessionsActive },
    bytesUpstream: { ...bytesUpstream },
    bytesDownstream: { ...bytesDownstream },
    udpDatagramsDropped,
    sessionErrors: { ...sessionErrors }
  });

  const prometheusText = (): string => {
    const lines: string[] = [];

    lines.push("# HELP socks_relay_sessions_active Active SOCKS5 relay sessions.");
    lines.push("# TYPE socks_relay_sessions_active gauge");
    lines.push(`socks_relay_sessions_active{proto="tcp"} ${sessionsActive.tcp}`);
    lines.push(`socks_relay_sessions_active{proto="udp"} ${sessionsActive.udp}`);

    lines.push("# HELP socks_relay_bytes_upstream_total Bytes sent from SOCKS5 clients to the relay stream.");
    lines.push("# TYPE socks_relay_bytes_upstream_total counter");
    lines.push(`socks_relay_bytes_upstream_total{proto="tcp"} ${bytesUpstream.tcp}`);
    lines.push(`socks_relay_bytes_upstream_total{proto="udp"} ${bytesUpstream.udp}`);

    lines.push("# HELP socks_relay_bytes_downstream_total Bytes written back to SOCKS5 clients.");
    lines.push("# TYPE socks_relay_bytes_downstream_total counter");
    lines.push(`socks_relay_bytes_downstream_total{proto="tcp"} ${bytesDownstream.tcp}`);
    lines.push(`socks_relay_bytes_downstream_total{proto="udp"} ${bytesDownstream.udp}`);

    lines.push("# HELP socks_relay_udp_datagrams_dropped_total UDP datagrams dropped before reaching the stream.");
    lines.push("# TYPE socks_relay_udp_datagrams_dropped_total counter");
    lines.push(`socks_relay_udp_datagrams_dropped_total ${udpDatagramsDropped}`);

    lines.push("# HELP socks_relay_session_errors_total Sessions that ended on an unexpected error.");
    lines.push("# TYPE socks_relay_session_errors_total counter");
    lines.push(`socks_relay_session_errors_total{kind="handshake"} ${sessionErrors.handshake}`);
    lines.push(`socks_relay_session_errors_total{kind="stream"} ${sessionErrors.stream}`);
    lines.push(`socks_relay_session_errors_total{kind="client"} ${sessionErrors.client}`);

    return `${lines.join("\n")}\n`;
  };

  return {
    sessionActiveInc: (proto) => {
      sessionsActive[proto] = clampNonNegative(sessionsActive[proto] + 1);
    },
    sessionActiveDec: (proto) => {
      sessionsActive[proto] = clampNonNegative(sessionsActive[proto] - 1);
    },
    addBytesUpstream: (proto, bytes) => {
      if (!Number.isFinite(bytes) || bytes <= 0) return;
      bytesUpstream[proto] += BigInt(bytes);
    },
    addBytesDownstream: (proto, bytes) => {
      if (!Number.isFinite(bytes) || bytes <= 0) return;
      bytesDownstream[proto] += BigInt(bytes);
    },
    incUdpDropped: () => {
      udpDatagramsDropped += 1n;
    },
    incSessionError: (kind) => {
      sessionErrors[kind] += 1n;
    },
    snapshot,
    prometheusText
  };
}
