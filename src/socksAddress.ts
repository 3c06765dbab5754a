import ipaddr from "ipaddr.js";

import type { SocketReader } from "./socketReader";

/*
 * SOCKS5 address block (RFC 1928 §4, §5):
 *
 * +------+----------+----------+
 * | ATYP | DST.ADDR | DST.PORT |
 * +------+----------+----------+
 * |  1   | Variable |    2     |
 * +------+----------+----------+
 *
 * ATYP 0x01: 4 address bytes, 0x03: 1 length byte + domain, 0x04: 16 address bytes.
 */

export enum SocksAddrType {
  IPV4 = 0x01,
  DOMAIN = 0x03,
  IPV6 = 0x04
}

export type SocksAddressKind = "ipv4" | "domain" | "ipv6";

export interface SocksAddress {
  readonly kind: SocksAddressKind;
  readonly host: string;
  readonly port: number;
}

export const MAX_SOCKS_DOMAIN_BYTES = 255;

function assertPort(port: number): void {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`invalid port: ${port}`);
  }
}

function encodeHost(addr: SocksAddress): Buffer {
  switch (addr.kind) {
    case "ipv4":
      if (!ipaddr.IPv4.isValidFourPartDecimal(addr.host)) {
        throw new Error(`invalid IPv4 address: ${addr.host}`);
      }
      return Buffer.from([SocksAddrType.IPV4, ...ipaddr.IPv4.parse(addr.host).toByteArray()]);
    case "ipv6":
      if (!ipaddr.IPv6.isValid(addr.host)) {
        throw new Error(`invalid IPv6 address: ${addr.host}`);
      }
      return Buffer.from([SocksAddrType.IPV6, ...ipaddr.IPv6.parse(addr.host).toByteArray()]);
    case "domain": {
      const name = Buffer.from(addr.host, "utf8");
      if (name.length === 0 || name.length > MAX_SOCKS_DOMAIN_BYTES) {
        throw new Error(`invalid domain length: ${name.length}`);
      }
      return Buffer.concat([Buffer.from([SocksAddrType.DOMAIN, name.length]), name]);
    }
  }
}

export function encodeSocksAddress(addr: SocksAddress): Buffer {
  assertPort(addr.port);
  const head = encodeHost(addr);
  const out = Buffer.allocUnsafe(head.length + 2);
  head.copy(out, 0);
  out.writeUInt16BE(addr.port, head.length);
  return out;
}

/**
 * Number of bytes the address block starting at `buf[offset]` occupies, or
 * `null` when too few bytes are available to tell.
 */
function socksAddressLength(buf: Buffer, offset: number): number | null {
  if (buf.length <= offset) return null;
  const atyp = buf.readUInt8(offset);
  switch (atyp) {
    case SocksAddrType.IPV4:
      return 1 + 4 + 2;
    case SocksAddrType.IPV6:
      return 1 + 16 + 2;
    case SocksAddrType.DOMAIN:
      if (buf.length <= offset + 1) return null;
      return 1 + 1 + buf.readUInt8(offset + 1) + 2;
    default:
      throw new Error(`unsupported address type: 0x${atyp.toString(16).padStart(2, "0")}`);
  }
}

/**
 * Decodes the address block at `buf[offset]`. IP hosts come back in the
 * compressed lowercase form `ipaddr.js` prints: `2001:DB8:0::1` decodes to
 * `2001:db8::1` and an IPv4-mapped `::ffff:1.2.3.4` to `::ffff:102:304`.
 */
export function decodeSocksAddress(buf: Buffer, offset = 0): { address: SocksAddress; bytesRead: number } {
  const length = socksAddressLength(buf, offset);
  if (length === null || buf.length < offset + length) {
    throw new Error("truncated address block");
  }

  const atyp = buf.readUInt8(offset);
  const port = buf.readUInt16BE(offset + length - 2);
  let address: SocksAddress;
  if (atyp === SocksAddrType.IPV4) {
    const bytes = Array.from(buf.subarray(offset + 1, offset + 5));
    address = { kind: "ipv4", host: ipaddr.fromByteArray(bytes).toString(), port };
  } else if (atyp === SocksAddrType.IPV6) {
    const bytes = Array.from(buf.subarray(offset + 1, offset + 17));
    address = { kind: "ipv6", host: ipaddr.fromByteArray(bytes).toString(), port };
  } else {
    const nameLength = buf.readUInt8(offset + 1);
    if (nameLength === 0) throw new Error("empty domain name");
    address = { kind: "domain", host: buf.toString("utf8", offset + 2, offset + 2 + nameLength), port };
  }
  return { address, bytesRead: length };
}

/** Reads one address block off a control connection. */
export async function readSocksAddress(reader: SocketReader): Promise<SocksAddress> {
  const atyp = await reader.readExact(1);
  const parts = [atyp];
  if (atyp.readUInt8(0) === SocksAddrType.DOMAIN) {
    const nameLength = await reader.readExact(1);
    parts.push(nameLength);
  }
  const known = Buffer.concat(parts);
  // Throws on an unknown ATYP before reading any further.
  const length = socksAddressLength(known, 0) ?? 0;
  parts.push(await reader.readExact(length - known.length));
  return decodeSocksAddress(Buffer.concat(parts)).address;
}

/** `host:port`, with IPv6 hosts bracketed. */
export function formatSocksAddress(addr: SocksAddress): string {
  return addr.kind === "ipv6" ? `[${addr.host}]:${addr.port}` : `${addr.host}:${addr.port}`;
}
