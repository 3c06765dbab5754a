import type { Duplex } from "node:stream";

import { errorWithCode } from "./errorCode";
import type { SocketReader } from "./socketReader";

export const SOCKS_VERSION = 0x05;

export enum SocksCommand {
  CONNECT = 0x01,
  BIND = 0x02,
  UDP_ASSOCIATE = 0x03
}

export enum SocksAuthMethod {
  NO_AUTH = 0x00,
  NO_ACCEPTABLE = 0xff
}

/**
 * CONNECT reply sent before the remote leg exists: success, bound 0.0.0.0:0.
 * Clients that fail later observe a reset instead of a SOCKS error code.
 */
export const SOCKS5_CONNECT_REPLY = Buffer.from([0x05, 0x00, 0x00, 0x01, 0, 0, 0, 0, 0, 0]);

/** UDP ASSOCIATE reply: success, IPv4 host 0.0.0.0, the relay's UDP port. */
export function encodeUdpAssociateReply(port: number): Buffer {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`invalid port: ${port}`);
  }
  const reply = Buffer.from([0x05, 0x00, 0x00, 0x01, 0, 0, 0, 0, 0, 0]);
  reply.writeUInt16BE(port, 8);
  return reply;
}

export function writeAsync(socket: Duplex, data: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Runs method negotiation and reads the request header, leaving the reader
 * positioned at the request's address block. Resolves with the CMD byte; the
 * caller decides whether it is supported.
 *
 * +----+----------+----------+      +----+-----+-------+
 * |VER | NMETHODS | METHODS  |      |VER | CMD |  RSV  |
 * +----+----------+----------+      +----+-----+-------+
 * | 1  |    1     | 1 to 255 |      | 1  |  1  | X'00' |
 * +----+----------+----------+      +----+-----+-------+
 */
export async function socksHandshake(reader: SocketReader, socket: Duplex): Promise<number> {
  const greeting = await reader.readExact(2);
  const version = greeting.readUInt8(0);
  if (version !== SOCKS_VERSION) {
    throw errorWithCode(`unsupported SOCKS version ${version}`, "ERR_SOCKS_VERSION");
  }
  const methodCount = greeting.readUInt8(1);
  if (methodCount === 0) {
    throw errorWithCode("no authentication methods offered", "ERR_SOCKS_METHOD");
  }
  const methods = await reader.readExact(methodCount);
  if (!methods.includes(SocksAuthMethod.NO_AUTH)) {
    await writeAsync(socket, Buffer.from([SOCKS_VERSION, SocksAuthMethod.NO_ACCEPTABLE]));
    throw errorWithCode("no acceptable authentication method", "ERR_SOCKS_METHOD");
  }
  await writeAsync(socket, Buffer.from([SOCKS_VERSION, SocksAuthMethod.NO_AUTH]));

  const header = await reader.readExact(3);
  const requestVersion = header.readUInt8(0);
  if (requestVersion !== SOCKS_VERSION) {
    throw errorWithCode(`unsupported SOCKS request version ${requestVersion}`, "ERR_SOCKS_VERSION");
  }
  return header.readUInt8(1);
}
