export function tryGetErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  try {
    // Getters on foreign error objects may throw.
    const code: unknown = Reflect.get(err, "code");
    return typeof code === "string" ? code : undefined;
  } catch {
    return undefined;
  }
}

// Codes Node reports when one side of a session tears a socket down while the
// other direction is still reading or writing it.
const CLOSED_CONNECTION_CODES: ReadonlySet<string> = new Set([
  "ERR_SOCKET_CLOSED",
  "ERR_STREAM_DESTROYED",
  "ERR_STREAM_WRITE_AFTER_END",
  "ERR_STREAM_PREMATURE_CLOSE",
  "EPIPE"
]);

export function isClosedConnectionError(err: unknown): boolean {
  const code = tryGetErrorCode(err);
  return code !== undefined && CLOSED_CONNECTION_CODES.has(code);
}

export function errorWithCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}
