const textEncoder = new TextEncoder();

function isForbiddenInLine(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029 || /\s/u.test(ch);
}

export function sanitizeOneLine(input: unknown): string {
  let out = "";
  let pendingSpace = false;
  let raw: string;
  try {
    raw = String(input ?? "");
  } catch {
    return "";
  }
  for (const ch of raw) {
    if (isForbiddenInLine(ch)) {
      pendingSpace = out.length > 0;
      continue;
    }
    if (pendingSpace) {
      out += " ";
      pendingSpace = false;
    }
    out += ch;
  }
  return out;
}

export function truncateUtf8(input: string, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return "";
  const buf = new Uint8Array(maxBytes);
  const { read, written } = textEncoder.encodeInto(input, buf);
  if (read === input.length) return input;
  return written === 0 ? "" : Buffer.from(buf.subarray(0, written)).toString("utf8");
}

export function formatOneLineUtf8(input: unknown, maxBytes: number): string {
  return truncateUtf8(sanitizeOneLine(input), maxBytes);
}

function errorMessageInput(err: unknown): string {
  if (err === null) return "null";
  switch (typeof err) {
    case "string":
      return err;
    case "number":
    case "boolean":
    case "bigint":
    case "undefined":
      return String(err);
    case "object": {
      try {
        const message: unknown = Reflect.get(err, "message");
        if (typeof message === "string") return message;
      } catch {
        // message getter threw
      }
      return "Error";
    }
    default:
      return "Error";
  }
}

export function formatOneLineError(err: unknown, maxBytes: number, fallback = "Error"): string {
  return formatOneLineUtf8(errorMessageInput(err), maxBytes) || fallback;
}
