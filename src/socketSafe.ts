// Best-effort helpers for sockets, dgram sockets and WebSockets. None of them throws.

// eslint-disable-next-line @typescript-eslint/ban-types
function tryGetMethodBestEffort(obj: unknown, key: PropertyKey): Function | null {
  if (typeof obj !== "object" && typeof obj !== "function") return null;
  if (obj === null) return null;
  try {
    const fn: unknown = Reflect.get(obj, key);
    return typeof fn === "function" ? fn : null;
  } catch {
    return null;
  }
}

export function callMethodCaptureErrorBestEffort(obj: unknown, key: PropertyKey, ...args: unknown[]): unknown | null {
  const fn = tryGetMethodBestEffort(obj, key);
  if (!fn) return new Error(`Missing method ${String(key)}`);
  try {
    fn.apply(obj, args);
    return null;
  } catch (err) {
    return err;
  }
}

function callMethodBestEffort(obj: unknown, key: PropertyKey, ...args: unknown[]): void {
  void callMethodCaptureErrorBestEffort(obj, key, ...args);
}

export function destroyBestEffort(obj: unknown): void {
  callMethodBestEffort(obj, "destroy");
}

export function destroyWithErrorBestEffort(obj: unknown, err: unknown): void {
  callMethodBestEffort(obj, "destroy", err);
}

export function closeBestEffort(obj: unknown, ...args: unknown[]): void {
  callMethodBestEffort(obj, "close", ...args);
}

export function pauseBestEffort(stream: unknown): void {
  callMethodBestEffort(stream, "pause");
}

export function resumeBestEffort(stream: unknown): void {
  callMethodBestEffort(stream, "resume");
}
