/** Lets a timer or handle stop keeping the process alive, when it supports that. */
export function unrefBestEffort(handle: unknown): void {
  if (typeof handle !== "object" || handle === null) return;
  try {
    const unref: unknown = Reflect.get(handle, "unref");
    if (typeof unref === "function") unref.call(handle);
  } catch {
    // unref getter threw
  }
}
