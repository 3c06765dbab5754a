/**
 * Bounded free-list of equally sized buffers shared by every TCP session.
 *
 * `get()` never blocks: an empty pool allocates. `put()` keeps at most
 * `capacity` buffers and silently drops the rest. A buffer handed to `put()`
 * must not be touched by the caller afterwards.
 */
export class BufferPool {
  readonly capacity: number;
  readonly bufferSize: number;
  private readonly free: Buffer[] = [];
  // Identity set over `free`, so a double `put()` cannot queue one buffer twice.
  private readonly pooled = new WeakSet<Buffer>();

  constructor(capacity: number, bufferSize: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`Invalid buffer pool capacity: ${capacity}`);
    }
    if (!Number.isInteger(bufferSize) || bufferSize < 1) {
      throw new Error(`Invalid buffer pool buffer size: ${bufferSize}`);
    }
    this.capacity = capacity;
    this.bufferSize = bufferSize;
  }

  get available(): number {
    return this.free.length;
  }

  get(): Buffer {
    const buf = this.free.pop();
    if (buf === undefined) return Buffer.allocUnsafe(this.bufferSize);
    this.pooled.delete(buf);
    return buf;
  }

  put(buf: Buffer): void {
    if (buf.length !== this.bufferSize) return;
    if (this.pooled.has(buf)) return;
    if (this.free.length >= this.capacity) return;
    this.pooled.add(buf);
    this.free.push(buf);
  }
}
