/**
 * Single-consumer FIFO of inbound frames with an end-of-stream marker and a
 * terminal error. Frames queued before `end()`/`fail()` are still delivered.
 */
export class FrameQueue {
  private readonly frames: Buffer[] = [];
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  get length(): number {
    return this.frames.length;
  }

  get finished(): boolean {
    return this.ended || this.failure !== null;
  }

  push(frame: Buffer): void {
    if (this.finished) return;
    this.frames.push(frame);
    this.notify();
  }

  end(): void {
    if (this.finished) return;
    this.ended = true;
    this.notify();
  }

  fail(err: Error): void {
    if (this.finished) return;
    this.failure = err;
    this.notify();
  }

  /** Next frame, `null` once ended, rejects once failed or when `signal` aborts. */
  async next(signal?: AbortSignal): Promise<Buffer | null> {
    for (;;) {
      signal?.throwIfAborted();
      const frame = this.frames.shift();
      if (frame !== undefined) return frame;
      if (this.failure) throw this.failure;
      if (this.ended) return null;
      await this.changed(signal);
    }
  }

  private changed(signal: AbortSignal | undefined): Promise<void> {
    return new Promise<void>((resolve) => {
      const onAbort = () => {
        this.wake = null;
        resolve();
      };
      this.wake = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
