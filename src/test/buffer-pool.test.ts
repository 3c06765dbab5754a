import assert from "node:assert/strict";
import test from "node:test";

import { BufferPool } from "../bufferPool";

test("buffer pool: get allocates fixed-size buffers when empty", () => {
  const pool = new BufferPool(2, 16);
  const a = pool.get();
  const b = pool.get();
  assert.equal(a.length, 16);
  assert.equal(b.length, 16);
  assert.notEqual(a, b);
  assert.equal(pool.available, 0);
});

test("buffer pool: put then get reuses the same buffer", () => {
  const pool = new BufferPool(2, 16);
  const buf = pool.get();
  pool.put(buf);
  assert.equal(pool.available, 1);
  assert.equal(pool.get(), buf);
  assert.equal(pool.available, 0);
});

test("buffer pool: put beyond capacity discards", () => {
  const pool = new BufferPool(2, 8);
  const bufs = [pool.get(), pool.get(), pool.get()];
  for (const buf of bufs) pool.put(buf);
  assert.equal(pool.available, 2);
});

test("buffer pool: a double put keeps one copy", () => {
  const pool = new BufferPool(4, 8);
  const buf = pool.get();
  pool.put(buf);
  pool.put(buf);
  assert.equal(pool.available, 1);
  assert.equal(pool.get(), buf);
  assert.notEqual(pool.get(), buf);
});

test("buffer pool: buffers of another size are not pooled", () => {
  const pool = new BufferPool(4, 8);
  pool.put(Buffer.alloc(7));
  pool.put(Buffer.alloc(9));
  pool.put(pool.get().subarray(0, 4));
  assert.equal(pool.available, 0);
});

test("buffer pool: zero capacity never retains", () => {
  const pool = new BufferPool(0, 8);
  pool.put(pool.get());
  assert.equal(pool.available, 0);
});

test("buffer pool: interleaved sessions never share a live buffer", async () => {
  const pool = new BufferPool(4, 32);
  const live = new Set<Buffer>();
  let overlaps = 0;

  const session = async (rounds: number) => {
    for (let i = 0; i < rounds; i++) {
      const buf = pool.get();
      if (live.has(buf)) overlaps += 1;
      live.add(buf);
      assert.equal(buf.length, 32);
      await new Promise<void>((resolve) => setImmediate(resolve));
      live.delete(buf);
      pool.put(buf);
    }
  };

  await Promise.all(Array.from({ length: 16 }, () => session(25)));
  assert.equal(overlaps, 0);
  assert.ok(pool.available <= 4);
});

test("buffer pool: rejects invalid parameters", () => {
  assert.throws(() => new BufferPool(-1, 8), /capacity/);
  assert.throws(() => new BufferPool(1.5, 8), /capacity/);
  assert.throws(() => new BufferPool(1, 0), /buffer size/);
});
