import assert from "node:assert/strict";
import test from "node:test";

import { FrameQueue } from "../frameQueue";

test("frame queue: delivers frames in order", async () => {
  const queue = new FrameQueue();
  queue.push(Buffer.from("a"));
  queue.push(Buffer.from("b"));
  assert.equal(queue.length, 2);
  assert.equal((await queue.next())?.toString(), "a");
  assert.equal((await queue.next())?.toString(), "b");
  assert.equal(queue.length, 0);
});

test("frame queue: a waiting consumer is woken by push", async () => {
  const queue = new FrameQueue();
  const pending = queue.next();
  queue.push(Buffer.from("late"));
  assert.equal((await pending)?.toString(), "late");
});

test("frame queue: end drains queued frames before reporting null", async () => {
  const queue = new FrameQueue();
  queue.push(Buffer.from("last"));
  queue.end();
  queue.push(Buffer.from("ignored"));
  assert.equal(queue.finished, true);
  assert.equal((await queue.next())?.toString(), "last");
  assert.equal(await queue.next(), null);
  assert.equal(await queue.next(), null);
});

test("frame queue: fail rejects after queued frames", async () => {
  const queue = new FrameQueue();
  const boom = new Error("boom");
  queue.push(Buffer.from("x"));
  queue.fail(boom);
  queue.end();
  assert.equal((await queue.next())?.toString(), "x");
  await assert.rejects(queue.next(), (err: unknown) => err === boom);
});

test("frame queue: abort rejects a pending next", async () => {
  const queue = new FrameQueue();
  const controller = new AbortController();
  const pending = queue.next(controller.signal);
  controller.abort();
  await assert.rejects(pending, { name: "AbortError" });

  // The queue stays usable for a later consumer.
  queue.push(Buffer.from("after"));
  assert.equal((await queue.next())?.toString(), "after");
});

test("frame queue: an already aborted signal rejects even with frames queued", async () => {
  const queue = new FrameQueue();
  queue.push(Buffer.from("x"));
  await assert.rejects(queue.next(AbortSignal.abort()), { name: "AbortError" });
  assert.equal(queue.length, 1);
});
