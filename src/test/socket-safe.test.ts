import assert from "node:assert/strict";
import test from "node:test";

import {
  callMethodCaptureErrorBestEffort,
  closeBestEffort,
  destroyBestEffort,
  destroyWithErrorBestEffort,
  pauseBestEffort,
  resumeBestEffort
} from "../socketSafe";
import { unrefBestEffort } from "../unrefSafe";

function throwingGetter(key: string): object {
  const obj = {};
  Object.defineProperty(obj, key, {
    get() {
      throw new Error("boom");
    }
  });
  return obj;
}

test("socket safe: helpers tolerate throwing getters", () => {
  assert.doesNotThrow(() => destroyBestEffort(throwingGetter("destroy")));
  assert.doesNotThrow(() => closeBestEffort(throwingGetter("close")));
  assert.doesNotThrow(() => pauseBestEffort(throwingGetter("pause")));
  assert.doesNotThrow(() => resumeBestEffort(throwingGetter("resume")));
  assert.doesNotThrow(() => unrefBestEffort(throwingGetter("unref")));
});

test("socket safe: helpers tolerate non-objects", () => {
  for (const value of [null, undefined, 1, "socket"]) {
    assert.doesNotThrow(() => destroyBestEffort(value));
    assert.doesNotThrow(() => unrefBestEffort(value));
  }
});

test("socket safe: destroyWithErrorBestEffort passes the error through", () => {
  const calls: unknown[][] = [];
  const boom = new Error("timed out");
  destroyWithErrorBestEffort(
    {
      destroy(...args: unknown[]) {
        calls.push(args);
      }
    },
    boom
  );
  assert.deepEqual(calls, [[boom]]);
});

test("socket safe: closeBestEffort forwards arguments and swallows throws", () => {
  const calls: unknown[][] = [];
  closeBestEffort(
    {
      close(...args: unknown[]) {
        calls.push(args);
        throw new Error("already closed");
      }
    },
    1000
  );
  assert.deepEqual(calls, [[1000]]);
});

test("socket safe: callMethodCaptureErrorBestEffort reports what happened", () => {
  const ended: unknown[][] = [];
  assert.equal(
    callMethodCaptureErrorBestEffort(
      {
        end(...args: unknown[]) {
          ended.push(args);
        }
      },
      "end",
      "last"
    ),
    null
  );
  assert.deepEqual(ended, [["last"]]);

  const boom = new Error("boom");
  assert.equal(
    callMethodCaptureErrorBestEffort(
      {
        end() {
          throw boom;
        }
      },
      "end"
    ),
    boom
  );

  const missing = callMethodCaptureErrorBestEffort({}, "end");
  assert.ok(missing instanceof Error);
  assert.equal(missing.message, "Missing method end");
});

test("socket safe: unrefBestEffort calls unref on the handle", () => {
  let unrefCalls = 0;
  const handle = {
    unref() {
      unrefCalls += 1;
      return handle;
    }
  };
  unrefBestEffort(handle);
  assert.equal(unrefCalls, 1);
});
