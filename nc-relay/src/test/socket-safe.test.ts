import test from "node:test";
import assert from "node:assert/strict";
import { PassThrough, Writable } from "node:stream";

import {
  closeBestEffort,
  destroyBestEffort,
  destroyWithErrorBestEffort,
  writeCaptureErrorBestEffort
} from "../socketSafe";

test("destroyBestEffort does not throw if destroy getter throws", () => {
  const obj = {};
  Object.defineProperty(obj, "destroy", {
    get() {
      throw new Error("boom");
    }
  });
  assert.doesNotThrow(() => destroyBestEffort(obj));
});

test("closeBestEffort does not throw if close getter throws", () => {
  const obj = {};
  Object.defineProperty(obj, "close", {
    get() {
      throw new Error("boom");
    }
  });
  assert.doesNotThrow(() => closeBestEffort(obj));
});

test("closeBestEffort ignores values without a close method", () => {
  assert.doesNotThrow(() => closeBestEffort(null));
  assert.doesNotThrow(() => closeBestEffort({ close: 1 }));
});

test("destroyWithErrorBestEffort passes the error through", () => {
  const boom = new Error("boom");
  let received: unknown = null;
  destroyWithErrorBestEffort(
    {
      destroy(err: unknown) {
        received = err;
      }
    },
    boom
  );
  assert.equal(received, boom);
});

test("writeCaptureErrorBestEffort reports a successful write", () => {
  const stream = new PassThrough();
  assert.deepEqual(writeCaptureErrorBestEffort(stream, Buffer.from("hi")), { ok: true, err: null });
});

test("writeCaptureErrorBestEffort returns the error when write throws", () => {
  const boom = new Error("boom");
  class ThrowingWritable extends Writable {
    override write(): boolean {
      throw boom;
    }
  }
  assert.deepEqual(writeCaptureErrorBestEffort(new ThrowingWritable(), Buffer.from("hi")), { ok: false, err: boom });
});
