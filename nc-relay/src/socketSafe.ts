import type { Writable } from "node:stream";

export type WriteResult = { ok: boolean; err: Error | null };

function callBestEffort(target: unknown, method: "destroy" | "close" | "pause" | "resume", arg?: unknown): void {
  if (!target || typeof target !== "object") return;
  try {
    if (!(method in target)) return;
    const fn: unknown = Reflect.get(target, method);
    if (typeof fn !== "function") return;
    if (arg === undefined) fn.call(target);
    else fn.call(target, arg);
  } catch {
    // ignore
  }
}

export function destroyBestEffort(target: unknown): void {
  callBestEffort(target, "destroy");
}

export function destroyWithErrorBestEffort(target: unknown, err: Error): void {
  callBestEffort(target, "destroy", err);
}

export function closeBestEffort(target: unknown): void {
  callBestEffort(target, "close");
}

export function pauseBestEffort(target: unknown): void {
  callBestEffort(target, "pause");
}

export function resumeBestEffort(target: unknown): void {
  callBestEffort(target, "resume");
}

// `write` can throw synchronously; surface that as a value instead. Failures reported
// through the write callback (such as writing to a destroyed stream) go to `onAsyncError`.
export function writeCaptureErrorBestEffort(
  stream: Writable,
  chunk: Buffer,
  onAsyncError?: (err: Error) => void
): WriteResult {
  try {
    const ok = stream.write(chunk, (err) => {
      if (err && onAsyncError) onAsyncError(err);
    });
    return { ok, err: null };
  } catch (err) {
    return { ok: false, err: err instanceof Error ? err : new Error(String(err)) };
  }
}
