import { unrefBestEffort } from "./unrefSafe";

// A `timeoutMs` of 0 disables the deadline.
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  if (timeoutMs <= 0) return await promise;
  let handle: NodeJS.Timeout | null = null;
  const timeout = new Promise<never>((_resolve, reject) => {
    handle = setTimeout(() => reject(onTimeout()), timeoutMs);
    unrefBestEffort(handle);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (handle) clearTimeout(handle);
  }
}
