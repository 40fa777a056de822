export function unrefBestEffort(handle: unknown): void {
  if (!handle || typeof handle !== "object") return;
  try {
    if ("unref" in handle && typeof handle.unref === "function") handle.unref();
  } catch {
    // ignore
  }
}
