export function tryGetErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  try {
    return "code" in err && typeof err.code === "string" ? err.code : undefined;
  } catch {
    return undefined;
  }
}
