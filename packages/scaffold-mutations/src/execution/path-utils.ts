import path from "node:path";

/**
 * Resolve a mutation target against the context's base directory.
 * Absolute targets pass through normalized.
 */
export function resolveTarget(rawPath: string, cwd: string): string {
  if (typeof rawPath !== "string" || rawPath.length === 0) {
    throw new Error("Target path must be a non-empty string.");
  }
  return path.resolve(cwd, rawPath);
}
