import type { FileSystem } from "./types.js";

/**
 * Check if an error carries the given Node.js error code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === code
  );
}

/**
 * Check if an error is a "file not found" (ENOENT) error.
 */
export function isNotFound(error: unknown): boolean {
  return hasErrorCode(error, "ENOENT");
}

/**
 * Check if a path exists (file or directory).
 */
export async function pathExists(
  fs: FileSystem,
  target: string
): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Human-readable reason for a filesystem failure, without the stack.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
