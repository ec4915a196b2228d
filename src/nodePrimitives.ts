import process from "node:process";

/**
 * Narrow aliases over the Node.js process globals shared by the gateways and
 * the configuration layer.
 */
export type ProcessEnv = typeof process.env;

/** errno-flavoured error raised by the `node:fs` and `node:child_process` APIs. */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Type guard narrowing unknown failures to {@link ErrnoException}. */
export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error;
}

/** Returns the errno code carried by {@link error}, if any. */
export function errnoCode(error: unknown): string | undefined {
  if (!isErrnoException(error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}
