/**
 * Gateway responsible for running the external toolchain programs. It
 * validates the argument vector, hands the child an allow-listed environment,
 * pins its working directory and enforces an optional timeout, then resolves
 * once the process has exited.
 */
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import process from "node:process";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Number of trailing stdout and stderr characters kept for diagnostics. */
const OUTPUT_TAIL_LIMIT = 4_096;

export interface RunChildProcessOptions {
  /** Executable name or path. Must not be empty. */
  readonly command: string;
  /** Ordered list of arguments forwarded as-is to the child. */
  readonly args?: readonly string[];
  /** Working directory of the child. Relative file arguments resolve against it. */
  readonly cwd: string;
  /**
   * Environment variable names allowed to reach the child. Values come from
   * {@link extraEnv} first, then from {@link inheritEnv}.
   */
  readonly allowedEnvKeys: readonly string[];
  /** Snapshot of environment variables to inherit (defaults to {@link process.env}). */
  readonly inheritEnv?: NodeJS.ProcessEnv;
  /** Explicit overrides; only keys from {@link allowedEnvKeys} are accepted. */
  readonly extraEnv?: Record<string, string | undefined>;
  /** Kill the child with SIGKILL once this many milliseconds have elapsed. */
  readonly timeoutMs?: number;
}

/** Outcome of a child that was started and exited on its own or through a signal. */
export interface ChildProcessCompletion {
  /** Exit status, `null` when the child was terminated by a signal. */
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  /** Last {@link OUTPUT_TAIL_LIMIT} characters written to stdout. */
  readonly stdoutTail: string;
  /** Last {@link OUTPUT_TAIL_LIMIT} characters written to stderr. */
  readonly stderrTail: string;
  readonly durationMs: number;
}

export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

export class InvalidChildProcessArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Child process arguments must be strings without NUL bytes. Argument at index ${index} is invalid (${typeof value}).`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

export class ChildProcessEnvViolationError extends Error {
  constructor(key: string) {
    super(`Environment variable "${key}" is not allow-listed for the spawned child process.`);
    this.name = "ChildProcessEnvViolationError";
  }
}

/** Raised when a child process exceeds its configured timeout. */
export class ChildProcessTimeoutError extends Error {
  public readonly timeoutMs: number;
  public readonly stderrTail: string;

  constructor(timeoutMs: number, stderrTail = "") {
    super(`Child process exceeded its timeout of ${timeoutMs}ms.`);
    this.name = "ChildProcessTimeoutError";
    this.timeoutMs = timeoutMs;
    this.stderrTail = stderrTail;
  }
}

export interface ChildProcessGateway {
  /**
   * Starts the child and resolves once it has exited. Rejects with the spawn
   * error (for example `ENOENT`) when the program cannot be started, and with
   * {@link ChildProcessTimeoutError} when the timeout fires.
   */
  run(options: RunChildProcessOptions): Promise<ChildProcessCompletion>;
}

interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: typeof nodeSpawn;
  /** Clock used to measure durations. */
  readonly now?: () => number;
}

export function createChildProcessGateway({
  spawnImpl = nodeSpawn,
  now = Date.now,
}: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    run(options: RunChildProcessOptions): Promise<ChildProcessCompletion> {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        return Promise.reject(new InvalidChildProcessCommandError(command));
      }

      let args: readonly string[];
      let env: NodeJS.ProcessEnv;
      try {
        args = normaliseArgs(options.args);
        env = buildWhitelistedEnv({
          allowedKeys: options.allowedEnvKeys,
          ...(options.inheritEnv ? { inheritEnv: options.inheritEnv } : {}),
          ...(options.extraEnv ? { extraEnv: options.extraEnv } : {}),
        });
      } catch (error) {
        return Promise.reject(error);
      }

      const abortManagement = prepareTimeout(options.timeoutMs);
      const spawnOptions: SpawnOptions = {
        cwd: options.cwd,
        env,
        ...(abortManagement.signal ? { signal: abortManagement.signal } : {}),
        stdio: ["ignore", "pipe", "pipe"],
        shell: false,
        windowsVerbatimArguments: false,
      };

      const startedAt = now();
      return new Promise<ChildProcessCompletion>((resolve, reject) => {
        let child: ChildProcess;
        try {
          child = spawnImpl(command, args, spawnOptions);
        } catch (error) {
          abortManagement.dispose();
          reject(error);
          return;
        }

        abortManagement.arm(child);

        let stdoutTail = "";
        let stderrTail = "";
        child.stdout?.setEncoding("utf8");
        child.stdout?.on("data", (chunk: string) => {
          stdoutTail = (stdoutTail + chunk).slice(-OUTPUT_TAIL_LIMIT);
        });
        child.stderr?.setEncoding("utf8");
        child.stderr?.on("data", (chunk: string) => {
          stderrTail = (stderrTail + chunk).slice(-OUTPUT_TAIL_LIMIT);
        });

        // Node can emit both `error` and `close` for a single failure, so the
        // promise settles on whichever arrives first.
        let settled = false;
        const settle = (outcome: { error: unknown } | { completion: ChildProcessCompletion }) => {
          if (settled) {
            return;
          }
          settled = true;
          abortManagement.dispose();
          if ("error" in outcome) {
            reject(outcome.error);
          } else {
            resolve(outcome.completion);
          }
        };

        child.once("error", (error: Error) => {
          const reason = abortManagement.signal?.reason;
          settle({ error: reason instanceof ChildProcessTimeoutError ? withTail(reason, stderrTail) : error });
        });
        child.once("close", (exitCode: number | null, signal: NodeJS.Signals | null) => {
          const reason = abortManagement.signal?.reason;
          if (reason instanceof ChildProcessTimeoutError) {
            settle({ error: withTail(reason, stderrTail) });
            return;
          }
          settle({ completion: { exitCode, signal, stdoutTail, stderrTail, durationMs: now() - startedAt } });
        });
      });
    },
  };
}

function withTail(error: ChildProcessTimeoutError, stderrTail: string): ChildProcessTimeoutError {
  return new ChildProcessTimeoutError(error.timeoutMs, stderrTail);
}

/** Returns a copy of the argument list after checking every entry is a NUL-free string. */
function normaliseArgs(args: RunChildProcessOptions["args"]): readonly string[] {
  if (args === undefined) {
    return [];
  }
  if (!Array.isArray(args)) {
    throw new InvalidChildProcessArgumentError(args, -1);
  }
  return args.map((value: unknown, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}

interface BuildEnvOptions {
  readonly allowedKeys: readonly string[];
  readonly inheritEnv?: NodeJS.ProcessEnv;
  readonly extraEnv?: Record<string, string | undefined>;
}

/** Produces a new environment object containing only allow-listed keys. */
export function buildWhitelistedEnv({
  allowedKeys,
  inheritEnv = process.env,
  extraEnv = {},
}: BuildEnvOptions): NodeJS.ProcessEnv {
  const allowSet = new Set(allowedKeys);
  const env: NodeJS.ProcessEnv = {};

  for (const key of Object.keys(extraEnv)) {
    if (!allowSet.has(key)) {
      throw new ChildProcessEnvViolationError(key);
    }
  }

  for (const key of allowSet) {
    const value = Object.prototype.hasOwnProperty.call(extraEnv, key) ? extraEnv[key] : inheritEnv[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }

  return env;
}

interface AbortManagement {
  readonly signal: AbortSignal | undefined;
  arm(child: ChildProcess): void;
  dispose(): void;
}

/** Arms a SIGKILL timeout whose abort reason is a {@link ChildProcessTimeoutError}. */
function prepareTimeout(timeoutMs: number | undefined): AbortManagement {
  if (timeoutMs === undefined) {
    return {
      signal: undefined,
      arm(): void {},
      dispose(): void {},
    };
  }

  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | null = null;

  return {
    signal: controller.signal,
    arm(child: ChildProcess): void {
      timeoutHandle = setTimeout(() => {
        controller.abort(new ChildProcessTimeoutError(timeoutMs));
        if (!child.killed) {
          child.kill("SIGKILL");
        }
      }, timeoutMs);
      timeoutHandle.unref();
    },
    dispose(): void {
      if (timeoutHandle !== null) {
        clearTimeout(timeoutHandle);
        timeoutHandle = null;
      }
    },
  };
}
