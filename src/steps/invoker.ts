import { PipelineError, type PipelineErrorCode } from "../errors.js";
import {
  ChildProcessTimeoutError,
  createChildProcessGateway,
  type ChildProcessGateway,
} from "../gateways/childProcess.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { errnoCode } from "../nodePrimitives.js";
import { resolveWithin } from "../paths.js";

/** External collaborators run by the pipeline, in execution order. */
export type StepName = "format" | "prepare" | "cluster";

/** How one external step is launched. */
export interface StepCommand {
  readonly command: string;
  /** Leading arguments placed before the per-run arguments. */
  readonly args: readonly string[];
  /** When false a non-zero exit is logged and the step still counts as done. */
  readonly checkExit: boolean;
  readonly timeoutMs?: number;
}

/**
 * `produces` steps must leave the listed files (relative to the workspace)
 * behind for the next stage; `side-effect` steps are judged on their exit only.
 */
export type StepMode =
  | { readonly kind: "produces"; readonly outputs: readonly string[] }
  | { readonly kind: "side-effect" };

export type StepFailureKind = "executable-not-found" | "non-zero-exit" | "timeout" | "missing-output";

export interface StepFailure {
  readonly step: StepName;
  readonly kind: StepFailureKind;
  readonly command: string;
  readonly message: string;
  readonly exitCode?: number | null;
  readonly signal?: NodeJS.Signals | null;
  readonly stdoutTail?: string;
  readonly stderrTail?: string;
  readonly missing?: readonly string[];
}

export type StepOutcome =
  | { readonly ok: true; readonly step: StepName; readonly exitCode: number | null; readonly durationMs: number }
  | { readonly ok: false; readonly failure: StepFailure };

const FAILURE_CODES: Record<StepFailureKind, PipelineErrorCode> = {
  "executable-not-found": "E-STEP-NOT-FOUND",
  "non-zero-exit": "E-STEP-EXIT",
  timeout: "E-STEP-TIMEOUT",
  "missing-output": "E-STEP-OUTPUT",
};

const FAILURE_HINTS: Record<StepFailureKind, string> = {
  "executable-not-found": "check the toolchain directory and the command configured for this step",
  "non-zero-exit": "inspect the stderr tail attached to the failure",
  timeout: "raise the step timeout or check the program for a hang",
  "missing-output": "the step exited without writing the files the next stage reads",
};

/** Errno codes meaning the program could not be started at all. */
const NOT_FOUND_CODES = new Set(["ENOENT", "EACCES", "ENOTDIR"]);

/** Carries a {@link StepFailure} through the controller's guarded region. */
export class StepFailedError extends PipelineError {
  public readonly code: PipelineErrorCode;
  public readonly hint: string;
  public readonly failure: StepFailure;

  constructor(failure: StepFailure) {
    super(`${failure.step} step failed: ${failure.message}`, { ...failure });
    this.name = "StepFailedError";
    this.code = FAILURE_CODES[failure.kind];
    this.hint = FAILURE_HINTS[failure.kind];
    this.failure = failure;
  }
}

export interface ExternalStepInvokerOptions {
  readonly logger: StructuredLogger;
  readonly gateway?: ChildProcessGateway;
  readonly fs?: FileSystemGateway;
  /** Environment variable names forwarded to every step. */
  readonly allowedEnvKeys: readonly string[];
  readonly inheritEnv?: NodeJS.ProcessEnv;
}

export interface StepRunOptions {
  /** Working directory of the child; `mode` outputs resolve against it. */
  readonly cwd: string;
  readonly mode: StepMode;
}

/**
 * Runs the external programs one at a time and folds every way they can fail
 * into a {@link StepOutcome}. Nothing here retries.
 */
export class ExternalStepInvoker {
  private readonly logger: StructuredLogger;
  private readonly gateway: ChildProcessGateway;
  private readonly fs: FileSystemGateway;
  private readonly allowedEnvKeys: readonly string[];
  private readonly inheritEnv: NodeJS.ProcessEnv | undefined;

  constructor(options: ExternalStepInvokerOptions) {
    this.logger = options.logger;
    this.gateway = options.gateway ?? createChildProcessGateway();
    this.fs = options.fs ?? defaultFileSystemGateway;
    this.allowedEnvKeys = options.allowedEnvKeys;
    this.inheritEnv = options.inheritEnv;
  }

  async run(step: StepName, command: StepCommand, args: readonly string[], options: StepRunOptions): Promise<StepOutcome> {
    const argv = [...command.args, ...args];
    this.logger.debug("step_started", { step, command: command.command, args: argv, cwd: options.cwd });

    let exitCode: number | null;
    let durationMs: number;
    let stdoutTail: string;
    try {
      const completion = await this.gateway.run({
        command: command.command,
        args: argv,
        cwd: options.cwd,
        allowedEnvKeys: this.allowedEnvKeys,
        ...(this.inheritEnv ? { inheritEnv: this.inheritEnv } : {}),
        ...(command.timeoutMs !== undefined ? { timeoutMs: command.timeoutMs } : {}),
      });
      exitCode = completion.exitCode;
      durationMs = completion.durationMs;
      stdoutTail = completion.stdoutTail;

      if (completion.exitCode !== 0) {
        const failure: StepFailure = {
          step,
          kind: "non-zero-exit",
          command: command.command,
          message:
            completion.signal !== null
              ? `terminated by ${completion.signal}`
              : `did not return a successful code. Returned ${completion.exitCode}`,
          exitCode: completion.exitCode,
          signal: completion.signal,
          stdoutTail: completion.stdoutTail,
          stderrTail: completion.stderrTail,
        };
        if (command.checkExit) {
          return this.fail(failure);
        }
        this.logger.warn("step_exit_ignored", { ...failure });
      }
    } catch (error) {
      if (error instanceof ChildProcessTimeoutError) {
        return this.fail({
          step,
          kind: "timeout",
          command: command.command,
          message: error.message,
          stderrTail: error.stderrTail,
        });
      }
      const code = errnoCode(error);
      if (code !== undefined && NOT_FOUND_CODES.has(code)) {
        return this.fail({
          step,
          kind: "executable-not-found",
          command: command.command,
          message: `the executable could not be found (${code})`,
        });
      }
      throw error;
    }

    if (options.mode.kind === "produces") {
      const missing: string[] = [];
      for (const output of options.mode.outputs) {
        if (!(await this.fs.exists(resolveWithin(options.cwd, output)))) {
          missing.push(output);
        }
      }
      if (missing.length > 0) {
        return this.fail({
          step,
          kind: "missing-output",
          command: command.command,
          message: `expected output not written: ${missing.join(", ")}`,
          exitCode,
          stdoutTail,
          missing,
        });
      }
    }

    this.logger.info("step_completed", {
      step,
      exit_code: exitCode,
      duration_ms: durationMs,
      ...(stdoutTail.length > 0 ? { stdout_tail: stdoutTail } : {}),
    });
    return { ok: true, step, exitCode, durationMs };
  }

  private fail(failure: StepFailure): StepOutcome {
    this.logger.error("step_failed", { ...failure });
    return { ok: false, failure };
  }
}
