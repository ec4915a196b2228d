import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import {
  ChildProcessTimeoutError,
  type ChildProcessCompletion,
  type ChildProcessGateway,
  type RunChildProcessOptions,
} from "../../src/gateways/childProcess.js";
import { StructuredLogger, type LogEntry } from "../../src/logger.js";
import type { ErrnoException } from "../../src/nodePrimitives.js";
import { ExternalStepInvoker, StepFailedError, type StepCommand } from "../../src/steps/invoker.js";

/** Gateway double returning a canned completion or rejection. */
function stubGateway(result: ChildProcessCompletion | Error): {
  gateway: ChildProcessGateway;
  run: sinon.SinonSpy<[RunChildProcessOptions], Promise<ChildProcessCompletion>>;
} {
  const run = sinon.spy(
    async (_options: RunChildProcessOptions): Promise<ChildProcessCompletion> => {
      if (result instanceof Error) {
        throw result;
      }
      return result;
    },
  );
  return { gateway: { run }, run };
}

function completion(
  exitCode: number | null,
  signal: NodeJS.Signals | null = null,
  stdoutTail = "",
): ChildProcessCompletion {
  return { exitCode, signal, stdoutTail, stderrTail: "stderr tail", durationMs: 12 };
}

function errno(code: string): ErrnoException {
  const error: ErrnoException = new Error(`spawn a.out ${code}`);
  error.code = code;
  return error;
}

const cluster: StepCommand = { command: "/opt/gcm/a.out", args: [], checkExit: true };

describe("steps/ExternalStepInvoker", () => {
  let workDir: string;
  let entries: LogEntry[];
  let logger: StructuredLogger;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), "gcm-invoker-"));
    entries = [];
    logger = new StructuredLogger({ sink: () => undefined, level: "debug", onEntry: (entry) => entries.push(entry) });
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("places the configured arguments before the per-run ones and pins the cwd", async () => {
    const { gateway, run } = stubGateway(completion(0));
    const invoker = new ExternalStepInvoker({
      logger,
      gateway,
      allowedEnvKeys: ["PATH"],
      inheritEnv: { PATH: "/usr/bin" },
    });

    const outcome = await invoker.run(
      "prepare",
      { command: "bash", args: ["/opt/gcm/work.sh"], checkExit: true, timeoutMs: 500 },
      ["edges_formatted.txt"],
      { cwd: workDir, mode: { kind: "side-effect" } },
    );

    expect(outcome).to.deep.equal({ ok: true, step: "prepare", exitCode: 0, durationMs: 12 });
    expect(run.firstCall.args[0]).to.deep.equal({
      command: "bash",
      args: ["/opt/gcm/work.sh", "edges_formatted.txt"],
      cwd: workDir,
      allowedEnvKeys: ["PATH"],
      inheritEnv: { PATH: "/usr/bin" },
      timeoutMs: 500,
    });
    expect(entries.map((entry) => entry.message)).to.deep.equal(["step_started", "step_completed"]);
  });

  it("keeps what the step printed on stdout in the completion log", async () => {
    const { gateway } = stubGateway(completion(0, null, "modularity 0.42\n"));
    const invoker = new ExternalStepInvoker({ logger, gateway, allowedEnvKeys: [] });

    await invoker.run("cluster", cluster, [], { cwd: workDir, mode: { kind: "side-effect" } });

    const completed = entries.find((entry) => entry.message === "step_completed");
    expect(completed?.payload).to.deep.equal({
      step: "cluster",
      exit_code: 0,
      duration_ms: 12,
      stdout_tail: "modularity 0.42\n",
    });
  });

  it("fails a checked step on a non-zero exit", async () => {
    const { gateway } = stubGateway(completion(2));
    const invoker = new ExternalStepInvoker({ logger, gateway, allowedEnvKeys: [] });

    const outcome = await invoker.run("cluster", cluster, ["2"], { cwd: workDir, mode: { kind: "side-effect" } });

    expect(outcome).to.deep.equal({
      ok: false,
      failure: {
        step: "cluster",
        kind: "non-zero-exit",
        command: "/opt/gcm/a.out",
        message: "did not return a successful code. Returned 2",
        exitCode: 2,
        signal: null,
        stdoutTail: "",
        stderrTail: "stderr tail",
      },
    });
    expect(entries.at(-1)?.message).to.equal("step_failed");
  });

  it("describes termination by signal", async () => {
    const { gateway } = stubGateway(completion(null, "SIGSEGV"));
    const invoker = new ExternalStepInvoker({ logger, gateway, allowedEnvKeys: [] });

    const outcome = await invoker.run("cluster", cluster, [], { cwd: workDir, mode: { kind: "side-effect" } });

    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.failure.message).to.equal("terminated by SIGSEGV");
    }
  });

  it("logs and ignores a non-zero exit when the step is unchecked", async () => {
    const { gateway } = stubGateway(completion(1));
    const invoker = new ExternalStepInvoker({ logger, gateway, allowedEnvKeys: [] });

    const outcome = await invoker.run("format", { ...cluster, checkExit: false }, [], {
      cwd: workDir,
      mode: { kind: "side-effect" },
    });

    expect(outcome).to.deep.equal({ ok: true, step: "format", exitCode: 1, durationMs: 12 });
    expect(entries.map((entry) => `${entry.level}:${entry.message}`)).to.include("warn:step_exit_ignored");
  });

  it("fails a producing step whose outputs are missing even after a clean exit", async () => {
    await writeFile(path.join(workDir, "edges_formatted.txt"), "1 2\n", "utf8");
    const { gateway } = stubGateway(completion(0));
    const invoker = new ExternalStepInvoker({ logger, gateway, allowedEnvKeys: [] });

    const outcome = await invoker.run("format", { ...cluster, checkExit: false }, [], {
      cwd: workDir,
      mode: { kind: "produces", outputs: ["edges_formatted.txt", "edges_key.txt"] },
    });

    expect(outcome).to.deep.equal({
      ok: false,
      failure: {
        step: "format",
        kind: "missing-output",
        command: "/opt/gcm/a.out",
        message: "expected output not written: edges_key.txt",
        exitCode: 0,
        stdoutTail: "",
        missing: ["edges_key.txt"],
      },
    });
  });

  it("classifies a program that cannot be started", async () => {
    for (const code of ["ENOENT", "EACCES", "ENOTDIR"]) {
      const { gateway } = stubGateway(errno(code));
      const invoker = new ExternalStepInvoker({ logger, gateway, allowedEnvKeys: [] });

      const outcome = await invoker.run("cluster", cluster, [], { cwd: workDir, mode: { kind: "side-effect" } });

      expect(outcome).to.deep.equal({
        ok: false,
        failure: {
          step: "cluster",
          kind: "executable-not-found",
          command: "/opt/gcm/a.out",
          message: `the executable could not be found (${code})`,
        },
      });
    }
  });

  it("classifies timeouts", async () => {
    const { gateway } = stubGateway(new ChildProcessTimeoutError(50, "partial"));
    const invoker = new ExternalStepInvoker({ logger, gateway, allowedEnvKeys: [] });

    const outcome = await invoker.run("cluster", cluster, [], { cwd: workDir, mode: { kind: "side-effect" } });

    expect(outcome).to.deep.equal({
      ok: false,
      failure: {
        step: "cluster",
        kind: "timeout",
        command: "/opt/gcm/a.out",
        message: "Child process exceeded its timeout of 50ms.",
        stderrTail: "partial",
      },
    });
  });

  it("rethrows failures it cannot classify", async () => {
    const { gateway } = stubGateway(errno("EMFILE"));
    const invoker = new ExternalStepInvoker({ logger, gateway, allowedEnvKeys: [] });

    let caught: unknown;
    try {
      await invoker.run("cluster", cluster, [], { cwd: workDir, mode: { kind: "side-effect" } });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.have.property("code", "EMFILE");
  });
});

describe("steps/StepFailedError", () => {
  it("maps each failure kind to its error code", () => {
    const base = { step: "cluster", command: "a.out", message: "m" } as const;

    expect(new StepFailedError({ ...base, kind: "executable-not-found" }).code).to.equal("E-STEP-NOT-FOUND");
    expect(new StepFailedError({ ...base, kind: "non-zero-exit" }).code).to.equal("E-STEP-EXIT");
    expect(new StepFailedError({ ...base, kind: "timeout" }).code).to.equal("E-STEP-TIMEOUT");
    const missing = new StepFailedError({ ...base, kind: "missing-output", missing: ["x"] });
    expect(missing.code).to.equal("E-STEP-OUTPUT");
    expect(missing.message).to.equal("cluster step failed: m");
  });
});
