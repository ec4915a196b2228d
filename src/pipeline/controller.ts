import { randomUUID } from "node:crypto";
import path from "node:path";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { Toolchain } from "../config/toolchain.js";
import { isPipelineError, type PipelineErrorCode } from "../errors.js";
import type { EdgeSeparator } from "../format/edgeList.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { ChildProcessGateway } from "../gateways/childProcess.js";
import { IdentifierKeyStore } from "../keys/keyStore.js";
import type { StructuredLogger } from "../logger.js";
import { derivedFilenames, type DerivedFilenames } from "../paths.js";
import { remapPartitionFile, type LabelledAssignment } from "../remap/remapper.js";
import {
  ExternalStepInvoker,
  StepFailedError,
  type StepCommand,
  type StepMode,
  type StepName,
} from "../steps/invoker.js";
import { ScratchWorkspace, type PublishOutcome } from "../workspace/scratch.js";

/**
 * Positional parameters the clustering program expects ahead of the seed,
 * chi and file name. They are part of its calling convention, not tunables.
 */
export const CLUSTER_PROTOCOL_ARGS = ["2", "5", "2"] as const;

export const DEFAULT_OUTPUT_FILE = "clustering_output.txt";
export const DEFAULT_SEED = 12345;
export const DEFAULT_CHI = 0.0;

/**
 * Linear run states. A failure leaves the run at the last stage it completed;
 * `published` is only reached after a successful copy of the remapped result.
 */
export type PipelineStage = "start" | "staged" | "formatted" | "prepared" | "clustered" | "remapped" | "published";

export interface PipelineOptions {
  readonly inputFile: string;
  /** Defaults to the process working directory. */
  readonly outputDir?: string;
  readonly outputFile?: string;
  readonly seed?: number;
  readonly chi?: number;
  readonly sep?: EdgeSeparator;
  /** Directory hosting the scratch workspace. Defaults to the process working directory. */
  readonly scratchRoot?: string;
}

export interface PipelineDependencies {
  readonly toolchain: Toolchain;
  readonly logger: StructuredLogger;
  readonly fs?: FileSystemGateway;
  readonly processGateway?: ChildProcessGateway;
  readonly inheritEnv?: NodeJS.ProcessEnv;
  /** Correlation identifier stamped on the log entries of the run. */
  readonly runId?: string;
  /** Workspace suffix source, forwarded to {@link ScratchWorkspace.enter}. */
  readonly generateSuffix?: (length: number) => string;
}

export interface PipelineFailure {
  readonly code: PipelineErrorCode | "E-UNEXPECTED";
  readonly message: string;
  readonly hint?: string;
  readonly details?: Record<string, unknown>;
}

export type PipelineReport =
  | {
      readonly status: "published";
      readonly runId: string;
      readonly stage: "published";
      readonly output: string;
      readonly nodeCount: number;
      readonly clusterCount: number;
    }
  | {
      readonly status: "failed";
      readonly runId: string;
      /** Last stage completed before the failure. */
      readonly stage: PipelineStage;
      readonly failure: PipelineFailure;
    };

/** Renders chi the way the clustering program's reference driver does: `0` becomes `0.0`. */
export function formatChi(chi: number): string {
  return Number.isInteger(chi) ? chi.toFixed(1) : String(chi);
}

function describeFailure(error: unknown): PipelineFailure {
  if (isPipelineError(error)) {
    return { code: error.code, message: error.message, hint: error.hint, details: error.details };
  }
  return { code: "E-UNEXPECTED", message: error instanceof Error ? error.message : String(error) };
}

/**
 * Runs stage → format → prepare → cluster → remap → publish for one input.
 *
 * Stage failures never escape: every stage after staging, remapping
 * included, runs inside one guarded region whose release step publishes the
 * remapped result (when there is one) and removes the workspace exactly once.
 * The returned report tells published runs from failed ones.
 */
export async function runPipeline(options: PipelineOptions, deps: PipelineDependencies): Promise<PipelineReport> {
  const runId = deps.runId ?? randomUUID();
  const logger = deps.logger.child(runId);
  const fs = deps.fs ?? defaultFileSystemGateway;
  const invoker = new ExternalStepInvoker({
    logger,
    fs,
    allowedEnvKeys: deps.toolchain.allowedEnvKeys,
    ...(deps.processGateway ? { gateway: deps.processGateway } : {}),
    ...(deps.inheritEnv ? { inheritEnv: deps.inheritEnv } : {}),
  });

  const outputDir = path.resolve(options.outputDir ?? process.cwd());
  const outputFile = options.outputFile ?? DEFAULT_OUTPUT_FILE;
  const seed = options.seed ?? DEFAULT_SEED;
  const chi = options.chi ?? DEFAULT_CHI;
  const sep = options.sep ?? "space";

  const progress: { stage: PipelineStage } = { stage: "start" };
  const advance = (next: PipelineStage): void => {
    progress.stage = next;
    logger.info("pipeline_stage", { stage: next });
  };
  const fail = (error: unknown): PipelineReport => {
    const failure = describeFailure(error);
    logger.error("pipeline_failed", { stage: progress.stage, ...failure });
    return { status: "failed", runId, stage: progress.stage, failure };
  };

  logger.info("pipeline_started", { input: options.inputFile, output: path.join(outputDir, outputFile), seed, chi, sep });

  let entered: ScratchWorkspace;
  try {
    entered = await ScratchWorkspace.enter(options.inputFile, {
      scratchRoot: options.scratchRoot ?? process.cwd(),
      logger,
      fs,
      ...(deps.generateSuffix ? { generateSuffix: deps.generateSuffix } : {}),
    });
  } catch (error) {
    return fail(error);
  }
  const workspace = entered;
  advance("staged");

  const names = derivedFilenames(workspace.stagedFile);
  const runStep = async (step: StepName, command: StepCommand, args: readonly string[], mode: StepMode): Promise<void> => {
    const outcome = await invoker.run(step, command, args, { cwd: workspace.directory, mode });
    if (!outcome.ok) {
      throw new StepFailedError(outcome.failure);
    }
  };

  let failure: unknown;
  let published: PublishOutcome | undefined;
  let nodeCount = 0;
  let clusterCount = 0;
  try {
    await runStep("format", deps.toolchain.format, [names.input, "--sep", sep], {
      kind: "produces",
      outputs: [names.formatted, names.key],
    });
    advance("formatted");

    await runStep("prepare", deps.toolchain.prepare, [names.formatted], { kind: "side-effect" });
    advance("prepared");

    // A failed clustering run must never reach remap, whatever the toolchain says.
    await runStep(
      "cluster",
      { ...deps.toolchain.cluster, checkExit: true },
      [...CLUSTER_PROTOCOL_ARGS, String(seed), formatChi(chi), names.formatted],
      { kind: "produces", outputs: [names.partition] },
    );
    advance("clustered");

    const assignments = await remap(workspace, names, fs, logger);
    nodeCount = assignments.length;
    clusterCount = new Set(assignments.map((assignment) => assignment.cluster)).size;
    advance("remapped");
  } catch (error) {
    failure = error;
  } finally {
    try {
      if (progress.stage === "remapped") {
        published = await workspace.publishAndDispose(names.partition, outputDir, outputFile);
      } else {
        logger.warn("publish_skipped", { stage: progress.stage, reason: "run did not reach the remapped stage" });
        await workspace.dispose();
      }
    } catch (error) {
      failure ??= error;
    }
  }

  if (failure !== undefined) {
    return fail(failure);
  }
  if (published === undefined || published.status === "missing") {
    return fail(new Error(`no result exists at ${published?.expected ?? names.partition}`));
  }

  advance("published");
  logger.info("pipeline_completed", { output: published.path, nodes: nodeCount, clusters: clusterCount });
  return { status: "published", runId, stage: "published", output: published.path, nodeCount, clusterCount };
}

async function remap(
  workspace: ScratchWorkspace,
  names: DerivedFilenames,
  fs: FileSystemGateway,
  logger: StructuredLogger,
): Promise<LabelledAssignment[]> {
  const keys = await IdentifierKeyStore.load(workspace.resolve(names.key), fs);
  if (keys.duplicates.length > 0) {
    logger.warn("key_store_duplicates", { dense_ids: keys.duplicates });
  }
  const gaps = keys.gaps();
  if (gaps.length > 0) {
    logger.warn("key_store_gaps", { dense_ids: gaps.slice(0, 20), total: gaps.length });
  }
  return await remapPartitionFile(workspace.resolve(names.partition), keys, fs);
}
