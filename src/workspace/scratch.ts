import { randomInt } from "node:crypto";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { WorkspaceCreateError } from "../errors.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { errnoCode } from "../nodePrimitives.js";
import { WORKSPACE_PREFIX, resolveWithin } from "../paths.js";

const SUFFIX_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

/** Default length of the random workspace suffix. */
export const DEFAULT_SUFFIX_LENGTH = 4;

/** Number of suffixes tried before giving up on a collision. */
export const DEFAULT_CREATE_ATTEMPTS = 8;

/** Returns {@link length} characters drawn uniformly from `[A-Za-z0-9]`. */
export function randomSuffix(length = DEFAULT_SUFFIX_LENGTH): string {
  let suffix = "";
  for (let index = 0; index < length; index += 1) {
    suffix += SUFFIX_ALPHABET[randomInt(SUFFIX_ALPHABET.length)];
  }
  return suffix;
}

export type PublishOutcome =
  | { readonly status: "published"; readonly path: string }
  | { readonly status: "missing"; readonly expected: string };

export interface ScratchWorkspaceOptions {
  /** Directory hosting the `gcm_cache_<suffix>` workspaces. */
  readonly scratchRoot: string;
  readonly logger: StructuredLogger;
  readonly fs?: FileSystemGateway;
  readonly suffixLength?: number;
  readonly maxAttempts?: number;
  /** Suffix source, injectable so tests can force collisions. */
  readonly generateSuffix?: (length: number) => string;
}

/**
 * One isolated working directory for a pipeline run. {@link enter} creates it
 * and stages the input; {@link publishAndDispose} copies the result out and
 * removes the tree. The process working directory is never changed: external
 * steps receive {@link directory} as their `cwd`.
 */
export class ScratchWorkspace {
  /** Absolute path of the workspace directory. */
  public readonly directory: string;
  /** Absolute path of the staged copy of the input file. */
  public readonly stagedFile: string;
  private readonly fs: FileSystemGateway;
  private readonly logger: StructuredLogger;
  private disposed = false;

  private constructor(directory: string, stagedFile: string, fs: FileSystemGateway, logger: StructuredLogger) {
    this.directory = directory;
    this.stagedFile = stagedFile;
    this.fs = fs;
    this.logger = logger;
  }

  /**
   * Creates a fresh workspace under {@link ScratchWorkspaceOptions.scratchRoot}
   * and copies {@link inputFile} into it under its base name. A name collision
   * is retried with a new suffix up to `maxAttempts` times.
   *
   * @throws {WorkspaceCreateError} when no directory could be created or the
   * input could not be staged. A half-created directory is removed first.
   */
  static async enter(inputFile: string, options: ScratchWorkspaceOptions): Promise<ScratchWorkspace> {
    const fs = options.fs ?? defaultFileSystemGateway;
    const suffixLength = options.suffixLength ?? DEFAULT_SUFFIX_LENGTH;
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_CREATE_ATTEMPTS);
    const generateSuffix = options.generateSuffix ?? randomSuffix;
    const scratchRoot = path.resolve(options.scratchRoot);
    const details = { scratchRoot, inputFile };

    let directory: string | undefined;
    let attempts = 0;
    while (directory === undefined) {
      attempts += 1;
      const candidate = path.join(scratchRoot, `${WORKSPACE_PREFIX}${generateSuffix(suffixLength)}`);
      try {
        await fs.makeDirectory(candidate);
        directory = candidate;
      } catch (error) {
        if (errnoCode(error) === "EEXIST" && attempts < maxAttempts) {
          options.logger.warn("workspace_name_collision", { directory: candidate, attempt: attempts });
          continue;
        }
        throw new WorkspaceCreateError(
          `could not create a scratch workspace under ${scratchRoot}`,
          { ...details, attempts },
          error,
        );
      }
    }

    try {
      const stagedFile = resolveWithin(directory, path.basename(inputFile));
      await fs.copyFile(inputFile, stagedFile);
      options.logger.info("workspace_entered", { directory, staged_file: stagedFile, attempts });
      return new ScratchWorkspace(directory, stagedFile, fs, options.logger);
    } catch (error) {
      await fs.removeTree(directory);
      throw new WorkspaceCreateError(`could not stage ${inputFile} into ${directory}`, { ...details, attempts }, error);
    }
  }

  /** Resolves a file name inside the workspace. */
  resolve(fileName: string): string {
    return resolveWithin(this.directory, fileName);
  }

  /**
   * Copies `<workspace>/<resultFile>` to `<outputDir>/<outputFile>` when it
   * exists. A missing result is reported through the returned outcome rather
   * than thrown.
   */
  async publish(resultFile: string, outputDir: string, outputFile: string): Promise<PublishOutcome> {
    const source = this.resolve(resultFile);
    if (!(await this.fs.exists(source))) {
      this.logger.error("publish_missing_result", { expected: source });
      return { status: "missing", expected: source };
    }
    const destination = path.resolve(outputDir, outputFile);
    await this.fs.copyFile(source, destination);
    this.logger.info("publish_completed", { output: destination });
    return { status: "published", path: destination };
  }

  /** Removes the workspace tree. Calling it again is a no-op. */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    await this.fs.removeTree(this.directory);
    this.logger.info("workspace_removed", { directory: this.directory });
  }

  /**
   * Publishes then disposes. The tree is removed even when the copy throws;
   * the copy error is then rethrown. Once the result has been published a
   * teardown failure is logged as `workspace_teardown_failed` and the
   * published outcome stands, so the output file and the outcome agree.
   */
  async publishAndDispose(resultFile: string, outputDir: string, outputFile: string): Promise<PublishOutcome> {
    let outcome: PublishOutcome;
    try {
      outcome = await this.publish(resultFile, outputDir, outputFile);
    } catch (error) {
      await this.dispose();
      throw error;
    }

    try {
      await this.dispose();
    } catch (error) {
      if (outcome.status !== "published") {
        throw error;
      }
      this.logger.warn("workspace_teardown_failed", {
        directory: this.directory,
        message: error instanceof Error ? error.message : String(error),
      });
    }
    return outcome;
  }
}
