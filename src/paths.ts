import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { PipelineError } from "./errors.js";

/** Prefix of every scratch workspace directory created under the scratch root. */
export const WORKSPACE_PREFIX = "gcm_cache_";

/** Prefix the clustering program gives to its partition file. */
export const PARTITION_PREFIX = "partition_";

/**
 * Raised when a file name handed to the workspace would resolve outside of it,
 * e.g. an input named `../x`.
 */
export class PathResolutionError extends PipelineError {
  public readonly code = "E-PATHS-ESCAPE";
  public readonly hint = "keep staged and published file names free of directory components";

  constructor(attemptedPath: string, rootDirectory: string) {
    super("path escapes base directory", { attemptedPath, rootDirectory });
    this.name = "PathResolutionError";
  }
}

/**
 * Resolves {@link segments} against {@link rootDir} and ensures the result
 * stays within it.
 *
 * @throws {PathResolutionError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new PathResolutionError(targetPath, absoluteRoot);
  }

  return targetPath;
}

/** File names produced around one staged input. All are base names. */
export interface DerivedFilenames {
  readonly input: string;
  readonly formatted: string;
  readonly key: string;
  readonly partition: string;
}

/**
 * Derives the formatter and clustering file names from the staged input:
 * `edges.txt` gives `edges_formatted.txt`, `edges_key.txt` and
 * `partition_edges_formatted.txt`.
 */
export function derivedFilenames(inputFile: string): DerivedFilenames {
  const { name, ext } = path.parse(path.basename(inputFile));
  const formatted = `${name}_formatted${ext}`;
  return {
    input: path.basename(inputFile),
    formatted,
    key: `${name}_key${ext}`,
    partition: partitionFilename(formatted),
  };
}

export function partitionFilename(formattedFile: string): string {
  return `${PARTITION_PREFIX}${path.basename(formattedFile)}`;
}
