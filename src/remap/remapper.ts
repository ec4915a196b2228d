import {
  IncompleteAssignmentError,
  MalformedAssignmentRecordError,
  UnknownDenseIdError,
} from "../errors.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import { splitLines, type IdentifierKeyStore } from "../keys/keyStore.js";

const CLUSTER_LABEL_PATTERN = /^[-+]?\d+$/;

/** One remapped partition line. */
export interface LabelledAssignment {
  readonly label: string;
  /** Cluster label exactly as written by the clustering program, surrounding whitespace removed. */
  readonly cluster: string;
}

/**
 * Translates a positional partition (line `i` holds the cluster of dense ID
 * `i`) into `(label, cluster)` pairs ordered by dense ID.
 *
 * @throws {MalformedAssignmentRecordError} when a line is not an integer.
 * @throws {UnknownDenseIdError} when a line position has no key entry.
 * @throws {IncompleteAssignmentError} when the partition is shorter than the key store.
 */
export function remapAssignments(
  partition: string,
  keys: IdentifierKeyStore,
  source = "<partition>",
): LabelledAssignment[] {
  const lines = splitLines(partition);
  const assignments = lines.map((line, index) => {
    const denseId = index + 1;
    const literal = line.trim();
    if (!CLUSTER_LABEL_PATTERN.test(literal)) {
      throw new MalformedAssignmentRecordError(source, denseId, line);
    }
    const label = keys.labelFor(denseId);
    if (label === undefined) {
      throw new UnknownDenseIdError(denseId, keys.size);
    }
    return { label, cluster: literal };
  });

  if (assignments.length < keys.size) {
    throw new IncompleteAssignmentError(assignments.length, keys.size);
  }
  return assignments;
}

export function renderAssignments(assignments: readonly LabelledAssignment[]): string {
  return assignments.map(({ label, cluster }) => `${label} ${cluster}\n`).join("");
}

/**
 * Rewrites the partition file at {@link partitionPath} in place with
 * `<label> <cluster>` lines. Nothing is written when validation fails, so a
 * rejected partition keeps its positional form.
 */
export async function remapPartitionFile(
  partitionPath: string,
  keys: IdentifierKeyStore,
  fs: FileSystemGateway = defaultFileSystemGateway,
): Promise<LabelledAssignment[]> {
  const assignments = remapAssignments(await fs.readText(partitionPath), keys, partitionPath);
  await fs.writeText(partitionPath, renderAssignments(assignments));
  return assignments;
}
