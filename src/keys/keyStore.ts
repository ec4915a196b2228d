import { MalformedKeyRecordError } from "../errors.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";

/** Matches the integer literals accepted for dense IDs. */
const INTEGER_PATTERN = /^[-+]?\d+$/;

/**
 * Splits file content into lines, dropping the empty segment that follows a
 * trailing newline. Every other line, blank or not, is kept so callers can
 * reject it with its 1-based position.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Dense ID to original label index read from the key file written by the
 * formatter. Lines are `<original> <dense>`; the in-memory index is keyed by
 * the dense ID.
 *
 * The store is read-only once loaded. A dense ID listed twice keeps its last
 * label; the overwritten IDs are exposed through {@link duplicates} so the
 * pipeline can warn about them.
 */
export class IdentifierKeyStore {
  private readonly labels: ReadonlyMap<number, string>;
  /** Dense IDs that appeared on more than one line, in order of first repeat. */
  public readonly duplicates: readonly number[];

  private constructor(labels: Map<number, string>, duplicates: number[]) {
    this.labels = labels;
    this.duplicates = duplicates;
  }

  /** Reads and parses the key file at {@link path}. */
  static async load(path: string, fs: FileSystemGateway = defaultFileSystemGateway): Promise<IdentifierKeyStore> {
    return IdentifierKeyStore.parse(await fs.readText(path), path);
  }

  /**
   * Parses key file content. {@link source} only labels the errors.
   *
   * @throws {MalformedKeyRecordError} on a line that does not hold exactly two
   * whitespace-separated tokens or whose second token is not an integer.
   */
  static parse(text: string, source = "<key file>"): IdentifierKeyStore {
    const labels = new Map<number, string>();
    const duplicates: number[] = [];

    splitLines(text).forEach((line, index) => {
      const tokens = line.trim().split(/\s+/).filter((token) => token.length > 0);
      if (tokens.length !== 2) {
        throw new MalformedKeyRecordError(source, index + 1, line);
      }
      const [label, denseToken] = tokens;
      if (!INTEGER_PATTERN.test(denseToken)) {
        throw new MalformedKeyRecordError(source, index + 1, line);
      }
      const denseId = Number.parseInt(denseToken, 10);
      if (!Number.isSafeInteger(denseId)) {
        throw new MalformedKeyRecordError(source, index + 1, line);
      }
      if (labels.has(denseId) && !duplicates.includes(denseId)) {
        duplicates.push(denseId);
      }
      labels.set(denseId, label);
    });

    return new IdentifierKeyStore(labels, duplicates);
  }

  /** Builds a store from in-memory pairs, mostly for callers that format in process. */
  static fromEntries(entries: Iterable<readonly [number, string]>): IdentifierKeyStore {
    const labels = new Map<number, string>();
    const duplicates: number[] = [];
    for (const [denseId, label] of entries) {
      if (labels.has(denseId) && !duplicates.includes(denseId)) {
        duplicates.push(denseId);
      }
      labels.set(denseId, label);
    }
    return new IdentifierKeyStore(labels, duplicates);
  }

  /** Number of distinct dense IDs. */
  get size(): number {
    return this.labels.size;
  }

  labelFor(denseId: number): string | undefined {
    return this.labels.get(denseId);
  }

  has(denseId: number): boolean {
    return this.labels.has(denseId);
  }

  /** Dense IDs in ascending order. */
  denseIds(): number[] {
    return [...this.labels.keys()].sort((left, right) => left - right);
  }

  /**
   * Returns the IDs of `1..max` that have no label, where `max` is the
   * largest dense ID loaded. An empty array means the IDs form `{1..N}`.
   */
  gaps(): number[] {
    const ids = this.denseIds();
    const max = ids.length > 0 ? ids[ids.length - 1] : 0;
    const missing: number[] = [];
    for (let denseId = 1; denseId <= max; denseId += 1) {
      if (!this.labels.has(denseId)) {
        missing.push(denseId);
      }
    }
    return missing;
  }

  /** Serialises the store back to key file content, in ascending dense order. */
  toKeyFile(): string {
    return this.denseIds()
      .map((denseId) => `${this.labels.get(denseId) ?? ""} ${denseId}\n`)
      .join("");
  }
}
