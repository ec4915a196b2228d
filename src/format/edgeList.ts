import { EdgeListFormatError } from "../errors.js";
import { IdentifierKeyStore, splitLines } from "../keys/keyStore.js";

/** Field delimiters recognised for flat edge lists. */
export const EDGE_SEPARATORS = ["space", "comma", "semicolon"] as const;

export type EdgeSeparator = (typeof EDGE_SEPARATORS)[number];

const SEPARATOR_CHARACTERS: Record<EdgeSeparator, string> = {
  space: " ",
  comma: ",",
  semicolon: ";",
};

export function isEdgeSeparator(value: string): value is EdgeSeparator {
  return EDGE_SEPARATORS.some((candidate) => candidate === value);
}

export interface FormattedEdgeList {
  /** Dense edge list content, joined with the chosen delimiter. */
  readonly formatted: string;
  /** Key file content, `<label> <dense>` per line in dense order. */
  readonly keyFile: string;
  readonly keys: IdentifierKeyStore;
  readonly nodeCount: number;
  readonly edgeCount: number;
}

function splitFields(line: string, sep: EdgeSeparator): string[] {
  if (sep === "space") {
    return line.trim().split(/\s+/);
  }
  return line.split(SEPARATOR_CHARACTERS[sep]).map((field) => field.trim());
}

/**
 * Relabels an edge list onto dense IDs `1..N`, assigned in order of first
 * appearance (source before target on each line). Columns after the first two
 * are carried through verbatim; blank lines are skipped.
 *
 * @throws {EdgeListFormatError} when a line holds fewer than two fields or a
 * node label is empty or contains whitespace.
 */
export function formatEdgeList(text: string, sep: EdgeSeparator = "space"): FormattedEdgeList {
  const delimiter = SEPARATOR_CHARACTERS[sep];
  const denseIds = new Map<string, number>();
  const edges: string[] = [];

  const denseIdFor = (label: string, lineNumber: number, line: string): number => {
    if (label.length === 0 || /\s/.test(label)) {
      throw new EdgeListFormatError(`invalid node label "${label}"`, lineNumber, line);
    }
    let denseId = denseIds.get(label);
    if (denseId === undefined) {
      denseId = denseIds.size + 1;
      denseIds.set(label, denseId);
    }
    return denseId;
  };

  splitLines(text).forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }
    const fields = splitFields(line, sep);
    if (fields.length < 2) {
      throw new EdgeListFormatError(`expected at least two fields separated by ${sep}`, index + 1, line);
    }
    const [source, target, ...rest] = fields;
    const sourceId = denseIdFor(source, index + 1, line);
    const targetId = denseIdFor(target, index + 1, line);
    edges.push([String(sourceId), String(targetId), ...rest].join(delimiter));
  });

  const keys = IdentifierKeyStore.fromEntries([...denseIds].map(([label, denseId]) => [denseId, label] as const));
  return {
    formatted: edges.map((edge) => `${edge}\n`).join(""),
    keyFile: keys.toKeyFile(),
    keys,
    nodeCount: denseIds.size,
    edgeCount: edges.length,
  };
}
