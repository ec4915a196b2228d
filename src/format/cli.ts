/**
 * Standalone edge-list formatter run by the pipeline as its first external
 * step: `cli.js <input> [--sep space|comma|semicolon]`. It reads the input
 * from the working directory and writes `<stem>_formatted<ext>` and
 * `<stem>_key<ext>` beside it.
 */
import { readFile, writeFile } from "node:fs/promises";
import { realpathSync } from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { isPipelineError } from "../errors.js";
import { StructuredLogger } from "../logger.js";
import { derivedFilenames } from "../paths.js";
import { formatEdgeList, isEdgeSeparator, type EdgeSeparator } from "./edgeList.js";

export interface FormatterArgs {
  readonly file: string;
  readonly sep: EdgeSeparator;
}

export function parseFormatterArgs(argv: readonly string[]): FormatterArgs {
  let file: string | undefined;
  let sep: EdgeSeparator = "space";

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--sep" || arg.startsWith("--sep=")) {
      const value = arg === "--sep" ? argv[++index] : arg.slice("--sep=".length);
      if (value === undefined || !isEdgeSeparator(value)) {
        throw new Error(`--sep expects one of space, comma, semicolon (received ${value ?? "nothing"})`);
      }
      sep = value;
      continue;
    }
    if (arg.startsWith("--")) {
      throw new Error(`unknown flag ${arg}`);
    }
    if (file !== undefined) {
      throw new Error(`unexpected extra argument ${arg}`);
    }
    file = arg;
  }

  if (file === undefined) {
    throw new Error("usage: format <edge-list> [--sep space|comma|semicolon]");
  }
  return { file, sep };
}

/** Formats {@link args.file} relative to {@link cwd}; returns the paths written. */
export async function runFormatter(
  args: FormatterArgs,
  cwd: string = process.cwd(),
): Promise<{ formatted: string; key: string; nodeCount: number; edgeCount: number }> {
  const inputPath = path.resolve(cwd, args.file);
  const names = derivedFilenames(inputPath);
  const result = formatEdgeList(await readFile(inputPath, "utf8"), args.sep);

  const formatted = path.join(path.dirname(inputPath), names.formatted);
  const key = path.join(path.dirname(inputPath), names.key);
  await writeFile(formatted, result.formatted, "utf8");
  await writeFile(key, result.keyFile, "utf8");
  return { formatted, key, nodeCount: result.nodeCount, edgeCount: result.edgeCount };
}

async function main(argv: string[]): Promise<void> {
  const logger = new StructuredLogger({ sink: (line) => process.stderr.write(line) });
  try {
    const summary = await runFormatter(parseFormatterArgs(argv));
    logger.info("edge_list_formatted", {
      formatted: path.basename(summary.formatted),
      key: path.basename(summary.key),
      nodes: summary.nodeCount,
      edges: summary.edgeCount,
    });
  } catch (error) {
    logger.error("edge_list_format_failed", isPipelineError(error) ? error.toJSON() : { message: String(error) });
    process.exitCode = 1;
  }
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }
  // npm links `bin` entries, so compare resolved paths rather than argv verbatim.
  try {
    return realpathSync(fileURLToPath(import.meta.url)) === realpathSync(path.resolve(executedFromCli));
  } catch {
    return false;
  }
})();

if (isCliEntryPoint) {
  void main(process.argv.slice(2));
}
