import { EDGE_SEPARATORS, isEdgeSeparator, type EdgeSeparator } from "./format/edgeList.js";
import { DEFAULT_CHI, DEFAULT_OUTPUT_FILE, DEFAULT_SEED } from "./pipeline/controller.js";

/** Runtime configuration parsed from the command line. */
export interface CliOptions {
  readonly inputFile: string;
  /** `undefined` means the working directory at launch. */
  readonly outputDir?: string;
  readonly outputFile: string;
  readonly seed: number;
  readonly chi: number;
  readonly sep: EdgeSeparator;
  /** Toolchain YAML file. */
  readonly configPath?: string;
  /** Per-step timeout applied where the toolchain sets none. */
  readonly timeoutMs?: number;
  readonly logFile?: string;
}

export type CliCommand = { readonly kind: "help" } | { readonly kind: "run"; readonly options: CliOptions };

/** Raised for unknown flags, missing values and values that fail validation. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const FLAG_WITH_VALUE = new Set([
  "--output_dir",
  "--output_file",
  "--seed",
  "--chi",
  "--sep",
  "--config",
  "--timeout_ms",
  "--log_file",
]);

export const USAGE = [
  "Usage: gcm-pipeline <input_file> [options]",
  "",
  "Options:",
  "  --output_dir <dir>     directory receiving the output file (default: current directory)",
  `  --output_file <name>   output file name (default: ${DEFAULT_OUTPUT_FILE})`,
  `  --seed <int>           random seed for the clustering program (default: ${DEFAULT_SEED})`,
  "  --chi <float>          chi value for the clustering program (default: 0.0)",
  `  --sep <sep>            input delimiter, one of ${EDGE_SEPARATORS.join(", ")} (default: space)`,
  "  --config <file>        toolchain YAML file (default: $GCM_TOOLCHAIN_CONFIG)",
  "  --timeout_ms <ms>      per-step timeout where the toolchain sets none",
  "  --log_file <file>      mirror the JSON log lines to this file",
  "  --help                 print this message",
].join("\n");

function parseInteger(value: string, flag: string): number {
  if (!/^[-+]?\d+$/.test(value.trim())) {
    throw new CliUsageError(`${flag} expects an integer (received "${value}")`);
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new CliUsageError(`${flag} is out of range (received "${value}")`);
  }
  return parsed;
}

function parseFloatValue(value: string, flag: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed.length === 0 || !Number.isFinite(parsed)) {
    throw new CliUsageError(`${flag} expects a finite number (received "${value}")`);
  }
  return parsed;
}

function requireNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new CliUsageError(`${flag} cannot be empty`);
  }
  return trimmed;
}

interface ParseState {
  inputFile?: string;
  outputDir?: string;
  outputFile: string;
  seed: number;
  chi: number;
  sep: EdgeSeparator;
  configPath?: string;
  timeoutMs?: number;
  logFile?: string;
}

/**
 * Parses `process.argv.slice(2)`. Flags accept both `--flag value` and
 * `--flag=value`; the single positional argument is the input file.
 */
export function parseCliArguments(argv: readonly string[]): CliCommand {
  const state: ParseState = {
    outputFile: DEFAULT_OUTPUT_FILE,
    seed: DEFAULT_SEED,
    chi: DEFAULT_CHI,
    sep: "space",
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }
    if (!arg.startsWith("--")) {
      if (state.inputFile !== undefined) {
        throw new CliUsageError(`unexpected extra argument "${arg}"`);
      }
      state.inputFile = arg;
      continue;
    }

    const separatorIndex = arg.indexOf("=");
    const flag = separatorIndex === -1 ? arg : arg.slice(0, separatorIndex);
    if (!FLAG_WITH_VALUE.has(flag)) {
      throw new CliUsageError(`unknown flag ${flag}`);
    }

    let value = separatorIndex === -1 ? undefined : arg.slice(separatorIndex + 1);
    if (value === undefined) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliUsageError(`${flag} requires a value`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--output_dir":
        state.outputDir = requireNonEmpty(value, flag);
        break;
      case "--output_file":
        state.outputFile = requireNonEmpty(value, flag);
        break;
      case "--seed":
        state.seed = parseInteger(value, flag);
        break;
      case "--chi":
        state.chi = parseFloatValue(value, flag);
        break;
      case "--sep": {
        const sep = value.trim().toLowerCase();
        if (!isEdgeSeparator(sep)) {
          throw new CliUsageError(`--sep expects one of ${EDGE_SEPARATORS.join(", ")} (received "${value}")`);
        }
        state.sep = sep;
        break;
      }
      case "--config":
        state.configPath = requireNonEmpty(value, flag);
        break;
      case "--timeout_ms": {
        const timeout = parseInteger(value, flag);
        if (timeout <= 0) {
          throw new CliUsageError(`${flag} must be positive`);
        }
        state.timeoutMs = timeout;
        break;
      }
      case "--log_file":
        state.logFile = requireNonEmpty(value, flag);
        break;
    }
  }

  const { inputFile, ...rest } = state;
  if (inputFile === undefined) {
    throw new CliUsageError("missing input file");
  }
  return { kind: "run", options: { inputFile, ...rest } };
}
