#!/usr/bin/env node
/**
 * Command-line entry point: `gcm-pipeline <input_file> [options]`.
 *
 * Exit codes: 0 when the remapped partition was published, 1 when the run
 * failed (the diagnostics are in the JSON log lines), 2 on usage errors.
 */
import { realpathSync } from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { CliUsageError, USAGE, parseCliArguments, type CliOptions } from "./cliOptions.js";
import { loadToolchain } from "./config/toolchain.js";
import { readOptionalString } from "./config/env.js";
import { isPipelineError } from "./errors.js";
import { StructuredLogger, type LoggerOptions } from "./logger.js";
import { runPipeline, type PipelineReport } from "./pipeline/controller.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
  cwd: process.cwd(),
};

/** Runs one pipeline for {@link options} and returns the report. */
export async function executeRun(options: CliOptions, io: CliIo, loggerOptions: LoggerOptions = {}): Promise<PipelineReport> {
  const logFile = options.logFile ?? readOptionalString("GCM_LOG_FILE", io.env);
  const logger = new StructuredLogger({
    sink: io.stdout,
    ...loggerOptions,
    ...(logFile !== undefined ? { logFile: path.resolve(io.cwd, logFile) } : {}),
  });

  try {
    const toolchain = await loadToolchain({
      env: io.env,
      cwd: io.cwd,
      ...(options.configPath !== undefined ? { configPath: options.configPath } : {}),
      ...(options.timeoutMs !== undefined ? { defaultTimeoutMs: options.timeoutMs } : {}),
    });
    const scratchRoot = readOptionalString("GCM_SCRATCH_ROOT", io.env);

    return await runPipeline(
      {
        inputFile: path.resolve(io.cwd, options.inputFile),
        outputDir: path.resolve(io.cwd, options.outputDir ?? "."),
        outputFile: options.outputFile,
        seed: options.seed,
        chi: options.chi,
        sep: options.sep,
        scratchRoot: path.resolve(io.cwd, scratchRoot ?? "."),
      },
      { toolchain, logger, inheritEnv: io.env },
    );
  } finally {
    await logger.flush();
  }
}

/** Parses {@link argv}, runs the pipeline and maps the outcome to an exit code. */
export async function main(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  let options: CliOptions;
  try {
    const command = parseCliArguments(argv);
    if (command.kind === "help") {
      io.stdout(`${USAGE}\n`);
      return EXIT_OK;
    }
    options = command.options;
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr(`${error.message}\n\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  try {
    const report = await executeRun(options, io);
    return report.status === "published" ? EXIT_OK : EXIT_FAILED;
  } catch (error) {
    const detail = isPipelineError(error) ? `${error.message} (${error.code}): ${error.hint}` : String(error);
    io.stderr(`${detail}\n`);
    return EXIT_FAILED;
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
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = EXIT_FAILED;
    },
  );
}
