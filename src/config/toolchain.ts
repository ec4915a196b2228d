import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import YAML from "yaml";
import { z } from "zod";

import { ToolchainConfigError } from "../errors.js";
import type { ProcessEnv } from "../nodePrimitives.js";
import type { StepCommand, StepName } from "../steps/invoker.js";
import { readList, readOptionalInt, readOptionalString, readString } from "./env.js";

/** Environment variables always forwarded to the external steps. */
export const BASE_ALLOWED_ENV = ["PATH", "HOME", "LANG", "LC_ALL", "TMPDIR", "SYSTEMROOT"] as const;

/** The external programs driven by one pipeline run. */
export interface Toolchain {
  readonly format: StepCommand;
  readonly prepare: StepCommand;
  readonly cluster: StepCommand;
  /** Environment variable names forwarded to every step. */
  readonly allowedEnvKeys: readonly string[];
}

const stepSchema = z
  .object({
    command: z.string().trim().min(1),
    args: z.array(z.string()).default([]),
    script: z.string().trim().min(1).optional(),
    check_exit: z.boolean().optional(),
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict();

const toolchainFileSchema = z
  .object({
    toolchain_dir: z.string().trim().min(1).optional(),
    env_allow: z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/)).default([]),
    format: stepSchema.optional(),
    prepare: stepSchema.optional(),
    cluster: stepSchema.optional(),
  })
  .strict();

export type ToolchainFile = z.infer<typeof toolchainFileSchema>;
type StepEntry = z.infer<typeof stepSchema>;

/** Location of the bundled formatter next to this module once compiled. */
export function bundledFormatterPath(): string {
  return fileURLToPath(new URL("../format/cli.js", import.meta.url));
}

export interface LoadToolchainOptions {
  /** YAML file overriding the defaults; falls back to `GCM_TOOLCHAIN_CONFIG`. */
  readonly configPath?: string;
  /** Timeout applied to steps that configure none; falls back to `GCM_STEP_TIMEOUT_MS`. */
  readonly defaultTimeoutMs?: number;
  readonly env?: ProcessEnv;
  /** Base for relative paths read from the environment. */
  readonly cwd?: string;
}

/**
 * Default toolchain: the bundled formatter run by the current Node binary
 * (exit unchecked), then `bash <dir>/work.sh` and `<dir>/a.out` (exit
 * checked), where `<dir>` is `GCM_TOOLCHAIN_DIR` or the working directory.
 */
export function defaultToolchain(toolchainDir: string, defaultTimeoutMs?: number): Omit<Toolchain, "allowedEnvKeys"> {
  const timeout = defaultTimeoutMs !== undefined ? { timeoutMs: defaultTimeoutMs } : {};
  return {
    format: { command: process.execPath, args: [bundledFormatterPath()], checkExit: false, ...timeout },
    prepare: { command: "bash", args: [path.join(toolchainDir, "work.sh")], checkExit: true, ...timeout },
    cluster: { command: path.join(toolchainDir, "a.out"), args: [], checkExit: true, ...timeout },
  };
}

export interface ParseToolchainOptions {
  /** Directory relative `toolchain_dir` values resolve against (the YAML file's). */
  readonly baseDir: string;
  /** Toolchain directory used when the file sets none. */
  readonly fallbackDir: string;
  readonly defaultTimeoutMs?: number;
  /** Labels errors. */
  readonly origin?: string;
}

/**
 * Parses toolchain YAML. Steps the file leaves out keep their defaults. The
 * cluster step cannot opt out of exit checking.
 * `script` entries and relative commands containing a path separator resolve
 * against the toolchain directory.
 *
 * @throws {ToolchainConfigError} on YAML syntax or schema violations.
 */
export function parseToolchainFile(
  source: string,
  options: ParseToolchainOptions,
): { toolchain: Omit<Toolchain, "allowedEnvKeys">; envAllow: string[] } {
  const origin = options.origin ?? "<toolchain>";
  let raw: unknown;
  try {
    raw = YAML.parse(source) ?? {};
  } catch (error) {
    throw new ToolchainConfigError(`invalid YAML in ${origin}`, { origin }, error);
  }

  const parsed = toolchainFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolchainConfigError(`invalid toolchain configuration in ${origin}`, {
      origin,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    });
  }

  const file = parsed.data;
  const toolchainDir = file.toolchain_dir ? path.resolve(options.baseDir, file.toolchain_dir) : options.fallbackDir;
  const defaults = defaultToolchain(toolchainDir, options.defaultTimeoutMs);

  const resolveStep = (name: StepName, entry: StepEntry | undefined): StepCommand => {
    if (!entry) {
      return defaults[name];
    }
    if (name === "cluster" && entry.check_exit === false) {
      throw new ToolchainConfigError(`the cluster step always checks its exit status (${origin})`, {
        origin,
        issues: ["cluster.check_exit: must not be false"],
      });
    }
    const command = entry.command.includes("/") || entry.command.includes(path.sep)
      ? path.resolve(toolchainDir, entry.command)
      : entry.command;
    const timeoutMs = entry.timeout_ms ?? options.defaultTimeoutMs;
    return {
      command,
      args: entry.script ? [...entry.args, path.resolve(toolchainDir, entry.script)] : entry.args,
      checkExit: entry.check_exit ?? defaults[name].checkExit,
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    };
  };

  return {
    toolchain: {
      format: resolveStep("format", file.format),
      prepare: resolveStep("prepare", file.prepare),
      cluster: resolveStep("cluster", file.cluster),
    },
    envAllow: file.env_allow,
  };
}

/**
 * Builds the toolchain from the defaults, the environment and the optional
 * YAML file, in increasing order of precedence.
 */
export async function loadToolchain(options: LoadToolchainOptions = {}): Promise<Toolchain> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const toolchainDir = path.resolve(cwd, readString("GCM_TOOLCHAIN_DIR", ".", env));
  const defaultTimeoutMs = options.defaultTimeoutMs ?? readOptionalInt("GCM_STEP_TIMEOUT_MS", { min: 1 }, env);
  const allowed = new Set<string>([...BASE_ALLOWED_ENV, ...readList("GCM_ENV_ALLOW", env)]);

  const configPath = options.configPath ?? readOptionalString("GCM_TOOLCHAIN_CONFIG", env);
  if (configPath === undefined) {
    return { ...defaultToolchain(toolchainDir, defaultTimeoutMs), allowedEnvKeys: [...allowed] };
  }

  const absolute = path.resolve(cwd, configPath);
  let source: string;
  try {
    source = await readFile(absolute, "utf8");
  } catch (error) {
    throw new ToolchainConfigError(`cannot read toolchain configuration ${absolute}`, { origin: absolute }, error);
  }

  const { toolchain, envAllow } = parseToolchainFile(source, {
    baseDir: path.dirname(absolute),
    fallbackDir: toolchainDir,
    origin: absolute,
    ...(defaultTimeoutMs !== undefined ? { defaultTimeoutMs } : {}),
  });
  for (const key of envAllow) {
    allowed.add(key);
  }
  return { ...toolchain, allowedEnvKeys: [...allowed] };
}
