/**
 * Typed readers over environment variables. Every helper trims the raw value,
 * treats blank strings as unset and falls back to the caller's default when
 * the literal cannot be coerced, so a stray export never aborts a run.
 *
 * The readers take the environment as their last argument (defaulting to
 * {@link process.env}) which keeps the toolchain loader testable without
 * mutating the global environment.
 */
import process from "node:process";

import type { ProcessEnv } from "../nodePrimitives.js";

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

export interface IntegerBounds {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/** Returns the trimmed value of {@link name}, or `undefined` when blank. */
export function readOptionalString(name: string, env: ProcessEnv = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(name: string, defaultValue: string, env: ProcessEnv = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Parses {@link name} as a base-10 integer. Literals that are not plain
 * integers, overflow the safe integer range or fall outside {@link bounds}
 * are ignored.
 */
export function readOptionalInt(
  name: string,
  bounds: IntegerBounds = {},
  env: ProcessEnv = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  if (bounds.min !== undefined && value < bounds.min) {
    return undefined;
  }
  if (bounds.max !== undefined && value > bounds.max) {
    return undefined;
  }
  return value;
}

/** Splits a comma or whitespace separated list, dropping blanks and duplicates. */
export function readList(name: string, env: ProcessEnv = process.env): string[] {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return [];
  }
  return Array.from(new Set(normalised.split(/[\s,]+/).filter((token) => token.length > 0)));
}
