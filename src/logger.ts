import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { errnoCode } from "./nodePrimitives.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Default placeholder inserted when a secret token is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys whose values are redacted when `GCM_LOG_REDACT=on`. */
const SENSITIVE_KEYS = new Set(["authorization", "token", "password", "secret", "api_key", "api-key"]);

/**
 * Parses the `GCM_LOG_REDACT` environment variable. The value is a
 * comma-separated list of directives (`on`, `off`) and literal substrings to
 * scrub from string payloads, e.g. `"on,/home/alice"`. Providing substrings
 * without an explicit toggle enables redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];

  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/** Rotate the mirrored log file once it grows past 5 MiB. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

/** Number of log files retained during rotation, the active one included. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  run_id?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Correlation identifier stamped on every entry. */
  readonly runId?: string;
  /** Substrings or patterns scrubbed from string payload values. */
  readonly redactSecrets?: Array<string | RegExp>;
  /**
   * Explicit toggle for payload redaction. When omitted the logger follows
   * {@link parseRedactionDirectives} applied to `GCM_LOG_REDACT`.
   */
  readonly redactionEnabled?: boolean;
  /** Destination of the JSON lines. Defaults to `process.stdout`. */
  readonly sink?: (line: string) => void;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile: string | undefined;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly minLevel: LogLevel;
  private readonly runId: string | undefined;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly sink: (line: string) => void;
  private readonly entryListener: ((entry: LogEntry) => void) | undefined;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.minLevel = options.level ?? "info";
    this.runId = options.runId;
    const directives = parseRedactionDirectives(process.env.GCM_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.sink = options.sink ?? ((line) => process.stdout.write(line));
    this.entryListener = options.onEntry;
  }

  /**
   * Returns a logger sharing this one's destination and options but stamping
   * {@link runId} on its entries. File writes stay ordered through the
   * parent's queue.
   */
  child(runId: string): StructuredLogger {
    const child = new StructuredLogger({
      logFile: null,
      level: this.minLevel,
      runId,
      redactSecrets: this.redactSecrets,
      redactionEnabled: this.redactionEnabled,
      sink: (line) => this.emitLine(line),
      ...(this.entryListener ? { onEntry: this.entryListener } : {}),
    });
    return child;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const safePayload = payload !== undefined ? this.redact(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.runId !== undefined ? { run_id: this.runId } : {}),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    this.emitLine(`${JSON.stringify(entry)}\n`);
  }

  private emitLine(line: string): void {
    this.sink(line);
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        process.stderr.write(
          `${JSON.stringify({
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: { message: err instanceof Error ? err.message : String(err) },
          })}\n`,
        );
        // Allow the next entry to retry directory creation.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active log file when appending {@link pendingBytes} would
   * exceed the size limit, keeping at most {@link maxFileCount} files.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      let sanitised = value;
      for (const pattern of this.redactSecrets) {
        if (typeof pattern === "string" && pattern.length > 0) {
          sanitised = sanitised.split(pattern).join(REDACTION_TOKEN);
        } else if (pattern instanceof RegExp) {
          sanitised = sanitised.replace(pattern, REDACTION_TOKEN);
        }
      }
      return sanitised;
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (errnoCode(error) !== "ENOENT") {
      throw error;
    }
  }
}
