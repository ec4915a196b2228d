/**
 * Error taxonomy shared by every pipeline stage. Each error carries a stable
 * `code` so the controller and the CLI can classify failures without string
 * matching, a short remediation `hint`, and structured `details` mirrored into
 * the log entries.
 */
export type PipelineErrorCode =
  | "E-WORKSPACE-CREATE"
  | "E-KEY-MALFORMED"
  | "E-DENSE-ID-UNKNOWN"
  | "E-ASSIGNMENT-MALFORMED"
  | "E-ASSIGNMENT-INCOMPLETE"
  | "E-STEP-NOT-FOUND"
  | "E-STEP-EXIT"
  | "E-STEP-TIMEOUT"
  | "E-STEP-OUTPUT"
  | "E-EDGELIST-FORMAT"
  | "E-TOOLCHAIN-CONFIG"
  | "E-PATHS-ESCAPE";

export type PipelineErrorDetails = Record<string, unknown>;

export abstract class PipelineError extends Error {
  public abstract readonly code: PipelineErrorCode;
  public abstract readonly hint: string;
  public readonly details: PipelineErrorDetails;

  protected constructor(message: string, details: PipelineErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.details = details;
  }

  /** Serialisable view used by the logger and the pipeline report. */
  toJSON(): { code: PipelineErrorCode; message: string; hint: string; details: PipelineErrorDetails } {
    return { code: this.code, message: this.message, hint: this.hint, details: this.details };
  }
}

/** The scratch directory could not be created, or the input could not be staged into it. */
export class WorkspaceCreateError extends PipelineError {
  public readonly code = "E-WORKSPACE-CREATE";
  public readonly hint = "check that the scratch root exists, is writable and that the input file is readable";

  constructor(message: string, details: { scratchRoot: string; attempts: number; inputFile: string }, cause?: unknown) {
    super(message, details, { cause });
    this.name = "WorkspaceCreateError";
  }
}

/** A key file line did not split into `<original> <dense>` with an integer dense ID. */
export class MalformedKeyRecordError extends PipelineError {
  public readonly code = "E-KEY-MALFORMED";
  public readonly hint = "every key line must hold exactly two whitespace-separated tokens, the second an integer";
  public readonly lineNumber: number;

  constructor(source: string, lineNumber: number, line: string) {
    super(`malformed key record at ${source}:${lineNumber}`, { source, lineNumber, line });
    this.name = "MalformedKeyRecordError";
    this.lineNumber = lineNumber;
  }
}

/** A positional dense ID of the assignment file has no entry in the key store. */
export class UnknownDenseIdError extends PipelineError {
  public readonly code = "E-DENSE-ID-UNKNOWN";
  public readonly hint = "the partition and the key file come from different runs or the partition is corrupted";
  public readonly denseId: number;

  constructor(denseId: number, keyCount: number) {
    super(`dense id ${denseId} has no entry in the key store (${keyCount} keys loaded)`, { denseId, keyCount });
    this.name = "UnknownDenseIdError";
    this.denseId = denseId;
  }
}

/** An assignment line is not an integer cluster label. */
export class MalformedAssignmentRecordError extends PipelineError {
  public readonly code = "E-ASSIGNMENT-MALFORMED";
  public readonly hint = "each partition line must hold a single integer cluster label";

  constructor(source: string, lineNumber: number, line: string) {
    super(`malformed cluster label at ${source}:${lineNumber}`, { source, lineNumber, line });
    this.name = "MalformedAssignmentRecordError";
  }
}

/** The assignment file holds fewer lines than the key store has dense IDs. */
export class IncompleteAssignmentError extends PipelineError {
  public readonly code = "E-ASSIGNMENT-INCOMPLETE";
  public readonly hint = "the clustering program stopped early; inspect its output before rerunning";

  constructor(assigned: number, expected: number) {
    super(`partition covers ${assigned} of ${expected} nodes`, { assigned, expected });
    this.name = "IncompleteAssignmentError";
  }
}

/** An edge list line could not be turned into a dense edge. */
export class EdgeListFormatError extends PipelineError {
  public readonly code = "E-EDGELIST-FORMAT";
  public readonly hint = "use --sep to match the delimiter of the input and keep labels free of whitespace";

  constructor(message: string, lineNumber: number, line: string) {
    super(`${message} (line ${lineNumber})`, { lineNumber, line });
    this.name = "EdgeListFormatError";
  }
}

/** The toolchain YAML file or an environment override is invalid. */
export class ToolchainConfigError extends PipelineError {
  public readonly code = "E-TOOLCHAIN-CONFIG";
  public readonly hint = "fix the toolchain configuration file or unset the offending environment variable";

  constructor(message: string, details: PipelineErrorDetails = {}, cause?: unknown) {
    super(message, details, { cause });
    this.name = "ToolchainConfigError";
  }
}

/** Type guard used by the controller when classifying stage failures. */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
