export { runPipeline, formatChi, CLUSTER_PROTOCOL_ARGS } from "./pipeline/controller.js";
export type {
  PipelineDependencies,
  PipelineFailure,
  PipelineOptions,
  PipelineReport,
  PipelineStage,
} from "./pipeline/controller.js";
export { IdentifierKeyStore } from "./keys/keyStore.js";
export { remapAssignments, remapPartitionFile, renderAssignments } from "./remap/remapper.js";
export type { LabelledAssignment } from "./remap/remapper.js";
export { ScratchWorkspace, randomSuffix } from "./workspace/scratch.js";
export type { PublishOutcome, ScratchWorkspaceOptions } from "./workspace/scratch.js";
export { ExternalStepInvoker, StepFailedError } from "./steps/invoker.js";
export type { StepCommand, StepFailure, StepFailureKind, StepMode, StepName, StepOutcome } from "./steps/invoker.js";
export { EDGE_SEPARATORS, formatEdgeList } from "./format/edgeList.js";
export type { EdgeSeparator, FormattedEdgeList } from "./format/edgeList.js";
export { loadToolchain, parseToolchainFile, defaultToolchain } from "./config/toolchain.js";
export type { Toolchain } from "./config/toolchain.js";
export { StructuredLogger } from "./logger.js";
export type { LogEntry, LoggerOptions, LogLevel } from "./logger.js";
export * from "./errors.js";
