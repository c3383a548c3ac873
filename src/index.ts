// Config
export { defaults, resolveConfig, parseConfig, loadConfigFile, DEFAULT_DATA_DIR } from "./config.js";
export type { StagelineConfig, ConfigOverrides } from "./config.js";

// Errors
export {
  PipelineError,
  GraphError,
  CallError,
  ValidationError,
  FallbackSynthesisError,
  RunNotFoundError,
  TransitionError,
  ConfigError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, CallErrorReason } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  JsonValueSchema,
  JsonObjectSchema,
  TaskDescriptorSchema,
  PipelineDefinitionSchema,
  RunLogRecordSchema,
} from "./schemas.js";
export type { PipelineDefinition, CapabilityEndpoint, RunLogRecord } from "./schemas.js";

// Core
export { Pipeline } from "./pipeline.js";
export type { PipelineSpec, PipelineOptions, RunOptions } from "./pipeline.js";
export { StageCatalog } from "./catalog.js";
export type { StageKindDefinition } from "./catalog.js";

// Graph
export { buildTaskGraph, topologicalOrder } from "./graph/task-graph.js";
export { projectInputs, parseInputRef, RUN_INPUT_REF } from "./graph/input-mapping.js";
export type { TaskDescriptor, TaskSpec, TaskGraph, InputMapping, BuildOptions } from "./graph/types.js";

// Execution
export { Executor } from "./executor/executor.js";
export type { ExecutorDeps } from "./executor/executor.js";
export { RetryController } from "./executor/retry-controller.js";
export type { AttemptOutcome, RetryExhausted, RetryOutcome, StageError } from "./executor/retry-controller.js";
export type { ExecutionCallbacks, ExecutionOptions, RunRecorder } from "./executor/types.js";
export { Run, canTransition, buildTerminalOutput, serializeTerminalOutput } from "./run/run.js";
export { formatReport, exitCodeFor } from "./run/report.js";
export type {
  StageResult,
  StageStatus,
  Provenance,
  TaskState,
  RunStatus,
  RunReport,
  TaskReport,
  TerminalOutput,
} from "./run/types.js";

// Validation & fallback
export { validate, parseRawPayload } from "./validation/validator.js";
export type { ValidatedOutput, ValidationResult } from "./validation/validator.js";
export { definePolicy } from "./validation/policy.js";
export type { ValidationPolicy, PolicyOptions } from "./validation/policy.js";
export { DEFAULT_PLACEHOLDER_PATTERNS, matchPlaceholder } from "./validation/placeholders.js";
export { FallbackSynthesizer } from "./fallback/synthesizer.js";
export type { FallbackContext, FallbackFn } from "./fallback/synthesizer.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { RunHeader, RunSummary } from "./persistence/store.js";
export { Replayer } from "./persistence/replayer.js";
export type { ReplayResult } from "./persistence/replayer.js";

// Capabilities
export type { Capability, CapabilityRequest, InvokeContext } from "./capabilities/capability.js";
export { CapabilityRegistry } from "./capabilities/registry.js";
export { FunctionCapability } from "./capabilities/function-capability.js";
export type { CapabilityFunction, FunctionCapabilityOptions } from "./capabilities/function-capability.js";
export { HttpCapability } from "./capabilities/http-capability.js";
export type { HttpCapabilityOptions } from "./capabilities/http-capability.js";

// Built-in pipeline
export { loadPipelineFile, parsePipelineDefinition, httpCapabilitiesFor } from "./pipelines/loader.js";
export {
  STOCK_ANALYSIS_PIPELINE_PATH,
  createStockAnalysisCatalog,
  defaultRunInput,
  loadUniverse,
} from "./pipelines/stock-analysis.js";
export { createSyntheticCapability } from "./pipelines/synthetic-capability.js";

// Utils
export { log, setLogLevel, getLogLevel, isLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
export { backoffDelay, sleep, MAX_TIMER_MS } from "./utils/retry.js";
export { stableStringify, stableHash, deepFreeze } from "./utils/stable-json.js";
export type { JsonValue, JsonObject } from "./utils/stable-json.js";
