// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { TaskweaveConfig, ConfigOverrides } from "./config.js";

// Errors
export {
  TaskflowError,
  TokenLimitError,
  OperationTimeoutError,
  InvalidOutputError,
  UserInterruptError,
  ConfigurationError,
  DependencyError,
  ERROR_KINDS,
  classifyError,
  severityOf,
  isFatal,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, ErrorKind, ErrorSeverity } from "./errors.js";
export { ErrorHandler } from "./handling/error-handler.js";
export type { ErrorHandlerFn, ErrorHandlerOptions, FallbackAction, FallbackFn } from "./handling/error-handler.js";
export { reportFailure } from "./handling/report.js";
export type { Printer } from "./handling/report.js";

// Schemas
export {
  parseOrThrow,
  RetryOptionsSchema,
  ConcurrencySchema,
  WorkflowFileSchema,
  WorkflowTaskSchema,
} from "./schemas.js";
export type { WorkflowFile, WorkflowTask } from "./schemas.js";

// Graph
export {
  TaskGraph,
  readyTasks,
  dependentsOf,
  unknownDependencies,
  validate,
  planRounds,
  describeGraph,
} from "./graph/task-graph.js";
export type {
  NamedInputs,
  ResultStore,
  Task,
  TaskDefinition,
  TaskOperation,
  TaskStatus,
} from "./graph/types.js";

// Executor
export { GraphExecutor, effectiveInputs } from "./executor/executor.js";
export type { ExecutionOptions, TaskOutcome } from "./executor/types.js";

// Workflow files
export { loadWorkflow, parseWorkflow, buildGraph } from "./workflow/loader.js";
export type { BuildGraphOptions } from "./workflow/loader.js";
export { commandOperation, envName, inputsToEnv } from "./workflow/command-operation.js";
export type { CommandOperation, CommandOperationOptions } from "./workflow/command-operation.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { RetryPolicy, retryPolicyFor, withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export { UsageTracker } from "./utils/usage.js";
export type { UsageRecord, UsageSnapshot } from "./utils/usage.js";
