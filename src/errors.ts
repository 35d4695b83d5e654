export type ErrorKind =
  | "token_limit"
  | "timeout"
  | "invalid_output"
  | "user_interrupt"
  | "configuration"
  | "dependency"
  | "generic";

export type ErrorSeverity = "info" | "warning" | "error" | "critical";

export type ErrorCode =
  | "TOKEN_LIMIT"
  | "TIMEOUT"
  | "INVALID_OUTPUT"
  | "USER_INTERRUPT"
  | "INVALID_CONCURRENCY"
  | "INVALID_OPTIONS"
  | "INVALID_WORKFLOW"
  | "DUPLICATE_TASK"
  | "SELF_DEPENDENCY"
  | "UNKNOWN_DEPENDENCY"
  | "CYCLE"
  | "DEADLOCK"
  | "COMMAND_FAILED"
  | "UNKNOWN";

export const ERROR_KINDS: readonly ErrorKind[] = [
  "token_limit",
  "timeout",
  "invalid_output",
  "user_interrupt",
  "configuration",
  "dependency",
  "generic",
];

/** Base class for every error the library raises. */
export class TaskflowError extends Error {
  readonly kind: ErrorKind;
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;

  constructor(
    kind: ErrorKind,
    code: ErrorCode,
    message: string,
    severity: ErrorSeverity = "error",
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TaskflowError";
    this.kind = kind;
    this.code = code;
    this.severity = severity;
  }
}

/** The operation exceeded its token or quota budget. */
export class TokenLimitError extends TaskflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("token_limit", "TOKEN_LIMIT", message, "warning", options);
    this.name = "TokenLimitError";
  }
}

export class OperationTimeoutError extends TaskflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("timeout", "TIMEOUT", message, "warning", options);
    this.name = "OperationTimeoutError";
  }
}

/** The operation's result failed downstream validation. */
export class InvalidOutputError extends TaskflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalid_output", "INVALID_OUTPUT", message, "error", options);
    this.name = "InvalidOutputError";
  }
}

export class UserInterruptError extends TaskflowError {
  constructor(message = "Operation interrupted by user") {
    super("user_interrupt", "USER_INTERRUPT", message, "info");
    this.name = "UserInterruptError";
  }
}

export class ConfigurationError extends TaskflowError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super("configuration", code, message, "critical", options);
    this.name = "ConfigurationError";
  }
}

/** The graph's structural contract was violated (deadlock, cycle, unknown id). */
export class DependencyError extends TaskflowError {
  readonly taskIds: string[];

  constructor(code: ErrorCode, message: string, taskIds: string[] = []) {
    super("dependency", code, message, "critical");
    this.name = "DependencyError";
    this.taskIds = taskIds;
  }
}

/** Map any thrown value onto the taxonomy. */
export function classifyError(err: unknown): ErrorKind {
  return err instanceof TaskflowError ? err.kind : "generic";
}

export function severityOf(err: unknown): ErrorSeverity {
  return err instanceof TaskflowError ? err.severity : "error";
}

/** Configuration and dependency failures are structural: never retried, always surfaced. */
export function isFatal(err: unknown): boolean {
  const kind = classifyError(err);
  return kind === "configuration" || kind === "dependency";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
