import { classifyError, errorMessage, type ErrorKind } from "../errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("errors");

export type FallbackAction =
  | { status: "retrying"; action: "reduce_context" | "backoff_retry" | "simplify_request" }
  | { status: "error"; message: string };

export type ErrorHandlerFn = (error: unknown) => void;
export type FallbackFn = (error: unknown) => FallbackAction;

export type ErrorHandlerOptions = {
  /** Called after a user interrupt has been logged. Defaults to a clean process exit. */
  exit?: (code: number) => void;
};

// The taxonomy is flat: every kind's only ancestor is "generic".
function lookupChain(kind: ErrorKind): ErrorKind[] {
  return kind === "generic" ? ["generic"] : [kind, "generic"];
}

/**
 * Dispatches errors to handlers and fallbacks registered per error kind. The
 * most specific registration wins; unregistered kinds get generic behaviour.
 */
export class ErrorHandler {
  private handlers = new Map<ErrorKind, ErrorHandlerFn>();
  private fallbacks = new Map<ErrorKind, FallbackFn>();
  private exit: (code: number) => void;
  lastError: unknown;

  constructor(opts?: ErrorHandlerOptions) {
    this.exit = opts?.exit ?? ((code) => process.exit(code));
    this.registerDefaults();
  }

  registerHandler(kind: ErrorKind, handler: ErrorHandlerFn): void {
    this.handlers.set(kind, handler);
  }

  registerFallback(kind: ErrorKind, fallback: FallbackFn): void {
    this.fallbacks.set(kind, fallback);
  }

  handle(error: unknown): void {
    this.lastError = error;
    for (const kind of lookupChain(classifyError(error))) {
      const handler = this.handlers.get(kind);
      if (handler) {
        handler(error);
        return;
      }
    }
    this.handleGeneric(error);
  }

  fallback(error: unknown): FallbackAction {
    for (const kind of lookupChain(classifyError(error))) {
      const fallback = this.fallbacks.get(kind);
      if (fallback) return fallback(error);
    }
    log.info("Using generic fallback strategy");
    return { status: "error", message: errorMessage(error) };
  }

  private registerDefaults(): void {
    this.registerHandler("token_limit", (err) => log.warn(`Token limit exceeded: ${errorMessage(err)}`));
    this.registerHandler("timeout", (err) => log.warn(`Operation timed out: ${errorMessage(err)}`));
    this.registerHandler("invalid_output", (err) => log.error(`Invalid output: ${errorMessage(err)}`));
    this.registerHandler("user_interrupt", (err) => {
      log.info(`User interrupted: ${errorMessage(err)}`);
      this.exit(0);
    });

    this.registerFallback("token_limit", () => {
      log.info("Using fallback for token limit error: reducing context");
      return { status: "retrying", action: "reduce_context" };
    });
    this.registerFallback("timeout", () => {
      log.info("Using fallback for timeout error: retrying with backoff");
      return { status: "retrying", action: "backoff_retry" };
    });
    this.registerFallback("invalid_output", () => {
      log.info("Using fallback for invalid output: requesting simplified response");
      return { status: "retrying", action: "simplify_request" };
    });
  }

  private handleGeneric(error: unknown): void {
    log.error(`Unexpected error: ${errorMessage(error)}`, {
      kind: classifyError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
}
