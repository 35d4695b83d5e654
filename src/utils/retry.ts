import { getConfig } from "../config.js";
import { classifyError, errorMessage, type ErrorKind } from "../errors.js";
import { parseOrThrow, RetryCountSchema, RetryOptionsSchema } from "../schemas.js";
import { createLogger } from "./logger.js";

const log = createLogger("retry");

// Retrying these cannot change the outcome, whatever the policy lists.
const NEVER_RETRIED: ReadonlySet<ErrorKind> = new Set(["user_interrupt", "configuration", "dependency"]);

export type RetryOptions = {
  maxAttempts?: number;
  /** Backoff before retry n is `backoffFactor ** (n - 1)` units. */
  backoffFactor?: number;
  unitMs?: number;
  maxDelayMs?: number;
  retryableKinds?: ErrorKind[];
};

/**
 * Re-invokes a fallible operation on retryable error kinds with exponential
 * backoff. Anything else, and the last failure once attempts run out,
 * propagates unchanged.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffFactor: number;
  readonly unitMs: number;
  readonly maxDelayMs?: number;
  readonly retryableKinds: ReadonlySet<ErrorKind>;

  constructor(opts?: RetryOptions) {
    const defaults = getConfig().retry;
    const parsed = parseOrThrow(RetryOptionsSchema, opts ?? {});

    this.maxAttempts = parsed.maxAttempts ?? defaults.maxAttempts;
    this.backoffFactor = parsed.backoffFactor ?? defaults.backoffFactor;
    this.unitMs = parsed.unitMs ?? defaults.unitMs;
    this.maxDelayMs = parsed.maxDelayMs;
    this.retryableKinds = new Set(parsed.retryableKinds ?? defaults.retryableKinds);
  }

  isRetryable(err: unknown): boolean {
    const kind = classifyError(err);
    return this.retryableKinds.has(kind) && !NEVER_RETRIED.has(kind);
  }

  /** Wait before the attempt following `attempt` (1-indexed). */
  delayFor(attempt: number): number {
    const delay = this.backoffFactor ** (attempt - 1) * this.unitMs;
    return this.maxDelayMs === undefined ? delay : Math.min(delay, this.maxDelayMs);
  }

  async execute<T>(fn: () => T | Promise<T>, label = "operation"): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (!this.isRetryable(err)) throw err;
        if (attempt >= this.maxAttempts) {
          log.error(`${label} failed after ${this.maxAttempts} attempts`, { error: errorMessage(err) });
          throw err;
        }
        const delay = this.delayFor(attempt);
        log.info(`Retry attempt ${attempt}/${this.maxAttempts} for ${label} after ${delay}ms`, {
          kind: classifyError(err),
        });
        await new Promise((r) => setTimeout(r, delay));
      }
    }
  }

  /** Same parameters as `fn`, every call routed through `execute`. */
  wrap<A extends unknown[], T>(fn: (...args: A) => T | Promise<T>, label = fn.name || "operation"): (...args: A) => Promise<T> {
    return (...args: A) => this.execute(() => fn(...args), label);
  }
}

export async function withRetry<T>(
  fn: () => T | Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  return new RetryPolicy(opts).execute(fn);
}

/**
 * Policy for a retry count given on the command line: `"0"` means no policy,
 * anything that is not a whole number of at least zero is a ConfigurationError.
 */
export function retryPolicyFor(retries: string): RetryPolicy | undefined {
  const count = parseOrThrow(RetryCountSchema, retries.trim() === "" ? Number.NaN : Number(retries));
  return count > 0 ? new RetryPolicy({ maxAttempts: count + 1 }) : undefined;
}
