import type { ErrorKind } from "./errors.js";
import type { LogLevel } from "./utils/logger.js";

export type TaskweaveConfig = {
  retry: {
    maxAttempts: number;
    backoffFactor: number;
    /** Length of one backoff time unit in ms. */
    unitMs: number;
    retryableKinds: ErrorKind[];
  };
  limits: {
    maxConcurrent: number;
  };
  logging: {
    level: LogLevel;
  };
  commands: {
    timeoutMs: number;
    outputTruncation: number;
  };
};

export type ConfigOverrides = {
  [K in keyof TaskweaveConfig]?: Partial<TaskweaveConfig[K]>;
};

const DEFAULTS: TaskweaveConfig = {
  retry: {
    maxAttempts: 3,
    backoffFactor: 1.5,
    unitMs: 1_000,
    retryableKinds: ["timeout", "token_limit"],
  },
  limits: {
    maxConcurrent: 5,
  },
  logging: {
    level: "info",
  },
  commands: {
    timeoutMs: 60_000,
    outputTruncation: 200,
  },
};

let current: TaskweaveConfig = structuredClone(DEFAULTS);

function mergeSection<T extends object>(base: T, overrides?: Partial<T>): T {
  const result = structuredClone(base);
  if (!overrides) return result;
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined) result[key] = val;
  }
  return result;
}

/** Override config values. Merges each section with the defaults. */
export function configure(overrides: ConfigOverrides): void {
  current = {
    retry: mergeSection(DEFAULTS.retry, overrides.retry),
    limits: mergeSection(DEFAULTS.limits, overrides.limits),
    logging: mergeSection(DEFAULTS.logging, overrides.logging),
    commands: mergeSection(DEFAULTS.commands, overrides.commands),
  };
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<TaskweaveConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<TaskweaveConfig> = Object.freeze(structuredClone(DEFAULTS));
