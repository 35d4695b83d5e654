import { exec } from "node:child_process";
import { getConfig } from "../config.js";
import { OperationTimeoutError, TaskflowError } from "../errors.js";
import type { NamedInputs } from "../graph/types.js";
import type { UsageTracker } from "../utils/usage.js";

export type CommandOperationOptions = {
  command: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Receives one record per successful invocation. */
  usage?: UsageTracker;
};

/** `build_result` → `BUILD_RESULT`, `lint.v2_result` → `LINT_V2_RESULT`. */
export function envName(key: string): string {
  return key.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

export function inputsToEnv(inputs: NamedInputs): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(inputs)) {
    env[envName(key)] = typeof value === "string" ? value : JSON.stringify(value) ?? "";
  }
  return env;
}

export function countTokens(text: string): number {
  const trimmed = text.trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

/** Always asynchronous, so callers can chain on the result directly. */
export type CommandOperation = (args: readonly unknown[], inputs: NamedInputs) => Promise<string>;

/**
 * A task operation that runs `command` through the shell. Named inputs become
 * environment variables; the result is the trimmed stdout.
 */
export function commandOperation(opts: CommandOperationOptions): CommandOperation {
  const timeoutMs = opts.timeoutMs ?? getConfig().commands.timeoutMs;

  return (_args, inputs) =>
    new Promise<string>((resolve, reject) => {
      exec(
        opts.command,
        {
          encoding: "utf8",
          env: { ...process.env, ...opts.env, ...inputsToEnv(inputs) },
          timeout: timeoutMs,
        },
        (err, stdout, stderr) => {
          if (err) {
            if (err.killed) {
              reject(new OperationTimeoutError(`Command timed out after ${timeoutMs}ms: ${opts.command}`, { cause: err }));
              return;
            }
            const detail = stderr.trim() || err.message;
            // Node reports spawn and buffer failures with a string code instead of an exit status.
            const message =
              typeof err.code === "number" ? `Command exited with code ${err.code}: ${detail}` : `Command failed: ${detail}`;
            reject(new TaskflowError("generic", "COMMAND_FAILED", message, "error", { cause: err }));
            return;
          }
          const output = stdout.trim();
          opts.usage?.record({ tokens: countTokens(output) });
          resolve(output);
        },
      );
    });
}
