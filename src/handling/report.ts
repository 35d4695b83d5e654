import { errorMessage, isFatal } from "../errors.js";
import type { ErrorHandler } from "./error-handler.js";

export type Printer = (...parts: string[]) => void;

/**
 * Print a one-line summary of a failed command and return the exit code.
 * Configuration and dependency failures are reported as configuration problems
 * and bypass the handler; everything else goes through `errors.handle` first.
 */
export function reportFailure(err: unknown, errors: ErrorHandler, print: Printer = console.error): number {
  if (isFatal(err)) {
    print("Configuration problem:", errorMessage(err));
    return 1;
  }
  errors.handle(err);
  print("Run failed:", errorMessage(err));
  return 1;
}
