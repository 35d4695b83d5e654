import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { describeGraph, readyTasks, stuckError, type TaskGraph } from "../graph/task-graph.js";
import type { NamedInputs, ResultStore, Task } from "../graph/types.js";
import { ConcurrencySchema, parseOrThrow } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { ExecutionOptions, TaskOutcome } from "./types.js";

const log = createLogger("executor");

/** Build the named inputs a task is invoked with. Declared keys win over `<dep>_result`. */
export function effectiveInputs(task: Task, results: ReadonlyMap<string, unknown>): NamedInputs {
  const inputs: NamedInputs = { ...task.namedInputs };
  for (const dep of task.dependsOn) {
    const key = `${dep}_result`;
    if (!(key in inputs)) inputs[key] = results.get(dep);
  }
  return inputs;
}

// Hooks observe a run; an error thrown by one is logged and does not change the outcome.
function callHook(name: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    log.warn(`${name} hook threw`, { error: errorMessage(err) });
  }
}

/**
 * Round-based scheduler. Each round launches up to `maxConcurrent` ready tasks,
 * waits for all of them, then recomputes the ready set. A failed task ends the
 * run once its round has joined.
 */
export class GraphExecutor {
  private defaults: ExecutionOptions;

  /** `defaults` apply to every run; options passed to `run` override them. */
  constructor(defaults?: ExecutionOptions) {
    this.defaults = defaults ?? {};
  }

  async run(graph: TaskGraph, optsOrMax?: number | ExecutionOptions): Promise<ResultStore> {
    const opts: ExecutionOptions = {
      ...this.defaults,
      ...(typeof optsOrMax === "number" ? { maxConcurrent: optsOrMax } : optsOrMax),
    };
    const maxConcurrent = parseOrThrow(
      ConcurrencySchema,
      opts.maxConcurrent ?? getConfig().limits.maxConcurrent,
      "INVALID_CONCURRENCY",
    );

    const results: ResultStore = new Map();
    const completed = new Set<string>();

    let round = 0;
    while (completed.size < graph.size) {
      const ready = readyTasks(graph, completed);
      if (ready.length === 0) {
        const err = stuckError(graph, completed);
        log.error(err.message, { completed: completed.size, total: graph.size });
        throw err;
      }

      round++;
      const batch = ready.slice(0, maxConcurrent);
      log.debug(`Round ${round}`, { tasks: batch.map((t) => t.id) });
      callHook("onRoundStart", () => opts.onRoundStart?.(round, batch.map((t) => t.id)));

      // Inputs are resolved before launch so no task sees a sibling's result.
      const settled = await Promise.allSettled(
        batch.map((task) => this.executeTask(task, effectiveInputs(task, results), opts)),
      );

      let firstFailure: { reason: unknown } | undefined;
      for (let i = 0; i < batch.length; i++) {
        const outcome = settled[i];
        if (outcome.status === "fulfilled") {
          results.set(batch[i].id, outcome.value);
          completed.add(batch[i].id);
        } else if (!firstFailure) {
          firstFailure = { reason: outcome.reason };
        }
      }
      if (firstFailure) throw firstFailure.reason;
    }

    return results;
  }

  describe(graph: TaskGraph): string {
    return describeGraph(graph);
  }

  private async executeTask(task: Task, inputs: NamedInputs, opts: ExecutionOptions): Promise<unknown> {
    const start = Date.now();
    callHook("onTaskStart", () => opts.onTaskStart?.(task.id));
    log.info(`Executing task "${task.id}"`);

    let outcome: TaskOutcome;
    try {
      const result = await task.operation(task.args, inputs);
      outcome = { status: "completed", result, durationMs: Date.now() - start };
      log.info(`Task completed: "${task.id}"`, { durationMs: outcome.durationMs });
    } catch (err) {
      outcome = { status: "failed", error: err, durationMs: Date.now() - start };
      log.error(`Error executing task "${task.id}"`, { error: errorMessage(err) });
    }

    callHook("onTaskEnd", () => opts.onTaskEnd?.(task.id, outcome));
    if (outcome.status === "failed") throw outcome.error;
    return outcome.result;
  }
}
