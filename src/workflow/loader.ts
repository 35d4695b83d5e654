import { readFile } from "node:fs/promises";
import { ConfigurationError, errorMessage } from "../errors.js";
import { TaskGraph } from "../graph/task-graph.js";
import { parseOrThrow, WorkflowFileSchema, type WorkflowFile } from "../schemas.js";
import type { RetryPolicy } from "../utils/retry.js";
import type { UsageTracker } from "../utils/usage.js";
import { commandOperation } from "./command-operation.js";

export type BuildGraphOptions = {
  usage?: UsageTracker;
  /** Every command is wrapped in this policy when given. */
  retry?: RetryPolicy;
};

export function parseWorkflow(raw: unknown): WorkflowFile {
  return parseOrThrow(WorkflowFileSchema, raw, "INVALID_WORKFLOW");
}

export async function loadWorkflow(path: string): Promise<WorkflowFile> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError("INVALID_WORKFLOW", `Cannot read workflow file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError("INVALID_WORKFLOW", `Workflow file ${path} is not valid JSON`, { cause: err });
  }
  return parseWorkflow(raw);
}

export function buildGraph(workflow: WorkflowFile, opts?: BuildGraphOptions): TaskGraph {
  const graph = new TaskGraph();
  for (const task of workflow.tasks) {
    const op = commandOperation({
      command: task.command,
      env: task.env,
      timeoutMs: task.timeoutMs,
      usage: opts?.usage,
    });
    graph.add({
      id: task.id,
      dependsOn: task.dependsOn,
      operation: opts?.retry ? opts.retry.wrap(op, task.id) : op,
    });
  }
  return graph;
}
