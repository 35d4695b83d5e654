import type { TaskStatus } from "../graph/types.js";

export type TaskOutcome =
  | { status: Extract<TaskStatus, "completed">; result: unknown; durationMs: number }
  | { status: Extract<TaskStatus, "failed">; error: unknown; durationMs: number };

export type ExecutionOptions = {
  maxConcurrent?: number;
  onRoundStart?: (round: number, taskIds: string[]) => void;
  onTaskStart?: (taskId: string) => void;
  onTaskEnd?: (taskId: string, outcome: TaskOutcome) => void;
};
