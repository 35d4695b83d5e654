export type NamedInputs = Record<string, unknown>;

/**
 * The injected work behind a task. Receives the task's positional args and its
 * effective named inputs (declared inputs plus `<dep>_result` entries).
 * May return a value or a promise.
 */
export type TaskOperation<R = unknown> = (args: readonly unknown[], inputs: NamedInputs) => R | Promise<R>;

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export type Task<R = unknown> = {
  readonly id: string;
  readonly dependsOn: readonly string[];
  readonly operation: TaskOperation<R>;
  readonly args: readonly unknown[];
  readonly namedInputs: Readonly<NamedInputs>;
};

export type TaskDefinition<R = unknown> = {
  id: string;
  operation: TaskOperation<R>;
  dependsOn?: string[];
  args?: unknown[];
  namedInputs?: NamedInputs;
};

/** Completed task id → result. Built fresh by every run. */
export type ResultStore = Map<string, unknown>;
