import { ConcurrencySchema, parseOrThrow } from "../schemas.js";
import { ConfigurationError, DependencyError } from "../errors.js";
import type { Task, TaskDefinition } from "./types.js";

/**
 * Holds declared tasks in insertion order. Dependencies may name tasks that are
 * added later; they only have to exist by the time the graph runs.
 */
export class TaskGraph {
  private tasks = new Map<string, Task>();

  add<R>(def: TaskDefinition<R>): this {
    if (this.tasks.has(def.id)) {
      throw new ConfigurationError("DUPLICATE_TASK", `Task "${def.id}" already declared`);
    }
    const dependsOn = [...new Set(def.dependsOn ?? [])];
    if (dependsOn.includes(def.id)) {
      throw new DependencyError("SELF_DEPENDENCY", `Task "${def.id}" depends on itself`, [def.id]);
    }
    this.tasks.set(def.id, {
      id: def.id,
      dependsOn,
      operation: def.operation,
      args: [...(def.args ?? [])],
      namedInputs: { ...def.namedInputs },
    });
    return this;
  }

  get(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  list(): Task[] {
    return [...this.tasks.values()];
  }

  ids(): string[] {
    return [...this.tasks.keys()];
  }

  get size(): number {
    return this.tasks.size;
  }
}

/** Tasks not yet completed whose every dependency is completed, in declaration order. */
export function readyTasks(graph: TaskGraph, completed: ReadonlySet<string>): Task[] {
  return graph.list().filter(
    (t) => !completed.has(t.id) && t.dependsOn.every((d) => completed.has(d)),
  );
}

/** Direct consumers of `id`: tasks that list it as a dependency. */
export function dependentsOf(graph: TaskGraph, id: string): Task[] {
  return graph.list().filter((t) => t.dependsOn.includes(id));
}

/** Dependency ids referenced by some task but never declared. */
export function unknownDependencies(graph: TaskGraph, tasks: Task[] = graph.list()): string[] {
  const missing = new Set<string>();
  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      if (!graph.has(dep)) missing.add(dep);
    }
  }
  return [...missing];
}

/**
 * The error a run raises when nothing is ready but tasks remain. Unknown ids
 * are reported in preference to a plain deadlock since they are the likelier cause.
 */
export function stuckError(graph: TaskGraph, completed: ReadonlySet<string>): DependencyError {
  const blocked = graph.list().filter((t) => !completed.has(t.id));
  const missing = unknownDependencies(graph, blocked);
  if (missing.length > 0) {
    return new DependencyError(
      "UNKNOWN_DEPENDENCY",
      `Tasks depend on undeclared tasks: ${missing.map((m) => `"${m}"`).join(", ")}`,
      missing,
    );
  }
  const ids = blocked.map((t) => t.id);
  return new DependencyError(
    "DEADLOCK",
    `Deadlock detected in dependency graph: no ready tasks among ${ids.map((i) => `"${i}"`).join(", ")}`,
    ids,
  );
}

/** Eager check for unknown dependencies and cycles. Running a graph does not require it. */
export function validate(graph: TaskGraph): void {
  const missing = unknownDependencies(graph);
  if (missing.length > 0) {
    throw new DependencyError(
      "UNKNOWN_DEPENDENCY",
      `Tasks depend on undeclared tasks: ${missing.map((m) => `"${m}"`).join(", ")}`,
      missing,
    );
  }

  // Kahn's algorithm: whatever never reaches in-degree 0 sits on or behind a cycle.
  const indegree = new Map(graph.list().map((t) => [t.id, t.dependsOn.length]));
  const queue = graph.ids().filter((id) => indegree.get(id) === 0);
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    for (const next of dependentsOf(graph, id)) {
      const remaining = (indegree.get(next.id) ?? 0) - 1;
      indegree.set(next.id, remaining);
      if (remaining === 0) queue.push(next.id);
    }
  }

  const cyclic = graph.ids().filter((id) => (indegree.get(id) ?? 0) > 0);
  if (cyclic.length > 0) {
    throw new DependencyError(
      "CYCLE",
      `Task graph contains a cycle through: ${cyclic.map((c) => `"${c}"`).join(", ")}`,
      cyclic,
    );
  }
}

/**
 * Dry run of the scheduler assuming every task succeeds: the ids launched in
 * each round. Fails exactly where `GraphExecutor.run` would.
 */
export function planRounds(graph: TaskGraph, maxConcurrent: number): string[][] {
  parseOrThrow(ConcurrencySchema, maxConcurrent, "INVALID_CONCURRENCY");
  const completed = new Set<string>();
  const rounds: string[][] = [];

  while (completed.size < graph.size) {
    const ready = readyTasks(graph, completed);
    if (ready.length === 0) throw stuckError(graph, completed);
    const batch = ready.slice(0, maxConcurrent).map((t) => t.id);
    rounds.push(batch);
    for (const id of batch) completed.add(id);
  }

  return rounds;
}

/**
 * Render the consumer view of the graph: roots are tasks without dependencies,
 * children are the tasks that depend on them. Each task is printed once.
 */
export function describeGraph(graph: TaskGraph): string {
  const lines = ["Dependency Graph:"];
  const visited = new Set<string>();
  const roots = graph.list().filter((t) => t.dependsOn.length === 0);

  // Pushed in reverse so pops come out in declaration order.
  const stack: Array<{ id: string; depth: number }> = roots
    .map((t) => ({ id: t.id, depth: 0 }))
    .reverse();

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry || visited.has(entry.id)) continue;
    visited.add(entry.id);
    lines.push(`${"  ".repeat(entry.depth)}└─ ${entry.id}`);

    const children = dependentsOf(graph, entry.id);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ id: children[i].id, depth: entry.depth + 1 });
    }
  }

  return lines.join("\n");
}
