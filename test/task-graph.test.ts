import { describe, expect, it } from "vitest";
import { ConfigurationError, DependencyError } from "../src/errors.js";
import {
  TaskGraph,
  dependentsOf,
  describeGraph,
  planRounds,
  readyTasks,
  unknownDependencies,
  validate,
} from "../src/graph/task-graph.js";

const noop = async () => "ok";

function graphOf(...tasks: Array<[string, string[]]>): TaskGraph {
  const graph = new TaskGraph();
  for (const [id, dependsOn] of tasks) graph.add({ id, dependsOn, operation: noop });
  return graph;
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("TaskGraph", () => {
  it("keeps tasks in declaration order with defaults filled in", () => {
    const graph = new TaskGraph()
      .add({ id: "b", operation: noop })
      .add({ id: "a", dependsOn: ["b"], args: [1, 2], namedInputs: { mode: "fast" }, operation: noop });

    expect(graph.ids()).toEqual(["b", "a"]);
    expect(graph.size).toBe(2);
    expect(graph.get("b")?.dependsOn).toEqual([]);
    expect(graph.get("b")?.args).toEqual([]);
    expect(graph.get("a")?.args).toEqual([1, 2]);
    expect(graph.get("a")?.namedInputs).toEqual({ mode: "fast" });
  });

  it("accepts dependencies declared later", () => {
    const graph = new TaskGraph().add({ id: "b", dependsOn: ["a"], operation: noop });
    expect(graph.has("a")).toBe(false);
    graph.add({ id: "a", operation: noop });
    expect(() => validate(graph)).not.toThrow();
  });

  it("collapses repeated dependency ids", () => {
    const graph = graphOf(["a", []], ["b", ["a", "a"]]);
    expect(graph.get("b")?.dependsOn).toEqual(["a"]);
  });

  it("rejects a self-dependency", () => {
    const err = caught(() => graphOf(["a", ["a"]]));
    expect(err).toBeInstanceOf(DependencyError);
    expect(err).toHaveProperty("code", "SELF_DEPENDENCY");
    expect(err).toHaveProperty("message", 'Task "a" depends on itself');
  });

  it("rejects a duplicate id", () => {
    const err = caught(() => graphOf(["a", []], ["a", []]));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toHaveProperty("code", "DUPLICATE_TASK");
  });
});

describe("readyTasks", () => {
  it("returns tasks whose dependencies are all completed", () => {
    const graph = graphOf(["a", []], ["b", ["a"]], ["c", ["b"]]);
    expect(readyTasks(graph, new Set(["a"])).map((t) => t.id)).toEqual(["b"]);
  });

  it("returns independent tasks in declaration order", () => {
    const graph = graphOf(["a", []], ["b", []], ["c", ["a", "b"]]);
    expect(readyTasks(graph, new Set()).map((t) => t.id)).toEqual(["a", "b"]);
  });

  it("never returns completed tasks", () => {
    const graph = graphOf(["a", []], ["b", []]);
    expect(readyTasks(graph, new Set(["a", "b"]))).toEqual([]);
  });
});

describe("dependentsOf", () => {
  it("lists direct consumers only", () => {
    const graph = graphOf(["a", []], ["b", ["a"]], ["c", ["b"]], ["d", ["a"]]);
    expect(dependentsOf(graph, "a").map((t) => t.id)).toEqual(["b", "d"]);
  });
});

describe("validate", () => {
  it("reports undeclared dependencies", () => {
    const graph = graphOf(["a", ["ghost"]], ["b", ["a", "phantom"]]);
    expect(unknownDependencies(graph)).toEqual(["ghost", "phantom"]);

    const err = caught(() => validate(graph));
    expect(err).toBeInstanceOf(DependencyError);
    expect(err).toHaveProperty("code", "UNKNOWN_DEPENDENCY");
    expect(err).toHaveProperty("message", 'Tasks depend on undeclared tasks: "ghost", "phantom"');
  });

  it("reports a cycle with everything stuck behind it", () => {
    const graph = graphOf(["a", ["b"]], ["b", ["a"]], ["c", ["a"]], ["d", []]);

    const err = caught(() => validate(graph));
    expect(err).toBeInstanceOf(DependencyError);
    expect(err).toHaveProperty("code", "CYCLE");
    expect(err).toHaveProperty("taskIds", ["a", "b", "c"]);
  });

  it("accepts a DAG", () => {
    const graph = graphOf(["a", []], ["b", ["a"]], ["c", ["a"]], ["d", ["b", "c"]]);
    expect(() => validate(graph)).not.toThrow();
  });
});

describe("planRounds", () => {
  const graph = graphOf(["a", []], ["b", []], ["c", ["a", "b"]], ["d", ["c"]], ["e", []]);

  it("groups ready tasks up to the concurrency limit", () => {
    expect(planRounds(graph, 2)).toEqual([["a", "b"], ["c", "e"], ["d"]]);
  });

  it("runs everything ready at once when the limit allows", () => {
    expect(planRounds(graph, 10)).toEqual([["a", "b", "e"], ["c"], ["d"]]);
  });

  it("fails on a deadlock like a run would", () => {
    const cyclic = graphOf(["x", ["y"]], ["y", ["x"]]);
    const err = caught(() => planRounds(cyclic, 2));
    expect(err).toBeInstanceOf(DependencyError);
    expect(err).toHaveProperty("code", "DEADLOCK");
  });

  it("rejects a concurrency below one", () => {
    const err = caught(() => planRounds(graph, 0));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toHaveProperty("code", "INVALID_CONCURRENCY");
  });
});

describe("describeGraph", () => {
  it("renders consumers under their dependencies, each task once", () => {
    const graph = graphOf(["a", []], ["b", []], ["c", ["a", "b"]], ["d", ["a"]], ["e", ["c"]]);

    expect(describeGraph(graph)).toBe(
      ["Dependency Graph:", "└─ a", "  └─ c", "    └─ e", "  └─ d", "└─ b"].join("\n"),
    );
  });

  it("prints only the header when no task is a root", () => {
    expect(describeGraph(graphOf(["x", ["y"]], ["y", ["x"]]))).toBe("Dependency Graph:");
  });

  it("handles long chains without recursion", () => {
    const graph = new TaskGraph();
    for (let i = 0; i < 2_000; i++) {
      graph.add({ id: `t${i}`, dependsOn: i === 0 ? [] : [`t${i - 1}`], operation: noop });
    }
    const lines = describeGraph(graph).split("\n");
    expect(lines).toHaveLength(2_001);
    expect(lines[2_000]).toBe(`${"  ".repeat(1_999)}└─ t1999`);
  });
});
