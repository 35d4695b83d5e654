import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { planRounds } from "../src/graph/task-graph.js";
import { buildGraph, loadWorkflow, parseWorkflow } from "../src/workflow/loader.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (err: unknown) => err,
  );
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("parseWorkflow", () => {
  it("fills in defaults", () => {
    const wf = parseWorkflow({ tasks: [{ id: "a", command: "true" }] });
    expect(wf.tasks[0]).toEqual({ id: "a", command: "true", dependsOn: [], env: {} });
  });

  it("rejects an empty task list", () => {
    const err = caught(() => parseWorkflow({ tasks: [] }));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toHaveProperty("code", "INVALID_WORKFLOW");
    expect(err).toHaveProperty("message", "tasks: Workflow must declare at least one task");
  });

  it("rejects ids the environment mapping cannot carry", () => {
    const err = caught(() => parseWorkflow({ tasks: [{ id: "two words", command: "true" }] }));
    expect(err).toHaveProperty(
      "message",
      "tasks.0.id: Task id may only contain letters, digits, '.', '_' and '-'",
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseWorkflow({ tasks: [{ id: "a", command: "true", priority: 1 }] })).toThrow(ConfigurationError);
  });
});

describe("loadWorkflow", () => {
  it("reads and validates a workflow file", async () => {
    const wf = await loadWorkflow(fixture("pipeline.json"));

    expect(wf.tasks.map((t) => t.id)).toEqual(["fetch", "parse", "lint", "report"]);
    expect(wf.tasks[2].timeoutMs).toBe(5000);
    expect(wf.tasks[3].env).toEqual({ REPORT_MODE: "short" });
  });

  it("reports malformed JSON as a configuration problem", async () => {
    const err = await rejection(loadWorkflow(fixture("broken.json")));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toHaveProperty("message", `Workflow file ${fixture("broken.json")} is not valid JSON`);
  });

  it("reports a missing file as a configuration problem", async () => {
    const err = await rejection(loadWorkflow(fixture("missing.json")));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toHaveProperty("code", "INVALID_WORKFLOW");
  });
});

describe("buildGraph", () => {
  it("declares one task per workflow entry with its dependencies", async () => {
    const graph = buildGraph(await loadWorkflow(fixture("pipeline.json")));

    expect(graph.ids()).toEqual(["fetch", "parse", "lint", "report"]);
    expect(graph.get("report")?.dependsOn).toEqual(["parse", "lint"]);
    expect(planRounds(graph, 2)).toEqual([["fetch"], ["parse", "lint"], ["report"]]);
  });

  it("rejects duplicate ids", () => {
    const wf = parseWorkflow({
      tasks: [
        { id: "a", command: "true" },
        { id: "a", command: "false" },
      ],
    });
    expect(() => buildGraph(wf)).toThrow('Task "a" already declared');
  });
});
