#!/usr/bin/env node

import { Command } from "commander";
import { getConfig } from "./config.js";
import { errorMessage, UserInterruptError } from "./errors.js";
import { GraphExecutor } from "./executor/executor.js";
import { describeGraph, planRounds, validate } from "./graph/task-graph.js";
import { ErrorHandler } from "./handling/error-handler.js";
import { reportFailure } from "./handling/report.js";
import { setLogLevel } from "./utils/logger.js";
import { retryPolicyFor } from "./utils/retry.js";
import { UsageTracker } from "./utils/usage.js";
import { buildGraph, loadWorkflow } from "./workflow/loader.js";

const errors = new ErrorHandler();

process.on("SIGINT", () => {
  errors.handle(new UserInterruptError());
});

const program = new Command();

program
  .name("taskweave")
  .description("Run dependency graphs of shell tasks with bounded parallelism")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--quiet", "Only log errors");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<{ debug?: boolean; quiet?: boolean }>();
  if (opts.debug) setLogLevel("debug");
  else if (opts.quiet) setLogLevel("error");
});

// --- run ---
program
  .command("run")
  .description("Execute every task of a workflow file")
  .argument("<file>", "Workflow JSON file")
  .option("-c, --concurrency <n>", "Max parallel tasks", String(getConfig().limits.maxConcurrent))
  .option("-r, --retries <n>", "Retries per task on timeouts", "0")
  .action(async (file: string, opts: { concurrency: string; retries: string }) => {
    try {
      const usage = new UsageTracker();
      const retry = retryPolicyFor(opts.retries);
      const graph = buildGraph(await loadWorkflow(file), { usage, retry });
      validate(graph);

      const start = Date.now();
      const maxOutput = getConfig().commands.outputTruncation;
      const results = await new GraphExecutor().run(graph, {
        maxConcurrent: Number(opts.concurrency),
        onRoundStart: (round, ids) => console.log(`\n  Round ${round}: ${ids.join(", ")}`),
        onTaskEnd: (id, outcome) => {
          const line = outcome.status === "completed" ? String(outcome.result) : errorMessage(outcome.error);
          const icon = outcome.status === "completed" ? "+" : "x";
          console.log(`    [${icon}] ${id} (${outcome.durationMs}ms): ${line.slice(0, maxOutput) || "—"}`);
        },
      });

      const stats = usage.snapshot();
      console.log(
        `\nCompleted ${results.size} task(s) in ${Date.now() - start}ms (${stats.requests} command(s), ${stats.totalTokens} output words)`,
      );
    } catch (err) {
      process.exitCode = reportFailure(err, errors);
    }
  });

// --- plan ---
program
  .command("plan")
  .description("Show the rounds a run would execute, without running anything")
  .argument("<file>", "Workflow JSON file")
  .option("-c, --concurrency <n>", "Max parallel tasks", String(getConfig().limits.maxConcurrent))
  .action(async (file: string, opts: { concurrency: string }) => {
    try {
      const graph = buildGraph(await loadWorkflow(file));
      const rounds = planRounds(graph, Number(opts.concurrency));
      rounds.forEach((ids, i) => console.log(`Round ${i + 1}: ${ids.join(", ")}`));
    } catch (err) {
      process.exitCode = reportFailure(err, errors);
    }
  });

// --- describe ---
program
  .command("describe")
  .description("Print the dependency tree of a workflow file")
  .argument("<file>", "Workflow JSON file")
  .action(async (file: string) => {
    try {
      console.log(describeGraph(buildGraph(await loadWorkflow(file))));
    } catch (err) {
      process.exitCode = reportFailure(err, errors);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
