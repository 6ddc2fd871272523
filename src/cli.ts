#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { computeAccuracy } from "./answer/comparator.js";
import { getConfig, loadConfigFile } from "./config.js";
import { ValidationError, errorMessage } from "./errors.js";
import { HttpOracle } from "./oracle/http-oracle.js";
import { RunStore } from "./persistence/store.js";
import { TableQaPipeline, type PipelineRun } from "./pipeline.js";
import { STRATEGY_NAMES, type Strategy, type Table } from "./planner/types.js";
import { RetrievalFusion } from "./retrieval/fusion.js";
import { ToolRegistry } from "./retrieval/registry.js";
import { Bm25Tool } from "./retrieval/tools/bm25.js";
import { DenseTool } from "./retrieval/tools/dense.js";
import { KeywordTool } from "./retrieval/tools/keyword.js";
import { EvalSampleSchema, TableSchema, parseOrThrow } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

const program = new Command();

program
  .name("tableqa")
  .description("Answer questions over tables by decomposing them into dependent subtasks")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--config <file>", "JSON config file merged over the defaults");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
  if (typeof opts.config === "string") loadConfigFile(opts.config);
});

type OracleFlags = { oracleUrl?: string; model?: string; apiKey?: string };
type RunFlags = OracleFlags & {
  table: string;
  strategy?: string;
  concurrency?: string;
  maxFailures?: string;
  store?: boolean;
  json?: boolean;
};

function withOracleFlags(cmd: Command): Command {
  return cmd
    .option("-u, --oracle-url <url>", "OpenAI-compatible base URL (default: config oracle.url)")
    .option("-m, --model <name>", "Model name sent to the oracle")
    .option("-k, --api-key <key>", "Bearer token for the oracle");
}

function readTable(path: string): Table {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ValidationError("VALIDATION_FAILED", `Could not read table file ${path}: ${errorMessage(err)}`);
  }
  return parseOrThrow(TableSchema, raw, "table");
}

function parseStrategy(value: string | undefined): Strategy | undefined {
  if (value === undefined) return undefined;
  const found = STRATEGY_NAMES.find((s) => s === value);
  if (!found) {
    throw new ValidationError("VALIDATION_FAILED", `Unknown strategy "${value}" (expected ${STRATEGY_NAMES.join(", ")})`);
  }
  return found;
}

function optionalNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError("VALIDATION_FAILED", `${flag} must be a non-negative integer, got "${value}"`);
  }
  return n;
}

function buildTools(): ToolRegistry {
  const tools = new ToolRegistry();
  tools.add(new KeywordTool());
  tools.add(new DenseTool());
  tools.add(new Bm25Tool());
  return tools;
}

async function buildPipeline(opts: OracleFlags & { store?: boolean }): Promise<{ pipeline: TableQaPipeline; store?: RunStore }> {
  const url = opts.oracleUrl ?? getConfig().oracle.url;
  if (!url) {
    throw new ValidationError("VALIDATION_FAILED", "No oracle configured. Pass --oracle-url or set oracle.url in the config file.");
  }
  const oracle = new HttpOracle({ name: "oracle", url, model: opts.model, apiKey: opts.apiKey });
  const store = opts.store === false ? undefined : await RunStore.open(getConfig().store.path);
  const pipeline = new TableQaPipeline({ oracle, fusion: new RetrievalFusion(buildTools()), store });
  return { pipeline, store };
}

function printRun(run: PipelineRun): void {
  console.log(`\nStrategy: ${run.strategy ?? "(none)"}`);
  for (const task of run.graph?.tasks ?? []) {
    const deps = task.dependencies.length > 0 ? ` <- ${task.dependencies.join(", ")}` : "";
    const detail = task.result?.output ?? task.error ?? "";
    console.log(`  [${task.status}] ${task.id} (${task.taskType})${deps}: ${detail.slice(0, 200)}`);
  }
  for (const issue of run.report?.issues ?? []) {
    console.log(`  ${issue.severity}: ${issue.message}`);
  }
  console.log("\n--- Answer ---");
  console.log(run.answer?.text ?? "(none)");
  const durationMs = (run.finishedAt ?? Date.now()) - run.startedAt;
  console.log(`\n${run.status} in ${durationMs}ms${run.error ? ` (${run.error})` : ""}`);
}

// --- ask ---
withOracleFlags(
  program
    .command("ask")
    .description("Answer a question about a table")
    .argument("<question>", "The question to answer")
    .requiredOption("-t, --table <file>", "JSON file with { columns, rows }")
    .option("-s, --strategy <name>", `Force a strategy (${STRATEGY_NAMES.join(", ")})`)
    .option("-c, --concurrency <n>", "Max parallel subtasks")
    .option("--max-failures <n>", "Cancel the run once more subtasks fail")
    .option("--no-store", "Do not record the run")
    .option("--json", "Print the full run as JSON"),
).action(async (question: string, opts: RunFlags) => {
  const { pipeline, store } = await buildPipeline(opts);
  try {
    const run = await pipeline.answer(
      { text: question, table: readTable(opts.table) },
      {
        strategy: parseStrategy(opts.strategy),
        maxConcurrency: optionalNumber(opts.concurrency, "--concurrency"),
        maxFailures: optionalNumber(opts.maxFailures, "--max-failures"),
      },
    );
    if (opts.json) {
      console.log(JSON.stringify(run, null, 2));
    } else {
      printRun(run);
    }
    if (run.status === "error" || run.status === "invalid") process.exitCode = 1;
  } finally {
    store?.close();
  }
});

// --- plan ---
withOracleFlags(
  program
    .command("plan")
    .description("Show the subtask graph for a question without executing it (dry-run)")
    .argument("<question>", "The question to decompose")
    .requiredOption("-t, --table <file>", "JSON file with { columns, rows }")
    .option("-s, --strategy <name>", "Force a strategy"),
).action(async (question: string, opts: RunFlags) => {
  const { pipeline } = await buildPipeline({ ...opts, store: false });
  const plan = await pipeline.plan(
    { text: question, table: readTable(opts.table) },
    { strategy: parseStrategy(opts.strategy) },
  );
  console.log(JSON.stringify(plan, null, 2));
  if (!plan.report.isValid) process.exitCode = 1;
});

// --- eval ---
withOracleFlags(
  program
    .command("eval")
    .description("Run a dataset of { question, table, answer } samples and report exact-match accuracy")
    .argument("<file>", "JSON array of samples")
    .option("-l, --limit <n>", "Only run the first n samples")
    .option("-c, --concurrency <n>", "Max parallel subtasks per sample"),
).action(async (file: string, opts: OracleFlags & { limit?: string; concurrency?: string }) => {
  const samples = parseOrThrow(z.array(EvalSampleSchema), JSON.parse(readFileSync(file, "utf8")), "dataset");
  const limit = optionalNumber(opts.limit, "--limit") ?? samples.length;
  const { pipeline } = await buildPipeline({ ...opts, store: false });

  const selected = samples.slice(0, limit);
  const predictions: string[] = [];
  for (const [i, sample] of selected.entries()) {
    const run = await pipeline.answer(
      { text: sample.question, table: sample.table },
      { maxConcurrency: optionalNumber(opts.concurrency, "--concurrency") },
    );
    const prediction = run.answer?.text ?? "";
    predictions.push(prediction);
    console.error(`[${i + 1}/${selected.length}] ${sample.id ?? i} ${run.status}: ${prediction}`);
  }

  const report = computeAccuracy(predictions, selected.map((s) => s.answer));
  console.log(JSON.stringify(report, null, 2));
});

// --- tools ---
program
  .command("tools")
  .description("List retrieval tools and their fusion weights")
  .action(() => {
    const fusion = new RetrievalFusion(buildTools());
    const enabled = new Set(getConfig().retrieval.tools);
    for (const tool of buildTools().list()) {
      const mark = enabled.has(tool.name) ? "*" : " ";
      console.log(`${mark} ${tool.name} (weight ${fusion.weightOf(tool.name)})${tool.description ? `: ${tool.description}` : ""}`);
    }
  });

// --- runs ---
const runs = program.command("runs").description("Inspect recorded runs");

runs
  .command("list")
  .description("List recent runs")
  .option("-n, --limit <n>", "How many runs", "20")
  .action(async (opts: { limit: string }) => {
    const store = await RunStore.open(getConfig().store.path);
    try {
      for (const run of await store.list(optionalNumber(opts.limit, "--limit"))) {
        const started = new Date(run.startedAt).toISOString();
        console.log(`${run.runId}  ${started}  ${run.status.padEnd(9)}  ${run.question.slice(0, 60)}`);
      }
    } finally {
      store.close();
    }
  });

runs
  .command("show")
  .description("Print one run as JSON")
  .argument("<runId>")
  .action(async (runId: string) => {
    const store = await RunStore.open(getConfig().store.path);
    try {
      const run = await store.get(runId);
      if (!run) {
        console.error(`Run not found: ${runId}`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(run, null, 2));
    } finally {
      store.close();
    }
  });

runs
  .command("clear")
  .description("Delete recorded runs")
  .option("--older-than <days>", "Only delete runs older than this many days")
  .action(async (opts: { olderThan?: string }) => {
    const store = await RunStore.open(getConfig().store.path);
    try {
      const days = optionalNumber(opts.olderThan, "--older-than");
      const deleted = days === undefined ? await store.deleteAll() : await store.deleteOlderThan(Date.now() - days * 86_400_000);
      console.log(`Deleted ${deleted} run(s)`);
    } finally {
      store.close();
    }
  });

(async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
})();
