import { afterEach, describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import { FunctionOracle } from "../src/oracle/function-oracle.js";
import { RunStore } from "../src/persistence/store.js";
import { TableQaPipeline } from "../src/pipeline.js";
import type { Question } from "../src/planner/types.js";
import { cityTable } from "./helpers.js";

const question: Question = { text: "Which city has a larger population, Paris or Berlin?", table: cityTable };

const comparisonPlan = JSON.stringify({
  strategy: "comparison",
  subtasks: [
    { id: "paris", description: "Population of Paris", task_type: "independent", dependencies: [] },
    { id: "berlin", description: "Population of Berlin", task_type: "independent", dependencies: [] },
    { id: "cmp", description: "Pick the larger city", task_type: "compare", dependencies: ["paris", "berlin"] },
  ],
});

const cyclicPlan = JSON.stringify({
  subtasks: [
    { id: "a", description: "Population of Paris", task_type: "bridge", dependencies: ["b"] },
    { id: "b", description: "Population of Berlin", task_type: "bridge", dependencies: ["a"] },
  ],
});

type Script = {
  plans: string[];
  answers?: Record<string, string>;
};

/** Answers decomposition prompts from a queue of plans and subtask prompts by description. */
function scriptedOracle(script: Script): { oracle: FunctionOracle; subtaskCalls: string[] } {
  const plans = [...script.plans];
  const answers: Record<string, string> = {
    "Population of Paris": "2100000",
    "Population of Berlin": "3600000",
    "Pick the larger city": "<answer>Berlin</answer>",
    ...script.answers,
  };
  const subtaskCalls: string[] = [];
  const oracle = new FunctionOracle({
    name: "scripted",
    timeout: 1000,
    fn: async (prompt) => {
      if (prompt.includes("Break the question into small subtasks")) {
        return plans.length > 1 ? (plans.shift() ?? "") : (plans[0] ?? "");
      }
      const description = prompt.match(/^Task: (.+)$/m)?.[1] ?? "";
      subtaskCalls.push(description);
      const reply = answers[description];
      if (reply === undefined || reply === "FAIL") throw new Error(`no answer for ${description}`);
      return reply;
    },
  });
  return { oracle, subtaskCalls };
}

function pipelineFor(script: Script, store?: RunStore) {
  const { oracle, subtaskCalls } = scriptedOracle(script);
  return { pipeline: new TableQaPipeline({ oracle, store, retry: { maxAttempts: 1 } }), subtaskCalls };
}

describe("TableQaPipeline", () => {
  let store: RunStore | undefined;

  afterEach(() => {
    store?.close();
    store = undefined;
  });

  it("answers a comparison question end to end", async () => {
    const { pipeline, subtaskCalls } = pipelineFor({ plans: [comparisonPlan] });

    const run = await pipeline.answer(question);

    expect(run.status).toBe("answered");
    expect(run.strategy).toBe("comparison");
    expect(run.decomposeAttempts).toBe(1);
    expect(run.answer?.text).toBe("<answer>Berlin</answer>");
    expect(run.answer?.warning).toBe(false);
    expect(run.order).toEqual(["paris", "berlin", "cmp"]);
    expect(subtaskCalls).toEqual(["Population of Paris", "Population of Berlin", "Pick the larger city"]);
    expect(run.finishedAt).toBeGreaterThanOrEqual(run.startedAt);
  });

  it("re-decomposes when the first graph is invalid", async () => {
    const { pipeline } = pipelineFor({ plans: [cyclicPlan, comparisonPlan] });

    const run = await pipeline.answer(question);

    expect(run.decomposeAttempts).toBe(2);
    expect(run.status).toBe("answered");
    expect(run.report?.isValid).toBe(true);
  });

  it("gives up with an invalid run when every graph is invalid", async () => {
    const { pipeline, subtaskCalls } = pipelineFor({ plans: [cyclicPlan] });

    const run = await pipeline.answer(question, { maxDecomposeAttempts: 3 });

    expect(run.status).toBe("invalid");
    expect(run.decomposeAttempts).toBe(3);
    expect(run.error).toBe("Subtask graph is invalid: Dependency cycle: a -> b -> a");
    expect(run.answer).toBeUndefined();
    expect(subtaskCalls).toEqual([]);
  });

  it("returns a partial run when a branch fails", async () => {
    const { pipeline } = pipelineFor({ plans: [comparisonPlan], answers: { "Population of Berlin": "FAIL" } });

    const run = await pipeline.answer(question);

    expect(run.status).toBe("partial");
    expect(run.failures.map((f) => f.id)).toEqual(["berlin"]);
    expect(run.skipped).toEqual(["cmp"]);
    expect(Object.keys(run.context)).toEqual(["paris"]);
    expect(run.answer?.text).toBe("<answer></answer>");
    expect(run.answer?.warning).toBe(true);
  });

  it("reports a malformed decomposition as an error run", async () => {
    const { pipeline } = pipelineFor({ plans: ['{"steps": []}'] });
    const errors: string[] = [];

    const run = await pipeline.answer(question, {}, { onError: (e) => errors.push(e) });

    expect(run.status).toBe("error");
    expect(run.error).toBe('Decomposer response has no "subtasks" array');
    expect(errors).toEqual([run.error]);
  });

  it("cancels when the caller aborts", async () => {
    const { pipeline, subtaskCalls } = pipelineFor({ plans: [comparisonPlan] });
    const controller = new AbortController();
    controller.abort();

    const run = await pipeline.answer(question, { abortSignal: controller.signal });

    expect(run.status).toBe("cancelled");
    expect(run.error).toBe("Run aborted by caller");
    expect(run.skipped).toEqual(["paris", "berlin", "cmp"]);
    expect(subtaskCalls).toEqual([]);
  });

  it("uses a forced strategy and reports progress through callbacks", async () => {
    const { pipeline } = pipelineFor({ plans: [comparisonPlan] });
    const events: string[] = [];

    await pipeline.answer(
      question,
      { strategy: "aggregation", maxConcurrency: 1 },
      {
        onStrategy: (s) => events.push(`strategy:${s}`),
        onPlan: (graph) => events.push(`plan:${graph.tasks.length}`),
        onTaskEnd: (id, status) => events.push(`${status}:${id}`),
        onFinish: (run) => events.push(`finish:${run.status}`),
      },
    );

    expect(events).toEqual([
      "strategy:aggregation",
      "plan:3",
      "succeeded:paris",
      "succeeded:berlin",
      "succeeded:cmp",
      "finish:answered",
    ]);
  });

  it("persists the finished run", async () => {
    store = await RunStore.open(":memory:");
    const { pipeline } = pipelineFor({ plans: [comparisonPlan] }, store);

    const run = await pipeline.answer(question);
    const stored = await store.get(run.runId);

    expect(stored?.status).toBe("answered");
    expect(stored?.strategy).toBe("comparison");
    expect(stored?.answer).toBe("<answer>Berlin</answer>");
    expect(stored?.tasks.map((t) => [t.id, t.status, t.output])).toEqual([
      ["paris", "succeeded", "2100000"],
      ["berlin", "succeeded", "3600000"],
      ["cmp", "succeeded", "Berlin"],
    ]);
  });

  it("plans without executing", async () => {
    const { pipeline, subtaskCalls } = pipelineFor({ plans: [comparisonPlan] });

    const plan = await pipeline.plan(question);

    expect(plan.strategy).toBe("comparison");
    expect(plan.attempts).toBe(1);
    expect(plan.report).toEqual({ isValid: true, issues: [] });
    expect(plan.graph.tasks.every((t) => t.status === "pending")).toBe(true);
    expect(subtaskCalls).toEqual([]);
  });

  it("rejects a question without text", async () => {
    const { pipeline } = pipelineFor({ plans: [comparisonPlan] });
    await expect(pipeline.answer({ text: "   ", table: cityTable })).rejects.toThrow(ValidationError);
  });

  it("rejects a ragged table", async () => {
    const { pipeline } = pipelineFor({ plans: [comparisonPlan] });
    const table = { columns: ["a", "b"], rows: [["x"]] };
    await expect(pipeline.answer({ text: "How many rows?", table })).rejects.toThrow("Row 0 has 1 cells, expected 2");
  });
});
