import { FunctionOracle } from "../src/oracle/function-oracle.js";
import { createSubtaskGraph } from "../src/planner/task-graph.js";
import type { Strategy, SubtaskGraph, SubtaskDraft, Table, TaskType } from "../src/planner/types.js";

export const cityTable: Table = {
  columns: ["city", "country", "population"],
  rows: [
    ["Paris", "France", 2100000],
    ["Lyon", "France", 513000],
    ["Berlin", "Germany", 3600000],
    ["Hamburg", "Germany", 1800000],
  ],
};

export function draft(id: string, dependencies: string[] = [], taskType: TaskType = "independent"): SubtaskDraft {
  return {
    id,
    description: `do ${id}`,
    taskType,
    dependencies,
    expectedOutput: "",
    reasoningSteps: [],
    needsRetrieval: false,
  };
}

export function graphOf(drafts: SubtaskDraft[], strategy: Strategy = "independent"): SubtaskGraph {
  return createSubtaskGraph("test question", strategy, drafts);
}

/** The task id named on the prompt's "Task: do <id>" line. */
export function taskIdOf(prompt: string): string {
  const match = prompt.match(/^Task: do (\S+)$/m);
  return match ? match[1] : "";
}

/** Oracle that answers subtask prompts through a per-task handler. */
export function subtaskOracle(handler: (taskId: string, prompt: string) => string | Promise<string>): FunctionOracle {
  return new FunctionOracle({
    name: "test-oracle",
    timeout: 1000,
    fn: async (prompt) => handler(taskIdOf(prompt), prompt),
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
