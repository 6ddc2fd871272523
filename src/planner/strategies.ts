import { dependentsMap, leafIds, sinkIds, taskMap } from "./task-graph.js";
import type { Strategy, SubtaskGraph, SubtaskDraft, TaskType } from "./types.js";

export type ConformanceFinding = {
  message: string;
  taskIds: string[];
};

export type StrategyDefinition = {
  name: Strategy;
  /** Labels the classifier accepts from the oracle for this strategy. */
  aliases: readonly string[];
  /** Decomposition rules appended to the decomposer prompt. */
  template: string;
  /** Soft structural expectations. Findings are warnings, never hard failures. */
  conformance(graph: SubtaskGraph): ConformanceFinding[];
  /** Decomposition used when the oracle produces nothing usable. */
  fallback(): SubtaskDraft[];
};

function draft(
  id: string,
  taskType: TaskType,
  description: string,
  expectedOutput: string,
  dependencies: string[],
  reasoningSteps: string[],
): SubtaskDraft {
  return {
    id,
    description,
    taskType,
    dependencies,
    expectedOutput,
    reasoningSteps,
    needsRetrieval: needsRetrievalByDefault(taskType),
  };
}

/** Lookup-shaped task types read the table; the rest work from dependency results. */
export function needsRetrievalByDefault(taskType: TaskType): boolean {
  return taskType === "independent" || taskType === "bridge";
}

function singleSink(graph: SubtaskGraph, label: string): ConformanceFinding[] | string {
  const sinks = sinkIds(graph);
  if (sinks.length !== 1) {
    return [{ message: `${label} graph should have exactly one sink task, found ${sinks.length}`, taskIds: sinks }];
  }
  return sinks[0];
}

/** Every task after the first must consume at least one earlier-declared task. */
function chainFindings(graph: SubtaskGraph, label: string, strict: boolean): ConformanceFinding[] {
  const findings: ConformanceFinding[] = [];
  const seen = new Set<string>();
  graph.tasks.forEach((task, i) => {
    if (i > 0) {
      const earlier = task.dependencies.filter((d) => seen.has(d));
      if (earlier.length === 0) {
        findings.push({ message: `${label} step "${task.id}" does not consume any earlier step`, taskIds: [task.id] });
      } else if (strict && earlier.length !== task.dependencies.length) {
        findings.push({ message: `${label} step "${task.id}" depends on a later step`, taskIds: [task.id] });
      }
    }
    seen.add(task.id);
  });
  return findings;
}

const OUTPUT_CONTRACT = `Output format (JSON only):
{
  "strategy": "<strategy>",
  "subtasks": [
    {
      "id": "task_1",
      "description": "what to do",
      "task_type": "independent | aggregate | compare | bridge | sequential",
      "dependencies": ["ids of tasks whose results this task needs"],
      "expected_output": "the value this task should produce",
      "reasoning_steps": ["step 1", "step 2"],
      "needs_retrieval": true
    }
  ]
}`;

export const STRATEGIES: { readonly [S in Strategy]: StrategyDefinition & { name: S } } = {
  aggregation: {
    name: "aggregation",
    aliases: ["aggregation", "aggregate"],
    template: `Aggregation question. Decomposition rules:
1. Identify the numeric column(s) the aggregate is computed over.
2. Split the aggregate into simple extraction steps, one column per task.
3. Extraction tasks are "independent" with no dependencies.
4. Finish with a single "aggregate" task that depends on every extraction task.
Example: "What is the average number of cyclones per season?" -> extract the cyclone counts, then average them.`,
    conformance(graph) {
      const sink = singleSink(graph, "Aggregation");
      if (typeof sink !== "string") return sink;
      const task = taskMap(graph).get(sink);
      if (task && task.taskType !== "aggregate") {
        return [{ message: `Aggregation sink "${sink}" should be an aggregate task`, taskIds: [sink] }];
      }
      return [];
    },
    fallback: () => [
      draft("task_1", "independent", "Extract the values of the relevant column", "List of values", [], [
        "Locate the column",
        "Extract its values",
      ]),
      draft("task_2", "aggregate", "Compute the requested aggregate over the extracted values", "Aggregate value", ["task_1"], [
        "Take the extracted values",
        "Apply the aggregate",
      ]),
    ],
  },

  comparison: {
    name: "comparison",
    aliases: ["comparison", "compare"],
    template: `Comparison question. Decomposition rules:
1. Identify the two or more entities being compared.
2. Create one "independent" task per entity that computes the compared metric; these have no dependencies.
3. Finish with a single "compare" task that depends on every entity task.
Example: "Which country has the higher GDP, A or B?" -> GDP of A, GDP of B, compare them.`,
    conformance(graph) {
      const sink = singleSink(graph, "Comparison");
      if (typeof sink !== "string") return sink;
      const tasks = taskMap(graph);
      const task = tasks.get(sink);
      if (!task) return [];
      if (task.taskType !== "compare" && task.taskType !== "aggregate") {
        return [{ message: `Comparison sink "${sink}" should be a compare or aggregate task`, taskIds: [sink] }];
      }
      const leaves = new Set(leafIds(graph));
      const branches = task.dependencies.filter((d) => leaves.has(d));
      if (branches.length < 2) {
        return [
          { message: `Comparison sink "${sink}" should depend on at least 2 independent branches, found ${branches.length}`, taskIds: [sink] },
        ];
      }
      return [];
    },
    fallback: () => [
      draft("task_1", "independent", "Extract the value of the first entity", "Value of the first entity", [], [
        "Identify the first entity",
        "Extract its value",
      ]),
      draft("task_2", "independent", "Extract the value of the second entity", "Value of the second entity", [], [
        "Identify the second entity",
        "Extract its value",
      ]),
      draft("task_3", "compare", "Compare the two values", "Comparison result", ["task_1", "task_2"], [
        "Take both values",
        "Compare them",
      ]),
    ],
  },

  bridge: {
    name: "bridge",
    aliases: ["bridge", "bridging"],
    template: `Bridge question. Decomposition rules:
1. Identify the intermediate facts the answer hinges on.
2. Order the tasks so each step's output narrows what the next step looks up.
3. Every task after the first depends on the step it consumes.
Example: "What is the total revenue of companies with profit above 1000?" -> select those companies, then total their revenue.`,
    conformance: (graph) => chainFindings(graph, "Bridge", false),
    fallback: () => [
      draft("task_1", "independent", "Apply the filter condition to the table", "Matching rows", [], [
        "Identify the condition",
        "Select matching rows",
      ]),
      draft("task_2", "bridge", "Compute the requested value over the matching rows", "Computed value", ["task_1"], [
        "Take the matching rows",
        "Compute the value",
      ]),
    ],
  },

  sequential: {
    name: "sequential",
    aliases: ["sequential", "sequence", "temporal"],
    template: `Sequential question. Decomposition rules:
1. Identify the time series or logical order in the question.
2. Create the tasks in that order.
3. A task may depend on any earlier task, never on a later one.
Example: "What was the trend of sales from 2020 to 2023?" -> sales per year in order, then describe the trend.`,
    conformance: (graph) => chainFindings(graph, "Sequential", true),
    fallback: () => [
      draft("task_1", "independent", "Extract the time-ordered values", "Ordered values", [], [
        "Identify the time column",
        "Extract and sort the values",
      ]),
      draft("task_2", "sequential", "Analyse how the values change over time", "Trend description", ["task_1"], [
        "Take the ordered values",
        "Describe the change",
      ]),
    ],
  },

  independent: {
    name: "independent",
    aliases: ["independent", "parallel"],
    template: `Independent question. Decomposition rules:
1. Identify parts of the question that can be answered separately.
2. Each part is an "independent" task with no dependencies.
3. When there is more than one part, finish with one "aggregate" task that combines them.
Example: "What are the top 3 countries by population and by GDP?" -> top 3 by population, top 3 by GDP, combine.`,
    conformance(graph) {
      const dependents = dependentsMap(graph);
      const findings: ConformanceFinding[] = [];
      const combiners = graph.tasks.filter((t) => t.dependencies.length > 0);
      for (const task of combiners) {
        if ((dependents.get(task.id) ?? []).length > 0) {
          findings.push({ message: `Independent decomposition has an intermediate step "${task.id}"`, taskIds: [task.id] });
        }
      }
      if (combiners.length > 1) {
        findings.push({
          message: `Independent decomposition should have at most one combining task, found ${combiners.length}`,
          taskIds: combiners.map((t) => t.id),
        });
      }
      return findings;
    },
    fallback: () => [
      draft("task_1", "independent", "Extract all data relevant to the question", "Relevant values", [], [
        "Analyse the question",
        "Extract the values",
      ]),
    ],
  },
};

export function strategyDefinition(strategy: Strategy): StrategyDefinition {
  return STRATEGIES[strategy];
}

export function outputContract(strategy: Strategy): string {
  return OUTPUT_CONTRACT.replace("<strategy>", strategy);
}
