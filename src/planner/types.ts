export type CellValue = string | number;

export type Table = {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly CellValue[])[];
};

export type Question = {
  readonly text: string;
  readonly table: Table;
};

export const STRATEGY_NAMES = ["aggregation", "comparison", "bridge", "sequential", "independent"] as const;
export type Strategy = (typeof STRATEGY_NAMES)[number];

export const TASK_TYPES = ["independent", "aggregate", "compare", "bridge", "sequential"] as const;
export type TaskType = (typeof TASK_TYPES)[number];

export type SubtaskStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type EvidenceItem = {
  /** Highest-weighted tool that returned this locator. */
  sourceTool: string;
  /** Every tool that returned this locator, highest weight first. */
  sources: string[];
  score: number;
  content: string;
  /** Where the content lives, e.g. `row:3/col:1`. */
  locator: string;
};

export type SubtaskResult = {
  output: string;
  evidence: EvidenceItem[];
  durationMs: number;
};

export type Subtask = {
  id: string;
  description: string;
  taskType: TaskType;
  dependencies: string[];
  /** Prompt hint only. */
  expectedOutput: string;
  reasoningSteps: string[];
  /** Set by the decomposer: run retrieval fusion before inference. */
  needsRetrieval: boolean;
  status: SubtaskStatus;
  result?: SubtaskResult;
  error?: string;
};

/** The five fields exchanged between decomposer, validator and executor, plus hints. */
export type SubtaskDraft = Omit<Subtask, "status" | "result" | "error">;

export type SubtaskGraph = {
  id: string;
  question: string;
  strategy: Strategy;
  /** Declaration order. Iteration and tie-breaks follow it. */
  tasks: Subtask[];
};

export type IssueSeverity = "error" | "warning";

export type IssueCode =
  | "EMPTY_GRAPH"
  | "DUPLICATE_ID"
  | "UNKNOWN_DEPENDENCY"
  | "SELF_DEPENDENCY"
  | "CYCLE"
  | "INDEPENDENCE_VIOLATION"
  | "STRATEGY_CONFORMANCE";

export type GraphIssue = {
  severity: IssueSeverity;
  code: IssueCode;
  message: string;
  taskIds: string[];
};

export type ValidationReport = {
  isValid: boolean;
  issues: GraphIssue[];
};
