import type { ReasoningOracle } from "../oracle/oracle.js";
import type { SubtaskGraph, SubtaskResult } from "../planner/types.js";
import type { RetrievalFusion } from "../retrieval/fusion.js";
import type { RetryOptions } from "../utils/retry.js";

export type ExecutorOptions = {
  oracle: ReasoningOracle;
  /** Omit to run every subtask without evidence. */
  fusion?: RetrievalFusion;
  /** Tools fused for each lookup subtask (default: config retrieval.tools). */
  tools?: string[];
  topK?: number;
  /** Oracle retry policy per subtask (default: config retry). */
  retry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs">;
};

export type ExecutionOptions = {
  /** Worker pool size for independent subtasks (default: config limits.maxConcurrency). */
  maxConcurrency?: number;
  /** Cancel once more than this many subtasks failed (default: config limits.maxFailures). */
  maxFailures?: number;
  onTaskStart?: (taskId: string) => void;
  onTaskEnd?: (taskId: string, status: "succeeded" | "failed", result?: SubtaskResult) => void;
  abortSignal?: AbortSignal;
};

export type ExecutionStatus = "succeeded" | "partial" | "failed" | "cancelled";

export type TaskFailure = {
  id: string;
  error: string;
};

export type ExecutionResult = {
  graph: SubtaskGraph;
  status: ExecutionStatus;
  /** Results of succeeded subtasks keyed by id. */
  context: Record<string, SubtaskResult>;
  /** Ids in the order their outcomes were recorded: batch by batch, topological position within a batch. */
  order: string[];
  failures: TaskFailure[];
  skipped: string[];
  cancellation?: { reason: string };
  durationMs: number;
};
