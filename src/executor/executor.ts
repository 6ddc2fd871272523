import { getConfig } from "../config.js";
import { GraphInvalidError, GraphMalformedError, ParseError, errorMessage } from "../errors.js";
import { isRetryableOracleError, type ReasoningOracle } from "../oracle/oracle.js";
import { isComplete, readySubtasks, skipDownstream, taskMap, topologicalOrder } from "../planner/task-graph.js";
import type { EvidenceItem, Subtask, SubtaskGraph, SubtaskResult, Table } from "../planner/types.js";
import { structuralIssues } from "../planner/validator.js";
import type { RetrievalFusion } from "../retrieval/fusion.js";
import { createLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import { ExecutionContext } from "./context.js";
import { buildSubtaskPrompt, parseSubtaskOutput } from "./prompts.js";
import type { ExecutionOptions, ExecutionResult, ExecutionStatus, ExecutorOptions, TaskFailure } from "./types.js";

const log = createLogger("executor");

type RunScope = {
  graph: SubtaskGraph;
  tasks: Map<string, Subtask>;
  table: Table;
  context: ExecutionContext;
  opts?: ExecutionOptions;
};

export class Executor {
  private oracle: ReasoningOracle;
  private fusion?: RetrievalFusion;
  private tools: string[];
  private topK: number;
  private retry: NonNullable<ExecutorOptions["retry"]>;

  constructor(opts: ExecutorOptions) {
    const cfg = getConfig();
    this.oracle = opts.oracle;
    this.fusion = opts.fusion;
    this.tools = opts.tools ?? [...cfg.retrieval.tools];
    this.topK = opts.topK ?? cfg.retrieval.topK;
    this.retry = { ...cfg.retry, ...opts.retry };
  }

  /**
   * Run every subtask of a graph in dependency order. Subtask failures mark
   * their dependents skipped and never abort the run; the result always
   * leaves each task in a terminal status.
   */
  async execute(graph: SubtaskGraph, table: Table, opts?: ExecutionOptions): Promise<ExecutionResult> {
    const start = Date.now();
    const { limits } = getConfig();
    const maxConcurrency = Math.max(1, opts?.maxConcurrency ?? limits.maxConcurrency);
    const maxFailures = opts?.maxFailures ?? limits.maxFailures;

    // Refused before any task changes state.
    const structural = structuralIssues(graph);
    if (structural.some((i) => i.code === "EMPTY_GRAPH")) throw new GraphMalformedError("Graph has no subtasks");
    if (structural.length > 0) throw new GraphInvalidError(structural);

    // Throws GraphInvalidError on a cycle.
    const position = new Map(topologicalOrder(graph).map((id, i) => [id, i]));
    const scope: RunScope = { graph, tasks: taskMap(graph), table, context: new ExecutionContext(), opts };

    const order: string[] = [];
    const failures: TaskFailure[] = [];
    const skipped: string[] = [];
    let cancellation: { reason: string } | undefined;

    while (!isComplete(graph)) {
      if (opts?.abortSignal?.aborted) {
        cancellation = { reason: "Run aborted by caller" };
        break;
      }
      if (failures.length > maxFailures) {
        cancellation = { reason: `${failures.length} subtasks failed, more than the limit of ${maxFailures}` };
        break;
      }

      const ready = readySubtasks(graph).sort((a, b) => (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0));
      if (ready.length === 0) {
        log.error("Execution deadlock: no ready subtasks but graph not complete", { graphId: graph.id });
        break;
      }

      const batch = ready.slice(0, maxConcurrency);
      const settled = await Promise.allSettled(batch.map((task) => this.runTask(task, scope)));

      batch.forEach((task, i) => {
        const outcome = settled[i];
        order.push(task.id);
        if (outcome.status === "fulfilled") {
          task.status = "succeeded";
          task.result = outcome.value;
          scope.context.set(task.id, outcome.value);
          opts?.onTaskEnd?.(task.id, "succeeded", outcome.value);
          return;
        }
        const error = errorMessage(outcome.reason);
        task.status = "failed";
        task.error = error;
        failures.push({ id: task.id, error });
        const downstream = skipDownstream(graph, task.id);
        skipped.push(...downstream);
        log.warn(`Subtask "${task.id}" failed`, { error, skipped: downstream });
        opts?.onTaskEnd?.(task.id, "failed");
      });
    }

    for (const task of graph.tasks) {
      if (task.status === "pending") {
        task.status = "skipped";
        skipped.push(task.id);
      }
    }

    const status = overallStatus(graph, cancellation !== undefined);
    const durationMs = Date.now() - start;
    log.info("Execution finished", { graphId: graph.id, status, failed: failures.length, skipped: skipped.length, durationMs });

    return {
      graph,
      status,
      context: scope.context.toJSON(),
      order,
      failures,
      skipped,
      cancellation,
      durationMs,
    };
  }

  private async runTask(task: Subtask, scope: RunScope): Promise<SubtaskResult> {
    const start = Date.now();
    task.status = "running";
    scope.opts?.onTaskStart?.(task.id);

    const dependencyResults = task.dependencies.flatMap((id) => {
      const result = scope.context.get(id);
      return result ? [{ id, description: scope.tasks.get(id)?.description ?? "", result }] : [];
    });
    const evidence = task.needsRetrieval ? await this.retrieve(task, scope.table) : [];

    const { limits, retrieval } = getConfig();
    const prompt = buildSubtaskPrompt({
      task,
      table: scope.table,
      dependencyResults,
      evidence,
      previewRows: limits.tablePreviewRows,
      maxEvidence: retrieval.promptEvidence,
      outputTruncation: limits.outputTruncation,
    });

    log.debug(`Dispatching "${task.id}" to oracle "${this.oracle.name}"`, { evidence: evidence.length });
    const raw = await withRetry(() => this.oracle.infer(prompt), {
      ...this.retry,
      shouldRetry: isRetryableOracleError,
      onRetry: (err, attempt) => log.warn(`Retrying subtask "${task.id}"`, { attempt, error: errorMessage(err) }),
    });

    const output = parseSubtaskOutput(raw);
    if (output === undefined) {
      throw new ParseError(`Subtask "${task.id}" produced no usable output`);
    }
    return { output, evidence, durationMs: Date.now() - start };
  }

  /** Evidence is advisory: retrieval problems leave the subtask with none. */
  private async retrieve(task: Subtask, table: Table): Promise<EvidenceItem[]> {
    if (!this.fusion) return [];
    try {
      return await this.fusion.fuse(task.description, table, this.tools, this.topK);
    } catch (err) {
      log.warn(`Retrieval failed for "${task.id}"`, { error: errorMessage(err) });
      return [];
    }
  }
}

function overallStatus(graph: SubtaskGraph, cancelled: boolean): ExecutionStatus {
  if (cancelled) return "cancelled";
  const succeeded = graph.tasks.filter((t) => t.status === "succeeded").length;
  if (succeeded === graph.tasks.length) return "succeeded";
  return succeeded > 0 ? "partial" : "failed";
}
