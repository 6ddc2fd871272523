import { randomUUID } from "node:crypto";
import { assembleAnswer, type AssembledAnswer } from "./answer/assembler.js";
import { getConfig } from "./config.js";
import { GraphInvalidError, GraphMalformedError, errorMessage } from "./errors.js";
import { Executor } from "./executor/executor.js";
import type { ExecutorOptions, TaskFailure } from "./executor/types.js";
import type { ReasoningOracle } from "./oracle/oracle.js";
import type { RunStatus, RunStore, StoredRun } from "./persistence/store.js";
import { StrategyClassifier } from "./planner/classifier.js";
import { TaskDecomposer } from "./planner/decomposer.js";
import type { Question, Strategy, SubtaskGraph, SubtaskResult, ValidationReport } from "./planner/types.js";
import { hardIssues, validateGraph } from "./planner/validator.js";
import type { RetrievalFusion } from "./retrieval/fusion.js";
import { QuestionSchema, parseOrThrow } from "./schemas.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("pipeline");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PipelineRun = {
  runId: string;
  question: string;
  status: RunStatus;
  strategy?: Strategy;
  graph?: SubtaskGraph;
  report?: ValidationReport;
  decomposeAttempts: number;
  context: Record<string, SubtaskResult>;
  order: string[];
  failures: TaskFailure[];
  skipped: string[];
  answer?: AssembledAnswer;
  error?: string;
  startedAt: number;
  finishedAt?: number;
};

export type PlanResult = {
  strategy: Strategy;
  graph: SubtaskGraph;
  report: ValidationReport;
  attempts: number;
};

export type PipelineCallbacks = {
  onStrategy?: (strategy: Strategy) => void;
  onPlan?: (graph: SubtaskGraph, report: ValidationReport) => void;
  onTaskStart?: (taskId: string) => void;
  onTaskEnd?: (taskId: string, status: "succeeded" | "failed", result?: SubtaskResult) => void;
  onFinish?: (run: PipelineRun) => void;
  onError?: (error: string) => void;
};

export type AnswerOptions = {
  /** Skip classification and decompose with this strategy. */
  strategy?: Strategy;
  maxConcurrency?: number;
  maxFailures?: number;
  maxDecomposeAttempts?: number;
  abortSignal?: AbortSignal;
};

export type PipelineOptions = {
  oracle: ReasoningOracle;
  /** Let the classifier ask the oracle when keyword heuristics are inconclusive (default: true). */
  classifyWithOracle?: boolean;
  fusion?: RetrievalFusion;
  tools?: string[];
  store?: RunStore;
  retry?: ExecutorOptions["retry"];
};

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/** classify → decompose → validate → execute → assemble */
export class TableQaPipeline {
  readonly classifier: StrategyClassifier;
  readonly decomposer: TaskDecomposer;
  readonly executor: Executor;
  private store?: RunStore;

  constructor(opts: PipelineOptions) {
    this.classifier = new StrategyClassifier({ oracle: opts.classifyWithOracle === false ? undefined : opts.oracle });
    this.decomposer = new TaskDecomposer({ oracle: opts.oracle });
    this.executor = new Executor({ oracle: opts.oracle, fusion: opts.fusion, tools: opts.tools, retry: opts.retry });
    this.store = opts.store;
  }

  /**
   * Answer a question. Input that fails validation throws `ValidationError`
   * before a run exists; every later failure ends up in the returned run.
   */
  async answer(input: Question, opts?: AnswerOptions, callbacks?: PipelineCallbacks): Promise<PipelineRun> {
    const question = parseOrThrow(QuestionSchema, input, "question");
    const run: PipelineRun = {
      runId: randomUUID(),
      question: question.text,
      status: "planning",
      decomposeAttempts: 0,
      context: {},
      order: [],
      failures: [],
      skipped: [],
      startedAt: Date.now(),
    };
    await this.persist(run);

    try {
      const strategy = opts?.strategy ?? (await this.classifier.classify(question.text));
      run.strategy = strategy;
      callbacks?.onStrategy?.(strategy);

      const plan = await this.planWith(question, strategy, opts?.maxDecomposeAttempts, (attempts) => {
        run.decomposeAttempts = attempts;
      });
      run.graph = plan.graph;
      run.report = plan.report;
      callbacks?.onPlan?.(plan.graph, plan.report);

      if (!plan.report.isValid) {
        const error = new GraphInvalidError(hardIssues(plan.report));
        return await this.finish(run, "invalid", callbacks, error.message);
      }

      run.status = "executing";
      await this.persist(run);
      const result = await this.executor.execute(plan.graph, question.table, {
        maxConcurrency: opts?.maxConcurrency,
        maxFailures: opts?.maxFailures,
        abortSignal: opts?.abortSignal,
        onTaskStart: callbacks?.onTaskStart,
        onTaskEnd: callbacks?.onTaskEnd,
      });
      run.context = result.context;
      run.order = result.order;
      run.failures = result.failures;
      run.skipped = result.skipped;
      run.answer = assembleAnswer(plan.graph, result.context, result.order);

      switch (result.status) {
        case "succeeded":
          return await this.finish(run, "answered", callbacks);
        case "partial":
          return await this.finish(run, "partial", callbacks);
        case "cancelled":
          return await this.finish(run, "cancelled", callbacks, result.cancellation?.reason);
        default:
          return await this.finish(run, "error", callbacks, "Every subtask failed");
      }
    } catch (err) {
      return this.finish(run, "error", callbacks, errorMessage(err));
    }
  }

  /** Dry run: classify, decompose and validate without executing. */
  async plan(input: Question, opts?: Pick<AnswerOptions, "strategy" | "maxDecomposeAttempts">): Promise<PlanResult> {
    const question = parseOrThrow(QuestionSchema, input, "question");
    const strategy = opts?.strategy ?? (await this.classifier.classify(question.text));
    return this.planWith(question, strategy, opts?.maxDecomposeAttempts);
  }

  /**
   * Decompose until a graph passes validation or the attempts run out.
   * The last attempt's graph is returned even when it is invalid.
   */
  private async planWith(
    question: Question,
    strategy: Strategy,
    maxAttempts = getConfig().limits.maxDecomposeAttempts,
    onAttempt?: (attempts: number) => void,
  ): Promise<PlanResult> {
    const limit = Math.max(1, maxAttempts);
    let last: PlanResult | undefined;
    let malformed: GraphMalformedError | undefined;

    for (let attempt = 1; attempt <= limit; attempt++) {
      onAttempt?.(attempt);
      let graph: SubtaskGraph;
      try {
        graph = await this.decomposer.decompose(question, strategy);
      } catch (err) {
        if (!(err instanceof GraphMalformedError)) throw err;
        malformed = err;
        log.warn("Decomposition malformed", { attempt, error: err.message });
        continue;
      }

      const report = validateGraph(graph);
      last = { strategy, graph, report, attempts: attempt };
      if (report.isValid) return last;
      log.warn("Decomposition rejected by validation", {
        attempt,
        issues: hardIssues(report).map((i) => i.message),
      });
    }

    if (last) return last;
    throw malformed ?? new GraphMalformedError("Decomposition produced no graph");
  }

  private async finish(run: PipelineRun, status: RunStatus, callbacks?: PipelineCallbacks, error?: string): Promise<PipelineRun> {
    run.status = status;
    run.error = error;
    run.finishedAt = Date.now();
    await this.persist(run);

    if (status === "error" || status === "invalid") {
      log.error("Run failed", { runId: run.runId, status, error });
      callbacks?.onError?.(error ?? status);
    } else {
      log.info("Run finished", { runId: run.runId, status, durationMs: run.finishedAt - run.startedAt });
    }
    callbacks?.onFinish?.(run);
    return run;
  }

  private async persist(run: PipelineRun): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.insert(toStoredRun(run));
    } catch (err) {
      log.warn("Failed to persist run", { runId: run.runId, error: errorMessage(err) });
    }
  }
}

export function toStoredRun(run: PipelineRun): StoredRun {
  return {
    runId: run.runId,
    question: run.question,
    status: run.status,
    strategy: run.strategy,
    answer: run.answer?.text,
    warning: run.answer?.warning ?? false,
    error: run.error,
    tasks: (run.graph?.tasks ?? []).map((t) => ({
      id: t.id,
      description: t.description,
      taskType: t.taskType,
      dependencies: [...t.dependencies],
      status: t.status,
      output: t.result?.output,
      error: t.error,
    })),
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
  };
}
