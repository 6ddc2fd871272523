import { getConfig } from "../config.js";
import { GraphMalformedError, errorMessage } from "../errors.js";
import type { ReasoningOracle } from "../oracle/oracle.js";
import { DecomposerResponseSchema, RawSubtaskSchema } from "../schemas.js";
import { extractJsonObject } from "../utils/json.js";
import { createLogger } from "../utils/logger.js";
import { needsRetrievalByDefault, outputContract, strategyDefinition } from "./strategies.js";
import { describeSchema, formatTable } from "./table.js";
import { createSubtaskGraph } from "./task-graph.js";
import { TASK_TYPES, type Question, type Strategy, type SubtaskGraph, type SubtaskDraft, type TaskType } from "./types.js";

const log = createLogger("decomposer");

const DECOMPOSER_PREAMBLE = `You are an expert at analysing questions over tables.
Break the question into small subtasks that together answer it.
Each subtask must list, in "dependencies", the ids of the subtasks whose results it needs.
Tasks of type "independent" must not have dependencies.`;

export type TaskDecomposerOptions = {
  oracle: ReasoningOracle;
  /** Table rows shown in the prompt (default: config limits.tablePreviewRows). */
  previewRows?: number;
  /** Use the strategy's built-in decomposition when the oracle fails or returns no JSON (default: true). */
  fallbackOnOracleFailure?: boolean;
};

function toTaskType(value: string | undefined): TaskType | undefined {
  const normalized = value?.trim().toLowerCase();
  return TASK_TYPES.find((t) => t === normalized);
}

function toIdList(values: unknown[] | undefined): string[] {
  const ids = (values ?? [])
    .filter((v): v is string | number => typeof v === "string" || typeof v === "number")
    .map((v) => String(v).trim())
    .filter((v) => v.length > 0);
  return [...new Set(ids)];
}

/**
 * Turn the oracle's subtask list into well-formed drafts: synthetic ids for
 * missing ones, suffixes for duplicates, `independent` for unknown types.
 */
export function normalizeSubtasks(items: readonly unknown[]): SubtaskDraft[] {
  const drafts: SubtaskDraft[] = [];
  const used = new Set<string>();

  items.forEach((item, index) => {
    const parsed = RawSubtaskSchema.safeParse(item);
    if (!parsed.success) {
      log.warn("Dropping subtask that is not an object", { position: index + 1 });
      return;
    }
    const raw = parsed.data;

    let id = raw.id?.trim() || `task_${index + 1}`;
    if (used.has(id)) {
      let n = 2;
      while (used.has(`${id}_${n}`)) n++;
      log.warn("Duplicate subtask id, renaming", { id, renamed: `${id}_${n}` });
      id = `${id}_${n}`;
    }
    used.add(id);

    const taskType = toTaskType(raw.task_type);
    if (!taskType && raw.task_type !== undefined) {
      log.debug("Unknown task type coerced to independent", { id, taskType: raw.task_type });
    }
    const resolvedType = taskType ?? "independent";

    const description = (raw.description ?? raw.task ?? "").trim();
    if (description.length === 0) {
      log.warn("Subtask has no description", { id });
    }

    drafts.push({
      id,
      description,
      taskType: resolvedType,
      dependencies: toIdList(raw.dependencies ?? raw.depends_on),
      expectedOutput: raw.expected_output?.trim() ?? "",
      reasoningSteps: (raw.reasoning_steps ?? []).filter((s): s is string => typeof s === "string"),
      needsRetrieval: raw.needs_retrieval ?? needsRetrievalByDefault(resolvedType),
    });
  });

  return drafts;
}

export class TaskDecomposer {
  private oracle: ReasoningOracle;
  private previewRows: number;
  private fallbackOnOracleFailure: boolean;

  constructor(opts: TaskDecomposerOptions) {
    this.oracle = opts.oracle;
    this.previewRows = opts.previewRows ?? getConfig().limits.tablePreviewRows;
    this.fallbackOnOracleFailure = opts.fallbackOnOracleFailure ?? true;
  }

  async decompose(question: Question, strategy: Strategy): Promise<SubtaskGraph> {
    const definition = strategyDefinition(strategy);
    const drafts = await this.generate(question, strategy);
    const graph = createSubtaskGraph(question.text, strategy, drafts);

    for (const finding of definition.conformance(graph)) {
      log.warn("Decomposition does not match strategy shape", { strategy, finding: finding.message });
    }
    log.info(`Decomposed question into ${graph.tasks.length} subtasks`, { strategy, graphId: graph.id });
    return graph;
  }

  buildPrompt(question: Question, strategy: Strategy): string {
    return [
      DECOMPOSER_PREAMBLE,
      "",
      describeSchema(question.table),
      formatTable(question.table, this.previewRows),
      "",
      `Question: ${question.text}`,
      "",
      strategyDefinition(strategy).template,
      "",
      outputContract(strategy),
      "",
      "Return raw JSON only, no markdown fences and no other text.",
    ].join("\n");
  }

  private async generate(question: Question, strategy: Strategy): Promise<SubtaskDraft[]> {
    let raw: string;
    try {
      raw = await this.oracle.infer(this.buildPrompt(question, strategy));
    } catch (err) {
      return this.fallback(strategy, `oracle call failed: ${errorMessage(err)}`, err);
    }

    const json = extractJsonObject(raw);
    if (json === undefined) {
      log.error("Failed to parse decomposer response", { raw: raw.slice(0, 500) });
      return this.fallback(strategy, "response contained no JSON object");
    }

    const envelope = DecomposerResponseSchema.safeParse(json);
    if (!envelope.success) {
      throw new GraphMalformedError(`Decomposer response has no "subtasks" array`);
    }
    if (envelope.data.strategy && envelope.data.strategy !== strategy) {
      log.debug("Oracle reported a different strategy", { requested: strategy, reported: envelope.data.strategy });
    }

    const drafts = normalizeSubtasks(envelope.data.subtasks);
    if (drafts.length === 0) {
      throw new GraphMalformedError("Decomposer produced an empty subtask graph");
    }
    return drafts;
  }

  private fallback(strategy: Strategy, reason: string, cause?: unknown): SubtaskDraft[] {
    if (!this.fallbackOnOracleFailure) {
      throw new GraphMalformedError(`Decomposition failed: ${reason}`, { cause });
    }
    log.warn("Using default decomposition", { strategy, reason });
    return strategyDefinition(strategy).fallback();
  }
}
