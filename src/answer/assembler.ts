import { sinkIds, topologicalOrder } from "../planner/task-graph.js";
import type { SubtaskGraph, SubtaskResult } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("assembler");

export const ANSWER_OPEN = "<answer>";
export const ANSWER_CLOSE = "</answer>";

export type AssembledAnswer = {
  /** The enveloped answer, `<answer>value</answer>`. */
  text: string;
  value: string;
  sinkIds: string[];
  /** Set when the graph did not end in exactly one answered sink. */
  warning: boolean;
};

/** Wrap a value in the answer envelope. Answer tags inside the value are dropped. */
export function wrapAnswer(value: string): string {
  const clean = value.replaceAll(ANSWER_OPEN, "").replaceAll(ANSWER_CLOSE, "");
  return `${ANSWER_OPEN}${clean}${ANSWER_CLOSE}`;
}

/**
 * Pick the final answer from the graph's sink tasks. With several sinks
 * the outputs are joined by newline in completion order, falling back to
 * topological order when no completion order is given.
 */
export function assembleAnswer(
  graph: SubtaskGraph,
  context: Readonly<Record<string, SubtaskResult>>,
  order?: readonly string[],
): AssembledAnswer {
  const sinks = sinkIds(graph);
  const sequence = order ?? topologicalOrder(graph);
  const ranked = [...sinks].sort((a, b) => rankIn(sequence, a) - rankIn(sequence, b));
  const outputs = ranked.flatMap((id) => {
    const result = Object.hasOwn(context, id) ? context[id] : undefined;
    return result ? [result.output] : [];
  });

  const value = outputs.join("\n");
  const warning = sinks.length !== 1 || outputs.length !== 1;
  if (warning) {
    log.warn("Answer assembled from an irregular sink set", { graphId: graph.id, sinks, answered: outputs.length });
  }
  return { text: wrapAnswer(value), value, sinkIds: ranked, warning };
}

function rankIn(sequence: readonly string[], id: string): number {
  const i = sequence.indexOf(id);
  return i === -1 ? sequence.length : i;
}
