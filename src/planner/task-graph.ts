import { randomUUID } from "node:crypto";
import { GraphInvalidError } from "../errors.js";
import type { Strategy, Subtask, SubtaskGraph, SubtaskDraft } from "./types.js";

/** Create a subtask graph with every task pending. Structural checks live in the validator. */
export function createSubtaskGraph(question: string, strategy: Strategy, drafts: SubtaskDraft[]): SubtaskGraph {
  return {
    id: randomUUID(),
    question,
    strategy,
    tasks: drafts.map((s) => ({ ...s, dependencies: [...s.dependencies], status: "pending" })),
  };
}

export function taskMap(graph: SubtaskGraph): Map<string, Subtask> {
  return new Map(graph.tasks.map((t) => [t.id, t]));
}

/** Explicit adjacency: task id → ids it depends on. */
export function dependencyMap(graph: SubtaskGraph): Map<string, Set<string>> {
  return new Map(graph.tasks.map((t) => [t.id, new Set(t.dependencies)]));
}

/** Reverse adjacency: task id → ids that depend on it, in declaration order. */
export function dependentsMap(graph: SubtaskGraph): Map<string, string[]> {
  const dependents = new Map<string, string[]>(graph.tasks.map((t) => [t.id, []]));
  for (const task of graph.tasks) {
    for (const dep of new Set(task.dependencies)) {
      dependents.get(dep)?.push(task.id);
    }
  }
  return dependents;
}

/**
 * Kahn's algorithm in rounds. Each round releases every task whose in-degree
 * reached zero, ordered by declaration position. Unknown dependency ids are
 * ignored here; the validator reports them.
 */
export function topologicalLayers(graph: SubtaskGraph): string[][] {
  const ids = new Set(graph.tasks.map((t) => t.id));
  const inDegree = new Map<string, number>();
  for (const task of graph.tasks) {
    inDegree.set(task.id, [...new Set(task.dependencies)].filter((d) => ids.has(d)).length);
  }
  const dependents = dependentsMap(graph);
  const position = new Map(graph.tasks.map((t, i) => [t.id, i]));
  const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);

  const layers: string[][] = [];
  let frontier = graph.tasks.filter((t) => inDegree.get(t.id) === 0).map((t) => t.id);
  let placed = 0;

  while (frontier.length > 0) {
    layers.push(frontier);
    placed += frontier.length;
    const next: string[] = [];
    for (const id of frontier) {
      for (const dependent of dependents.get(id) ?? []) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) next.push(dependent);
      }
    }
    frontier = next.sort(byPosition);
  }

  if (placed !== graph.tasks.length) {
    const stuck = graph.tasks.filter((t) => (inDegree.get(t.id) ?? 0) > 0).map((t) => t.id);
    throw new GraphInvalidError([
      {
        severity: "error",
        code: "CYCLE",
        message: `Tasks ${stuck.join(", ")} are part of or behind a dependency cycle`,
        taskIds: stuck,
      },
    ]);
  }
  return layers;
}

/** Deterministic execution order: dependencies first, ties by declaration order. */
export function topologicalOrder(graph: SubtaskGraph): string[] {
  return topologicalLayers(graph).flat();
}

/** Pending tasks whose dependencies have all succeeded. */
export function readySubtasks(graph: SubtaskGraph): Subtask[] {
  const succeeded = new Set(graph.tasks.filter((t) => t.status === "succeeded").map((t) => t.id));
  return graph.tasks.filter(
    (t) => t.status === "pending" && t.dependencies.every((d) => succeeded.has(d)),
  );
}

/** True when every task reached a terminal status. */
export function isComplete(graph: SubtaskGraph): boolean {
  return graph.tasks.every((t) => t.status === "succeeded" || t.status === "failed" || t.status === "skipped");
}

/** Mark every pending transitive dependent of a task as skipped. Returns the ids it skipped. */
export function skipDownstream(graph: SubtaskGraph, failedId: string): string[] {
  const dependents = dependentsMap(graph);
  const tasks = taskMap(graph);
  const queue = [...(dependents.get(failedId) ?? [])];
  const visited = new Set<string>();
  const skipped: string[] = [];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    const task = tasks.get(id);
    if (task?.status === "pending") {
      task.status = "skipped";
      skipped.push(id);
    }
    queue.push(...(dependents.get(id) ?? []));
  }
  return skipped;
}

/** Tasks that no other task depends on, in declaration order. */
export function sinkIds(graph: SubtaskGraph): string[] {
  const dependents = dependentsMap(graph);
  return graph.tasks.filter((t) => (dependents.get(t.id) ?? []).length === 0).map((t) => t.id);
}

/** Tasks with no dependencies, in declaration order. */
export function leafIds(graph: SubtaskGraph): string[] {
  return graph.tasks.filter((t) => t.dependencies.length === 0).map((t) => t.id);
}
