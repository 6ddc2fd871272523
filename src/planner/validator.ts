import { strategyDefinition } from "./strategies.js";
import type { GraphIssue, SubtaskGraph, ValidationReport } from "./types.js";

/**
 * Static checks on a subtask graph. Every check runs and every violation is
 * collected: structure, referential integrity, acyclicity, independence
 * honesty (hard), then strategy conformance (warning).
 */
export function validateGraph(graph: SubtaskGraph): ValidationReport {
  const issues: GraphIssue[] = [
    ...structuralIssues(graph),
    ...checkReferences(graph),
    ...checkCycles(graph),
    ...checkIndependence(graph),
    ...checkConformance(graph),
  ];
  return {
    isValid: !issues.some((i) => i.severity === "error"),
    issues,
  };
}

export function hardIssues(report: ValidationReport): GraphIssue[] {
  return report.issues.filter((i) => i.severity === "error");
}

/** Issues that make a graph unexecutable: no tasks at all, or an id declared twice. */
export function structuralIssues(graph: SubtaskGraph): GraphIssue[] {
  if (graph.tasks.length === 0) {
    return [{ severity: "error", code: "EMPTY_GRAPH", message: "Graph has no subtasks", taskIds: [] }];
  }
  const seen = new Set<string>();
  const reported = new Set<string>();
  const issues: GraphIssue[] = [];
  for (const task of graph.tasks) {
    if (seen.has(task.id) && !reported.has(task.id)) {
      reported.add(task.id);
      issues.push({
        severity: "error",
        code: "DUPLICATE_ID",
        message: `Task id "${task.id}" is declared more than once`,
        taskIds: [task.id],
      });
    }
    seen.add(task.id);
  }
  return issues;
}

function checkReferences(graph: SubtaskGraph): GraphIssue[] {
  const ids = new Set(graph.tasks.map((t) => t.id));
  const issues: GraphIssue[] = [];
  for (const task of graph.tasks) {
    for (const dep of task.dependencies) {
      if (dep === task.id) {
        issues.push({
          severity: "error",
          code: "SELF_DEPENDENCY",
          message: `Task "${task.id}" depends on itself`,
          taskIds: [task.id],
        });
      } else if (!ids.has(dep)) {
        issues.push({
          severity: "error",
          code: "UNKNOWN_DEPENDENCY",
          message: `Task "${task.id}" depends on unknown task "${dep}"`,
          taskIds: [task.id, dep],
        });
      }
    }
  }
  return issues;
}

/**
 * DFS with colouring over task → dependency edges. Each back edge is one
 * reported cycle, listed from the re-entered task around to itself. Self
 * edges and dangling ids are already reported by the reference check.
 */
function checkCycles(graph: SubtaskGraph): GraphIssue[] {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const deps = new Map(graph.tasks.map((t) => [t.id, t.dependencies]));
  const color = new Map<string, number>(graph.tasks.map((t) => [t.id, WHITE]));
  const stack: string[] = [];
  const issues: GraphIssue[] = [];

  function visit(id: string): void {
    color.set(id, GRAY);
    stack.push(id);
    for (const dep of deps.get(id) ?? []) {
      if (dep === id || !deps.has(dep)) continue;
      const c = color.get(dep);
      if (c === GRAY) {
        const cycle = [...stack.slice(stack.indexOf(dep)), dep];
        issues.push({
          severity: "error",
          code: "CYCLE",
          message: `Dependency cycle: ${cycle.join(" -> ")}`,
          taskIds: cycle.slice(0, -1),
        });
      } else if (c === WHITE) {
        visit(dep);
      }
    }
    stack.pop();
    color.set(id, BLACK);
  }

  for (const task of graph.tasks) {
    if (color.get(task.id) === WHITE) visit(task.id);
  }
  return issues;
}

function checkIndependence(graph: SubtaskGraph): GraphIssue[] {
  return graph.tasks
    .filter((t) => t.taskType === "independent" && t.dependencies.length > 0)
    .map((t): GraphIssue => ({
      severity: "error",
      code: "INDEPENDENCE_VIOLATION",
      message: `Task "${t.id}" is declared independent but depends on ${t.dependencies.join(", ")}`,
      taskIds: [t.id],
    }));
}

function checkConformance(graph: SubtaskGraph): GraphIssue[] {
  const issues: GraphIssue[] = strategyDefinition(graph.strategy)
    .conformance(graph)
    .map((f): GraphIssue => ({ severity: "warning", code: "STRATEGY_CONFORMANCE", message: f.message, taskIds: f.taskIds }));

  for (const task of graph.tasks) {
    if (task.taskType === "compare" && task.dependencies.length < 2) {
      issues.push({
        severity: "warning",
        code: "STRATEGY_CONFORMANCE",
        message: `Compare task "${task.id}" should depend on at least 2 tasks`,
        taskIds: [task.id],
      });
    }
  }
  return issues;
}
