import type { SubtaskResult } from "../planner/types.js";

/**
 * Append-only record of completed subtask results for one run. Each task id
 * is written exactly once; readers of finished ids never see a change.
 */
export class ExecutionContext {
  private results = new Map<string, SubtaskResult>();

  set(id: string, result: SubtaskResult): void {
    if (this.results.has(id)) {
      throw new Error(`Result for task "${id}" is already recorded`);
    }
    this.results.set(id, Object.freeze({ ...result, evidence: [...result.evidence] }));
  }

  get(id: string): SubtaskResult | undefined {
    return this.results.get(id);
  }

  has(id: string): boolean {
    return this.results.has(id);
  }

  ids(): string[] {
    return [...this.results.keys()];
  }

  get size(): number {
    return this.results.size;
  }

  toJSON(): Record<string, SubtaskResult> {
    return Object.fromEntries(this.results);
  }
}
