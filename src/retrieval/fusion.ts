import { getConfig } from "../config.js";
import { ValidationError, errorMessage } from "../errors.js";
import type { EvidenceItem, Table } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import type { ToolRegistry } from "./registry.js";
import type { ToolHit } from "./types.js";

const log = createLogger("fusion");

export type FusionOptions = {
  /** Per-tool weights (default: config retrieval.weights). */
  weights?: Record<string, number>;
  /** Weight for tools missing from `weights` (default: config retrieval.defaultWeight). */
  defaultWeight?: number;
};

type ToolRun = {
  tool: string;
  weight: number;
  hits: ToolHit[];
};

type FusedEntry = {
  item: EvidenceItem;
  ranks: Map<string, number>;
};

/** Min-max normalise one tool's scores. A single distinct score maps to 1. */
export function normalizeScores(scores: readonly number[]): number[] {
  if (scores.length === 0) return [];
  const min = Math.min(...scores);
  const max = Math.max(...scores);
  if (max === min) return scores.map(() => 1);
  return scores.map((s) => (s - min) / (max - min));
}

/**
 * Weighted score fusion across retrieval tools.
 *
 *   combined(locator) = Σ weight(tool) · minmax(tool score)
 *
 * Items are deduplicated by locator. A tool that did not return an item
 * contributes nothing for it. Equal combined scores are ordered by rank in
 * the highest-weighted tool that returned either item.
 */
export class RetrievalFusion {
  private registry: ToolRegistry;
  private weights: Record<string, number>;
  private defaultWeight: number;

  constructor(registry: ToolRegistry, opts?: FusionOptions) {
    const cfg = getConfig().retrieval;
    this.registry = registry;
    this.weights = { ...(opts?.weights ?? cfg.weights) };
    this.defaultWeight = opts?.defaultWeight ?? cfg.defaultWeight;
  }

  weightOf(tool: string): number {
    return this.weights[tool] ?? this.defaultWeight;
  }

  async fuse(query: string, table: Table, tools: readonly string[], topK: number): Promise<EvidenceItem[]> {
    if (tools.length === 0) {
      throw new ValidationError("VALIDATION_FAILED", "Retrieval fusion needs at least one tool");
    }
    const requested = [...new Set(tools)];
    const runs = (await Promise.all(requested.map((name) => this.runTool(name, query, table, topK))))
      .filter((run): run is ToolRun => run !== undefined)
      // Stable: equal weights keep request order.
      .sort((a, b) => b.weight - a.weight);

    if (runs.length === 0) {
      log.warn("No retrieval tool produced results", { tools: requested });
      return [];
    }

    const fused = new Map<string, FusedEntry>();
    for (const run of runs) {
      const seen = new Set<string>();
      const unique = run.hits.filter((h) => {
        if (seen.has(h.locator)) return false;
        seen.add(h.locator);
        return true;
      });
      const normalized = normalizeScores(unique.map((h) => h.score));

      unique.forEach((hit, rank) => {
        const contribution = run.weight * normalized[rank];
        const entry = fused.get(hit.locator);
        if (entry) {
          entry.item.score += contribution;
          entry.item.sources.push(run.tool);
          entry.ranks.set(run.tool, rank);
        } else {
          fused.set(hit.locator, {
            item: { sourceTool: run.tool, sources: [run.tool], score: contribution, content: hit.content, locator: hit.locator },
            ranks: new Map([[run.tool, rank]]),
          });
        }
      });
    }

    const order = runs.map((r) => r.tool);
    return [...fused.values()]
      .sort((a, b) => b.item.score - a.item.score || compareRanks(a, b, order))
      .slice(0, topK)
      .map((e) => e.item);
  }

  private async runTool(name: string, query: string, table: Table, topK: number): Promise<ToolRun | undefined> {
    const tool = this.registry.get(name);
    if (!tool) {
      log.warn(`Retrieval tool "${name}" is not registered`);
      return undefined;
    }
    try {
      const hits = await tool.search(query, table, topK);
      return { tool: name, weight: this.weightOf(name), hits: hits.slice(0, topK) };
    } catch (err) {
      log.warn(`Retrieval tool "${name}" failed`, { error: errorMessage(err) });
      return undefined;
    }
  }
}

function compareRanks(a: FusedEntry, b: FusedEntry, toolOrder: string[]): number {
  for (const tool of toolOrder) {
    const ra = a.ranks.get(tool);
    const rb = b.ranks.get(tool);
    if (ra === rb) continue;
    if (ra === undefined) return 1;
    if (rb === undefined) return -1;
    return ra - rb;
  }
  return 0;
}
