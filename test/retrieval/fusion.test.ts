import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/errors.js";
import { RetrievalFusion, normalizeScores } from "../../src/retrieval/fusion.js";
import { ToolRegistry } from "../../src/retrieval/registry.js";
import type { RetrievalTool, ToolHit } from "../../src/retrieval/types.js";
import { cityTable } from "../helpers.js";

function fixedTool(name: string, hits: Array<[string, number]>): RetrievalTool {
  return {
    name,
    async search(_query, _table, topK): Promise<ToolHit[]> {
      return hits.slice(0, topK).map(([locator, score]) => ({ locator, score, content: `cell ${locator}` }));
    },
  };
}

function brokenTool(name: string): RetrievalTool {
  return {
    name,
    async search(): Promise<ToolHit[]> {
      throw new Error("index unavailable");
    },
  };
}

function fusionOf(...tools: RetrievalTool[]): RetrievalFusion {
  const registry = new ToolRegistry();
  for (const tool of tools) registry.add(tool);
  return new RetrievalFusion(registry, { weights: { sparse: 0.3, dense: 0.7 }, defaultWeight: 0.5 });
}

describe("normalizeScores", () => {
  it("maps scores onto [0, 1]", () => {
    expect(normalizeScores([4, 3, 2])).toEqual([1, 0.5, 0]);
  });

  it("maps a single distinct score to 1", () => {
    expect(normalizeScores([0.4, 0.4])).toEqual([1, 1]);
    expect(normalizeScores([])).toEqual([]);
  });
});

describe("RetrievalFusion", () => {
  it("combines weighted normalised scores and dedupes by locator", async () => {
    const fusion = fusionOf(
      fixedTool("sparse", [["x", 4], ["y", 2]]),
      fixedTool("dense", [["y", 0.9], ["z", 0.5]]),
    );

    const items = await fusion.fuse("q", cityTable, ["sparse", "dense"], 5);

    expect(items.map((i) => [i.locator, i.score])).toEqual([
      ["y", 0.7],
      ["x", 0.3],
      ["z", 0],
    ]);
    expect(items[0].sourceTool).toBe("dense");
    expect(items[0].sources).toEqual(["dense", "sparse"]);
    expect(items[1].sources).toEqual(["sparse"]);
  });

  it("breaks score ties by rank in the higher-weighted tool", async () => {
    const fusion = fusionOf(
      fixedTool("sparse", [["q", 1], ["p", 1]]),
      fixedTool("dense", [["p", 0.9], ["q", 0.9]]),
    );

    const items = await fusion.fuse("q", cityTable, ["sparse", "dense"], 5);

    expect(items.map((i) => i.locator)).toEqual(["p", "q"]);
    expect(items[0].score).toBe(items[1].score);
  });

  it("never lowers an item when one tool scores it higher", async () => {
    const dense = fixedTool("dense", [["a", 0.9], ["b", 0.8], ["c", 0.1]]);
    const rankOfC = async (sparseHits: Array<[string, number]>) => {
      const items = await fusionOf(fixedTool("sparse", sparseHits), dense).fuse("q", cityTable, ["sparse", "dense"], 5);
      const index = items.findIndex((i) => i.locator === "c");
      return { index, score: items[index].score };
    };

    const before = await rankOfC([["a", 3], ["b", 2], ["c", 1]]);
    const after = await rankOfC([["a", 3], ["c", 2.5], ["b", 2]]);
    const top = await rankOfC([["c", 5], ["a", 3], ["b", 2]]);

    expect(after.score).toBeGreaterThan(before.score);
    expect(after.index).toBeLessThanOrEqual(before.index);
    expect(top.score).toBeGreaterThan(after.score);
    expect(top.index).toBeLessThanOrEqual(after.index);
  });

  it("keeps only a tool's first hit for a repeated locator", async () => {
    const fusion = fusionOf(fixedTool("sparse", [["x", 3], ["x", 1], ["y", 2]]));
    const items = await fusion.fuse("q", cityTable, ["sparse"], 5);
    expect(items.map((i) => [i.locator, i.score])).toEqual([
      ["x", 0.3],
      ["y", 0],
    ]);
  });

  it("returns sparse-only results when the dense tool fails", async () => {
    const fusion = fusionOf(fixedTool("sparse", [["x", 4], ["y", 2]]), brokenTool("dense"));
    const items = await fusion.fuse("q", cityTable, ["sparse", "dense"], 5);

    expect(items.map((i) => [i.locator, i.score])).toEqual([
      ["x", 0.3],
      ["y", 0],
    ]);
    expect(items.every((i) => i.sourceTool === "sparse")).toBe(true);
  });

  it("skips tools that are not registered", async () => {
    const fusion = fusionOf(fixedTool("sparse", [["x", 1]]));
    const items = await fusion.fuse("q", cityTable, ["sparse", "dense"], 5);
    expect(items.map((i) => i.locator)).toEqual(["x"]);
  });

  it("returns nothing when every tool fails", async () => {
    const fusion = fusionOf(brokenTool("sparse"));
    expect(await fusion.fuse("q", cityTable, ["sparse"], 5)).toEqual([]);
  });

  it("cuts the fused list to topK", async () => {
    const fusion = fusionOf(fixedTool("dense", [["a", 3], ["b", 2], ["c", 1]]));
    const items = await fusion.fuse("q", cityTable, ["dense"], 2);
    expect(items.map((i) => i.locator)).toEqual(["a", "b"]);
  });

  it("rejects an empty tool list", async () => {
    await expect(fusionOf().fuse("q", cityTable, [], 5)).rejects.toThrow(ValidationError);
  });

  it("uses the default weight for tools without one", () => {
    const fusion = fusionOf();
    expect(fusion.weightOf("dense")).toBe(0.7);
    expect(fusion.weightOf("bm25")).toBe(0.5);
  });
});
