import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/errors.js";
import { ToolRegistry } from "../../src/retrieval/registry.js";
import { Bm25Tool } from "../../src/retrieval/tools/bm25.js";
import { DenseTool, cosineSimilarity, type Embedder } from "../../src/retrieval/tools/dense.js";
import { KeywordTool } from "../../src/retrieval/tools/keyword.js";
import { cellDocuments, extractKeywords } from "../../src/retrieval/tools/text.js";
import { cityTable } from "../helpers.js";

describe("text helpers", () => {
  it("extracts distinct keywords without stop words", () => {
    expect(extractKeywords("What is the population of Paris and of paris?")).toEqual(["population", "paris"]);
  });

  it("addresses cells by row and column", () => {
    const docs = cellDocuments(cityTable);
    expect(docs).toHaveLength(12);
    expect(docs[5]).toEqual({ row: 1, col: 2, column: "population", value: "513000", locator: "row:1/col:2" });
  });
});

describe("KeywordTool", () => {
  it("scores cells by the share of keywords they contain", async () => {
    const hits = await new KeywordTool().search("France population", cityTable, 5);
    expect(hits).toEqual([
      { content: "country: France", locator: "row:0/col:1", score: 0.5 },
      { content: "country: France", locator: "row:1/col:1", score: 0.5 },
    ]);
  });

  it("returns nothing for a query without keywords", async () => {
    expect(await new KeywordTool().search("what is it", cityTable, 5)).toEqual([]);
  });
});

describe("Bm25Tool", () => {
  it("ranks the rare term above the common one", async () => {
    const hits = await new Bm25Tool().search("Berlin population", cityTable, 3);
    expect(hits.map((h) => h.locator)).toEqual(["row:2/col:0", "row:0/col:2", "row:1/col:2"]);
    expect(hits[0].score).toBeGreaterThan(hits[1].score);
  });
});

describe("DenseTool", () => {
  const embedder: Embedder = {
    async embed(texts) {
      return texts.map((t) => (t === "capital of France" || t.includes("Paris") ? [1, 0] : [0, 1]));
    },
  };

  it("keeps cells above the similarity threshold", async () => {
    const hits = await new DenseTool({ embedder }).search("capital of France", cityTable, 5);
    expect(hits).toEqual([{ content: "city: Paris", locator: "row:0/col:0", score: 1 }]);
  });

  it("falls back to word overlap without an embedder", async () => {
    const hits = await new DenseTool().search("population of Paris", cityTable, 3);
    expect(hits.map((h) => [h.locator, h.score])).toEqual([
      ["row:0/col:0", 0.5],
      ["row:0/col:2", 0.5],
      ["row:1/col:2", 0.5],
    ]);
  });

  it("computes cosine similarity", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe("ToolRegistry", () => {
  it("rejects duplicate names", () => {
    const registry = new ToolRegistry();
    registry.add(new KeywordTool());
    expect(() => registry.add(new KeywordTool())).toThrow(ValidationError);
    expect(() => registry.add(new KeywordTool())).toThrow('Retrieval tool "sparse" already registered');
  });

  it("lists and removes tools", () => {
    const registry = new ToolRegistry();
    registry.add(new KeywordTool());
    registry.add(new DenseTool());
    expect(registry.names()).toEqual(["sparse", "dense"]);
    expect(registry.remove("sparse")).toBe(true);
    expect(registry.has("sparse")).toBe(false);
    expect(registry.list().map((t) => t.name)).toEqual(["dense"]);
  });
});
