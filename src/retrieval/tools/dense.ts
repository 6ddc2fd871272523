import type { Table } from "../../planner/types.js";
import type { RetrievalTool, ToolHit } from "../types.js";
import { cellDocuments, extractKeywords, rankHits, tokenize } from "./text.js";

/** External embedding model. Returns one vector per input text, in order. */
export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

export type DenseToolOptions = {
  name?: string;
  embedder?: Embedder;
  /** Minimum cosine similarity when an embedder is present (default 0.3). */
  minSimilarity?: number;
  /** Minimum word-overlap score without an embedder (default 0.2, exclusive). */
  minOverlap?: number;
};

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0, normA = 0, normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Dense similarity between the query and each cell. Without an embedder it
 * degrades to the share of query keywords that appear as words in the cell
 * or its column header.
 */
export class DenseTool implements RetrievalTool {
  readonly name: string;
  readonly description = "Embedding similarity over table cells";

  private embedder?: Embedder;
  private minSimilarity: number;
  private minOverlap: number;

  constructor(opts: DenseToolOptions = {}) {
    this.name = opts.name ?? "dense";
    this.embedder = opts.embedder;
    this.minSimilarity = opts.minSimilarity ?? 0.3;
    this.minOverlap = opts.minOverlap ?? 0.2;
  }

  async search(query: string, table: Table, topK: number): Promise<ToolHit[]> {
    const docs = cellDocuments(table);
    if (docs.length === 0) return [];
    const texts = docs.map((d) => `${d.column}: ${d.value}`);

    const hits: ToolHit[] = [];
    if (this.embedder) {
      const [queryVec, ...docVecs] = await this.embedder.embed([query, ...texts]);
      docs.forEach((doc, i) => {
        const score = cosineSimilarity(queryVec ?? [], docVecs[i] ?? []);
        if (score >= this.minSimilarity) hits.push({ content: texts[i], locator: doc.locator, score });
      });
    } else {
      const queryWords = extractKeywords(query);
      if (queryWords.length === 0) return [];
      docs.forEach((doc, i) => {
        const words = new Set(tokenize(texts[i]));
        const score = queryWords.filter((w) => words.has(w)).length / queryWords.length;
        if (score > this.minOverlap) hits.push({ content: texts[i], locator: doc.locator, score });
      });
    }
    return rankHits(hits, topK);
  }
}
