import type { Table } from "../../planner/types.js";
import type { RetrievalTool, ToolHit } from "../types.js";
import { cellDocuments, extractKeywords, rankHits, tokenize } from "./text.js";

export type Bm25Options = {
  name?: string;
  k1?: number;
  b?: number;
};

/**
 * Okapi BM25 where each cell, prefixed with its column name, is a document.
 */
export class Bm25Tool implements RetrievalTool {
  readonly name: string;
  readonly description = "BM25 ranking over table cells";

  private k1: number;
  private b: number;

  constructor(opts: Bm25Options = {}) {
    this.name = opts.name ?? "bm25";
    this.k1 = opts.k1 ?? 1.2;
    this.b = opts.b ?? 0.75;
  }

  async search(query: string, table: Table, topK: number): Promise<ToolHit[]> {
    const terms = extractKeywords(query);
    const docs = cellDocuments(table).map((doc) => ({ doc, tokens: tokenize(`${doc.column} ${doc.value}`) }));
    if (terms.length === 0 || docs.length === 0) return [];

    const avgLength = docs.reduce((sum, d) => sum + d.tokens.length, 0) / docs.length;
    const docFreq = new Map<string, number>();
    for (const { tokens } of docs) {
      for (const term of new Set(tokens)) docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }

    const hits: ToolHit[] = [];
    for (const { doc, tokens } of docs) {
      let score = 0;
      for (const term of terms) {
        const tf = tokens.filter((t) => t === term).length;
        if (tf === 0) continue;
        const df = docFreq.get(term) ?? 0;
        const idf = Math.log(1 + (docs.length - df + 0.5) / (df + 0.5));
        const norm = tf + this.k1 * (1 - this.b + (this.b * tokens.length) / (avgLength || 1));
        score += (idf * tf * (this.k1 + 1)) / norm;
      }
      if (score > 0) {
        hits.push({ content: `${doc.column}: ${doc.value}`, locator: doc.locator, score });
      }
    }
    return rankHits(hits, topK);
  }
}
