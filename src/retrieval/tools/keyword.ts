import type { Table } from "../../planner/types.js";
import type { RetrievalTool, ToolHit } from "../types.js";
import { cellDocuments, extractKeywords, rankHits } from "./text.js";

/** Sparse keyword match: share of query keywords found in a cell. */
export class KeywordTool implements RetrievalTool {
  readonly name: string;
  readonly description = "Keyword match over table cells";

  constructor(name = "sparse") {
    this.name = name;
  }

  async search(query: string, table: Table, topK: number): Promise<ToolHit[]> {
    const keywords = extractKeywords(query);
    if (keywords.length === 0) return [];

    const hits: ToolHit[] = [];
    for (const doc of cellDocuments(table)) {
      const text = doc.value.toLowerCase();
      const matched = keywords.filter((kw) => text.includes(kw)).length;
      if (matched > 0) {
        hits.push({ content: `${doc.column}: ${doc.value}`, locator: doc.locator, score: matched / keywords.length });
      }
    }
    return rankHits(hits, topK);
  }
}
