import type { Table } from "../planner/types.js";

/** One ranked hit from a single tool. Scores are tool-local. */
export type ToolHit = {
  content: string;
  locator: string;
  score: number;
};

export interface RetrievalTool {
  name: string;
  description?: string;

  search(query: string, table: Table, topK: number): Promise<ToolHit[]>;
}
