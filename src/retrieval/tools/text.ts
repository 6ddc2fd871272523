import type { Table } from "../../planner/types.js";

const STOP_WORDS = new Set([
  "the", "a", "an", "and", "or", "but", "in", "on", "at", "to", "for", "of", "with", "by",
  "is", "are", "was", "were", "be", "been", "have", "has", "had", "do", "does", "did",
  "will", "would", "could", "should", "what", "which", "who", "how", "from", "that", "this",
]);

export type CellDocument = {
  row: number;
  col: number;
  column: string;
  value: string;
  locator: string;
};

export function cellLocator(row: number, col: number): string {
  return `row:${row}/col:${col}`;
}

/** Every cell of the table as a retrievable document, row-major. */
export function cellDocuments(table: Table): CellDocument[] {
  const docs: CellDocument[] = [];
  table.rows.forEach((row, r) => {
    row.forEach((cell, c) => {
      docs.push({
        row: r,
        col: c,
        column: table.columns[c] ?? `col_${c}`,
        value: String(cell),
        locator: cellLocator(r, c),
      });
    });
  });
  return docs;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/\w+/g) ?? [];
}

/** Distinct lowercase query terms longer than two characters, stop words removed. */
export function extractKeywords(query: string): string[] {
  return [...new Set(tokenize(query).filter((w) => w.length > 2 && !STOP_WORDS.has(w)))];
}

/** Stable descending sort by score; equal scores keep table order. */
export function rankHits<T extends { score: number }>(hits: T[], topK: number): T[] {
  return hits
    .map((hit, i) => ({ hit, i }))
    .sort((a, b) => b.hit.score - a.hit.score || a.i - b.i)
    .slice(0, topK)
    .map(({ hit }) => hit);
}
