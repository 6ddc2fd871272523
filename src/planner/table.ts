import type { Table } from "./types.js";

/** Pipe-separated preview of the first `maxRows` rows. */
export function formatTable(table: Table, maxRows: number): string {
  if (table.columns.length === 0 || table.rows.length === 0) {
    return "(empty table)";
  }
  const lines = [
    table.columns.join(" | "),
    table.columns.map((c) => "-".repeat(Math.max(c.length, 1))).join(" | "),
    ...table.rows.slice(0, maxRows).map((row) => row.map(String).join(" | ")),
  ];
  if (table.rows.length > maxRows) {
    lines.push(`... (${table.rows.length - maxRows} more rows)`);
  }
  return lines.join("\n");
}

export function describeSchema(table: Table): string {
  return `Columns: ${table.columns.join(", ")} (${table.rows.length} rows)`;
}
