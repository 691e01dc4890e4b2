// src/core/emit.ts
import Papa from "papaparse";
import type { GeneratedTable, GenerationResult } from "../types/data.js";

/**
 * Render a table as CSV: declared columns as the header, nulls as empty fields.
 * Every line, the last included, ends with "\n".
 */
export function emitCsv(table: GeneratedTable): string {
  const fields = table.spec.columns.map((c) => c.name);
  const data = table.rows.map((row) =>
    fields.map((field) => {
      const value = row[field];
      return value === null || value === undefined ? "" : value;
    }),
  );

  // header-only tables: unparse the header as a plain row
  const csv =
    data.length > 0
      ? Papa.unparse({ fields, data }, { newline: "\n" })
      : Papa.unparse([fields], { newline: "\n" });
  return `${csv}\n`;
}

/**
 * Render a table's rows as a pretty-printed JSON array.
 */
export function emitJson(table: GeneratedTable): string {
  return JSON.stringify(table.rows, null, 2);
}

/**
 * Render the run summary (seed, order, per-table counts).
 */
export function emitSummary(result: GenerationResult): string {
  return JSON.stringify(
    {
      seed: result.seed,
      tableOrder: result.tableOrder,
      ...result.summary,
    },
    null,
    2,
  );
}
