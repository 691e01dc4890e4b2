// src/types/data.ts
import type { TableSpec } from "./schema.js";

export type ScalarValue = string | number | boolean | null;
export type PrimaryKeyValue = Exclude<ScalarValue, null>;

export type GeneratedRow = Record<string, ScalarValue>;

export type GeneratedTable = {
  name: string;
  spec: TableSpec;
  rows: ReadonlyArray<Readonly<GeneratedRow>>;
  primaryKey: {
    // null when the table is keyed by its 0-based row index
    column: string | null;
    values: ReadonlyArray<PrimaryKeyValue>;
  };
};

export type TableSummary = {
  name: string;
  rows: number;
  columns: number;
};

export type GenerationSummary = {
  tables: TableSummary[];
  totalRows: number;
  totalColumns: number;
};

export type GenerationResult = {
  seed: number;
  tableOrder: string[];
  tables: ReadonlyMap<string, GeneratedTable>;
  summary: GenerationSummary;
};

export type TableProgress = {
  table: string;
  index: number;
  total: number;
  rows: number;
  // fraction of tables completed, in (0, 1]
  progress: number;
};
