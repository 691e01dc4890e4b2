// src/types/plan.ts
import type { TableSpec } from "./schema.js";
import type { SchemaViolation } from "./validation.js";

export type TablePlan = {
  table: string;
  spec: TableSpec;
  rowCount: number;
  columnCount: number;
  // parent tables, self excluded
  dependsOn: string[];
  selfReferencing: boolean;
};

export type GenerationPlan = {
  seed: number;
  tableOrder: string[];
  tablePlans: Map<string, TablePlan>;
  // non-fatal validator findings
  notices: SchemaViolation[];
};
