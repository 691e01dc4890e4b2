// src/types/schema.ts
import { z } from "zod";
import {
  SchemaModelSchema,
  TableSpecSchema,
  ColumnSpecSchema,
  ColumnConstraintSchema,
  TimeSeriesSchema,
  SEMANTIC_TYPES,
} from "../models/schema.js";

export type Schema = z.infer<typeof SchemaModelSchema>;
export type TableSpec = z.infer<typeof TableSpecSchema>;
export type ColumnSpec = z.infer<typeof ColumnSpecSchema>;
export type TimeSeriesSpec = z.infer<typeof TimeSeriesSchema>;
export type ColumnConstraint = z.infer<typeof ColumnConstraintSchema>;
export type SemanticType = (typeof SEMANTIC_TYPES)[number];

export type ForeignKeySpec = Extract<ColumnSpec, { type: "foreign_key" }>;
export type ValueColumnSpec = Exclude<ColumnSpec, { type: "foreign_key" }>;

/** Raw schema shape accepted before defaults are applied */
export type SchemaInput = z.input<typeof SchemaModelSchema>;
