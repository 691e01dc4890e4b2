// src/types/validation.ts
import type { ScalarValue } from "./data.js";

export type SchemaViolationKind =
  | "DuplicateTable"
  | "DuplicateColumn"
  | "EmptyTable"
  | "MultiplePrimaryKeys"
  | "InvalidConstraint"
  | "InvalidTimeSeries"
  | "MissingPrimaryKeyCandidate"
  | "UnresolvedForeignKey"
  | "CyclicDependency"
  | "RowCountOutOfRange";

export type SchemaViolation = {
  table: string;
  column?: string;
  kind: SchemaViolationKind;
  message: string;
  // informational violations (MissingPrimaryKeyCandidate) never block generation
  fatal: boolean;
};

export type ValidationResult = {
  valid: boolean;
  violations: SchemaViolation[];
};

export type IntegrityViolationKind =
  | "MissingTable"
  | "RowCountMismatch"
  | "NullPrimaryKey"
  | "DuplicatePrimaryKey"
  | "DuplicateUniqueValue"
  | "DanglingForeignKey"
  | "UnexpectedNull"
  | "ForwardSelfReference";

export type IntegrityViolation = {
  kind: IntegrityViolationKind;
  table: string;
  column?: string;
  rowIndex?: number;
  value?: ScalarValue;
  message: string;
};

export type VerificationResult = {
  ok: boolean;
  violations: IntegrityViolation[];
};
