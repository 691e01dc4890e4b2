// src/commands/report.ts
import {
  GenerationError,
  IntegrityError,
  SchemaParseError,
  SchemaValidationError,
} from "../core/errors.js";
import type {
  IntegrityViolation,
  SchemaViolation,
} from "../types/validation.js";
import { describeError } from "../util/helper.js";

export function formatSchemaViolation(v: SchemaViolation): string {
  const where = v.column ? `${v.table}.${v.column}` : v.table;
  return `${v.fatal ? "✖" : "ℹ"} [${v.kind}] ${where}: ${v.message}`;
}

export function formatIntegrityViolation(v: IntegrityViolation): string {
  const where = [
    v.table,
    v.column,
    v.rowIndex !== undefined ? `row ${v.rowIndex}` : undefined,
  ]
    .filter(Boolean)
    .join(" / ");
  const value = v.value !== undefined ? ` (value: ${JSON.stringify(v.value)})` : "";
  return `✖ [${v.kind}] ${where}${value}: ${v.message}`;
}

/**
 * Print a failure to stderr with every detail the error carries.
 */
export function reportFailure(label: string, error: unknown): void {
  if (error instanceof SchemaValidationError) {
    console.error(`❌ ${label}: schema is invalid`);
    for (const v of error.violations) {
      console.error(`   ${formatSchemaViolation(v)}`);
    }
  } else if (error instanceof IntegrityError) {
    console.error(`❌ ${label}: integrity check failed`);
    for (const v of error.violations) {
      console.error(`   ${formatIntegrityViolation(v)}`);
    }
  } else if (error instanceof SchemaParseError) {
    console.error(`❌ ${label}: schema file is malformed`);
    for (const issue of error.issues) {
      console.error(`   ✖ ${issue}`);
    }
  } else if (error instanceof GenerationError) {
    console.error(`❌ ${label} [${error.kind}]:`, error.message);
  } else {
    console.error(`❌ ${label}:`, describeError(error));
  }
}
