// src/core/errors.ts
import type {
  IntegrityViolation,
  SchemaViolation,
} from "../types/validation.js";

export type GenerationErrorKind =
  | "SchemaParse"
  | "SchemaValidation"
  | "CyclicDependency"
  | "EmptyParentTable"
  | "UniquenessExhausted"
  | "MissingParentTable"
  | "Integrity"
  | "Aborted";

/**
 * Base class for every failure raised by the generator. `kind` lets callers
 * map errors to job status without instanceof chains.
 */
export abstract class GenerationError extends Error {
  abstract readonly kind: GenerationErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SchemaParseError extends GenerationError {
  readonly kind = "SchemaParse";

  constructor(readonly issues: string[]) {
    super(`Invalid schema:\n  ${issues.join("\n  ")}`);
  }
}

export class SchemaValidationError extends GenerationError {
  readonly kind = "SchemaValidation";

  constructor(readonly violations: SchemaViolation[]) {
    super(
      `Schema has ${violations.length} violation(s): ${violations
        .map((v) => v.message)
        .join("; ")}`,
    );
  }
}

export class CyclicDependencyError extends GenerationError {
  readonly kind = "CyclicDependency";

  constructor(readonly tables: string[]) {
    super(
      `Circular dependency detected involving tables: ${tables.join(", ")}`,
    );
  }
}

export class EmptyParentTableError extends GenerationError {
  readonly kind = "EmptyParentTable";

  constructor(
    readonly table: string,
    readonly column: string,
    readonly parentTable: string,
  ) {
    super(
      `${table}.${column} references ${parentTable}, which has no rows to sample from`,
    );
  }
}

export class UniquenessExhaustedError extends GenerationError {
  readonly kind = "UniquenessExhausted";

  constructor(
    readonly table: string,
    readonly column: string,
    readonly rowIndex: number,
    readonly attempts: number,
  ) {
    super(
      `${table}.${column}: no unused value found for row ${rowIndex} after ${attempts} attempt(s)`,
    );
  }
}

export class MissingParentTableError extends GenerationError {
  readonly kind = "MissingParentTable";

  constructor(
    readonly table: string,
    readonly column: string,
    readonly parentTable: string,
  ) {
    super(
      `${table}.${column} references ${parentTable}, which has not been generated yet`,
    );
  }
}

export class IntegrityError extends GenerationError {
  readonly kind = "Integrity";

  constructor(readonly violations: IntegrityViolation[]) {
    super(
      `Integrity check failed with ${violations.length} violation(s): ${violations
        .slice(0, 5)
        .map((v) => v.message)
        .join("; ")}`,
    );
  }
}

export class GenerationAbortedError extends GenerationError {
  readonly kind = "Aborted";

  constructor(readonly completedTables: string[]) {
    super(
      `Generation aborted after ${completedTables.length} completed table(s)`,
    );
  }
}
