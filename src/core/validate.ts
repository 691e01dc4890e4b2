// src/core/validate.ts
import { SchemaModelSchema, findPrimaryKey, hasConstraint } from "../models/schema.js";
import type { Schema, TableSpec } from "../types/schema.js";
import type { GeneratorConfig } from "../types/config.js";
import type {
  SchemaViolation,
  ValidationResult,
} from "../types/validation.js";
import { buildFkEdges, findCycles } from "../util/toposort.js";
import { defaultConfig } from "../util/config.js";
import { SchemaParseError } from "./errors.js";
import {
  REQUIRED_SERIES_ROLES,
  SERIES_COLUMN_ROLES,
  SERIES_ROLE_TYPES,
  seriesRoles,
} from "./timeseries.js";

/**
 * Parse raw JSON into a typed Schema. Shape problems, including unknown
 * column types, are reported here; structural rules are left to `validate`.
 */
export function parseSchema(input: unknown): Schema {
  const result = SchemaModelSchema.safeParse(input);
  if (!result.success) {
    throw new SchemaParseError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

type Check = (schema: Schema, config: GeneratorConfig) => SchemaViolation[];

/**
 * Validate a schema before generation. Checks run by category in a fixed
 * order; every violation of a category is collected, and the first category
 * with a fatal violation ends validation.
 */
export function validate(
  schema: Schema,
  config: GeneratorConfig = defaultConfig,
): ValidationResult {
  const checks: Check[] = [
    checkTableNames,
    checkColumns,
    checkForeignKeys,
    checkCycles,
    checkRowCounts,
  ];

  const violations: SchemaViolation[] = [];
  for (const check of checks) {
    const found = check(schema, config);
    violations.push(...found);
    if (found.some((v) => v.fatal)) {
      return { valid: false, violations };
    }
  }

  return { valid: true, violations };
}

function checkTableNames(schema: Schema): SchemaViolation[] {
  const violations: SchemaViolation[] = [];
  const seen = new Set<string>();

  for (const table of schema.tables) {
    if (seen.has(table.name)) {
      violations.push({
        table: table.name,
        kind: "DuplicateTable",
        message: `Table "${table.name}" is declared more than once`,
        fatal: true,
      });
    }
    seen.add(table.name);
  }

  return violations;
}

function checkColumns(schema: Schema): SchemaViolation[] {
  const violations: SchemaViolation[] = [];

  for (const table of schema.tables) {
    if (table.columns.length === 0) {
      violations.push({
        table: table.name,
        kind: "EmptyTable",
        message: `Table "${table.name}" has no columns`,
        fatal: true,
      });
      continue;
    }

    const seen = new Set<string>();
    for (const col of table.columns) {
      if (seen.has(col.name)) {
        violations.push({
          table: table.name,
          column: col.name,
          kind: "DuplicateColumn",
          message: `Column "${table.name}.${col.name}" is declared more than once`,
          fatal: true,
        });
      }
      seen.add(col.name);

      if (hasConstraint(col, "primary_key") && hasConstraint(col, "nullable")) {
        violations.push({
          table: table.name,
          column: col.name,
          kind: "InvalidConstraint",
          message: `Primary key "${table.name}.${col.name}" cannot be nullable`,
          fatal: true,
        });
      }

      if (
        col.type === "integer" &&
        col.range &&
        hasConstraint(col, "primary_key")
      ) {
        violations.push({
          table: table.name,
          column: col.name,
          kind: "InvalidConstraint",
          message: `Primary key "${table.name}.${col.name}" is numbered from 1; it cannot take a range`,
          fatal: true,
        });
      }
    }

    const primaryKeys = table.columns.filter((c) =>
      hasConstraint(c, "primary_key"),
    );
    if (primaryKeys.length > 1) {
      violations.push({
        table: table.name,
        kind: "MultiplePrimaryKeys",
        message: `Table "${table.name}" marks ${primaryKeys.length} columns as primary_key (${primaryKeys
          .map((c) => c.name)
          .join(", ")}); at most one is allowed`,
        fatal: true,
      });
    } else if (primaryKeys.length === 0) {
      violations.push({
        table: table.name,
        kind: "MissingPrimaryKeyCandidate",
        message: `Table "${table.name}" has no primary_key column; its row index is used instead`,
        fatal: false,
      });
    }

    if (table.timeSeries) {
      violations.push(...checkTimeSeries(table));
    }
  }

  return violations;
}

function checkTimeSeries(table: TableSpec): SchemaViolation[] {
  const violations: SchemaViolation[] = [];
  const roles = seriesRoles(table);

  for (const col of table.columns) {
    const role = roles.get(col.name);
    if (!role) continue;

    const allowed = SERIES_ROLE_TYPES[role];
    if (!allowed.includes(col.type)) {
      violations.push({
        table: table.name,
        column: col.name,
        kind: "InvalidTimeSeries",
        message: `Column "${table.name}.${col.name}" holds the series ${role} and must be ${allowed.join(" or ")}, not ${col.type}`,
        fatal: true,
      });
    } else if (
      role !== "date" &&
      (hasConstraint(col, "primary_key") || hasConstraint(col, "unique"))
    ) {
      violations.push({
        table: table.name,
        column: col.name,
        kind: "InvalidTimeSeries",
        message: `Column "${table.name}.${col.name}" is filled by the series and cannot be primary_key or unique`,
        fatal: true,
      });
    }
  }

  const covered = new Set(roles.values());
  for (const role of REQUIRED_SERIES_ROLES) {
    if (covered.has(role)) continue;
    const names = Object.entries(SERIES_COLUMN_ROLES)
      .filter(([, r]) => r === role)
      .map(([name]) => name);
    violations.push({
      table: table.name,
      kind: "InvalidTimeSeries",
      message: `Time series "${table.name}" has no ${role} column (expected one of: ${names.join(", ")})`,
      fatal: true,
    });
  }

  return violations;
}

function checkForeignKeys(schema: Schema): SchemaViolation[] {
  const violations: SchemaViolation[] = [];
  const tables = new Map<string, TableSpec>(
    schema.tables.map((t) => [t.name, t]),
  );

  for (const table of schema.tables) {
    for (const col of table.columns) {
      if (col.type !== "foreign_key") continue;

      const { table: refTable, column: refColumn } = col.references;
      const target = `${refTable}${refColumn ? `.${refColumn}` : ""}`;
      const parent = tables.get(refTable);

      if (!parent) {
        violations.push({
          table: table.name,
          column: col.name,
          kind: "UnresolvedForeignKey",
          message: `${table.name}.${col.name} references unknown table "${refTable}"`,
          fatal: true,
        });
        continue;
      }

      if (refColumn === undefined) continue; // parent's primary key, explicit or implicit

      if (!parent.columns.some((c) => c.name === refColumn)) {
        violations.push({
          table: table.name,
          column: col.name,
          kind: "UnresolvedForeignKey",
          message: `${table.name}.${col.name} references unknown column "${target}"`,
          fatal: true,
        });
        continue;
      }

      const parentKey = findPrimaryKey(parent.columns);
      if (parentKey?.name !== refColumn) {
        violations.push({
          table: table.name,
          column: col.name,
          kind: "UnresolvedForeignKey",
          message: `${table.name}.${col.name} references "${target}", which is not the primary key of ${refTable}`,
          fatal: true,
        });
      }
    }
  }

  return violations;
}

function checkCycles(schema: Schema): SchemaViolation[] {
  const violations: SchemaViolation[] = [];

  for (const table of schema.tables) {
    for (const col of table.columns) {
      if (
        col.type === "foreign_key" &&
        col.references.table === table.name &&
        !hasConstraint(col, "nullable")
      ) {
        violations.push({
          table: table.name,
          column: col.name,
          kind: "CyclicDependency",
          message: `${table.name}.${col.name} references its own table and must be nullable`,
          fatal: true,
        });
      }
    }
  }

  const edges = buildFkEdges(schema.tables);
  const cycles = findCycles(
    schema.tables.map((t) => t.name),
    edges,
  );
  for (const cycle of cycles) {
    const [first] = cycle;
    if (first === undefined) continue;
    violations.push({
      table: first,
      kind: "CyclicDependency",
      message: `Circular dependency: ${[...cycle, first].join(" → ")}`,
      fatal: true,
    });
  }

  return violations;
}

function checkRowCounts(
  schema: Schema,
  config: GeneratorConfig,
): SchemaViolation[] {
  const violations: SchemaViolation[] = [];

  for (const table of schema.tables) {
    if (table.rowCount < 1 || table.rowCount > config.maxRowsPerTable) {
      violations.push({
        table: table.name,
        kind: "RowCountOutOfRange",
        message: `Table "${table.name}" asks for ${table.rowCount} rows; allowed range is 1..${config.maxRowsPerTable}`,
        fatal: true,
      });
    }
  }

  return violations;
}
