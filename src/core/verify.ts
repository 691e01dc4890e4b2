// src/core/verify.ts
import { hasConstraint } from "../models/schema.js";
import type {
  GeneratedTable,
  GenerationResult,
  PrimaryKeyValue,
} from "../types/data.js";
import type {
  IntegrityViolation,
  VerificationResult,
} from "../types/validation.js";

/**
 * Read-only safety net run after every table is generated. Any violation
 * here means the row generator or the orderer broke its contract.
 */
export function verify(result: GenerationResult): VerificationResult {
  const violations: IntegrityViolation[] = [];

  for (const table of result.tables.values()) {
    violations.push(...checkRowCount(table));
    violations.push(...checkKeysAndUniques(table));
  }
  for (const table of result.tables.values()) {
    violations.push(...checkForeignKeys(table, result.tables));
  }

  return { ok: violations.length === 0, violations };
}

function checkRowCount(table: GeneratedTable): IntegrityViolation[] {
  if (table.rows.length === table.spec.rowCount) return [];
  return [
    {
      kind: "RowCountMismatch",
      table: table.name,
      message: `${table.name}: expected ${table.spec.rowCount} rows, found ${table.rows.length}`,
    },
  ];
}

function checkKeysAndUniques(table: GeneratedTable): IntegrityViolation[] {
  const violations: IntegrityViolation[] = [];

  for (const col of table.spec.columns) {
    const isPrimaryKey = hasConstraint(col, "primary_key");
    if (!isPrimaryKey && !hasConstraint(col, "unique")) continue;

    const firstSeen = new Map<PrimaryKeyValue, number>();
    table.rows.forEach((row, rowIndex) => {
      const value = row[col.name] ?? null;
      if (value === null) {
        if (isPrimaryKey) {
          violations.push({
            kind: "NullPrimaryKey",
            table: table.name,
            column: col.name,
            rowIndex,
            value,
            message: `${table.name}.${col.name}: row ${rowIndex} has a null primary key`,
          });
        }
        return;
      }

      const earlier = firstSeen.get(value);
      if (earlier !== undefined) {
        violations.push({
          kind: isPrimaryKey ? "DuplicatePrimaryKey" : "DuplicateUniqueValue",
          table: table.name,
          column: col.name,
          rowIndex,
          value,
          message: `${table.name}.${col.name}: row ${rowIndex} repeats value ${JSON.stringify(value)} first seen at row ${earlier}`,
        });
      } else {
        firstSeen.set(value, rowIndex);
      }
    });
  }

  return violations;
}

/** Map each primary-key value of a table to the index of the row holding it */
function keyIndex(table: GeneratedTable): Map<PrimaryKeyValue, number> {
  const index = new Map<PrimaryKeyValue, number>();
  const { column } = table.primaryKey;

  table.rows.forEach((row, rowIndex) => {
    const key = column === null ? rowIndex : row[column];
    if (key !== null && key !== undefined && !index.has(key)) {
      index.set(key, rowIndex);
    }
  });
  return index;
}

function checkForeignKeys(
  table: GeneratedTable,
  tables: ReadonlyMap<string, GeneratedTable>,
): IntegrityViolation[] {
  const violations: IntegrityViolation[] = [];

  for (const col of table.spec.columns) {
    if (col.type !== "foreign_key") continue;

    const parentName = col.references.table;
    const parent = tables.get(parentName);
    if (!parent) {
      violations.push({
        kind: "MissingTable",
        table: table.name,
        column: col.name,
        message: `${table.name}.${col.name} references ${parentName}, which is missing from the result`,
      });
      continue;
    }

    const nullable = hasConstraint(col, "nullable");
    const selfReference = parentName === table.name;
    const parentKeys = keyIndex(parent);

    table.rows.forEach((row, rowIndex) => {
      const value = row[col.name] ?? null;
      if (value === null) {
        if (!nullable) {
          violations.push({
            kind: "UnexpectedNull",
            table: table.name,
            column: col.name,
            rowIndex,
            value,
            message: `${table.name}.${col.name}: row ${rowIndex} is null but the column is not nullable`,
          });
        }
        return;
      }

      const parentRow = parentKeys.get(value);
      if (parentRow === undefined) {
        violations.push({
          kind: "DanglingForeignKey",
          table: table.name,
          column: col.name,
          rowIndex,
          value,
          message: `${table.name}.${col.name}: row ${rowIndex} value ${JSON.stringify(value)} has no matching key in ${parentName}`,
        });
      } else if (selfReference && parentRow >= rowIndex) {
        violations.push({
          kind: "ForwardSelfReference",
          table: table.name,
          column: col.name,
          rowIndex,
          value,
          message: `${table.name}.${col.name}: row ${rowIndex} points at row ${parentRow}, which is not an earlier row`,
        });
      }
    });
  }

  return violations;
}
