// src/core/generate_rows.ts
import { findPrimaryKey, hasConstraint } from "../models/schema.js";
import type {
  TableSpec,
  ForeignKeySpec,
  ValueColumnSpec,
} from "../types/schema.js";
import type {
  GeneratedRow,
  GeneratedTable,
  PrimaryKeyValue,
  ScalarValue,
} from "../types/data.js";
import type { RandomSource } from "../types/rng.js";
import type { GeneratorConfig } from "../types/config.js";
import { randomBool, randomInt, randomPick } from "../util/rng.js";
import { defaultConfig } from "../util/config.js";
import { generateValue } from "./values.js";
import { createSeries, seriesRoles, seriesValue } from "./timeseries.js";
import {
  EmptyParentTableError,
  MissingParentTableError,
  UniquenessExhaustedError,
} from "./errors.js";

type ColumnGenerator = (rowIndex: number) => ScalarValue;

/** Keys of rows emitted so far in the current pass, for self-references */
type TableState = {
  emittedKeys: PrimaryKeyValue[];
};

/**
 * Generate every row of one table. `parentTables` must already hold each
 * table this one references (other than itself); they are only read.
 * The returned table and its rows are frozen.
 */
export function generateTable(
  table: TableSpec,
  parentTables: ReadonlyMap<string, GeneratedTable>,
  source: RandomSource,
  config: GeneratorConfig = defaultConfig,
): GeneratedTable {
  const pkColumn = findPrimaryKey(table.columns);
  const state: TableState = { emittedKeys: [] };
  const roles = seriesRoles(table);
  const series = table.timeSeries
    ? createSeries(table.timeSeries, source, config)
    : null;

  // Resolve every column strategy up front so parent problems surface before any row
  const generators = table.columns.map(
    (col): [string, ColumnGenerator] => {
      if (col.type === "foreign_key") {
        return [
          col.name,
          foreignKeyGenerator(table, col, parentTables, state, source, config),
        ];
      }
      const role = roles.get(col.name);
      if (series && role) {
        return [col.name, (rowIndex) => seriesValue(series(rowIndex), role, col)];
      }
      return [col.name, valueGenerator(table, col, source, config)];
    },
  );

  const rows: Readonly<GeneratedRow>[] = [];
  const keys: PrimaryKeyValue[] = [];

  for (let i = 0; i < table.rowCount; i++) {
    const row: GeneratedRow = {};
    for (const [name, generate] of generators) {
      row[name] = generate(i);
    }

    const key = pkColumn ? row[pkColumn.name] : i;
    if (key === null || key === undefined) {
      // primary keys are never nullable, so this only happens on a broken strategy
      throw new Error(`${table.name}: row ${i} has no primary key value`);
    }

    rows.push(Object.freeze(row));
    keys.push(key);
    state.emittedKeys.push(key);
  }

  return Object.freeze({
    name: table.name,
    spec: table,
    rows: Object.freeze(rows),
    primaryKey: Object.freeze({
      column: pkColumn?.name ?? null,
      values: Object.freeze(keys),
    }),
  });
}

function valueGenerator(
  table: TableSpec,
  col: ValueColumnSpec,
  source: RandomSource,
  config: GeneratorConfig,
): ColumnGenerator {
  const isPrimaryKey = hasConstraint(col, "primary_key");
  const nullable = hasConstraint(col, "nullable") && !isPrimaryKey;
  const nullProbability = col.nullProbability ?? config.nullProbability;

  // Integer keys are a plain sequence: unique without any bookkeeping
  if (isPrimaryKey && col.type === "integer") {
    return (rowIndex) => rowIndex + 1;
  }

  const unique = isPrimaryKey || hasConstraint(col, "unique");
  const used = new Set<PrimaryKeyValue>();

  return (rowIndex) => {
    if (nullable && randomBool(source.rng, nullProbability)) {
      return null;
    }

    if (!unique) {
      return generateValue(col, source, config);
    }

    for (let attempt = 0; attempt < config.maxUniqueAttempts; attempt++) {
      const value = generateValue(col, source, config);
      if (!used.has(value)) {
        used.add(value);
        return value;
      }
    }
    throw new UniquenessExhaustedError(
      table.name,
      col.name,
      rowIndex,
      config.maxUniqueAttempts,
    );
  };
}

function foreignKeyGenerator(
  table: TableSpec,
  col: ForeignKeySpec,
  parentTables: ReadonlyMap<string, GeneratedTable>,
  state: TableState,
  source: RandomSource,
  config: GeneratorConfig,
): ColumnGenerator {
  const { rng } = source;
  const nullable = hasConstraint(col, "nullable");
  const unique =
    hasConstraint(col, "unique") || hasConstraint(col, "primary_key");

  if (col.references.table === table.name) {
    return selfReferenceGenerator(col, state, source, config, unique);
  }

  const parent = parentTables.get(col.references.table);
  if (!parent) {
    throw new MissingParentTableError(
      table.name,
      col.name,
      col.references.table,
    );
  }

  const parentKeys = parent.primaryKey.values;
  if (parentKeys.length === 0) {
    if (!nullable) {
      throw new EmptyParentTableError(
        table.name,
        col.name,
        col.references.table,
      );
    }
    return () => null;
  }

  const nullProbability = col.nullProbability ?? config.nullProbability;
  // one-to-one links draw parent keys without replacement
  const pool = unique ? [...parentKeys] : null;

  return (rowIndex) => {
    if (nullable && randomBool(rng, nullProbability)) {
      return null;
    }
    if (!pool) {
      return randomPick(rng, parentKeys);
    }
    if (pool.length === 0) {
      if (nullable) return null;
      throw new UniquenessExhaustedError(
        table.name,
        col.name,
        rowIndex,
        parentKeys.length,
      );
    }
    return takeRandom(rng, pool);
  };
}

/**
 * Self-references only ever point at rows emitted earlier in this pass, and
 * the first row is always a root (null).
 */
function selfReferenceGenerator(
  col: ForeignKeySpec,
  state: TableState,
  source: RandomSource,
  config: GeneratorConfig,
  unique: boolean,
): ColumnGenerator {
  const { rng } = source;
  const nullProbability =
    col.nullProbability ?? config.selfReferenceNullProbability;
  // earlier keys not yet taken, for unique self-references
  const available: PrimaryKeyValue[] = [];
  let seen = 0;

  return (rowIndex) => {
    if (rowIndex === 0 || randomBool(rng, nullProbability)) {
      return null;
    }

    const earlier = state.emittedKeys;
    if (!unique) {
      return randomPick(rng, earlier);
    }

    while (seen < earlier.length) {
      const key = earlier[seen++];
      if (key !== undefined) available.push(key);
    }
    return available.length > 0 ? takeRandom(rng, available) : null;
  };
}

/** Remove and return a random element (swap-remove) */
function takeRandom<T>(rng: () => number, pool: T[]): T {
  const idx = randomInt(rng, 0, pool.length - 1);
  const value = pool[idx];
  const last = pool.pop();
  if (value === undefined || last === undefined) {
    throw new Error("Cannot take from empty pool");
  }
  if (idx < pool.length) {
    pool[idx] = last;
  }
  return value;
}
