// src/core/order.ts
import type { Schema, TableSpec } from "../types/schema.js";
import { toposort, buildFkEdges } from "../util/toposort.js";

/**
 * Order tables so every referenced table comes strictly before the tables
 * that reference it. Self-references are left to the row generator.
 *
 * @throws CyclicDependencyError if a cycle survives validation
 */
export function order(schema: Schema): TableSpec[] {
  const byName = new Map(schema.tables.map((t) => [t.name, t]));
  const sorted = toposort(
    schema.tables.map((t) => t.name),
    buildFkEdges(schema.tables),
  );

  return sorted.flatMap((name) => {
    const table = byName.get(name);
    return table ? [table] : [];
  });
}
