// src/util/toposort.ts
import { CyclicDependencyError } from "../core/errors.js";
import type { TableSpec } from "../types/schema.js";

/** `from` holds a foreign key pointing at `to` through `column` */
export type FkEdge = { from: string; to: string; column: string };

/**
 * Topological sort for table ordering based on FK dependencies.
 * Returns tables in an order where parent tables come before children.
 * Among tables that are ready at the same time, the one listed first in
 * `tables` wins, so the order is stable for a given schema.
 */
export function toposort(
  tables: string[],
  edges: Array<{ from: string; to: string }>, // from depends on to (from has FK to to)
): string[] {
  const position = new Map<string, number>();
  const inDegree = new Map<string, number>();
  const adjacency = new Map<string, string[]>();

  tables.forEach((table, idx) => {
    position.set(table, idx);
    inDegree.set(table, 0);
    adjacency.set(table, []);
  });

  // In adjacency, we track: to -> [from, ...] (to must come before from)
  for (const { from, to } of edges) {
    const dependents = adjacency.get(to);
    if (!dependents || !inDegree.has(from)) continue;
    if (from === to) continue; // self-reference, resolved inside the table

    dependents.push(from);
    inDegree.set(from, (inDegree.get(from) ?? 0) + 1);
  }

  // Kahn's algorithm, always taking the earliest-declared ready table
  const ready: string[] = tables.filter((t) => inDegree.get(t) === 0);
  const result: string[] = [];

  while (ready.length > 0) {
    let best = 0;
    for (let i = 1; i < ready.length; i++) {
      if ((position.get(ready[i]!) ?? 0) < (position.get(ready[best]!) ?? 0)) {
        best = i;
      }
    }
    const [current] = ready.splice(best, 1);
    if (current === undefined) break;
    result.push(current);

    for (const neighbor of adjacency.get(current) ?? []) {
      const newDegree = (inDegree.get(neighbor) ?? 1) - 1;
      inDegree.set(neighbor, newDegree);
      if (newDegree === 0) {
        ready.push(neighbor);
      }
    }
  }

  if (result.length !== tables.length) {
    const placed = new Set(result);
    throw new CyclicDependencyError(tables.filter((t) => !placed.has(t)));
  }

  return result;
}

/**
 * Find the distinct dependency cycles among `tables`, ignoring self-references.
 * Each cycle is reported once, starting from its earliest-declared table and
 * following FK direction (child -> parent).
 */
export function findCycles(
  tables: string[],
  edges: Array<{ from: string; to: string }>,
): string[][] {
  const parents = new Map<string, string[]>();
  for (const table of tables) parents.set(table, []);
  for (const { from, to } of edges) {
    if (from === to || !parents.has(to)) continue;
    parents.get(from)?.push(to);
  }

  const state = new Map<string, "visiting" | "done">();
  const stack: string[] = [];
  const cycles: string[][] = [];
  const seen = new Set<string>();

  const visit = (table: string): void => {
    state.set(table, "visiting");
    stack.push(table);

    for (const parent of parents.get(table) ?? []) {
      const s = state.get(parent);
      if (s === "visiting") {
        const cycle = stack.slice(stack.indexOf(parent));
        const key = [...cycle].sort().join("\u0000");
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(rotateToEarliest(cycle, tables));
        }
      } else if (s === undefined) {
        visit(parent);
      }
    }

    stack.pop();
    state.set(table, "done");
  };

  for (const table of tables) {
    if (!state.has(table)) visit(table);
  }

  return cycles;
}

function rotateToEarliest(cycle: string[], order: string[]): string[] {
  let start = 0;
  for (let i = 1; i < cycle.length; i++) {
    if (order.indexOf(cycle[i]!) < order.indexOf(cycle[start]!)) start = i;
  }
  return [...cycle.slice(start), ...cycle.slice(0, start)];
}

/**
 * Build FK edges from table specs for use with toposort.
 */
export function buildFkEdges(tables: readonly TableSpec[]): FkEdge[] {
  const edges: FkEdge[] = [];

  for (const table of tables) {
    for (const col of table.columns) {
      if (col.type === "foreign_key") {
        edges.push({
          from: table.name,
          to: col.references.table,
          column: col.name,
        });
      }
    }
  }

  return edges;
}
