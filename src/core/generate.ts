// src/core/generate.ts
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { Schema } from "../types/schema.js";
import type {
  GeneratedTable,
  GenerationResult,
  TableProgress,
} from "../types/data.js";
import type { GeneratorConfig } from "../types/config.js";
import { createRandomSource } from "../util/rng.js";
import { defaultConfig } from "../util/config.js";
import { buildPlan } from "./plan.js";
import { generateTable } from "./generate_rows.js";
import { verify } from "./verify.js";
import { GenerationAbortedError, IntegrityError } from "./errors.js";

export type GenerateOptions = {
  config?: GeneratorConfig;
  // checked between tables only, never mid-table
  signal?: AbortSignal;
  onTableComplete?: (progress: TableProgress) => void;
};

/**
 * Generate every table of a schema. Either all tables come back complete and
 * verified, or the call rejects and nothing partial is returned.
 */
export async function generate(
  schema: Schema,
  seed: number,
  options: GenerateOptions = {},
): Promise<GenerationResult> {
  const config = options.config ?? defaultConfig;
  const plan = buildPlan(schema, seed, config);
  const source = createRandomSource(seed);

  const tables = new Map<string, GeneratedTable>();
  const total = plan.tableOrder.length;

  for (const [index, tableName] of plan.tableOrder.entries()) {
    const tablePlan = plan.tablePlans.get(tableName);
    if (!tablePlan) continue;

    if (options.signal?.aborted) {
      throw new GenerationAbortedError([...tables.keys()]);
    }

    const generated = generateTable(tablePlan.spec, tables, source, config);
    tables.set(tableName, generated);

    options.onTableComplete?.({
      table: tableName,
      index,
      total,
      rows: generated.rows.length,
      progress: (index + 1) / total,
    });

    // let timers and abort signals fire between tables
    await yieldToEventLoop();
  }

  const result: GenerationResult = {
    seed,
    tableOrder: plan.tableOrder,
    tables,
    summary: summarize(plan.tableOrder, tables),
  };

  const verification = verify(result);
  if (!verification.ok) {
    throw new IntegrityError(verification.violations);
  }

  return result;
}

function summarize(
  tableOrder: string[],
  tables: ReadonlyMap<string, GeneratedTable>,
): GenerationResult["summary"] {
  const summaries = tableOrder.flatMap((name) => {
    const table = tables.get(name);
    return table
      ? [
          {
            name,
            rows: table.rows.length,
            columns: table.spec.columns.length,
          },
        ]
      : [];
  });

  return {
    tables: summaries,
    totalRows: summaries.reduce((sum, t) => sum + t.rows, 0),
    totalColumns: summaries.reduce((sum, t) => sum + t.columns, 0),
  };
}
