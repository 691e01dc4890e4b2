import type { Schema } from "../types/schema.js";
import type { TablePlan, GenerationPlan } from "../types/plan.js";
import type { GeneratorConfig } from "../types/config.js";
import { defaultConfig } from "../util/config.js";
import { validate } from "./validate.js";
import { order } from "./order.js";
import { SchemaValidationError } from "./errors.js";

/**
 * Build a generation plan from a schema: validate it, then order its tables.
 *
 * @throws SchemaValidationError when the schema has any fatal violation
 */
export function buildPlan(
  schema: Schema,
  seed: number,
  config: GeneratorConfig = defaultConfig,
): GenerationPlan {
  const validation = validate(schema, config);
  if (!validation.valid) {
    throw new SchemaValidationError(
      validation.violations.filter((v) => v.fatal),
    );
  }

  const tables = order(schema);
  const tablePlans = new Map<string, TablePlan>();

  for (const table of tables) {
    const parents = new Set<string>();
    let selfReferencing = false;

    for (const col of table.columns) {
      if (col.type !== "foreign_key") continue;
      if (col.references.table === table.name) {
        selfReferencing = true;
      } else {
        parents.add(col.references.table);
      }
    }

    tablePlans.set(table.name, {
      table: table.name,
      spec: table,
      rowCount: table.rowCount,
      columnCount: table.columns.length,
      dependsOn: [...parents],
      selfReferencing,
    });
  }

  return {
    seed,
    tableOrder: tables.map((t) => t.name),
    tablePlans,
    notices: validation.violations.filter((v) => !v.fatal),
  };
}
