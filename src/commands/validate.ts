// src/commands/validate.ts
import { Command } from "commander";
import { readSchemaFile } from "../util/fs.js";
import { parseInteger } from "../util/helper.js";
import { loadConfig } from "../util/config.js";
import { parseSchema, validate } from "../core/validate.js";
import { order } from "../core/order.js";
import type { ValidateOptions } from "../types/commands/validate.type.js";
import { formatSchemaViolation, reportFailure } from "./report.js";

export function validateCmd(): Command {
  const cmd = new Command("validate");

  cmd
    .description("Check a schema file without generating data")
    .requiredOption("-s, --schema <file>", "Path to schema JSON file")
    .option("--max-rows <number>", "Maximum rows allowed per table", parseInteger)
    .action(async (options: ValidateOptions) => {
      try {
        const config = loadConfig(
          process.env,
          options.maxRows !== undefined
            ? { maxRowsPerTable: options.maxRows }
            : {}
        );

        console.error("📄 Loading schema...");
        const schema = parseSchema(await readSchemaFile(options.schema));
        const result = validate(schema, config);

        for (const violation of result.violations) {
          console.error(`   ${formatSchemaViolation(violation)}`);
        }

        if (!result.valid) {
          console.error("❌ Schema is invalid");
          process.exit(1);
        }

        const tables = order(schema).map((t) => t.name);
        console.error(`✅ Schema is valid. Table order: ${tables.join(" → ")}`);
      } catch (error) {
        reportFailure("Validation failed", error);
        process.exit(1);
      }
    });

  return cmd;
}
