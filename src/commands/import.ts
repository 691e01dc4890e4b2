// src/commands/import.ts
import { extname } from "path";
import { Command, Option } from "commander";
import { readSchemaFile, readTextFile } from "../util/fs.js";
import { parseInteger } from "../util/helper.js";
import { parseDdl } from "../db/ddl.js";
import { buildSchemaFromOpenApi } from "../importers/openapi.js";
import type {
  ImportOptions,
  ImportSource,
} from "../types/commands/import.type.js";
import { writeDerivedSchema } from "./introspect.js";
import { reportFailure } from "./report.js";

export function importCmd(): Command {
  const cmd = new Command("import");

  cmd
    .description("Derive a generator schema from SQL DDL or an OpenAPI document")
    .argument("<file>", "SQL script (.sql) or OpenAPI JSON document (.json)")
    .addOption(
      new Option("--from <source>", "Input kind (defaults to the file extension)")
        .choices(["ddl", "openapi"])
    )
    .option("-o, --output <file>", "Output file path (defaults to stdout)")
    .option("--rows <number>", "Row count given to every table", parseInteger, 100)
    .action(async (file: string, options: ImportOptions) => {
      try {
        const source = options.from ?? sourceFromExtension(file);
        const catalogOptions = { defaultRowCount: options.rows };

        console.error(`📄 Importing ${file} (${source})...`);
        const { schema, warnings } =
          source === "ddl"
            ? parseDdl(await readTextFile(file), catalogOptions)
            : buildSchemaFromOpenApi(await readSchemaFile(file), catalogOptions);
        console.error(`✅ ${schema.tables.length} tables imported`);

        await writeDerivedSchema(schema, warnings, options.output);
      } catch (error) {
        reportFailure("Import failed", error);
        process.exit(1);
      }
    });

  return cmd;
}

export function sourceFromExtension(file: string): ImportSource {
  const ext = extname(file).toLowerCase();
  if (ext === ".sql" || ext === ".ddl") return "ddl";
  if (ext === ".json") return "openapi";
  throw new Error(
    `Cannot tell the input kind of "${file}" from its extension; pass --from ddl or --from openapi`
  );
}
