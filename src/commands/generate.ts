// src/commands/generate.ts
import { Command, Option } from "commander";
import { readSchemaFile, writeArtifacts } from "../util/fs.js";
import type { Artifact } from "../util/fs.js";
import { resolveOutputPath, parseInteger } from "../util/helper.js";
import { loadConfig } from "../util/config.js";
import { parseSchema } from "../core/validate.js";
import { buildPlan } from "../core/plan.js";
import { generate } from "../core/generate.js";
import { emitCsv, emitJson, emitSummary } from "../core/emit.js";
import type { GenerationResult } from "../types/data.js";
import type { Schema } from "../types/schema.js";
import type { GenerateOptions } from "../types/commands/generate.type.js";
import { formatSchemaViolation, reportFailure } from "./report.js";

export function generateCmd(): Command {
  const cmd = new Command("generate");

  cmd
    .description("Generate synthetic tables from a schema file")
    .requiredOption("-s, --schema <file>", "Path to schema JSON file")
    .option(
      "--seed <number>",
      "Random seed (defaults to the schema's seed, then the current time)",
      parseInteger
    )
    .option(
      "-o, --output <dir>",
      "Output directory (summary goes to stdout when omitted, auto-prefixes output/ for relative paths)"
    )
    .addOption(
      new Option("-f, --format <format>", "Artifact format")
        .choices(["csv", "json"])
        .default("csv")
    )
    .option("--max-rows <number>", "Maximum rows allowed per table", parseInteger)
    .option("--dry-run", "Show plan without generating data")
    .action(async (options: GenerateOptions) => {
      try {
        await processGeneration(options);
      } catch (error) {
        reportFailure("Generation failed", error);
        process.exit(1);
      }
    });

  return cmd;
}

async function processGeneration(options: GenerateOptions): Promise<void> {
  const { schema: schemaPath, format, maxRows, dryRun } = options;

  const output = resolveOutputPath("output", options.output);
  const config = loadConfig(
    process.env,
    maxRows !== undefined ? { maxRowsPerTable: maxRows } : {}
  );

  console.error("📄 Loading schema...");
  const schema = parseSchema(await readSchemaFile(schemaPath));
  console.error(`✅ Schema loaded (${schema.tables.length} tables)`);

  const seed = options.seed ?? schema.seed ?? Date.now();

  console.error("🔧 Building generation plan...");
  const plan = buildPlan(schema, seed, config);

  console.error("");
  console.error("📋 Generation Plan:");
  console.error(`   Seed: ${plan.seed}`);
  console.error(`   Table order: ${plan.tableOrder.join(" → ")}`);
  console.error("");

  for (const tableName of plan.tableOrder) {
    const tablePlan = plan.tablePlans.get(tableName);
    if (!tablePlan) continue;
    const deps = [
      ...tablePlan.dependsOn,
      ...(tablePlan.selfReferencing ? [`${tableName} (self)`] : []),
    ];
    console.error(
      `   ${tableName}: ${tablePlan.rowCount} rows × ${tablePlan.columnCount} columns${
        deps.length > 0 ? ` (depends on ${deps.join(", ")})` : ""
      }`
    );
  }
  for (const notice of plan.notices) {
    console.error(`   ${formatSchemaViolation(notice)}`);
  }
  console.error("");

  if (dryRun) {
    console.error("🚫 Dry run - skipping data generation");
    return;
  }

  console.error("🎲 Generating data...");
  const result = await generate(schema, seed, {
    config,
    onTableComplete: (p) =>
      console.error(
        `   📊 ${p.index + 1}/${p.total} ${p.table}: ${p.rows} rows (${Math.round(
          p.progress * 100
        )}%)`
      ),
  });
  console.error("🔍 Integrity verified");

  if (output) {
    console.error("📝 Writing artifacts...");
    const written = await writeArtifacts(output, buildArtifacts(result, schema, format));
    console.error(`✅ ${written.length} files written to ${output}`);
  } else {
    console.log(emitSummary(result));
  }

  console.error(
    `\n✅ Generated ${result.summary.totalRows} rows across ${result.summary.tables.length} tables`
  );
}

function buildArtifacts(
  result: GenerationResult,
  schema: Schema,
  format: GenerateOptions["format"]
): Artifact[] {
  const artifacts: Artifact[] = [];
  for (const name of result.tableOrder) {
    const table = result.tables.get(name);
    if (!table) continue;
    artifacts.push({
      fileName: `${name}.${format}`,
      content: format === "csv" ? emitCsv(table) : emitJson(table),
    });
  }
  artifacts.push({ fileName: "summary.json", content: emitSummary(result) });
  // input schema, pinned to the seed actually used
  artifacts.push({
    fileName: "schema.json",
    content: JSON.stringify({ ...schema, seed: result.seed }, null, 2),
  });
  return artifacts;
}
