// src/importers/openapi.ts
import { OpenApiDocumentSchema } from "../models/openapi.js";
import { SchemaParseError } from "../core/errors.js";
import { inferSemanticType } from "../db/catalog.js";
import type { CatalogOptions } from "../db/catalog.js";
import type { OpenApiSchemaObject } from "../types/openapi.js";
import type {
  ColumnConstraint,
  ColumnSpec,
  Schema,
  TableSpec,
} from "../types/schema.js";

const MAX_REF_DEPTH = 8;

type FormatType = "date" | "datetime" | "email" | "uuid" | "url";

const STRING_FORMATS = new Map<string, FormatType>([
  ["date", "date"],
  ["date-time", "datetime"],
  ["email", "email"],
  ["uuid", "uuid"],
  ["uri", "url"],
  ["url", "url"],
]);

type Definition = {
  name: string;
  schema: OpenApiSchemaObject;
};

type ImportContext = {
  definitions: Map<string, OpenApiSchemaObject>;
  // definition name -> table name, for object schemas only
  tableOf: Map<string, string>;
  warnings: string[];
};

/**
 * Convert the object schemas of an OpenAPI 3 (`components.schemas`) or
 * Swagger 2 (`definitions`) document into a generator schema, one table per
 * object schema. A property that `$ref`s another object schema becomes a
 * foreign key to it; an `id` property becomes the primary key.
 */
export function buildSchemaFromOpenApi(
  document: unknown,
  options: CatalogOptions
): { schema: Schema; warnings: string[] } {
  const parsed = OpenApiDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new SchemaParseError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }

  const entries: Definition[] = [
    ...Object.entries(parsed.data.components?.schemas ?? {}),
    ...Object.entries(parsed.data.definitions ?? {}),
  ].map(([name, schema]) => ({ name, schema }));

  const ctx: ImportContext = {
    definitions: new Map(entries.map((d) => [d.name, d.schema])),
    tableOf: new Map(),
    warnings: [],
  };

  const owners = new Map<string, string>();
  const objects: Definition[] = [];
  for (const def of entries) {
    if (!isObjectSchema(def.schema)) continue;
    const table = toTableName(def.name);
    const owner = owners.get(table);
    if (owner !== undefined) {
      ctx.warnings.push(
        `${def.name}: table name ${table} already taken by ${owner}; skipped`
      );
      continue;
    }
    owners.set(table, def.name);
    ctx.tableOf.set(def.name, table);
    objects.push(def);
  }

  let tables: TableSpec[] = objects.map((def) => ({
    name: toTableName(def.name),
    rowCount: options.defaultRowCount,
    columns: convertProperties(ctx, toTableName(def.name), def.schema),
  }));

  const dropped = new Set<string>();
  for (const table of tables) {
    if (table.columns.length === 0) {
      ctx.warnings.push(`${table.name}: no columns to generate; skipped`);
      dropped.add(table.name);
    }
  }
  if (dropped.size > 0) {
    tables = tables
      .filter((t) => !dropped.has(t.name))
      .map((t) => ({
        ...t,
        columns: t.columns.filter((col) => {
          if (col.type !== "foreign_key" || !dropped.has(col.references.table)) {
            return true;
          }
          ctx.warnings.push(
            `${t.name}.${col.name}: references skipped table ${col.references.table}; skipped`
          );
          return false;
        }),
      }));
  }

  return { schema: { tables }, warnings: ctx.warnings };
}

function convertProperties(
  ctx: ImportContext,
  table: string,
  schema: OpenApiSchemaObject
): ColumnSpec[] {
  const required = new Set(schema.required ?? []);
  const columns: ColumnSpec[] = [];

  for (const [prop, def] of Object.entries(schema.properties ?? {})) {
    const column = convertProperty(ctx, table, prop, def, required.has(prop), 0);
    if (column) columns.push(column);
  }
  return columns;
}

function convertProperty(
  ctx: ImportContext,
  table: string,
  prop: string,
  def: OpenApiSchemaObject,
  required: boolean,
  depth: number
): ColumnSpec | null {
  const label = `${table}.${prop}`;

  const ref = refOf(def);
  if (ref !== undefined) {
    const target = refName(ref);
    const refTable = target === undefined ? undefined : ctx.tableOf.get(target);
    if (refTable !== undefined) {
      const selfReference = refTable === table;
      if (selfReference && required) {
        ctx.warnings.push(`${label}: self-reference made nullable`);
      }
      const nullable = selfReference || !required || def.nullable === true;
      return {
        name: prop,
        type: "foreign_key",
        constraints: nullable ? ["nullable"] : [],
        references: { table: refTable },
      };
    }

    const resolved = target === undefined ? undefined : ctx.definitions.get(target);
    if (!resolved) {
      ctx.warnings.push(`${label}: unresolved reference ${ref}; skipped`);
      return null;
    }
    if (depth >= MAX_REF_DEPTH) {
      ctx.warnings.push(`${label}: reference chain too deep; skipped`);
      return null;
    }
    return convertProperty(ctx, table, prop, resolved, required, depth + 1);
  }

  const types = def.type === undefined ? [] : [def.type].flat();
  const type = types.find((t) => t !== "null") ?? "string";
  const isPrimaryKey = prop === "id";
  const nullable =
    !isPrimaryKey &&
    (!required || def.nullable === true || types.includes("null"));
  const constraints: ColumnConstraint[] = isPrimaryKey
    ? ["primary_key"]
    : nullable
      ? ["nullable"]
      : [];

  const categories = (def.enum ?? []).filter(
    (v): v is string | number => typeof v === "string" || typeof v === "number"
  );
  if (categories.length > 0) {
    return { name: prop, type: "categorical", constraints, categories };
  }

  switch (type) {
    case "integer": {
      const range = rangeOf(def);
      if (!range || isPrimaryKey) {
        return { name: prop, type: "integer", constraints };
      }
      if (Math.ceil(range.min) > Math.floor(range.max)) {
        ctx.warnings.push(
          `${label}: range ${range.min}..${range.max} holds no integer; ignored`
        );
        return { name: prop, type: "integer", constraints };
      }
      return { name: prop, type: "integer", constraints, range };
    }
    case "number": {
      const range = rangeOf(def);
      return range
        ? { name: prop, type: "float", constraints, range }
        : { name: prop, type: "float", constraints };
    }
    case "boolean":
      return { name: prop, type: "boolean", constraints };
    case "array":
    case "object":
      ctx.warnings.push(`${label}: ${type} properties are not generated; skipped`);
      return null;
    default: {
      const format =
        def.format === undefined ? undefined : STRING_FORMATS.get(def.format);
      if (format) {
        return { name: prop, type: format, constraints };
      }
      return { name: prop, type: inferSemanticType("text", prop), constraints };
    }
  }
}

function isObjectSchema(schema: OpenApiSchemaObject): boolean {
  if (schema.type === undefined) return schema.properties !== undefined;
  return [schema.type].flat().includes("object");
}

/** `$ref`, directly or as the only member of an `allOf` */
function refOf(def: OpenApiSchemaObject): string | undefined {
  if (def.$ref !== undefined) return def.$ref;
  const [only, ...rest] = def.allOf ?? [];
  return only && rest.length === 0 ? only.$ref : undefined;
}

function refName(ref: string): string | undefined {
  const match = /^#\/(?:components\/schemas|definitions)\/(.+)$/.exec(ref);
  return match?.[1]?.replace(/~1/g, "/").replace(/~0/g, "~");
}

function rangeOf(def: OpenApiSchemaObject): { min: number; max: number } | undefined {
  const { minimum: min, maximum: max } = def;
  if (min === undefined || max === undefined || max < min) return undefined;
  return { min, max };
}

/** Lower-cased, with anything outside [a-z0-9_] replaced by "_" */
export function toTableName(schemaName: string): string {
  const name = schemaName.toLowerCase().replace(/[^a-z0-9_]/g, "_");
  return /^[0-9]/.test(name) ? `_${name}` : name;
}
