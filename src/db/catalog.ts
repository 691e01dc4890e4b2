// src/db/catalog.ts
import type {
  ColumnConstraint,
  ColumnSpec,
  Schema,
  SemanticType,
  TableSpec,
} from "../types/schema.js";

export type PgColumnRow = {
  table_name: string;
  column_name: string;
  udt_name: string;
  is_nullable: "YES" | "NO";
};

export type PgKeyRow = {
  table_name: string;
  constraint_name: string;
  column_name: string;
};

export type PgForeignKeyRow = PgKeyRow & {
  foreign_table_name: string;
  foreign_column_name: string;
};

export type PgEnumRow = {
  enum_type: string;
  enum_value: string;
};

/** Raw rows read from information_schema / pg_catalog */
export type PgCatalog = {
  tables: string[];
  columns: PgColumnRow[];
  primaryKeys: PgKeyRow[];
  foreignKeys: PgForeignKeyRow[];
  uniques: PgKeyRow[];
  enums: PgEnumRow[];
};

export type CatalogOptions = {
  defaultRowCount: number;
};

type PlainType = Exclude<SemanticType, "foreign_key" | "categorical">;

const INTEGER_TYPES = new Set([
  "int2",
  "int4",
  "int8",
  "smallint",
  "integer",
  "bigint",
  "serial",
  "serial4",
  "serial8",
  "bigserial",
]);
const FLOAT_TYPES = new Set(["float4", "float8", "numeric", "decimal", "real"]);
const TEXT_TYPES = new Set(["text", "varchar", "bpchar", "citext", "name"]);

const NAME_PATTERNS: Array<[RegExp, PlainType]> = [
  [/email/, "email"],
  [/(phone|mobile|cell|tel)/, "phone"],
  [/(^|_)(full_?|first_?|last_?|sur)?name$/, "name"],
  [/(address|addr)/, "address"],
  [/(url|website|link|href)/, "url"],
];

/**
 * Map a Postgres column type (udt_name) to a semantic type. Text columns
 * are refined by column name (email, phone, ...).
 */
export function inferSemanticType(dbType: string, colName: string): PlainType {
  const type = dbType.toLowerCase();

  if (type === "uuid") return "uuid";
  if (INTEGER_TYPES.has(type)) return "integer";
  if (FLOAT_TYPES.has(type)) return "float";
  if (type === "bool" || type === "boolean") return "boolean";
  if (type === "date") return "date";
  if (type.includes("timestamp")) return "datetime";

  if (TEXT_TYPES.has(type) || type.startsWith("character")) {
    const name = colName.toLowerCase();
    for (const [regex, semantic] of NAME_PATTERNS) {
      if (regex.test(name)) return semantic;
    }
  }

  return "string";
}

/** Group key rows by table + constraint, keeping column order */
function groupConstraints(rows: PgKeyRow[]): Map<string, PgKeyRow[]> {
  const groups = new Map<string, PgKeyRow[]>();
  for (const r of rows) {
    const key = `${r.table_name}::${r.constraint_name}`;
    const group = groups.get(key) ?? [];
    group.push(r);
    groups.set(key, group);
  }
  return groups;
}

/**
 * Turn introspected catalog rows into a generator schema. Constructs the
 * generator cannot express (composite keys, FKs to non-key columns) are
 * dropped and listed in `warnings`.
 */
export function buildSchemaFromCatalog(
  catalog: PgCatalog,
  options: CatalogOptions,
): { schema: Schema; warnings: string[] } {
  const warnings: string[] = [];

  const enumMap = new Map<string, string[]>();
  for (const r of catalog.enums) {
    const arr = enumMap.get(r.enum_type) ?? [];
    arr.push(r.enum_value);
    enumMap.set(r.enum_type, arr);
  }

  // single-column primary keys
  const pkByTable = new Map<string, string>();
  for (const group of groupConstraints(catalog.primaryKeys).values()) {
    const [first] = group;
    if (!first) continue;
    if (group.length > 1) {
      warnings.push(
        `${first.table_name}: composite primary key (${group
          .map((r) => r.column_name)
          .join(", ")}) replaced by the row index`,
      );
      continue;
    }
    pkByTable.set(first.table_name, first.column_name);
  }

  // single-column unique constraints
  const uniqueColumns = new Set<string>();
  for (const group of groupConstraints(catalog.uniques).values()) {
    const [first] = group;
    if (first && group.length === 1) {
      uniqueColumns.add(`${first.table_name}.${first.column_name}`);
    }
  }

  // single-column FKs that point at the parent's primary key
  const fkByColumn = new Map<string, string>();
  const fkGroups = new Map<string, PgForeignKeyRow[]>();
  for (const r of catalog.foreignKeys) {
    const key = `${r.table_name}::${r.constraint_name}`;
    const group = fkGroups.get(key) ?? [];
    group.push(r);
    fkGroups.set(key, group);
  }
  for (const group of fkGroups.values()) {
    const [first] = group;
    if (!first) continue;
    const label = `${first.table_name}.${first.constraint_name}`;
    if (group.length > 1) {
      warnings.push(`${label}: composite foreign key skipped`);
      continue;
    }
    if (pkByTable.get(first.foreign_table_name) !== first.foreign_column_name) {
      warnings.push(
        `${label}: references ${first.foreign_table_name}.${first.foreign_column_name}, which is not its primary key; skipped`,
      );
      continue;
    }
    fkByColumn.set(
      `${first.table_name}.${first.column_name}`,
      first.foreign_table_name,
    );
  }

  const columnsByTable = new Map<string, ColumnSpec[]>();
  for (const r of catalog.columns) {
    const id = `${r.table_name}.${r.column_name}`;
    const isPrimaryKey = pkByTable.get(r.table_name) === r.column_name;

    const constraints: ColumnConstraint[] = [];
    if (isPrimaryKey) constraints.push("primary_key");
    else if (uniqueColumns.has(id)) constraints.push("unique");
    if (r.is_nullable === "YES" && !isPrimaryKey) constraints.push("nullable");

    const refTable = fkByColumn.get(id);
    const enumValues = enumMap.get(r.udt_name);

    let column: ColumnSpec;
    if (refTable !== undefined) {
      column = {
        name: r.column_name,
        type: "foreign_key",
        constraints,
        references: { table: refTable },
      };
    } else if (enumValues && enumValues.length > 0) {
      column = {
        name: r.column_name,
        type: "categorical",
        constraints,
        categories: enumValues,
      };
    } else {
      column = {
        name: r.column_name,
        type: inferSemanticType(r.udt_name, r.column_name),
        constraints,
      };
    }

    const cols = columnsByTable.get(r.table_name) ?? [];
    cols.push(column);
    columnsByTable.set(r.table_name, cols);
  }

  const tables: TableSpec[] = catalog.tables.map((name) => ({
    name,
    rowCount: options.defaultRowCount,
    columns: columnsByTable.get(name) ?? [],
  }));

  return { schema: { tables }, warnings };
}
