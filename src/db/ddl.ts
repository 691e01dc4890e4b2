// src/db/ddl.ts
import { SchemaParseError } from "../core/errors.js";
import type { Schema } from "../types/schema.js";
import { buildSchemaFromCatalog } from "./catalog.js";
import type { CatalogOptions, PgCatalog } from "./catalog.js";

// "quoted", `backticked`, [bracketed] or bare identifiers
const IDENT = String.raw`(?:"(?:[^"]|"")*"|\x60[^\x60]*\x60|\[[^\]]*\]|[A-Za-z_][\w$]*)`;
const QNAME = String.raw`${IDENT}(?:\s*\.\s*${IDENT})*`;

const CREATE_TABLE = new RegExp(
  String.raw`^CREATE\s+(?:OR\s+REPLACE\s+)?(?:(?:GLOBAL|LOCAL)\s+)?(?:(?:TEMP|TEMPORARY|UNLOGGED)\s+)?TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?(${QNAME})\s*\(`,
  "i"
);
const CREATE_ENUM = new RegExp(
  String.raw`^CREATE\s+TYPE\s+(${QNAME})\s+AS\s+ENUM\s*\(`,
  "i"
);
const ALTER_TABLE = new RegExp(
  String.raw`^ALTER\s+TABLE\s+(?:IF\s+EXISTS\s+)?(?:ONLY\s+)?(${QNAME})\s+([\s\S]*)$`,
  "i"
);

const PRIMARY_KEY = new RegExp(
  String.raw`^(?:CONSTRAINT\s+(${IDENT})\s+)?PRIMARY\s+KEY\s*\(([^)]*)\)`,
  "i"
);
const UNIQUE = new RegExp(
  String.raw`^(?:CONSTRAINT\s+(${IDENT})\s+)?UNIQUE(?:\s+(?:KEY|INDEX))?(?:\s+(${IDENT}))?\s*\(([^)]*)\)`,
  "i"
);
const FOREIGN_KEY = new RegExp(
  String.raw`^(?:CONSTRAINT\s+(${IDENT})\s+)?FOREIGN\s+KEY(?:\s+${IDENT})?\s*\(([^)]*)\)\s*REFERENCES\s+(${QNAME})(?:\s*\(([^)]*)\))?`,
  "i"
);
const IGNORED_ELEMENT = new RegExp(
  String.raw`^(?:CONSTRAINT\s+${IDENT}\s+)?(?:CHECK|EXCLUDE)\b|^(?:KEY|INDEX|FULLTEXT|SPATIAL)\b(?:\s+${IDENT})?\s*\(`,
  "i"
);

const COLUMN = new RegExp(String.raw`^(${IDENT})\s+([\s\S]+)$`);
const INLINE_ENUM = /^ENUM\s*\(/i;
const TYPE_END =
  /\s+(?:NOT|NULL|PRIMARY|UNIQUE|REFERENCES|DEFAULT|CHECK|CONSTRAINT|COLLATE|GENERATED|AUTO_INCREMENT|IDENTITY|COMMENT|ON)\b/i;
const INLINE_REFERENCES = new RegExp(
  String.raw`\bREFERENCES\s+(${QNAME})(?:\s*\(\s*(${IDENT})\s*\))?`,
  "i"
);

const ADD_CONSTRAINT = /^ADD\s+(?=(?:CONSTRAINT|PRIMARY|UNIQUE|FOREIGN)\b)/i;
const ADD_COLUMN = /^ADD\s+(?:COLUMN\s+)?(?:IF\s+NOT\s+EXISTS\s+)?/i;

/** Dialect spellings mapped onto the Postgres udt names the catalog reads */
const TYPE_ALIASES = new Map<string, string>([
  ["int", "int4"],
  ["integer", "int4"],
  ["mediumint", "int4"],
  ["smallint", "int2"],
  ["tinyint", "int2"],
  ["smallserial", "int2"],
  ["bigint", "int8"],
  ["serial", "serial4"],
  ["bigserial", "serial8"],
  ["double precision", "float8"],
  ["double", "float8"],
  ["float", "float8"],
  ["real", "float4"],
  ["decimal", "numeric"],
  ["money", "numeric"],
  ["boolean", "bool"],
  ["bit", "bool"],
  ["character varying", "varchar"],
  ["nvarchar", "varchar"],
  ["character", "bpchar"],
  ["char", "bpchar"],
  ["nchar", "bpchar"],
  ["datetime", "timestamp"],
  ["datetime2", "timestamp"],
  ["uniqueidentifier", "uuid"],
]);

const CLOSING_QUOTES = new Map<string, string>([
  ["'", "'"],
  ['"', '"'],
  ["`", "`"],
  ["[", "]"],
]);

type PendingKey = {
  table: string;
  constraint: string;
  columns: string[];
};

type PendingForeignKey = PendingKey & {
  refTable: string;
  // null = the parent's primary key
  refColumns: string[] | null;
};

type DdlState = {
  catalog: PgCatalog;
  columnsByTable: Map<string, Set<string>>;
  primaryKeys: PendingKey[];
  uniques: PendingKey[];
  foreignKeys: PendingForeignKey[];
  warnings: string[];
};

/**
 * Read CREATE TABLE, CREATE TYPE ... AS ENUM and ALTER TABLE ... ADD
 * statements from a SQL dump into a generator schema. Other statements are
 * ignored. Keys are resolved after the whole script is read, so constraints
 * may be added before or after the tables they name.
 *
 * Unquoted identifiers fold to lower case; quoted ones keep their case.
 */
export function parseDdl(
  sql: string,
  options: CatalogOptions
): { schema: Schema; warnings: string[] } {
  const state: DdlState = {
    catalog: {
      tables: [],
      columns: [],
      primaryKeys: [],
      foreignKeys: [],
      uniques: [],
      enums: [],
    },
    columnsByTable: new Map(),
    primaryKeys: [],
    uniques: [],
    foreignKeys: [],
    warnings: [],
  };

  for (const statement of splitTopLevel(stripComments(sql), ";")) {
    const create = CREATE_TABLE.exec(statement);
    if (create) {
      readCreateTable(state, statement, create);
      continue;
    }
    const enumType = CREATE_ENUM.exec(statement);
    if (enumType) {
      readEnumType(state, statement, enumType);
      continue;
    }
    const alter = ALTER_TABLE.exec(statement);
    if (alter) {
      readAlterTable(state, alter);
    }
  }

  if (state.catalog.tables.length === 0) {
    throw new SchemaParseError(["no CREATE TABLE statement found"]);
  }

  resolveKeys(state);
  const { schema, warnings } = buildSchemaFromCatalog(state.catalog, options);
  return { schema, warnings: [...state.warnings, ...warnings] };
}

function readCreateTable(
  state: DdlState,
  statement: string,
  match: RegExpExecArray
): void {
  const table = tableName(match[1] ?? "");
  const open = match[0].length - 1;
  const close = matchingParen(statement, open);
  if (close < 0) {
    throw new SchemaParseError([`CREATE TABLE ${table}: unbalanced parentheses`]);
  }
  if (state.columnsByTable.has(table)) {
    state.warnings.push(`${table}: declared more than once; later definition skipped`);
    return;
  }

  state.catalog.tables.push(table);
  state.columnsByTable.set(table, new Set());
  for (const element of splitTopLevel(statement.slice(open + 1, close), ",")) {
    readTableElement(state, table, element);
  }
}

function readEnumType(
  state: DdlState,
  statement: string,
  match: RegExpExecArray
): void {
  const name = tableName(match[1] ?? "");
  const open = match[0].length - 1;
  const close = matchingParen(statement, open);
  if (close < 0) {
    throw new SchemaParseError([`CREATE TYPE ${name}: unbalanced parentheses`]);
  }
  for (const value of stringLiterals(statement.slice(open + 1, close))) {
    state.catalog.enums.push({ enum_type: name, enum_value: value });
  }
}

function readAlterTable(state: DdlState, match: RegExpExecArray): void {
  const table = tableName(match[1] ?? "");
  if (!state.columnsByTable.has(table)) {
    state.warnings.push(`ALTER TABLE ${table}: unknown table; skipped`);
    return;
  }

  for (const action of splitTopLevel(match[2] ?? "", ",")) {
    const constraint = ADD_CONSTRAINT.exec(action);
    if (constraint) {
      readTableElement(state, table, action.slice(constraint[0].length));
      continue;
    }
    const column = ADD_COLUMN.exec(action);
    if (column) {
      readColumn(state, table, action.slice(column[0].length));
    }
  }
}

function readTableElement(state: DdlState, table: string, element: string): void {
  const pk = PRIMARY_KEY.exec(element);
  if (pk) {
    addPrimaryKey(state, table, pk[1], columnList(pk[2]));
    return;
  }

  const unique = UNIQUE.exec(element);
  if (unique) {
    addUnique(state, table, unique[1] ?? unique[2], columnList(unique[3]));
    return;
  }

  const fk = FOREIGN_KEY.exec(element);
  if (fk) {
    addForeignKey(
      state,
      table,
      fk[1],
      columnList(fk[2]),
      tableName(fk[3] ?? ""),
      fk[4] === undefined ? null : columnList(fk[4])
    );
    return;
  }

  if (IGNORED_ELEMENT.test(element)) return;
  readColumn(state, table, element);
}

function readColumn(state: DdlState, table: string, definition: string): void {
  const match = COLUMN.exec(definition);
  if (!match) {
    state.warnings.push(`${table}: could not read "${definition}"; skipped`);
    return;
  }

  const name = identifier(match[1] ?? "");
  const rest = match[2] ?? "";
  const columns = state.columnsByTable.get(table);
  if (!columns) return;
  if (columns.has(name)) {
    state.warnings.push(`${table}.${name}: declared more than once; later definition skipped`);
    return;
  }
  columns.add(name);

  let udtName: string;
  let constraints: string;
  const inlineEnum = INLINE_ENUM.exec(rest);
  const enumClose = inlineEnum ? matchingParen(rest, inlineEnum[0].length - 1) : -1;
  if (inlineEnum && enumClose >= 0) {
    // MySQL ENUM('a','b') becomes a per-column enum type
    udtName = `${table}_${name}_enum`;
    for (const value of stringLiterals(rest.slice(inlineEnum[0].length, enumClose))) {
      state.catalog.enums.push({ enum_type: udtName, enum_value: value });
    }
    constraints = stripLiterals(rest.slice(enumClose + 1));
  } else {
    const bare = stripLiterals(rest);
    const end = TYPE_END.exec(bare);
    udtName = normalizeType(end ? bare.slice(0, end.index) : bare);
    constraints = end ? bare.slice(end.index) : "";
  }

  const primary = /\bPRIMARY\s+KEY\b/i.test(constraints);
  const notNull = primary || /\bNOT\s+NULL\b/i.test(constraints);
  state.catalog.columns.push({
    table_name: table,
    column_name: name,
    udt_name: udtName,
    is_nullable: notNull ? "NO" : "YES",
  });

  if (primary) addPrimaryKey(state, table, undefined, [name]);
  if (/\bUNIQUE\b/i.test(constraints)) addUnique(state, table, undefined, [name]);

  const ref = INLINE_REFERENCES.exec(constraints);
  if (ref) {
    addForeignKey(
      state,
      table,
      undefined,
      [name],
      tableName(ref[1] ?? ""),
      ref[2] === undefined ? null : [identifier(ref[2])]
    );
  }
}

function addPrimaryKey(
  state: DdlState,
  table: string,
  constraint: string | undefined,
  columns: string[]
): void {
  if (state.primaryKeys.some((k) => k.table === table)) {
    state.warnings.push(`${table}: more than one primary key declared; keeping the first`);
    return;
  }
  state.primaryKeys.push({
    table,
    constraint: constraint ? identifier(constraint) : `${table}_pkey`,
    columns,
  });
}

function addUnique(
  state: DdlState,
  table: string,
  constraint: string | undefined,
  columns: string[]
): void {
  state.uniques.push({
    table,
    constraint: constraint ? identifier(constraint) : `${table}_${columns.join("_")}_key`,
    columns,
  });
}

function addForeignKey(
  state: DdlState,
  table: string,
  constraint: string | undefined,
  columns: string[],
  refTable: string,
  refColumns: string[] | null
): void {
  state.foreignKeys.push({
    table,
    constraint: constraint ? identifier(constraint) : `${table}_${columns.join("_")}_fkey`,
    columns,
    refTable,
    refColumns,
  });
}

/** Turn the collected keys into catalog rows, dropping ones that cannot resolve */
function resolveKeys(state: DdlState): void {
  const { catalog, warnings } = state;

  const columnsExist = (key: PendingKey): boolean => {
    const known = state.columnsByTable.get(key.table);
    const missing = key.columns.filter((c) => !known?.has(c));
    if (missing.length > 0) {
      warnings.push(
        `${key.table}.${key.constraint}: unknown column ${missing.join(", ")}; skipped`
      );
    }
    return missing.length === 0;
  };

  const pkColumns = new Map<string, string[]>();
  for (const key of state.primaryKeys) {
    if (!columnsExist(key)) continue;
    pkColumns.set(key.table, key.columns);
    for (const column of key.columns) {
      catalog.primaryKeys.push({
        table_name: key.table,
        constraint_name: key.constraint,
        column_name: column,
      });
    }
  }

  for (const key of state.uniques) {
    if (!columnsExist(key)) continue;
    for (const column of key.columns) {
      catalog.uniques.push({
        table_name: key.table,
        constraint_name: key.constraint,
        column_name: column,
      });
    }
  }

  for (const key of state.foreignKeys) {
    if (!columnsExist(key)) continue;
    const label = `${key.table}.${key.constraint}`;

    if (!state.columnsByTable.has(key.refTable)) {
      warnings.push(`${label}: references unknown table ${key.refTable}; skipped`);
      continue;
    }
    const targets = key.refColumns ?? pkColumns.get(key.refTable);
    if (!targets) {
      warnings.push(`${label}: references ${key.refTable}, which has no primary key; skipped`);
      continue;
    }
    if (targets.length !== key.columns.length) {
      warnings.push(
        `${label}: ${key.columns.length} column(s) reference ${targets.length} column(s) of ${key.refTable}; skipped`
      );
      continue;
    }

    key.columns.forEach((column, i) => {
      const target = targets[i];
      if (target === undefined) return;
      catalog.foreignKeys.push({
        table_name: key.table,
        constraint_name: key.constraint,
        column_name: column,
        foreign_table_name: key.refTable,
        foreign_column_name: target,
      });
    });
  }
}

/** Postgres udt name for a declared column type */
function normalizeType(declared: string): string {
  const isArray = /\[\s*\d*\s*\]\s*$/.test(declared);
  const type = declared
    .replace(/\[\s*\d*\s*\]/g, "")
    .replace(/\([^)]*\)/g, " ")
    .replace(/\b(?:unsigned|signed|zerofill)\b/gi, " ")
    .replace(/\s+/g, " ")
    .trim();

  const base = new RegExp(`^${QNAME}$`).test(type)
    ? tableName(type)
    : type.toLowerCase();
  const udt = TYPE_ALIASES.get(base) ?? base;
  return isArray ? `_${udt}` : udt;
}

/** Last part of a possibly schema-qualified name */
function tableName(qualified: string): string {
  const parts = qualified.match(new RegExp(IDENT, "g")) ?? [];
  return identifier(parts[parts.length - 1] ?? qualified);
}

function identifier(raw: string): string {
  const name = raw.trim();
  const first = name.charAt(0);
  const close = CLOSING_QUOTES.get(first);
  if (close !== undefined && first !== "'" && name.endsWith(close)) {
    const inner = name.slice(1, -1);
    return first === '"' ? inner.replace(/""/g, '"') : inner;
  }
  return name.toLowerCase();
}

function columnList(raw: string | undefined): string[] {
  return splitTopLevel(raw ?? "", ",").map(identifier);
}

function stringLiterals(text: string): string[] {
  return [...text.matchAll(/'((?:[^']|'')*)'/g)].map((m) =>
    (m[1] ?? "").replace(/''/g, "'")
  );
}

function stripLiterals(text: string): string {
  return text.replace(/'(?:[^']|'')*'/g, "''");
}

/**
 * Index just past the quoted or dollar-quoted run starting at `i`, or -1 when
 * no quote starts there.
 */
function quotedEnd(text: string, i: number): number {
  const ch = text.charAt(i);
  const close = CLOSING_QUOTES.get(ch);
  if (close !== undefined) {
    let j = i + 1;
    while (j < text.length) {
      if (text.charAt(j) === close) {
        // doubled quote is an escaped quote
        if (close !== "]" && text.charAt(j + 1) === close) {
          j += 2;
          continue;
        }
        return j + 1;
      }
      j++;
    }
    return text.length;
  }

  if (ch === "$") {
    const tag = /\$(?:[A-Za-z_]\w*)?\$/y;
    tag.lastIndex = i;
    const match = tag.exec(text);
    if (match) {
      const end = text.indexOf(match[0], i + match[0].length);
      return end < 0 ? text.length : end + match[0].length;
    }
  }
  return -1;
}

function stripComments(sql: string): string {
  let out = "";
  let i = 0;
  while (i < sql.length) {
    const quoted = quotedEnd(sql, i);
    if (quoted >= 0) {
      out += sql.slice(i, quoted);
      i = quoted;
      continue;
    }
    if (sql.startsWith("--", i)) {
      const eol = sql.indexOf("\n", i);
      i = eol < 0 ? sql.length : eol;
      continue;
    }
    if (sql.startsWith("/*", i)) {
      const end = sql.indexOf("*/", i + 2);
      i = end < 0 ? sql.length : end + 2;
      out += " ";
      continue;
    }
    out += sql.charAt(i);
    i++;
  }
  return out;
}

/** Split on `separator` outside quotes and parentheses */
function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  let i = 0;
  while (i < text.length) {
    const quoted = quotedEnd(text, i);
    if (quoted >= 0) {
      i = quoted;
      continue;
    }
    const ch = text.charAt(i);
    if (ch === "(") depth++;
    else if (ch === ")") depth--;
    else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
    i++;
  }
  parts.push(text.slice(start));
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

/** Index of the ")" closing the "(" at `open`, or -1 */
function matchingParen(text: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < text.length) {
    const quoted = quotedEnd(text, i);
    if (quoted >= 0) {
      i = quoted;
      continue;
    }
    const ch = text.charAt(i);
    if (ch === "(") depth++;
    else if (ch === ")") {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  return -1;
}
