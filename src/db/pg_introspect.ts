// src/db/pg_introspect.ts
import pg from "pg";
import type { Schema } from "../types/schema.js";
import type {
  CatalogOptions,
  PgCatalog,
  PgColumnRow,
  PgEnumRow,
  PgForeignKeyRow,
  PgKeyRow,
} from "./catalog.js";
import { buildSchemaFromCatalog } from "./catalog.js";

const { Client } = pg;

export async function introspectPostgres(
  connectionString: string,
  options: CatalogOptions,
): Promise<{ schema: Schema; warnings: string[] }> {
  const client = new Client({ connectionString });
  await client.connect();

  try {
    // 1) Tables (public schema)
    const tablesRes = await client.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
        AND table_type = 'BASE TABLE'
      ORDER BY table_name;
    `);

    // 2) Columns (udt_name carries enum type names)
    const colsRes = await client.query<PgColumnRow>(`
      SELECT
        c.table_name,
        c.column_name,
        c.udt_name,
        c.is_nullable
      FROM information_schema.columns c
      WHERE c.table_schema = 'public'
      ORDER BY c.table_name, c.ordinal_position;
    `);

    // 3) Primary keys (composite-safe)
    const pkRes = await client.query<PgKeyRow>(`
      SELECT
        tc.table_name,
        tc.constraint_name,
        kcu.column_name
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON tc.constraint_name = kcu.constraint_name
       AND tc.table_schema = kcu.table_schema
      WHERE tc.table_schema = 'public'
        AND tc.constraint_type = 'PRIMARY KEY'
      ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position;
    `);

    // 4) Foreign keys (composite-safe)
    const fkRes = await client.query<PgForeignKeyRow>(`
      SELECT
        tc.constraint_name,
        tc.table_name,
        kcu.column_name,
        kcu2.table_name AS foreign_table_name,
        kcu2.column_name AS foreign_column_name
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON tc.constraint_name = kcu.constraint_name
       AND tc.table_schema = kcu.table_schema
      JOIN information_schema.referential_constraints rc
        ON tc.constraint_name = rc.constraint_name
       AND tc.table_schema = rc.constraint_schema
      JOIN information_schema.key_column_usage kcu2
        ON rc.unique_constraint_name = kcu2.constraint_name
       AND kcu.ordinal_position = kcu2.ordinal_position
      WHERE tc.table_schema = 'public'
        AND tc.constraint_type = 'FOREIGN KEY'
      ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position;
    `);

    // 5) Unique constraints (composite-safe)
    const uniqRes = await client.query<PgKeyRow>(`
      SELECT
        tc.table_name,
        tc.constraint_name,
        kcu.column_name
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON tc.constraint_name = kcu.constraint_name
       AND tc.table_schema = kcu.table_schema
      WHERE tc.table_schema = 'public'
        AND tc.constraint_type = 'UNIQUE'
      ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position;
    `);

    // 6) Enum values (native PG enums)
    const enumRes = await client.query<PgEnumRow>(`
      SELECT
        t.typname AS enum_type,
        e.enumlabel AS enum_value
      FROM pg_type t
      JOIN pg_enum e ON t.oid = e.enumtypid
      ORDER BY t.typname, e.enumsortorder;
    `);

    const catalog: PgCatalog = {
      tables: tablesRes.rows.map((r) => r.table_name),
      columns: colsRes.rows,
      primaryKeys: pkRes.rows,
      foreignKeys: fkRes.rows,
      uniques: uniqRes.rows,
      enums: enumRes.rows,
    };

    return buildSchemaFromCatalog(catalog, options);
  } finally {
    await client.end();
  }
}
