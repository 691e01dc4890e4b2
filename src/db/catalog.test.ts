import { describe, it, expect } from "vitest";
import { buildSchemaFromCatalog, inferSemanticType } from "./catalog.js";
import type { PgCatalog } from "./catalog.js";
import { validate } from "../core/validate.js";

describe("inferSemanticType", () => {
  it.each([
    ["uuid", "id", "uuid"],
    ["int4", "id", "integer"],
    ["bigserial", "id", "integer"],
    ["numeric", "amount", "float"],
    ["bool", "active", "boolean"],
    ["date", "born_on", "date"],
    ["timestamptz", "created_at", "datetime"],
    ["varchar", "email_address", "email"],
    ["text", "mobile", "phone"],
    ["text", "first_name", "name"],
    ["text", "shipping_address", "address"],
    ["text", "website", "url"],
    ["text", "notes", "string"],
    ["jsonb", "payload", "string"],
  ])("maps %s %s to %s", (dbType, column, expected) => {
    expect(inferSemanticType(dbType, column)).toBe(expected);
  });
});

const catalog: PgCatalog = {
  tables: ["customers", "orders", "order_items"],
  columns: [
    { table_name: "customers", column_name: "id", udt_name: "int4", is_nullable: "NO" },
    { table_name: "customers", column_name: "email", udt_name: "varchar", is_nullable: "NO" },
    { table_name: "customers", column_name: "tier", udt_name: "customer_tier", is_nullable: "YES" },
    { table_name: "orders", column_name: "id", udt_name: "uuid", is_nullable: "NO" },
    { table_name: "orders", column_name: "customer_id", udt_name: "int4", is_nullable: "YES" },
    { table_name: "orders", column_name: "customer_email", udt_name: "varchar", is_nullable: "NO" },
    { table_name: "order_items", column_name: "order_id", udt_name: "uuid", is_nullable: "NO" },
    { table_name: "order_items", column_name: "line", udt_name: "int4", is_nullable: "NO" },
  ],
  primaryKeys: [
    { table_name: "customers", constraint_name: "customers_pkey", column_name: "id" },
    { table_name: "orders", constraint_name: "orders_pkey", column_name: "id" },
    { table_name: "order_items", constraint_name: "order_items_pkey", column_name: "order_id" },
    { table_name: "order_items", constraint_name: "order_items_pkey", column_name: "line" },
  ],
  foreignKeys: [
    {
      table_name: "orders",
      constraint_name: "orders_customer_fk",
      column_name: "customer_id",
      foreign_table_name: "customers",
      foreign_column_name: "id",
    },
    {
      table_name: "orders",
      constraint_name: "orders_email_fk",
      column_name: "customer_email",
      foreign_table_name: "customers",
      foreign_column_name: "email",
    },
    {
      table_name: "order_items",
      constraint_name: "order_items_order_fk",
      column_name: "order_id",
      foreign_table_name: "orders",
      foreign_column_name: "id",
    },
  ],
  uniques: [
    { table_name: "customers", constraint_name: "customers_email_key", column_name: "email" },
  ],
  enums: [
    { enum_type: "customer_tier", enum_value: "free" },
    { enum_type: "customer_tier", enum_value: "pro" },
  ],
};

describe("buildSchemaFromCatalog", () => {
  const { schema, warnings } = buildSchemaFromCatalog(catalog, {
    defaultRowCount: 25,
  });

  it("maps keys, uniques, enums and nullability onto columns", () => {
    expect(schema.tables.map((t) => [t.name, t.rowCount])).toEqual([
      ["customers", 25],
      ["orders", 25],
      ["order_items", 25],
    ]);
    expect(schema.tables[0]?.columns).toEqual([
      { name: "id", type: "integer", constraints: ["primary_key"] },
      { name: "email", type: "email", constraints: ["unique"] },
      {
        name: "tier",
        type: "categorical",
        constraints: ["nullable"],
        categories: ["free", "pro"],
      },
    ]);
    expect(schema.tables[1]?.columns).toEqual([
      { name: "id", type: "uuid", constraints: ["primary_key"] },
      {
        name: "customer_id",
        type: "foreign_key",
        constraints: ["nullable"],
        references: { table: "customers" },
      },
      { name: "customer_email", type: "email", constraints: [] },
    ]);
    expect(schema.tables[2]?.columns).toEqual([
      {
        name: "order_id",
        type: "foreign_key",
        constraints: [],
        references: { table: "orders" },
      },
      { name: "line", type: "integer", constraints: [] },
    ]);
  });

  it("warns about what it cannot express", () => {
    expect(warnings).toEqual([
      "order_items: composite primary key (order_id, line) replaced by the row index",
      "orders.orders_email_fk: references customers.email, which is not its primary key; skipped",
    ]);
  });

  it("produces a schema the validator accepts", () => {
    const result = validate(schema);
    expect(result.valid).toBe(true);
    expect(result.violations.map((v) => [v.kind, v.table])).toEqual([
      ["MissingPrimaryKeyCandidate", "order_items"],
    ]);
  });
});
