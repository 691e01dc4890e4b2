import { describe, it, expect } from "vitest";
import { verify } from "./verify.js";
import { parseSchema } from "./validate.js";
import type {
  GeneratedRow,
  GeneratedTable,
  GenerationResult,
} from "../types/data.js";

const schema = parseSchema({
  tables: [
    {
      name: "customers",
      rowCount: 3,
      columns: [
        { name: "id", type: "integer", constraints: ["primary_key"] },
        { name: "email", type: "email", constraints: ["unique", "nullable"] },
      ],
    },
    {
      name: "employees",
      rowCount: 3,
      columns: [
        { name: "id", type: "integer", constraints: ["primary_key"] },
        {
          name: "manager_id",
          type: "foreign_key",
          constraints: ["nullable"],
          references: { table: "employees", column: "id" },
        },
      ],
    },
    {
      name: "orders",
      rowCount: 2,
      columns: [
        {
          name: "customer_id",
          type: "foreign_key",
          references: { table: "customers" },
        },
      ],
    },
  ],
});

function table(name: string, rows: GeneratedRow[]): GeneratedTable {
  const spec = schema.tables.find((t) => t.name === name);
  if (!spec) throw new Error(`unknown fixture table ${name}`);
  const pk = spec.columns.find((c) => c.constraints.includes("primary_key"));
  return {
    name,
    spec,
    rows,
    primaryKey: {
      column: pk?.name ?? null,
      values: rows.map((row, i) => (pk ? (row[pk.name] ?? i) : i)),
    },
  };
}

function result(tables: GeneratedTable[]): GenerationResult {
  return {
    seed: 1,
    tableOrder: tables.map((t) => t.name),
    tables: new Map(tables.map((t) => [t.name, t])),
    summary: { tables: [], totalRows: 0, totalColumns: 0 },
  };
}

const customers = table("customers", [
  { id: 1, email: "a@example.com" },
  { id: 2, email: null },
  { id: 3, email: "c@example.com" },
]);
const employees = table("employees", [
  { id: 1, manager_id: null },
  { id: 2, manager_id: 1 },
  { id: 3, manager_id: 1 },
]);
const orders = table("orders", [{ customer_id: 3 }, { customer_id: 1 }]);

describe("verify", () => {
  it("accepts a consistent result", () => {
    expect(verify(result([customers, employees, orders]))).toEqual({
      ok: true,
      violations: [],
    });
  });

  it("reports duplicate keys and unique values", () => {
    const broken = table("customers", [
      { id: 1, email: "a@example.com" },
      { id: 1, email: "a@example.com" },
      { id: 3, email: null },
    ]);
    const { ok, violations } = verify(result([broken]));
    expect(ok).toBe(false);
    expect(violations.map((v) => [v.kind, v.column, v.rowIndex])).toEqual([
      ["DuplicatePrimaryKey", "id", 1],
      ["DuplicateUniqueValue", "email", 1],
    ]);
    expect(violations[0]?.message).toBe(
      "customers.id: row 1 repeats value 1 first seen at row 0",
    );
  });

  it("reports a row count that differs from the declared rowCount", () => {
    const short = table("customers", [{ id: 1, email: null }]);
    const { violations } = verify(result([short]));
    expect(violations).toEqual([
      {
        kind: "RowCountMismatch",
        table: "customers",
        message: "customers: expected 3 rows, found 1",
      },
    ]);
  });

  it("reports dangling and null foreign keys", () => {
    // orders are keyed by row index, customers by id
    const badOrders = table("orders", [{ customer_id: 9 }, { customer_id: null }]);
    const { violations } = verify(result([customers, badOrders]));
    expect(violations.map((v) => v.kind)).toEqual([
      "DanglingForeignKey",
      "UnexpectedNull",
    ]);
    expect(violations[0]?.message).toBe(
      "orders.customer_id: row 0 value 9 has no matching key in customers",
    );
  });

  it("reports self-references to the same or a later row", () => {
    const forward = table("employees", [
      { id: 1, manager_id: null },
      { id: 2, manager_id: 2 },
      { id: 3, manager_id: 1 },
    ]);
    const { violations } = verify(result([forward]));
    expect(violations).toEqual([
      {
        kind: "ForwardSelfReference",
        table: "employees",
        column: "manager_id",
        rowIndex: 1,
        value: 2,
        message: "employees.manager_id: row 1 points at row 1, which is not an earlier row",
      },
    ]);
  });

  it("reports a referenced table missing from the result", () => {
    const { violations } = verify(result([orders]));
    expect(violations.map((v) => [v.kind, v.table, v.column])).toEqual([
      ["MissingTable", "orders", "customer_id"],
    ]);
  });
});
