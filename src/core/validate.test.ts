import { describe, it, expect } from "vitest";
import { parseSchema, validate } from "./validate.js";
import { SchemaParseError } from "./errors.js";
import { GeneratorConfigSchema } from "../models/config.js";

const customersAndOrders = {
  tables: [
    {
      name: "customers",
      rowCount: 50,
      columns: [
        { name: "id", type: "integer", constraints: ["primary_key"] },
        { name: "name", type: "name" },
      ],
    },
    {
      name: "orders",
      rowCount: 200,
      columns: [
        { name: "id", type: "integer", constraints: ["primary_key"] },
        {
          name: "customer_id",
          type: "foreign_key",
          references: { table: "customers", column: "id" },
        },
      ],
    },
  ],
};

describe("parseSchema", () => {
  it("applies defaults to constraints", () => {
    const schema = parseSchema(customersAndOrders);
    expect(schema.tables[0]?.columns[1]?.constraints).toEqual([]);
  });

  it("rejects unknown semantic types", () => {
    const raw = {
      tables: [
        { name: "t", rowCount: 1, columns: [{ name: "c", type: "ipv6" }] },
      ],
    };
    try {
      parseSchema(raw);
      expect.unreachable("parseSchema should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaParseError);
      const issues = error instanceof SchemaParseError ? error.issues : [];
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(
        /^tables\.0\.columns\.0\.type: Invalid discriminator value/,
      );
    }
  });

  it("rejects categorical weights that do not match the categories", () => {
    const raw = {
      tables: [
        {
          name: "t",
          rowCount: 1,
          columns: [
            {
              name: "tier",
              type: "categorical",
              categories: ["free", "pro"],
              weights: [1],
            },
          ],
        },
      ],
    };
    expect(() => parseSchema(raw)).toThrow(
      "tables.0.columns.0.weights: weights must have one entry per category",
    );
  });

  it("rejects table names that are not plain identifiers", () => {
    const raw = {
      tables: [
        { name: "../../escape", rowCount: 1, columns: [{ name: "v", type: "string" }] },
      ],
    };
    expect(() => parseSchema(raw)).toThrow(
      "tables.0.name: table names may only use letters, digits and underscores, and must not start with a digit",
    );
  });

  it("reserves the run artifact names in any case", () => {
    for (const name of ["summary", "Schema"]) {
      const raw = {
        tables: [{ name, rowCount: 1, columns: [{ name: "v", type: "string" }] }],
      };
      expect(() => parseSchema(raw)).toThrow(
        "tables.0.name: table names summary and schema are reserved for run artifacts",
      );
    }
  });

  it("rejects an integer range with no whole number in it", () => {
    const raw = {
      tables: [
        {
          name: "t",
          rowCount: 1,
          columns: [{ name: "n", type: "integer", range: { min: 0.2, max: 0.8 } }],
        },
      ],
    };
    expect(() => parseSchema(raw)).toThrow(
      "tables.0.columns.0.range: range must contain at least one integer",
    );
  });

  it("accepts a fractional integer range that spans a whole number", () => {
    const schema = parseSchema({
      tables: [
        {
          name: "t",
          rowCount: 1,
          columns: [{ name: "n", type: "integer", range: { min: 0.5, max: 1.5 } }],
        },
      ],
    });
    expect(schema.tables[0]?.columns[0]).toMatchObject({ range: { min: 0.5, max: 1.5 } });
  });
});

describe("validate", () => {
  it("accepts a sound schema", () => {
    const result = validate(parseSchema(customersAndOrders));
    expect(result).toEqual({ valid: true, violations: [] });
  });

  it("stops at duplicate table names", () => {
    const schema = parseSchema({
      tables: [
        { name: "a", rowCount: 1, columns: [{ name: "x", type: "string" }] },
        { name: "a", rowCount: 1, columns: [] },
      ],
    });
    const result = validate(schema);
    expect(result.valid).toBe(false);
    // the empty column list belongs to a later category and is not reported
    expect(result.violations.map((v) => v.kind)).toEqual(["DuplicateTable"]);
  });

  it("collects every per-table column problem together", () => {
    const schema = parseSchema({
      tables: [
        {
          name: "a",
          rowCount: 1,
          columns: [
            { name: "id", type: "integer", constraints: ["primary_key"] },
            { name: "id", type: "string" },
          ],
        },
        {
          name: "b",
          rowCount: 1,
          columns: [
            {
              name: "k1",
              type: "uuid",
              constraints: ["primary_key", "nullable"],
            },
            { name: "k2", type: "uuid", constraints: ["primary_key"] },
          ],
        },
        { name: "c", rowCount: 1, columns: [] },
      ],
    });
    const result = validate(schema);
    expect(result.valid).toBe(false);
    expect(
      result.violations.map((v) => [v.kind, v.table, v.column ?? null]),
    ).toEqual([
      ["DuplicateColumn", "a", "id"],
      ["InvalidConstraint", "b", "k1"],
      ["MultiplePrimaryKeys", "b", null],
      ["EmptyTable", "c", null],
    ]);
  });

  it("rejects a range on an integer primary key", () => {
    const schema = parseSchema({
      tables: [
        {
          name: "accounts",
          rowCount: 5,
          columns: [
            {
              name: "id",
              type: "integer",
              constraints: ["primary_key"],
              range: { min: 100, max: 999 },
            },
          ],
        },
      ],
    });
    const result = validate(schema);
    expect(result.valid).toBe(false);
    expect(result.violations).toEqual([
      {
        table: "accounts",
        column: "id",
        kind: "InvalidConstraint",
        message: 'Primary key "accounts.id" is numbered from 1; it cannot take a range',
        fatal: true,
      },
    ]);
  });

  it("treats a missing primary key as informational", () => {
    const schema = parseSchema({
      tables: [
        { name: "logs", rowCount: 3, columns: [{ name: "msg", type: "string" }] },
      ],
    });
    const result = validate(schema);
    expect(result.valid).toBe(true);
    expect(result.violations).toEqual([
      {
        table: "logs",
        kind: "MissingPrimaryKeyCandidate",
        message:
          'Table "logs" has no primary_key column; its row index is used instead',
        fatal: false,
      },
    ]);
  });

  it("resolves a foreign key without a column to the implicit key", () => {
    const schema = parseSchema({
      tables: [
        { name: "logs", rowCount: 3, columns: [{ name: "msg", type: "string" }] },
        {
          name: "tags",
          rowCount: 3,
          columns: [
            { name: "log", type: "foreign_key", references: { table: "logs" } },
          ],
        },
      ],
    });
    const result = validate(schema);
    expect(result.valid).toBe(true);
    expect(result.violations.every((v) => !v.fatal)).toBe(true);
  });

  it("reports unresolved foreign keys", () => {
    const schema = parseSchema({
      tables: [
        {
          name: "users",
          rowCount: 1,
          columns: [
            { name: "id", type: "integer", constraints: ["primary_key"] },
            { name: "email", type: "email" },
          ],
        },
        {
          name: "posts",
          rowCount: 1,
          columns: [
            { name: "id", type: "integer", constraints: ["primary_key"] },
            {
              name: "a",
              type: "foreign_key",
              references: { table: "authors", column: "id" },
            },
            {
              name: "b",
              type: "foreign_key",
              references: { table: "users", column: "uid" },
            },
            {
              name: "c",
              type: "foreign_key",
              references: { table: "users", column: "email" },
            },
          ],
        },
      ],
    });
    const result = validate(schema);
    expect(result.valid).toBe(false);
    expect(result.violations.map((v) => [v.kind, v.column])).toEqual([
      ["UnresolvedForeignKey", "a"],
      ["UnresolvedForeignKey", "b"],
      ["UnresolvedForeignKey", "c"],
    ]);
    expect(result.violations[2]?.message).toBe(
      'posts.c references "users.email", which is not the primary key of users',
    );
  });

  it("rejects a cycle between two tables", () => {
    const schema = parseSchema({
      tables: [
        {
          name: "A",
          rowCount: 2,
          columns: [
            { name: "id", type: "integer", constraints: ["primary_key"] },
            { name: "x", type: "foreign_key", references: { table: "B", column: "id" } },
          ],
        },
        {
          name: "B",
          rowCount: 2,
          columns: [
            { name: "id", type: "integer", constraints: ["primary_key"] },
            { name: "y", type: "foreign_key", references: { table: "A", column: "id" } },
          ],
        },
      ],
    });
    const result = validate(schema);
    expect(result.valid).toBe(false);
    expect(result.violations).toEqual([
      {
        table: "A",
        kind: "CyclicDependency",
        message: "Circular dependency: A → B → A",
        fatal: true,
      },
    ]);
  });

  it("allows nullable self-references only", () => {
    const employees = (constraints: string[]) =>
      parseSchema({
        tables: [
          {
            name: "employees",
            rowCount: 10,
            columns: [
              { name: "id", type: "integer", constraints: ["primary_key"] },
              {
                name: "manager_id",
                type: "foreign_key",
                constraints,
                references: { table: "employees", column: "id" },
              },
            ],
          },
        ],
      });

    expect(validate(employees(["nullable"])).valid).toBe(true);

    const strict = validate(employees([]));
    expect(strict.valid).toBe(false);
    expect(strict.violations.map((v) => [v.kind, v.column])).toEqual([
      ["CyclicDependency", "manager_id"],
    ]);
  });

  it("checks row counts against the configured maximum", () => {
    const config = GeneratorConfigSchema.parse({ maxRowsPerTable: 100 });
    const schema = parseSchema({
      tables: [
        { name: "empty", rowCount: 0, columns: [{ name: "v", type: "string" }] },
        { name: "huge", rowCount: 101, columns: [{ name: "v", type: "string" }] },
        { name: "fine", rowCount: 100, columns: [{ name: "v", type: "string" }] },
      ],
    });
    const result = validate(schema, config);
    expect(result.valid).toBe(false);
    expect(
      result.violations.filter((v) => v.fatal).map((v) => [v.kind, v.table]),
    ).toEqual([
      ["RowCountOutOfRange", "empty"],
      ["RowCountOutOfRange", "huge"],
    ]);
  });
});
