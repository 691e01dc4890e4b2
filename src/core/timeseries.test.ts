import { describe, it, expect } from "vitest";
import { createSeries, seriesRoles } from "./timeseries.js";
import { generateTable } from "./generate_rows.js";
import { parseSchema, validate } from "./validate.js";
import { createRandomSource } from "../util/rng.js";
import { defaultConfig } from "../util/config.js";
import type { TableSpec } from "../types/schema.js";
import type { GeneratedTable } from "../types/data.js";

function tableSpec(raw: unknown): TableSpec {
  const [table] = parseSchema({ tables: [raw] }).tables;
  if (!table) throw new Error("fixture has no table");
  return table;
}

const candleColumns = [
  { name: "Date", type: "date", constraints: ["primary_key"] },
  { name: "symbol", type: "categorical", categories: ["ACME"] },
  { name: "open", type: "float" },
  { name: "high", type: "float" },
  { name: "low", type: "float" },
  { name: "close", type: "float" },
  { name: "volume", type: "integer" },
  { name: "price_change_percentage", type: "float" },
];

const candles = tableSpec({
  name: "candles",
  rowCount: 30,
  columns: candleColumns,
  timeSeries: { start: "2023-03-01", basePrice: 50 },
});

const noParents = new Map<string, GeneratedTable>();

describe("seriesRoles", () => {
  it("maps known column names regardless of case", () => {
    expect([...seriesRoles(candles)]).toEqual([
      ["Date", "date"],
      ["open", "open"],
      ["high", "high"],
      ["low", "low"],
      ["close", "close"],
      ["volume", "volume"],
      ["price_change_percentage", "change"],
    ]);
  });

  it("assigns no roles to tables without a series", () => {
    const plain = tableSpec({ name: "plain", rowCount: 1, columns: candleColumns });
    expect(seriesRoles(plain).size).toBe(0);
  });
});

describe("time-series tables", () => {
  it("writes one row per consecutive day from the start date", () => {
    const table = generateTable(candles, noParents, createRandomSource(3));
    expect(table.rows.slice(0, 3).map((r) => r.Date)).toEqual([
      "2023-03-01",
      "2023-03-02",
      "2023-03-03",
    ]);
    expect(table.rows[29]?.Date).toBe("2023-03-30");
    expect(table.primaryKey.values[0]).toBe("2023-03-01");
  });

  it("keeps high and low around open and close", () => {
    const table = generateTable(candles, noParents, createRandomSource(3));
    for (const row of table.rows) {
      const { open, high, low, close, volume } = row;
      if (
        typeof open !== "number" ||
        typeof high !== "number" ||
        typeof low !== "number" ||
        typeof close !== "number"
      ) {
        throw new Error("series prices must be numbers");
      }
      expect(high).toBeGreaterThanOrEqual(Math.max(open, close));
      expect(low).toBeLessThanOrEqual(Math.min(open, close));
      expect(low).toBeGreaterThan(0);
      expect(Number.isInteger(volume)).toBe(true);
      expect(volume).toBeGreaterThanOrEqual(1);
      expect(row.symbol).toBe("ACME");
    }
  });

  it("reports the open-to-close change in percent", () => {
    const next = createSeries({ basePrice: 20 }, createRandomSource(9), defaultConfig);
    const point = next(0);
    expect(point.change).toBeCloseTo(((point.close - point.open) / point.open) * 100, 10);
  });

  it("starts at the configured date range when no start is given", () => {
    const table = generateTable(
      tableSpec({ name: "ticks", rowCount: 2, columns: candleColumns, timeSeries: {} }),
      noParents,
      createRandomSource(5),
    );
    expect(table.rows.map((r) => r.Date)).toEqual(["2022-01-01", "2022-01-02"]);
  });

  it("writes full timestamps into datetime columns", () => {
    const table = generateTable(
      tableSpec({
        name: "ticks",
        rowCount: 2,
        columns: [
          { name: "ts", type: "datetime" },
          { name: "open", type: "float" },
          { name: "high", type: "float" },
          { name: "low", type: "float" },
          { name: "close", type: "float" },
        ],
        timeSeries: { start: "2024-02-28" },
      }),
      noParents,
      createRandomSource(5),
    );
    expect(table.rows.map((r) => r.ts)).toEqual([
      "2024-02-28T00:00:00.000Z",
      "2024-02-29T00:00:00.000Z",
    ]);
  });

  it("is reproducible for the same seed", () => {
    const a = generateTable(candles, noParents, createRandomSource(11));
    const b = generateTable(candles, noParents, createRandomSource(11));
    expect(a.rows).toEqual(b.rows);
  });

  it("builds points strictly in row order", () => {
    const next = createSeries({}, createRandomSource(1), defaultConfig);
    const first = next(0);
    expect(next(0)).toBe(first);
    expect(() => next(2)).toThrow(
      "Series points are built in order: asked for row 2, expected 1",
    );
  });
});

describe("validate on time-series tables", () => {
  it("reports wrong types, keyed price columns and missing roles", () => {
    const schema = parseSchema({
      tables: [
        {
          name: "prices",
          rowCount: 5,
          timeSeries: {},
          columns: [
            { name: "date", type: "date" },
            { name: "open", type: "integer" },
            { name: "high", type: "float", constraints: ["unique"] },
            { name: "low", type: "float" },
          ],
        },
      ],
    });
    const result = validate(schema);
    expect(result.valid).toBe(false);
    expect(
      result.violations
        .filter((v) => v.kind === "InvalidTimeSeries")
        .map((v) => v.message),
    ).toEqual([
      'Column "prices.open" holds the series open and must be float, not integer',
      'Column "prices.high" is filled by the series and cannot be primary_key or unique',
      'Time series "prices" has no close column (expected one of: close, closing_price, current_price)',
    ]);
  });

  it("accepts a complete series table", () => {
    const result = validate(parseSchema({ tables: [{ ...candles }] }));
    expect(result).toEqual({ valid: true, violations: [] });
  });

  it("rejects a start date that is not a calendar date", () => {
    expect(() =>
      parseSchema({
        tables: [
          { name: "t", rowCount: 1, columns: candleColumns, timeSeries: { start: "March 1" } },
        ],
      }),
    ).toThrow("tables.0.timeSeries.start: Invalid date");
  });
});
