import { describe, it, expect } from "vitest";
import { ConfigError, defaultConfig, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults with an empty environment", () => {
    expect(loadConfig({})).toEqual(defaultConfig);
    expect(defaultConfig.maxUniqueAttempts).toBe(100);
    expect(defaultConfig.nullProbability).toBe(0.1);
  });

  it("reads prefixed environment variables", () => {
    const config = loadConfig({
      DATASMITH_MAX_ROWS_PER_TABLE: "500",
      DATASMITH_NULL_PROBABILITY: "0.25",
      DATASMITH_DATE_FROM: "2020-06-01T00:00:00.000Z",
    });
    expect(config.maxRowsPerTable).toBe(500);
    expect(config.nullProbability).toBe(0.25);
    expect(config.dateRange).toEqual({
      from: "2020-06-01T00:00:00.000Z",
      to: defaultConfig.dateRange.to,
    });
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig(
      { DATASMITH_MAX_ROWS_PER_TABLE: "500" },
      { maxRowsPerTable: 20 },
    );
    expect(config.maxRowsPerTable).toBe(20);
  });

  it("rejects values that are not numbers", () => {
    expect(() => loadConfig({ DATASMITH_MAX_UNIQUE_ATTEMPTS: "lots" })).toThrow(
      new ConfigError('DATASMITH_MAX_UNIQUE_ATTEMPTS must be a number, got "lots"'),
    );
  });

  it("rejects values outside their range", () => {
    expect(() => loadConfig({ DATASMITH_NULL_PROBABILITY: "1.5" })).toThrow(
      /^Invalid configuration: nullProbability: /,
    );
  });

  it("rejects a default integer range with no whole number in it", () => {
    expect(() =>
      loadConfig({}, { integerRange: { min: 0.2, max: 0.8 } }),
    ).toThrow(
      "Invalid configuration: integerRange: range must contain at least one integer",
    );
  });

  it("rejects a date range that ends before it starts", () => {
    expect(() =>
      loadConfig({
        DATASMITH_DATE_FROM: "2024-01-01T00:00:00.000Z",
        DATASMITH_DATE_TO: "2023-01-01T00:00:00.000Z",
      }),
    ).toThrow(
      "Invalid configuration: dateRange.to: dateRange.to must not be before dateRange.from",
    );
  });
});
