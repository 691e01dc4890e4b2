// src/core/timeseries.ts
import type {
  ColumnSpec,
  TableSpec,
  TimeSeriesSpec,
  ValueColumnSpec,
} from "../types/schema.js";
import type { PrimaryKeyValue } from "../types/data.js";
import type { RandomSource } from "../types/rng.js";
import type { GeneratorConfig } from "../types/config.js";
import { randomFloat, randomNormal } from "../util/rng.js";

export type SeriesRole =
  | "date"
  | "open"
  | "high"
  | "low"
  | "close"
  | "volume"
  | "change";

/** Column names (lower-cased) that a time-series table fills from the walk */
export const SERIES_COLUMN_ROLES: Readonly<Record<string, SeriesRole>> = {
  date: "date",
  datetime: "date",
  ts: "date",
  open: "open",
  opening_price: "open",
  high: "high",
  highest_price: "high",
  low: "low",
  lowest_price: "low",
  close: "close",
  closing_price: "close",
  current_price: "close",
  volume: "volume",
  price_change_percentage: "change",
};

/** Roles every time-series table must cover */
export const REQUIRED_SERIES_ROLES: readonly SeriesRole[] = [
  "date",
  "open",
  "high",
  "low",
  "close",
];

export const SERIES_ROLE_TYPES: Readonly<
  Record<SeriesRole, readonly ColumnSpec["type"][]>
> = {
  date: ["date", "datetime"],
  open: ["float"],
  high: ["float"],
  low: ["float"],
  close: ["float"],
  volume: ["integer"],
  change: ["float"],
};

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_VOLATILITY = 0.02;
const INTRADAY_VOLATILITY = 0.01;

/**
 * Series role of each column of a time-series table. Empty for other tables.
 */
export function seriesRoles(table: TableSpec): Map<string, SeriesRole> {
  const roles = new Map<string, SeriesRole>();
  if (!table.timeSeries) return roles;
  for (const col of table.columns) {
    const role = SERIES_COLUMN_ROLES[col.name.toLowerCase()];
    if (role) roles.set(col.name, role);
  }
  return roles;
}

export type SeriesPoint = {
  day: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  // close relative to open, in percent
  change: number;
};

/**
 * Daily OHLC random walk: each open steps from the previous close, high and
 * low bracket open and close. Points must be requested in row order.
 */
export function createSeries(
  spec: TimeSeriesSpec,
  source: RandomSource,
  config: GeneratorConfig,
): (rowIndex: number) => SeriesPoint {
  const { rng } = source;
  const start = Date.parse(
    `${spec.start ?? config.dateRange.from.slice(0, 10)}T00:00:00.000Z`,
  );
  const volatility = spec.volatility ?? DEFAULT_VOLATILITY;
  const drift = spec.drift ?? randomFloat(rng, -0.001, 0.001);
  let price = spec.basePrice ?? Math.max(10, rng() * 100);
  let current: { rowIndex: number; point: SeriesPoint } | null = null;

  return (rowIndex) => {
    if (current && current.rowIndex === rowIndex) return current.point;
    const expected = current ? current.rowIndex + 1 : 0;
    if (rowIndex !== expected) {
      throw new Error(
        `Series points are built in order: asked for row ${rowIndex}, expected ${expected}`,
      );
    }

    const open = Math.max(0.01, price * (1 + randomNormal(rng, drift, volatility)));
    const close = Math.max(
      0.01,
      open * (1 + randomNormal(rng, 0, INTRADAY_VOLATILITY)),
    );
    const high =
      Math.max(open, close) *
      (1 + Math.abs(randomNormal(rng, 0, INTRADAY_VOLATILITY)));
    const low = Math.max(
      0.01,
      Math.min(open, close) *
        (1 - Math.abs(randomNormal(rng, 0, INTRADAY_VOLATILITY))),
    );
    const volume = Math.floor(Math.max(1, Math.exp(randomNormal(rng, 5, 0.5))));

    const point: SeriesPoint = {
      day: new Date(start + rowIndex * DAY_MS),
      open,
      high,
      low,
      close,
      volume,
      change: ((close - open) / open) * 100,
    };
    price = close;
    current = { rowIndex, point };
    return point;
  };
}

/**
 * Render one series field for a column, honouring the column's type and precision.
 */
export function seriesValue(
  point: SeriesPoint,
  role: SeriesRole,
  column: ValueColumnSpec,
): PrimaryKeyValue {
  switch (role) {
    case "date": {
      const iso = point.day.toISOString();
      return column.type === "datetime" ? iso : iso.slice(0, 10);
    }
    case "volume":
      return point.volume;
    case "change":
      return round(point.change, precisionOf(column, 4));
    default:
      return round(point[role], precisionOf(column, 2));
  }
}

function precisionOf(column: ValueColumnSpec, fallback: number): number {
  return column.type === "float" ? (column.precision ?? fallback) : fallback;
}

function round(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}
