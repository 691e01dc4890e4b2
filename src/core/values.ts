// src/core/values.ts
import type { ValueColumnSpec } from "../types/schema.js";
import type { PrimaryKeyValue } from "../types/data.js";
import type { RandomSource } from "../types/rng.js";
import type { GeneratorConfig } from "../types/config.js";
import {
  randomInt,
  randomFloat,
  randomPick,
  weightedIndex,
  randomBool,
} from "../util/rng.js";

/**
 * Produce one non-null value for a column according to its semantic type.
 * Nulls, uniqueness and primary keys are handled by the row generator.
 */
export function generateValue(
  column: ValueColumnSpec,
  source: RandomSource,
  config: GeneratorConfig,
): PrimaryKeyValue {
  const { rng, faker } = source;

  switch (column.type) {
    case "integer": {
      const { min, max } = column.range ?? config.integerRange;
      const low = Math.ceil(min);
      const high = Math.floor(max);
      if (low > high) {
        throw new Error(
          `Integer column "${column.name}" has range ${min}..${max}, which contains no integer`,
        );
      }
      return randomInt(rng, low, high);
    }
    case "float": {
      const { min, max } = column.range ?? config.floatRange;
      const factor = Math.pow(10, column.precision ?? 2);
      return Math.round(randomFloat(rng, min, max) * factor) / factor;
    }
    case "string":
      return faker.string.alphanumeric({ length: randomInt(rng, 6, 12) });
    case "email":
      return faker.internet.email();
    case "phone":
      return faker.phone.number();
    case "name":
      return faker.person.fullName();
    case "address":
      return faker.location.streetAddress();
    case "url":
      return faker.internet.url();
    case "uuid":
      return faker.string.uuid();
    case "date":
      return randomDate(source, config).toISOString().slice(0, 10);
    case "datetime":
      return randomDate(source, config).toISOString();
    case "boolean":
      return randomBool(rng, column.probability ?? 0.5);
    case "categorical":
      return column.weights
        ? pickWeighted(source, column.categories, column.weights)
        : randomPick(rng, column.categories);
    default: {
      const unreachable: never = column;
      throw new Error(`Unsupported column type: ${JSON.stringify(unreachable)}`);
    }
  }
}

function randomDate(source: RandomSource, config: GeneratorConfig): Date {
  return source.faker.date.between({
    from: config.dateRange.from,
    to: config.dateRange.to,
  });
}

function pickWeighted<T>(
  source: RandomSource,
  values: readonly T[],
  weights: readonly number[],
): T {
  const value = values[weightedIndex(source.rng, weights)];
  if (value === undefined) {
    throw new Error("Weighted pick fell outside the category list");
  }
  return value;
}
