// src/models/config.ts
import { z } from "zod";
import { IntegerRange, NumericRange } from "./schema.js";

export const DateRange = z
  .object({
    from: z.string().datetime(),
    to: z.string().datetime(),
  })
  .refine((v) => Date.parse(v.to) >= Date.parse(v.from), {
    message: "dateRange.to must not be before dateRange.from",
    path: ["to"],
  });

export const GeneratorConfigSchema = z.object({
  maxRowsPerTable: z.number().int().positive().default(1_000_000),
  nullProbability: z.number().min(0).max(1).default(0.1),
  selfReferenceNullProbability: z.number().min(0).max(1).default(0.2),
  maxUniqueAttempts: z.number().int().positive().default(100),
  integerRange: IntegerRange.default({ min: 0, max: 1000 }),
  floatRange: NumericRange.default({ min: 0, max: 1000 }),
  // fixed bounds rather than "last N days" so output does not drift with the clock
  dateRange: DateRange.default({
    from: "2022-01-01T00:00:00.000Z",
    to: "2024-12-31T23:59:59.999Z",
  }),
});
