// src/models/schema.ts
import { z } from "zod";

export const ColumnConstraintSchema = z.enum([
  "primary_key",
  "unique",
  "nullable",
]);

/** Inclusive numeric bounds for integer/float columns */
export const NumericRange = z
  .object({
    min: z.number(),
    max: z.number(),
  })
  .refine((v) => v.max >= v.min, {
    message: "range.max must be >= range.min",
    path: ["max"],
  });

/** Integer bounds must leave at least one whole number to draw */
export const IntegerRange = NumericRange.refine(
  (v) => Math.ceil(v.min) <= Math.floor(v.max),
  { message: "range must contain at least one integer" },
);

const columnBase = {
  name: z.string().min(1),
  constraints: z.array(ColumnConstraintSchema).default([]),
  // overrides the configured null probability for nullable columns
  nullProbability: z.number().min(0).max(1).optional(),
};

export const IntegerColumn = z.object({
  ...columnBase,
  type: z.literal("integer"),
  range: IntegerRange.optional(),
});

export const FloatColumn = z.object({
  ...columnBase,
  type: z.literal("float"),
  range: NumericRange.optional(),
  precision: z.number().int().min(0).max(10).optional(),
});

export const BooleanColumn = z.object({
  ...columnBase,
  type: z.literal("boolean"),
  probability: z.number().min(0).max(1).optional(),
});

export const CategoricalColumn = z.object({
  ...columnBase,
  type: z.literal("categorical"),
  categories: z.array(z.union([z.string(), z.number()])).min(1),
  weights: z.array(z.number().min(0)).optional(),
});

/** Columns whose values come straight from a faking strategy */
export const PlainColumn = z.object({
  ...columnBase,
  type: z.enum([
    "string",
    "email",
    "phone",
    "name",
    "address",
    "url",
    "uuid",
    "date",
    "datetime",
  ]),
});

export const ForeignKeyColumn = z.object({
  ...columnBase,
  type: z.literal("foreign_key"),
  references: z.object({
    table: z.string().min(1),
    // omitted = the parent's primary key, explicit or implicit
    column: z.string().min(1).optional(),
  }),
});

export const ColumnSpecSchema = z
  .discriminatedUnion("type", [
    IntegerColumn,
    FloatColumn,
    BooleanColumn,
    CategoricalColumn,
    PlainColumn,
    ForeignKeyColumn,
  ])
  .superRefine((col, ctx) => {
    if (col.type !== "categorical" || !col.weights) return;
    if (col.weights.length !== col.categories.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "weights must have one entry per category",
        path: ["weights"],
      });
    } else if (!col.weights.some((w) => w > 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "At least one weight must be > 0",
        path: ["weights"],
      });
    }
  });

/** File names the generate command writes next to the table artifacts */
export const RESERVED_TABLE_NAMES = ["summary", "schema"] as const;

// also used as artifact file names
export const TableNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, {
    message: "table names may only use letters, digits and underscores, and must not start with a digit",
  })
  .refine(
    (name) => !RESERVED_TABLE_NAMES.some((r) => r === name.toLowerCase()),
    { message: `table names ${RESERVED_TABLE_NAMES.join(" and ")} are reserved for run artifacts` },
  );

/** OHLC random-walk settings for tables that model a price series */
export const TimeSeriesSchema = z.object({
  // first day of the series (YYYY-MM-DD); defaults to the start of the configured date range
  start: z.string().date().optional(),
  basePrice: z.number().positive().optional(),
  drift: z.number().optional(),
  volatility: z.number().min(0).optional(),
});

export const TableSpecSchema = z.object({
  name: TableNameSchema,
  rowCount: z.number().int(),
  columns: z.array(ColumnSpecSchema),
  timeSeries: TimeSeriesSchema.optional(),
});

export const SchemaModelSchema = z.object({
  seed: z.number().int().optional(),
  tables: z.array(TableSpecSchema),
});

/** Every semantic type a column may declare */
export const SEMANTIC_TYPES = [
  "integer",
  "float",
  "string",
  "email",
  "phone",
  "name",
  "address",
  "date",
  "datetime",
  "boolean",
  "url",
  "uuid",
  "categorical",
  "foreign_key",
] as const;

type ConstrainedColumn = {
  constraints: ReadonlyArray<z.infer<typeof ColumnConstraintSchema>>;
};

/** Check whether a column carries the given constraint */
export function hasConstraint(
  col: ConstrainedColumn,
  constraint: z.infer<typeof ColumnConstraintSchema>,
): boolean {
  return col.constraints.includes(constraint);
}

/** First column marked primary_key, if any (the table uses its row index otherwise) */
export function findPrimaryKey<C extends ConstrainedColumn>(
  columns: readonly C[],
): C | undefined {
  return columns.find((c) => hasConstraint(c, "primary_key"));
}
