// src/index.ts
export { parseSchema, validate } from "./core/validate.js";
export { order } from "./core/order.js";
export { buildPlan } from "./core/plan.js";
export { generateTable } from "./core/generate_rows.js";
export { generateValue } from "./core/values.js";
export { verify } from "./core/verify.js";
export { generate } from "./core/generate.js";
export type { GenerateOptions } from "./core/generate.js";
export { emitCsv, emitJson, emitSummary } from "./core/emit.js";
export * from "./core/errors.js";
export { buildSchemaFromCatalog, inferSemanticType } from "./db/catalog.js";
export { introspectPostgres } from "./db/pg_introspect.js";
export { parseDdl } from "./db/ddl.js";
export { buildSchemaFromOpenApi } from "./importers/openapi.js";
export { createSeries, seriesRoles } from "./core/timeseries.js";
export { createRandomSource } from "./util/rng.js";
export { loadConfig, defaultConfig, ConfigError } from "./util/config.js";

export type * from "./types/schema.js";
export type * from "./types/data.js";
export type * from "./types/validation.js";
export type * from "./types/plan.js";
export type * from "./types/config.js";
export type * from "./types/rng.js";
export type * from "./types/openapi.js";
