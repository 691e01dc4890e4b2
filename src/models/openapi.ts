// src/models/openapi.ts
import { z } from "zod";
import type { OpenApiSchemaObject } from "../types/openapi.js";

// unknown keywords (description, example, items, ...) are dropped
export const OpenApiSchemaObjectSchema: z.ZodType<OpenApiSchemaObject> = z.lazy(
  () =>
    z.object({
      type: z.union([z.string(), z.array(z.string())]).optional(),
      format: z.string().optional(),
      enum: z
        .array(z.union([z.string(), z.number(), z.boolean(), z.null()]))
        .optional(),
      minimum: z.number().optional(),
      maximum: z.number().optional(),
      nullable: z.boolean().optional(),
      $ref: z.string().optional(),
      allOf: z.array(OpenApiSchemaObjectSchema).optional(),
      properties: z.record(OpenApiSchemaObjectSchema).optional(),
      required: z.array(z.string()).optional(),
    })
);

export const OpenApiDocumentSchema = z
  .object({
    openapi: z.string().optional(),
    swagger: z.string().optional(),
    components: z
      .object({ schemas: z.record(OpenApiSchemaObjectSchema).optional() })
      .optional(),
    // Swagger 2
    definitions: z.record(OpenApiSchemaObjectSchema).optional(),
  })
  .refine((doc) => doc.openapi !== undefined || doc.swagger !== undefined, {
    message: "not an OpenAPI document (no openapi or swagger version)",
  });
