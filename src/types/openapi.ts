// src/types/openapi.ts
import { z } from "zod";
import { OpenApiDocumentSchema } from "../models/openapi.js";

/** The parts of an OpenAPI / Swagger schema object the importer reads */
export type OpenApiSchemaObject = {
  type?: string | string[];
  format?: string;
  enum?: Array<string | number | boolean | null>;
  minimum?: number;
  maximum?: number;
  nullable?: boolean;
  $ref?: string;
  allOf?: OpenApiSchemaObject[];
  properties?: Record<string, OpenApiSchemaObject>;
  required?: string[];
};

export type OpenApiDocument = z.infer<typeof OpenApiDocumentSchema>;
