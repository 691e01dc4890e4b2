// src/types/config.ts
import { z } from "zod";
import { GeneratorConfigSchema } from "../models/config.js";

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>;
