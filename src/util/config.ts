// src/util/config.ts
import { GeneratorConfigSchema } from "../models/config.js";
import type {
  GeneratorConfig,
  GeneratorConfigInput,
} from "../types/config.js";

export const ENV_PREFIX = "DATASMITH_";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Config with every default applied */
export const defaultConfig: GeneratorConfig = GeneratorConfigSchema.parse({});

function numberFromEnv(
  env: NodeJS.ProcessEnv,
  key: string,
): number | undefined {
  const raw = env[`${ENV_PREFIX}${key}`];
  if (raw == null || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${ENV_PREFIX}${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Build the generator config from environment variables, then apply explicit
 * overrides (e.g. CLI flags) on top.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: GeneratorConfigInput = {},
): GeneratorConfig {
  const from = env[`${ENV_PREFIX}DATE_FROM`];
  const to = env[`${ENV_PREFIX}DATE_TO`];

  const raw: GeneratorConfigInput = {
    maxRowsPerTable: numberFromEnv(env, "MAX_ROWS_PER_TABLE"),
    nullProbability: numberFromEnv(env, "NULL_PROBABILITY"),
    selfReferenceNullProbability: numberFromEnv(
      env,
      "SELF_REFERENCE_NULL_PROBABILITY",
    ),
    maxUniqueAttempts: numberFromEnv(env, "MAX_UNIQUE_ATTEMPTS"),
    ...(from || to
      ? {
          dateRange: {
            from: from ?? defaultConfig.dateRange.from,
            to: to ?? defaultConfig.dateRange.to,
          },
        }
      : {}),
  };

  // drop unset keys so zod defaults apply
  const merged = Object.fromEntries(
    Object.entries({ ...raw, ...overrides }).filter(([, v]) => v !== undefined),
  );

  const result = GeneratorConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`,
    );
  }
  return result.data;
}
