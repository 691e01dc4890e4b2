import { isAbsolute, join, normalize, sep } from "path";
import { InvalidArgumentError } from "commander";

/**
 * Place a relative output path under `baseDir`, unless it is absolute or
 * already starts there. Returns undefined when no path was given.
 */
export function resolveOutputPath(
  baseDir: string,
  rawOutput?: string
): string | undefined {
  if (!rawOutput) return undefined;
  const output = normalize(rawOutput);
  if (isAbsolute(output) || output === baseDir || output.startsWith(`${baseDir}${sep}`)) {
    return output;
  }
  return join(baseDir, output);
}

/** commander argument parser for whole numbers (seeds, row counts) */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

/** Error message for logging, whatever was thrown */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
