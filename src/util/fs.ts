// src/util/fs.ts
import { readFile, writeFile, mkdir } from "fs/promises";
import { basename, dirname, join } from "path";
import { SchemaParseError } from "../core/errors.js";

/**
 * Read a schema document from disk. Malformed JSON is reported as a
 * SchemaParseError so the CLI prints it like any other schema problem;
 * the shape itself is checked by parseSchema.
 */
export async function readSchemaFile(filePath: string): Promise<unknown> {
  const content = await readTextFile(filePath);
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaParseError([`${filePath}: ${reason}`]);
  }
}

export async function readTextFile(filePath: string): Promise<string> {
  return readFile(filePath, "utf-8");
}

/**
 * Write a text file, creating parent directories as needed.
 */
export async function writeTextFile(
  filePath: string,
  content: string
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf-8");
}

/** One output file, named relative to the artifact directory */
export type Artifact = {
  fileName: string;
  content: string;
};

/**
 * Write a batch of artifacts into `dir`, in order. Names are checked before
 * anything is written: each must be a plain file name, and no two may match
 * ignoring case.
 * @returns the paths written
 */
export async function writeArtifacts(
  dir: string,
  artifacts: readonly Artifact[]
): Promise<string[]> {
  const seen = new Set<string>();
  for (const { fileName } of artifacts) {
    if (
      fileName === "" ||
      fileName === "." ||
      fileName === ".." ||
      basename(fileName) !== fileName ||
      fileName.includes("\\")
    ) {
      throw new Error(`Artifact name "${fileName}" is not a plain file name`);
    }
    const key = fileName.toLowerCase();
    if (seen.has(key)) {
      throw new Error(`Artifact name "${fileName}" is used twice`);
    }
    seen.add(key);
  }

  const written: string[] = [];
  for (const { fileName, content } of artifacts) {
    const filePath = join(dir, fileName);
    await writeTextFile(filePath, content);
    written.push(filePath);
  }
  return written;
}
