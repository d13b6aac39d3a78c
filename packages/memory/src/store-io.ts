import { readFile, mkdir, rename, open } from "node:fs/promises";
import { dirname } from "node:path";
import type { ValidationResult } from "@townsim/schemas";

export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, "utf-8");
  return JSON.parse(content);
}

export async function readValidatedJson<T>(
  filePath: string,
  validate: (data: unknown) => ValidationResult<T>
): Promise<T> {
  const result = validate(await readJsonFile(filePath));
  if (!result.valid) {
    throw new Error(`Invalid contents in ${filePath}: ${result.errors.join(", ")}`);
  }
  return result.value;
}

/** Write to a temp file, fsync, then rename over the target. */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = filePath + ".tmp";
  const fh = await open(tmpPath, "w");
  try {
    await fh.writeFile(JSON.stringify(data, null, 2) + "\n", "utf-8");
    await fh.sync();
  } finally {
    await fh.close();
  }
  await rename(tmpPath, filePath);
}
