import { writeFile, mkdir } from "fs/promises";
import { dirname } from "node:path";

/**
 * Save a value as formatted JSON
 * Creates directory if it doesn't exist
 */
export async function saveJson(filepath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });
  await writeFile(filepath, JSON.stringify(value, null, 2), "utf-8");
}
