import { promises as fs } from "fs";
import path from "path";
import type { Logger } from "../core/logger.js";

/**
 * Deletes regular files directly inside `directory` whose name ends with one of
 * `suffixes`. Subdirectories are never entered.
 */
export async function cleanDirectory(directory: string, suffixes: readonly string[], log: Logger): Promise<Set<string>> {
  const dir = path.resolve(directory);
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const deleted = new Set<string>();

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (!suffixes.some((suffix) => entry.name.endsWith(suffix))) continue;
    await fs.rm(path.join(dir, entry.name));
    deleted.add(entry.name);
  }

  if (!deleted.size) log.debug({ directory: dir }, "no job files found");
  else log.debug({ directory: dir, count: deleted.size }, "removed job files");
  return deleted;
}
