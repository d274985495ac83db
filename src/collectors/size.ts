import { lstat, readdir } from "node:fs/promises";
import { join } from "node:path";

/**
 * Sum the sizes of everything under `path` that is not a directory.
 * Symlinks are counted as links and never followed. The first I/O error
 * rejects the whole walk.
 */
export async function dirSize(path: string): Promise<number> {
  const s = await lstat(path);
  if (!s.isDirectory()) return s.size;

  let total = 0;
  const entries = await readdir(path);
  for (const entry of entries) {
    total += await dirSize(join(path, entry));
  }
  return total;
}
