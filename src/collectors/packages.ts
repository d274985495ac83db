import { readdir } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { basename, dirname, join } from "node:path";
import { describeError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { TraverseOptions } from "../types.js";
import { byName } from "../utils.js";
import { readManifest } from "./manifest.js";
import { dirSize } from "./size.js";
import type { UsageTable } from "./usage-table.js";

const debug = createLogger("packages");

/**
 * Record every package installed directly under a dependency-tree
 * directory. Nested node_modules inside packages are not visited.
 *
 * Returns the number of entries listed (files and skipped directories
 * included), so callers can report throughput.
 */
export async function traverseInstalledPackages(
  depTreeDir: string,
  table: UsageTable,
  options: TraverseOptions = {},
): Promise<number> {
  const project = options.project ?? basename(dirname(depTreeDir));
  const entries = (await readdir(depTreeDir, { withFileTypes: true })).sort(byName);
  let examined = entries.length;

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;

    const entryPath = join(depTreeDir, entry.name);
    if (options.includeScoped && entry.name.startsWith("@")) {
      let scoped: Dirent[];
      try {
        scoped = (await readdir(entryPath, { withFileTypes: true })).sort(byName);
      } catch (err) {
        if (!options.isolateFailures) throw err;
        options.onFailure?.({ scope: "package", path: entryPath, message: describeError(err) });
        continue;
      }
      examined += scoped.length;
      for (const sub of scoped) {
        if (!sub.isDirectory()) continue;
        await recordPackage(join(entryPath, sub.name), project, table, options);
      }
      continue;
    }

    await recordPackage(entryPath, project, table, options);
  }

  debug("%s: %d entries, %d identities so far", depTreeDir, examined, table.size);
  return examined;
}

async function recordPackage(
  packageDir: string,
  project: string,
  table: UsageTable,
  options: TraverseOptions,
): Promise<void> {
  try {
    const manifest = await readManifest(packageDir);
    if (!manifest) {
      debug("no manifest in %s, skipping", packageDir);
      return;
    }
    const sizeBytes = await dirSize(packageDir);
    table.add({
      name: manifest.name,
      version: manifest.version,
      location: packageDir,
      project,
      sizeBytes,
    });
  } catch (err) {
    if (!options.isolateFailures) throw err;
    options.onFailure?.({ scope: "package", path: packageDir, message: describeError(err) });
  }
}
