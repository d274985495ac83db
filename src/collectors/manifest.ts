import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { ManifestError, errnoCode } from "../errors.js";
import type { PackageManifest } from "../types.js";

export const MANIFEST_FILE = "package.json";

const ManifestSchema = z.object({
  name: z.string(),
  version: z.string(),
});

/**
 * Read the name and version a package declares. Resolves to null when the
 * package has no manifest at all; a manifest that exists but cannot be
 * used is an error.
 */
export async function readManifest(packageDir: string): Promise<PackageManifest | null> {
  const manifestPath = join(packageDir, MANIFEST_FILE);

  let raw: string;
  try {
    raw = await readFile(manifestPath, "utf-8");
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ManifestError("MALFORMED_MANIFEST", manifestPath, "manifest is not valid JSON", { cause: err });
  }

  const result = ManifestSchema.safeParse(parsed);
  if (!result.success) {
    const fields = [...new Set(result.error.issues.map((i) => i.path.join(".") || "(root)"))];
    throw new ManifestError(
      "INVALID_MANIFEST",
      manifestPath,
      `expected string fields, got invalid ${fields.join(", ")}`,
    );
  }

  return { name: result.data.name, version: result.data.version };
}
