import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "depweight-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeSizedFile(path: string, bytes: number): Promise<void> {
  await writeFile(path, "x".repeat(bytes));
}

/** A project with a package.json and an empty node_modules. */
export async function makeProject(root: string, name: string): Promise<string> {
  const dir = join(root, name);
  await mkdir(join(dir, "node_modules"), { recursive: true });
  await writeFile(join(dir, "package.json"), JSON.stringify({ name, version: "0.0.0" }));
  return dir;
}

/**
 * Install a package into `depTreeDir/dirName`. The manifest is written
 * verbatim when it is a string; `totalBytes` is the size of the whole
 * package directory, manifest included.
 */
export async function installPackage(
  depTreeDir: string,
  dirName: string,
  manifest: Record<string, unknown> | string,
  totalBytes?: number,
): Promise<string> {
  const dir = join(depTreeDir, dirName);
  await mkdir(dir, { recursive: true });
  const raw = typeof manifest === "string" ? manifest : JSON.stringify(manifest);
  await writeFile(join(dir, "package.json"), raw);
  const manifestBytes = Buffer.byteLength(raw);
  if (totalBytes !== undefined && totalBytes > manifestBytes) {
    await writeSizedFile(join(dir, "index.js"), totalBytes - manifestBytes);
  }
  return dir;
}
