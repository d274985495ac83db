import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { describeError, toError } from "../errors.js";
import { createLogger } from "../logger.js";
import type {
  AggregateOptions,
  AggregatedUsage,
  Project,
  ScanFailure,
  ScanOutcome,
  UsageReport,
} from "../types.js";
import { byName, compareStrings, runQueue } from "../utils.js";
import { MANIFEST_FILE } from "./manifest.js";
import { traverseInstalledPackages } from "./packages.js";
import { UsageTable } from "./usage-table.js";

export const DEP_TREE_DIR = "node_modules";

const debug = createLogger("aggregate");

interface ProjectScan {
  table: UsageTable;
  entries: number;
  failures: ScanFailure[];
}

export function instanceCount(row: AggregatedUsage): number {
  return row.records.length;
}

export function totalSize(row: AggregatedUsage): number {
  return row.records.length * row.sizeBytes;
}

/** By name, then version. */
export function compareUsage(a: AggregatedUsage, b: AggregatedUsage): number {
  return compareStrings(a.name, b.name) || compareStrings(a.version, b.version);
}

/** Projects are the directories directly under `root`, in name order. */
export async function listProjects(root: string): Promise<Project[]> {
  const entries = await readdir(root, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory())
    .sort(byName)
    .map((e) => ({ name: e.name, path: join(root, e.name) }));
}

async function scanProject(project: Project, options: AggregateOptions): Promise<ProjectScan | null> {
  const names = await readdir(project.path);
  if (!names.includes(MANIFEST_FILE) || !names.includes(DEP_TREE_DIR)) {
    debug("%s is not an npm project, skipping", project.name);
    return null;
  }

  const table = new UsageTable();
  const failures: ScanFailure[] = [];
  const entries = await traverseInstalledPackages(join(project.path, DEP_TREE_DIR), table, {
    project: project.name,
    includeScoped: options.includeScoped,
    isolateFailures: options.isolateFailures,
    onFailure: (failure) => failures.push(failure),
  });
  return { table, entries, failures };
}

/**
 * Scan every project under `root` and group their installed packages by
 * exact name and version.
 *
 * Projects may be scanned concurrently, but their results are merged in
 * listing order, so the representative size of an identity always comes
 * from the first project (in listing order) that has it installed.
 */
export async function aggregateUsage(root: string, options: AggregateOptions = {}): Promise<UsageReport> {
  const start = Date.now();
  const projects = await listProjects(root);
  options.onProjectsFound?.(projects.length);

  const scans: (ProjectScan | null)[] = projects.map(() => null);
  const projectFailures: (ScanFailure | null)[] = projects.map(() => null);
  let done = 0;

  await runQueue(projects, options.concurrency ?? 1, async (project, index) => {
    try {
      scans[index] = await scanProject(project, options);
    } catch (err) {
      if (!options.isolateFailures) throw err;
      projectFailures[index] = { scope: "project", path: project.path, message: describeError(err) };
    }
    done++;
    options.onProgress?.(done, projects.length);
  });

  const table = new UsageTable();
  const failures: ScanFailure[] = [];
  let entriesProcessed = 0;
  let eligibleProjects = 0;
  for (let i = 0; i < projects.length; i++) {
    const projectFailure = projectFailures[i];
    if (projectFailure) failures.push(projectFailure);

    const scan = scans[i];
    if (!scan) continue;
    eligibleProjects++;
    entriesProcessed += scan.entries;
    failures.push(...scan.failures);
    table.merge(scan.table);
  }

  const rows = table.toAggregates().sort(compareUsage);
  const totalBytes = rows.reduce((sum, row) => sum + totalSize(row), 0);
  debug("%d identities from %d installs", rows.length, table.recordCount);

  return {
    rows,
    projectsExamined: projects.length,
    eligibleProjects,
    entriesProcessed,
    elapsedMs: Date.now() - start,
    totalBytes,
    failures,
  };
}

export async function tryAggregateUsage(root: string, options: AggregateOptions = {}): Promise<ScanOutcome> {
  try {
    return { ok: true, report: await aggregateUsage(root, options) };
  } catch (err) {
    return { ok: false, error: toError(err) };
  }
}
