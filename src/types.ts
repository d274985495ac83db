/**
 * Shared data types — used by the collectors, the report writer and the CLI.
 */

// ─── Projects ────────────────────────────────────────────────────────

export interface Project {
  name: string;
  path: string;
}

// ─── Packages ────────────────────────────────────────────────────────

export interface PackageManifest {
  name: string;
  version: string;
}

/** One install of a package at one location. */
export interface UsageRecord {
  name: string;
  version: string;
  location: string;
  project: string;
  sizeBytes: number;
}

/** `name:version` */
export type Identity = string;

/**
 * One report row. `sizeBytes` is the size of the first install discovered
 * for the identity; later installs are not re-measured.
 */
export interface AggregatedUsage {
  name: string;
  version: string;
  records: readonly UsageRecord[];
  sizeBytes: number;
}

// ─── Failures ────────────────────────────────────────────────────────

export type FailureScope = "project" | "package";

export interface ScanFailure {
  scope: FailureScope;
  path: string;
  message: string;
}

// ─── Scan ────────────────────────────────────────────────────────────

export interface TraverseOptions {
  /** Descend one level into `@scope` folders. */
  includeScoped?: boolean;
  /** Record failing packages instead of aborting. */
  isolateFailures?: boolean;
  /** Name of the project owning the dependency tree. */
  project?: string;
  onFailure?: (failure: ScanFailure) => void;
}

export interface AggregateOptions {
  concurrency?: number;
  includeScoped?: boolean;
  isolateFailures?: boolean;
  onProjectsFound?: (count: number) => void;
  onProgress?: (done: number, total: number) => void;
}

export interface UsageReport {
  rows: AggregatedUsage[];
  projectsExamined: number;
  eligibleProjects: number;
  entriesProcessed: number;
  elapsedMs: number;
  totalBytes: number;
  failures: ScanFailure[];
}

export type ScanOutcome =
  | { ok: true; report: UsageReport }
  | { ok: false; error: Error };
