import { writeFile } from "node:fs/promises";
import { instanceCount, totalSize } from "./collectors/aggregate.js";
import type { AggregatedUsage } from "./types.js";
import { compareStrings, formatBytes } from "./utils.js";

export const DEFAULT_REPORT_PATH = "results.txt";

/** `name@version: count (size -> total)` */
export function formatReportLine(row: AggregatedUsage): string {
  return `${row.name}@${row.version}: ${instanceCount(row)} (${formatBytes(row.sizeBytes)} -> ${formatBytes(totalSize(row))})`;
}

export function formatReport(rows: readonly AggregatedUsage[]): string {
  return rows.map((row) => `${formatReportLine(row)}\n`).join("");
}

/** Replaces any previous report at `path`. */
export async function writeReport(path: string, rows: readonly AggregatedUsage[]): Promise<void> {
  await writeFile(path, formatReport(rows), "utf-8");
}

/** The `n` identities taking the most space overall. */
export function topUsage(rows: readonly AggregatedUsage[], n: number): AggregatedUsage[] {
  return [...rows]
    .sort((a, b) => totalSize(b) - totalSize(a) || compareStrings(a.name, b.name))
    .slice(0, Math.max(0, n));
}
