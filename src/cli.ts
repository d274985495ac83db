import { tryAggregateUsage } from "./collectors/aggregate.js";
import type { ScanOptions } from "./config.js";
import { UsageError, describeError } from "./errors.js";
import { logError, logInfo, logSuccess, logWarn } from "./logger.js";
import { formatReportLine, topUsage, writeReport } from "./report.js";
import type { ScanFailure } from "./types.js";
import { formatBytes, formatElapsed, renderProgressBar } from "./utils.js";

function requireRoot(options: ScanOptions): string {
  if (!options.root) throw new UsageError("no directory given, exiting...");
  return options.root;
}

function describeFailure(failure: ScanFailure): string {
  return `${failure.scope} ${failure.path}: ${failure.message}`;
}

/**
 * Scan, write the report and print the summary. Resolves to the process
 * exit code; nothing is written when the scan fails.
 */
export async function runScan(options: ScanOptions): Promise<number> {
  let root: string;
  try {
    root = requireRoot(options);
  } catch (err) {
    logError(describeError(err));
    return 1;
  }

  const showProgress = options.progress && process.stderr.isTTY === true;
  const outcome = await tryAggregateUsage(root, {
    concurrency: options.concurrency,
    includeScoped: options.includeScoped,
    isolateFailures: options.isolateFailures,
    onProjectsFound: (count) => logInfo(`found ${count} projects to check`),
    onProgress: showProgress
      ? (done, total) => process.stderr.write(`\r${renderProgressBar(done, total)}`)
      : undefined,
  });
  if (showProgress) process.stderr.write("\n");

  if (!outcome.ok) {
    logError(outcome.error.message);
    return 1;
  }

  const { report } = outcome;
  logInfo(`processed ${report.entriesProcessed} entries in ${formatElapsed(report.elapsedMs)}`);
  logInfo("formatting results...");

  try {
    await writeReport(options.reportPath, report.rows);
  } catch (err) {
    logError(describeError(err));
    return 1;
  }

  logSuccess(`total space used: ${formatBytes(report.totalBytes)}`);

  if (options.top > 0 && report.rows.length > 0) {
    logInfo(`top ${Math.min(options.top, report.rows.length)} by total size:`);
    for (const row of topUsage(report.rows, options.top)) {
      logInfo(`  ${formatReportLine(row)}`);
    }
  }

  if (report.failures.length > 0) {
    for (const failure of report.failures) logWarn(describeFailure(failure));
    logWarn(`${report.failures.length} failures recorded`);
  }

  return 0;
}
