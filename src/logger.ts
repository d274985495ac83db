import chalk from "chalk";
import createDebug from "debug";

/**
 * Console output for the CLI. The report itself goes to a file; everything
 * here is for the person watching the scan. Diagnostics that should stay
 * quiet by default go through `createLogger` (enable with DEBUG=depweight:*).
 */

export function createLogger(scope: string): createDebug.Debugger {
  return createDebug(`depweight:${scope}`);
}

export function logInfo(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function logSuccess(message: string): void {
  process.stdout.write(`${chalk.green(message)}\n`);
}

export function logWarn(message: string): void {
  process.stderr.write(`${chalk.yellow(message)}\n`);
}

export function logError(message: string): void {
  process.stderr.write(`${chalk.red(message)}\n`);
}
