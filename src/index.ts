#!/usr/bin/env node
import { InvalidArgumentError, program } from "commander";
import { runScan } from "./cli.js";
import { loadConfig, resolveOptions, type CliFlags } from "./config.js";

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return n;
}

program
  .name("depweight")
  .description("Measure how much disk space duplicated node_modules installs take across projects")
  .version("0.1.0")
  .option("-d, --dir <path>", "root directory whose subdirectories are the projects to scan")
  .option("-o, --output <file>", "report file, overwritten on each run (default: results.txt)")
  .option("-c, --concurrency <n>", "number of projects scanned at once", parsePositiveInt)
  .option("--scoped", "also count packages inside @scope folders")
  .option("--keep-going", "record broken packages and projects as warnings instead of aborting")
  .option("--top <n>", "print the n packages taking the most space", parsePositiveInt)
  .option("--no-progress", "hide the progress bar")
  .action(async () => {
    const config = await loadConfig();
    process.exitCode = await runScan(resolveOptions(program.opts<CliFlags>(), config));
  });

await program.parseAsync();
