import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { DEFAULT_REPORT_PATH } from "./report.js";

const debug = createLogger("config");

export const CONFIG_PATH = join(homedir(), ".config", "depweight", "config.json");

const ConfigSchema = z.object({
  root: z.string().min(1).optional(),
  reportPath: z.string().min(1).default(DEFAULT_REPORT_PATH),
  concurrency: z.number().int().positive().default(1),
  includeScoped: z.boolean().default(false),
  isolateFailures: z.boolean().default(false),
});

export type DepweightConfig = z.infer<typeof ConfigSchema>;

/** Options as given on the command line; anything unset falls back to the config file. */
export type CliFlags = {
  dir?: string;
  output?: string;
  concurrency?: number;
  scoped?: boolean;
  keepGoing?: boolean;
  top?: number;
  progress?: boolean;
};

export interface ScanOptions {
  root?: string;
  reportPath: string;
  concurrency: number;
  includeScoped: boolean;
  isolateFailures: boolean;
  top: number;
  progress: boolean;
}

export function defaultConfig(): DepweightConfig {
  return ConfigSchema.parse({});
}

/** A missing or unusable config file is not an error; the defaults apply. */
export async function loadConfig(path = CONFIG_PATH): Promise<DepweightConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    debug("no config at %s: %s", path, describeError(err));
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    debug("ignoring %s: %s", path, describeError(err));
    return defaultConfig();
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    debug("ignoring %s: %s", path, result.error.message);
    return defaultConfig();
  }
  return result.data;
}

export function resolveOptions(flags: CliFlags, config: DepweightConfig): ScanOptions {
  return {
    root: flags.dir ?? config.root,
    reportPath: flags.output ?? config.reportPath,
    concurrency: flags.concurrency ?? config.concurrency,
    includeScoped: flags.scoped ?? config.includeScoped,
    isolateFailures: flags.keepGoing ?? config.isolateFailures,
    top: flags.top ?? 0,
    progress: flags.progress ?? true,
  };
}
