const BYTE_UNITS = ["B", "kB", "MB", "GB", "TB", "PB", "EB"];

/** Decimal (base 1000) human-readable size, e.g. 1024 -> "1.0 kB", 12345 -> "12 kB". */
export function formatBytes(bytes: number): string {
  if (bytes < 10) return `${Math.max(0, Math.floor(bytes))} B`;
  let exp = 0;
  while (exp < BYTE_UNITS.length - 1 && bytes >= Math.pow(1000, exp + 1)) exp++;
  const val = Math.floor((bytes / Math.pow(1000, exp)) * 10 + 0.5) / 10;
  return val < 10 ? `${val.toFixed(1)} ${BYTE_UNITS[exp]}` : `${roundHalfEven(val)} ${BYTE_UNITS[exp]}`;
}

/** Whole-number rounding with exact halves going to the even neighbour (12.5 -> 12, 13.5 -> 14). */
export function roundHalfEven(val: number): number {
  const rounded = Math.round(val);
  if (Math.abs(val % 1) === 0.5 && rounded % 2 !== 0) return rounded - 1;
  return rounded;
}

/** Plain code-unit ordering, independent of locale. */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function byName<T extends { name: string }>(a: T, b: T): number {
  return compareStrings(a.name, b.name);
}

export function renderProgressBar(done: number, total: number, width = 20): string {
  if (total <= 0) return `[${"░".repeat(width)}] 0/0`;
  const ratio = Math.min(done / total, 1);
  const filled = Math.round(ratio * width);
  const empty = width - filled;
  return `[${"█".repeat(filled)}${"░".repeat(empty)}] ${done}/${total}`;
}

export function formatElapsed(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const secs = Math.floor(ms / 1000);
  return `${Math.floor(secs / 60)}m ${secs % 60}s`;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * After the first rejection no new items are taken; calls already running
 * are allowed to finish before the queue rejects with that first error.
 */
export async function runQueue<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const state: { failed: boolean; error?: unknown } = { failed: false };

  async function drain(): Promise<void> {
    while (!state.failed && next < items.length) {
      const index = next++;
      try {
        await worker(items[index], index);
      } catch (err) {
        if (!state.failed) {
          state.failed = true;
          state.error = err;
        }
      }
    }
  }

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.allSettled(Array.from({ length: lanes }, drain));
  if (state.failed) throw state.error;
}
