import { describe, it, expect } from "vitest";
import { compareStrings, formatBytes, formatElapsed, renderProgressBar, roundHalfEven, runQueue } from "../utils.js";

describe("formatBytes", () => {
  it("returns '0 B' for 0", () => {
    expect(formatBytes(0)).toBe("0 B");
  });

  it("returns '0 B' for negative", () => {
    expect(formatBytes(-5)).toBe("0 B");
  });

  it("formats bytes", () => {
    expect(formatBytes(5)).toBe("5 B");
    expect(formatBytes(500)).toBe("500 B");
    expect(formatBytes(999)).toBe("999 B");
  });

  it("uses decimal kilobytes", () => {
    expect(formatBytes(1000)).toBe("1.0 kB");
    expect(formatBytes(1024)).toBe("1.0 kB");
    expect(formatBytes(2048)).toBe("2.0 kB");
  });

  it("shows one decimal below 10", () => {
    expect(formatBytes(1536)).toBe("1.5 kB");
  });

  it("drops the decimal from 10 up", () => {
    expect(formatBytes(12345)).toBe("12 kB");
    expect(formatBytes(9960)).toBe("10 kB");
  });

  it("rounds exact halves of whole units to even", () => {
    expect(formatBytes(12500)).toBe("12 kB");
    expect(formatBytes(13500)).toBe("14 kB");
    expect(formatBytes(14500)).toBe("14 kB");
  });

  it("formats larger units", () => {
    expect(formatBytes(1_000_000)).toBe("1.0 MB");
    expect(formatBytes(1_500_000_000)).toBe("1.5 GB");
  });
});

describe("renderProgressBar", () => {
  it("renders empty bar for 0/0", () => {
    expect(renderProgressBar(0, 0, 10)).toBe("[░░░░░░░░░░] 0/0");
  });

  it("renders full bar when done", () => {
    expect(renderProgressBar(10, 10, 10)).toBe("[██████████] 10/10");
  });

  it("renders half bar", () => {
    expect(renderProgressBar(5, 10, 10)).toBe("[█████░░░░░] 5/10");
  });

  it("clamps to 100%", () => {
    expect(renderProgressBar(15, 10, 10)).toBe("[██████████] 15/10");
  });
});

describe("formatElapsed", () => {
  it("shows milliseconds under a second", () => {
    expect(formatElapsed(850)).toBe("850ms");
  });

  it("shows seconds with one decimal", () => {
    expect(formatElapsed(1200)).toBe("1.2s");
  });

  it("shows minutes and seconds", () => {
    expect(formatElapsed(125_000)).toBe("2m 5s");
  });
});

describe("roundHalfEven", () => {
  it("sends halves to the even neighbour", () => {
    expect(roundHalfEven(12.5)).toBe(12);
    expect(roundHalfEven(15.5)).toBe(16);
  });

  it("rounds everything else to nearest", () => {
    expect(roundHalfEven(12.3)).toBe(12);
    expect(roundHalfEven(12.7)).toBe(13);
    expect(roundHalfEven(40)).toBe(40);
  });
});

describe("compareStrings", () => {
  it("orders by code unit, not locale", () => {
    expect(["b", "B", "a"].sort(compareStrings)).toEqual(["B", "a", "b"]);
    expect(compareStrings("x", "x")).toBe(0);
  });
});

describe("runQueue", () => {
  it("never runs more than the concurrency limit at once", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];
    await runQueue([1, 2, 3, 4, 5], 2, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      seen.push(item);
      active--;
    });
    expect(peak).toBe(2);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it("stops taking items after a failure", async () => {
    const started: number[] = [];
    await expect(
      runQueue([1, 2, 3], 1, async (item) => {
        started.push(item);
        if (item === 2) throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(started).toEqual([1, 2]);
  });

  it("lets running calls finish before rejecting", async () => {
    const started: number[] = [];
    const finished: number[] = [];
    await expect(
      runQueue([1, 2, 3], 2, async (item) => {
        started.push(item);
        if (item === 1) throw new Error("first");
        await new Promise((resolve) => setTimeout(resolve, 20));
        finished.push(item);
      }),
    ).rejects.toThrow("first");
    expect(started).toEqual([1, 2]);
    expect(finished).toEqual([2]);
  });

  it("rejects with the first error when several calls fail", async () => {
    await expect(
      runQueue([1, 2], 2, async (item) => {
        if (item === 2) {
          await new Promise((resolve) => setTimeout(resolve, 10));
        }
        throw new Error(`failed ${item}`);
      }),
    ).rejects.toThrow("failed 1");
  });

  it("does nothing for an empty list", async () => {
    let calls = 0;
    await runQueue([], 4, async () => {
      calls++;
    });
    expect(calls).toBe(0);
  });
});
