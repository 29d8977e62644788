import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  mkdtemp,
  mkdir,
  writeFile,
  readFile,
  symlink,
  lstat,
  rm,
} from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { createJob, runBatch } from "./batch";
import { Logger } from "../utils/logger";
import {
  InvalidSpeedError,
  OutOfRangeSpeedError,
  ScanRootError,
} from "../utils/errors";
import type { ProgressEvent, UpdaterConfig } from "../types";

// Files named c.tap cannot be read, as if their permissions denied it
vi.mock("../utils/read-snapshot", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../utils/read-snapshot")>();
  return {
    readSnapshot: vi.fn(async (filePath: string) => {
      if (path.basename(filePath) === "c.tap") {
        throw Object.assign(
          new Error(`EACCES: permission denied, open '${filePath}'`),
          { code: "EACCES" },
        );
      }
      return actual.readSnapshot(filePath);
    }),
  };
});

const config: UpdaterConfig = {
  speed: { minRpm: 100, maxRpm: 24000 },
  scan: { extension: ".tap", followSymlinks: true },
  locator: {
    command: "S",
    searchWindow: 50,
    stopAtMotion: true,
    motionCodes: [0, 1, 2, 3],
  },
  batch: { concurrency: 2 },
  logging: { level: "error", showProgress: false },
};

const logger = new Logger("error");

const A_TAP = "%\r\n(PROGRAM A)\r\nS8000 M3\r\nG0 X0 Y0\r\nM30\r\n";
const B_TAP = "%\nG0 X0 Y0\nG1 Z-1 F300\nM30\n";
const C_TAP = "%\nS6000 M3\nM30\n";

describe("runBatch", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "spindle-batch-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function seed(files: Record<string, string>): Promise<void> {
    for (const [name, content] of Object.entries(files)) {
      const filePath = path.join(root, name);
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, content, "latin1");
    }
  }

  async function read(name: string): Promise<string> {
    return readFile(path.join(root, name), "latin1");
  }

  it("updates, skips and fails files independently", async () => {
    await seed({ "a.tap": A_TAP, "b.tap": B_TAP, "c.tap": C_TAP });

    const summary = await runBatch(createJob(root, 12000), { config, logger });

    expect(summary).toMatchObject({
      root,
      targetSpeed: 12000,
      total: 3,
      updatedCount: 1,
      skippedCount: 1,
      failedCount: 1,
      cancelled: false,
      diagnostics: [],
    });
    expect(summary.outcomes[0]).toEqual({
      path: path.join(root, "a.tap"),
      relativePath: "a.tap",
      status: "updated",
      oldSpeed: 8000,
      newSpeed: 12000,
      line: 3,
    });
    expect(summary.outcomes[1]).toEqual({
      path: path.join(root, "b.tap"),
      relativePath: "b.tap",
      status: "skipped",
      reason: "no-match",
      details: "no spindle-speed command found",
    });
    expect(summary.outcomes[2]).toMatchObject({
      relativePath: "c.tap",
      status: "failed",
      reason: "io-error",
    });
    expect(summary.outcomes[2]).toHaveProperty(
      "details",
      expect.stringContaining("EACCES: permission denied"),
    );

    expect(await read("a.tap")).toBe(
      "%\r\n(PROGRAM A)\r\nS12000 M3\r\nG0 X0 Y0\r\nM30\r\n",
    );
    expect(await read("b.tap")).toBe(B_TAP);
    expect(await read("c.tap")).toBe(C_TAP);
  });

  it("rewrites files that already carry the requested speed", async () => {
    await seed({ "same.tap": "S12000 M3\n" });

    const summary = await runBatch(createJob(root, 12000), { config, logger });

    expect(summary.outcomes).toEqual([
      expect.objectContaining({
        status: "updated",
        oldSpeed: 12000,
        newSpeed: 12000,
      }),
    ]);
    expect(await read("same.tap")).toBe("S12000 M3\n");
  });

  it("orders outcomes by discovery whatever the completion order", async () => {
    const names = Array.from({ length: 10 }, (_, i) => `f${i}.tap`);
    await seed(
      Object.fromEntries(
        names.map((name, i) => [name, i % 3 === 0 ? "M30\n" : "S5000\n"]),
      ),
    );

    const summary = await runBatch(createJob(root, 7000), {
      config: { ...config, batch: { concurrency: 4 } },
      logger,
    });

    expect(summary.outcomes.map((o) => o.relativePath)).toEqual(names);
    expect(summary.updatedCount + summary.skippedCount + summary.failedCount).toBe(
      summary.total,
    );
    expect(summary.skippedCount).toBe(4);
    expect(summary.updatedCount).toBe(6);
  });

  it("rewrites the target of a symlink and keeps the link", async () => {
    const outside = await mkdtemp(path.join(tmpdir(), "spindle-target-"));
    try {
      const real = path.join(outside, "real.tap");
      await writeFile(real, "S3000 M3\n");
      await symlink(real, path.join(root, "link.tap"), "file");

      const summary = await runBatch(createJob(root, 4000), { config, logger });

      expect(summary.updatedCount).toBe(1);
      expect(await readFile(real, "latin1")).toBe("S4000 M3\n");
      expect((await lstat(path.join(root, "link.tap"))).isSymbolicLink()).toBe(
        true,
      );
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });

  it("updates a file once when a later link points back at it", async () => {
    await seed({ [path.join("a", "real.tap")]: "S8000 M3\n" });
    await mkdir(path.join(root, "b"));
    await symlink(
      path.join("..", "a", "real.tap"),
      path.join(root, "b", "link.tap"),
      "file",
    );

    const summary = await runBatch(createJob(root, 12000), {
      config: { ...config, batch: { concurrency: 1 } },
      logger,
    });

    expect(summary.total).toBe(1);
    expect(summary.outcomes).toEqual([
      {
        path: path.join(root, "a", "real.tap"),
        relativePath: path.join("a", "real.tap"),
        status: "updated",
        oldSpeed: 8000,
        newSpeed: 12000,
        line: 1,
      },
    ]);
    expect(await read(path.join("a", "real.tap"))).toBe("S12000 M3\n");
    expect((await lstat(path.join(root, "b", "link.tap"))).isSymbolicLink()).toBe(
      true,
    );
  });

  // ==========================================================================
  // Progress
  // ==========================================================================
  describe("progress", () => {
    it("emits one event per file with running counts", async () => {
      await seed({ "a.tap": A_TAP, "b.tap": B_TAP });
      const events: ProgressEvent[] = [];

      const summary = await runBatch(createJob(root, 12000), {
        config: { ...config, batch: { concurrency: 1 } },
        logger,
        onProgress: (event) => events.push(event),
      });

      expect(events).toHaveLength(2);
      expect(events[1]).toMatchObject({
        type: "file",
        counts: { total: 2, updated: 1, skipped: 1, failed: 0 },
      });
      expect(summary.total).toBe(2);
    });
  });

  // ==========================================================================
  // Cancellation
  // ==========================================================================
  describe("cancellation", () => {
    it("finishes the running file and starts no more", async () => {
      await seed({
        "f0.tap": "S1000\n",
        "f1.tap": "S1000\n",
        "f2.tap": "S1000\n",
      });
      const controller = new AbortController();

      const summary = await runBatch(createJob(root, 2000), {
        config: { ...config, batch: { concurrency: 1 } },
        logger,
        signal: controller.signal,
        onProgress: () => controller.abort(),
      });

      expect(summary.cancelled).toBe(true);
      expect(summary.total).toBe(1);
      expect(summary.outcomes.map((o) => o.relativePath)).toEqual(["f0.tap"]);
      expect(await read("f0.tap")).toBe("S2000\n");
      expect(await read("f1.tap")).toBe("S1000\n");
      expect(await read("f2.tap")).toBe("S1000\n");
    });

    it("touches nothing when cancelled before starting", async () => {
      await seed({ "a.tap": A_TAP });
      const controller = new AbortController();
      controller.abort();

      const summary = await runBatch(createJob(root, 12000), {
        config,
        logger,
        signal: controller.signal,
      });

      expect(summary).toMatchObject({ cancelled: true, total: 0 });
      expect(await read("a.tap")).toBe(A_TAP);
    });
  });

  // ==========================================================================
  // Batch-level errors
  // ==========================================================================
  describe("batch-level errors", () => {
    it("aborts on speed 0 before touching any file", async () => {
      await seed({ "a.tap": A_TAP });
      const onProgress = vi.fn();

      await expect(
        runBatch(createJob(root, 0), { config, logger, onProgress }),
      ).rejects.toBeInstanceOf(InvalidSpeedError);

      expect(onProgress).not.toHaveBeenCalled();
      expect(await read("a.tap")).toBe(A_TAP);
    });

    it("validates the speed before looking at the root", async () => {
      await expect(
        runBatch(createJob(path.join(root, "missing"), 30000), {
          config,
          logger,
        }),
      ).rejects.toBeInstanceOf(OutOfRangeSpeedError);
    });

    it("rejects when the root cannot be read", async () => {
      await expect(
        runBatch(createJob(path.join(root, "missing"), 12000), {
          config,
          logger,
        }),
      ).rejects.toBeInstanceOf(ScanRootError);
    });
  });
});

describe("createJob", () => {
  it("resolves the root and freezes the job", () => {
    const job = createJob("jobs", 8000);
    expect(job).toEqual({ root: path.resolve("jobs"), requestedSpeed: 8000 });
    expect(Object.isFrozen(job)).toBe(true);
  });
});
