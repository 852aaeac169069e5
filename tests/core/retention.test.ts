import { mkdir, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  enforceRetention,
  pruneEmptyDirs,
  retentionCutoff,
  summarizeRetention,
} from "../../src/core/cleanup/retention";
import { DAY_MS, listTree, makeTempDir, removeTempDir, writeFileAt } from "../helpers";

// Local time: 10 February 2024, 12:00
const NOW = new Date(2024, 1, 10, 12, 0, 0);

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

describe("retention", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir("retention");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  async function seedWindowFixture(): Promise<void> {
    await writeFileAt(path.join(root, "2024", "02", "09", "shop_2024-02-09-12-00-00.sql.gz"), daysAgo(1));
    await writeFileAt(path.join(root, "2024", "01", "31", "shop_2024-01-31-12-00-00.sql.gz"), daysAgo(10));
    await writeFileAt(path.join(root, "2024", "01", "10", "shop_2024-01-10-12-00-00.sql.gz"), daysAgo(31));
    await writeFileAt(path.join(root, "backup.log"), daysAgo(60), "2024-01-01 00:00:00 - old record\n");
  }

  describe("retentionCutoff", () => {
    test("subtracts whole days from now", () => {
      expect(retentionCutoff(NOW, 7).getTime()).toBe(NOW.getTime() - 7 * DAY_MS);
    });

    test("throws instead of returning an invalid date", () => {
      expect(() => retentionCutoff(NOW, 999_999_999)).toThrow(RangeError);
    });
  });

  describe("enforceRetention", () => {
    test("0 days skips the pass and touches nothing", async () => {
      await seedWindowFixture();

      const result = await enforceRetention(root, 0, { now: NOW });

      expect(result.skipped).toBe(true);
      expect(result.cutoff).toBeNull();
      expect(result.deleted).toEqual([]);
      expect(await listTree(root)).toHaveLength(4);
    });

    test("rejects a negative or fractional window", async () => {
      await expect(enforceRetention(root, -1, { now: NOW })).rejects.toThrow(RangeError);
      await expect(enforceRetention(root, 1.5, { now: NOW })).rejects.toThrow(RangeError);
    });

    test("rejects a window beyond the supported maximum and deletes nothing", async () => {
      const recent = path.join(root, "2024", "02", "09", "shop_2024-02-09-12-00-00.sql.gz");
      await writeFileAt(recent, daysAgo(1));

      await expect(enforceRetention(root, 999_999_999, { now: NOW })).rejects.toThrow(
        "Retention days must be at most 36500, got 999999999",
      );
      expect((await stat(recent)).isFile()).toBe(true);
    });

    test("keeps recent artifacts at the maximum window", async () => {
      const recent = path.join(root, "2024", "02", "09", "shop_2024-02-09-12-00-00.sql.gz");
      await writeFileAt(recent, daysAgo(1));

      const result = await enforceRetention(root, 36500, { now: NOW });

      expect(result.deleted).toEqual([]);
      expect((await stat(recent)).isFile()).toBe(true);
    });

    test("keeps artifacts inside a 7 day window and deletes older ones", async () => {
      await seedWindowFixture();

      const result = await enforceRetention(root, 7, { now: NOW });

      expect(result.skipped).toBe(false);
      expect(result.scanned).toBe(3);
      expect([...result.deleted].sort()).toEqual([
        path.join(root, "2024", "01", "10", "shop_2024-01-10-12-00-00.sql.gz"),
        path.join(root, "2024", "01", "31", "shop_2024-01-31-12-00-00.sql.gz"),
      ]);
      expect(result.failed).toEqual([]);
      expect(await listTree(root)).toEqual([
        path.join("2024", "02", "09", "shop_2024-02-09-12-00-00.sql.gz"),
        "backup.log",
      ]);
    });

    test("prunes the day and month directories left empty", async () => {
      await seedWindowFixture();

      const result = await enforceRetention(root, 7, { now: NOW });

      expect([...result.prunedDirs].sort()).toEqual([
        path.join(root, "2024", "01"),
        path.join(root, "2024", "01", "10"),
        path.join(root, "2024", "01", "31"),
      ]);
      expect(result.pruneFailures).toEqual([]);
      await expect(stat(path.join(root, "2024", "01"))).rejects.toThrow();
      expect((await stat(path.join(root, "2024", "02", "09"))).isDirectory()).toBe(true);
    });

    test("deletes only artifacts strictly older than the cutoff", async () => {
      const onCutoff = path.join(root, "2024", "02", "03", "shop_2024-02-03-12-00-00.sql.gz");
      await writeFileAt(onCutoff, daysAgo(7));

      const result = await enforceRetention(root, 7, { now: NOW });

      expect(result.scanned).toBe(1);
      expect(result.deleted).toEqual([]);
      expect(await listTree(root)).toEqual([path.join("2024", "02", "03", "shop_2024-02-03-12-00-00.sql.gz")]);
    });

    test("a second pass with the same cutoff deletes nothing", async () => {
      await seedWindowFixture();
      await enforceRetention(root, 7, { now: NOW });
      const treeAfterFirst = await listTree(root);

      const second = await enforceRetention(root, 7, { now: NOW });

      expect(second.deleted).toEqual([]);
      expect(second.failed).toEqual([]);
      expect(second.prunedDirs).toEqual([]);
      expect(second.pruneFailures).toEqual([]);
      expect(await listTree(root)).toEqual(treeAfterFirst);
    });

    test("never touches files outside the day directories or with other names", async () => {
      const atRoot = path.join(root, "shop_2020-01-01-00-00-00.sql.gz");
      const atMonth = path.join(root, "2020", "01", "shop_2020-01-01-00-00-00.sql.gz");
      const notes = path.join(root, "2020", "01", "01", "notes.txt");
      const unnamed = path.join(root, "2020", "01", "01", "manual-copy.sql.gz");
      for (const file of [atRoot, atMonth, notes, unnamed]) {
        await writeFileAt(file, daysAgo(400));
      }

      const result = await enforceRetention(root, 7, { now: NOW });

      expect(result.scanned).toBe(0);
      expect(result.deleted).toEqual([]);
      expect(await listTree(root)).toEqual([
        path.join("2020", "01", "01", "manual-copy.sql.gz"),
        path.join("2020", "01", "01", "notes.txt"),
        path.join("2020", "01", "shop_2020-01-01-00-00-00.sql.gz"),
        "shop_2020-01-01-00-00-00.sql.gz",
      ]);
    });

    test("only considers the configured extension", async () => {
      const zst = path.join(root, "2020", "01", "01", "shop_2020-01-01-00-00-00.sql.zst");
      const gz = path.join(root, "2020", "01", "02", "shop_2020-01-02-00-00-00.sql.gz");
      await writeFileAt(zst, daysAgo(400));
      await writeFileAt(gz, daysAgo(400));

      const result = await enforceRetention(root, 7, { now: NOW, extension: ".sql.zst" });

      expect(result.deleted).toEqual([zst]);
      expect(await listTree(root)).toEqual([path.join("2020", "01", "02", "shop_2020-01-02-00-00-00.sql.gz")]);
    });

    test("keeps the root when every artifact expires", async () => {
      await writeFileAt(path.join(root, "2023", "01", "01", "app_2023-01-01-00-00-00.sql.gz"), daysAgo(400));

      const result = await enforceRetention(root, 7, { now: NOW });

      expect(result.deleted).toHaveLength(1);
      expect(result.prunedDirs).toContain(path.join(root, "2023"));
      expect(await listTree(root)).toEqual([]);
      expect((await stat(root)).isDirectory()).toBe(true);
    });

    test("dry run reports candidates without deleting or pruning", async () => {
      await seedWindowFixture();

      const result = await enforceRetention(root, 7, { now: NOW, dryRun: true });

      expect(result.deleted).toHaveLength(2);
      expect(result.prunedDirs).toEqual([]);
      expect(await listTree(root)).toHaveLength(4);
    });

    test("a missing root yields an empty result", async () => {
      const result = await enforceRetention(path.join(root, "absent"), 7, { now: NOW });

      expect(result.scanned).toBe(0);
      expect(result.deleted).toEqual([]);
      expect(result.failed).toEqual([]);
      expect(result.pruneFailures).toEqual([]);
    });
  });

  describe("pruneEmptyDirs", () => {
    test("removes nested empty directories deepest first and keeps non-empty ones", async () => {
      await mkdir(path.join(root, "2022", "05", "01"), { recursive: true });
      await mkdir(path.join(root, "2022", "06", "02"), { recursive: true });
      await writeFile(path.join(root, "2022", "06", "02", "keep.txt"), "x");

      const { pruned, failures } = await pruneEmptyDirs(root);

      expect(pruned).toEqual([path.join(root, "2022", "05", "01"), path.join(root, "2022", "05")]);
      expect(failures).toEqual([]);
      expect(await listTree(root)).toEqual([path.join("2022", "06", "02", "keep.txt")]);
    });

    test("never removes an empty root", async () => {
      const { pruned } = await pruneEmptyDirs(root);

      expect(pruned).toEqual([]);
      expect((await stat(root)).isDirectory()).toBe(true);
    });
  });

  describe("summarizeRetention", () => {
    test("counts deletions, pruned directories and failures", () => {
      const summary = summarizeRetention({
        skipped: false,
        cutoff: NOW,
        scanned: 4,
        deleted: ["a", "b"],
        failed: [{ path: "c", error: "EACCES" }],
        prunedDirs: ["d"],
        pruneFailures: [],
      });

      expect(summary).toBe("Deleted 2 of 4 artifact(s), removed 1 empty directory, 1 failure(s).");
    });
  });
});
