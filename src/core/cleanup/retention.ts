/**
 * Retention policy: delete artifacts older than the window, then prune the
 * directories left empty. Best effort; a failed delete never stops the pass.
 */

import type { Dirent } from "node:fs";
import { readdir, rm, rmdir, stat } from "node:fs/promises";
import * as path from "node:path";
import { MAX_RETENTION_DAYS } from "../../config/defaults";
import type { RetentionFailure, RetentionResult } from "../../types";
import { errorMessage, isNotFoundError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { DEFAULT_ARTIFACT_EXTENSION } from "../../utils/naming";
import { collectArtifactFiles } from "../backup/archive-tree";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RetentionOptions {
  now?: Date;
  extension?: string;
  /** Report what would be deleted without touching anything */
  dryRun?: boolean;
}

export function retentionCutoff(now: Date, retentionDays: number): Date {
  const cutoff = new Date(now.getTime() - retentionDays * DAY_MS);
  // An invalid cutoff compares false against every mtime and would delete everything
  if (Number.isNaN(cutoff.getTime())) {
    throw new RangeError(`Retention cutoff out of range for ${retentionDays} day(s)`);
  }
  return cutoff;
}

/**
 * Remove empty directories below root, deepest first. The root itself is
 * never removed.
 */
export async function pruneEmptyDirs(
  root: string,
): Promise<{ pruned: string[]; failures: RetentionFailure[] }> {
  const pruned: string[] = [];
  const failures: RetentionFailure[] = [];

  async function visit(dir: string): Promise<boolean> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === root && isNotFoundError(error)) return false;
      failures.push({ path: dir, error: errorMessage(error) });
      return false;
    }

    let remaining = entries.length;
    for (const entry of entries) {
      if (entry.isDirectory() && (await visit(path.join(dir, entry.name)))) {
        remaining--;
      }
    }

    if (dir === root || remaining > 0) {
      return false;
    }

    try {
      await rmdir(dir);
      pruned.push(dir);
      logger.debug(`Removed empty directory: ${dir}`);
      return true;
    } catch (error) {
      logger.warn(`Failed to remove directory ${dir}: ${errorMessage(error)}`);
      failures.push({ path: dir, error: errorMessage(error) });
      return false;
    }
  }

  await visit(root);
  return { pruned, failures };
}

export async function enforceRetention(
  root: string,
  retentionDays: number,
  options: RetentionOptions = {},
): Promise<RetentionResult> {
  const result: RetentionResult = {
    skipped: false,
    cutoff: null,
    scanned: 0,
    deleted: [],
    failed: [],
    prunedDirs: [],
    pruneFailures: [],
  };

  // 0 disables retention; it does not mean "keep nothing"
  if (retentionDays === 0) {
    return { ...result, skipped: true };
  }
  if (!Number.isInteger(retentionDays) || retentionDays < 0) {
    throw new RangeError(`Retention days must be a non-negative integer, got ${retentionDays}`);
  }
  if (retentionDays > MAX_RETENTION_DAYS) {
    throw new RangeError(`Retention days must be at most ${MAX_RETENTION_DAYS}, got ${retentionDays}`);
  }

  const cutoff = retentionCutoff(options.now ?? new Date(), retentionDays);
  result.cutoff = cutoff;

  const { files, errors } = await collectArtifactFiles(root, options.extension ?? DEFAULT_ARTIFACT_EXTENSION);
  result.scanned = files.length;
  result.failed.push(...errors);

  for (const filePath of files) {
    let modifiedAt: Date;
    try {
      modifiedAt = (await stat(filePath)).mtime;
    } catch (error) {
      result.failed.push({ path: filePath, error: errorMessage(error) });
      continue;
    }

    if (modifiedAt.getTime() >= cutoff.getTime()) continue;

    if (options.dryRun) {
      logger.info(`[DRY RUN] Would delete: ${filePath}`);
      result.deleted.push(filePath);
      continue;
    }

    try {
      await rm(filePath);
      result.deleted.push(filePath);
      logger.debug(`Deleted: ${filePath}`);
    } catch (error) {
      logger.warn(`Failed to delete ${filePath}: ${errorMessage(error)}`);
      result.failed.push({ path: filePath, error: errorMessage(error) });
    }
  }

  if (!options.dryRun) {
    const { pruned, failures } = await pruneEmptyDirs(root);
    result.prunedDirs = pruned;
    result.pruneFailures = failures;
  }

  return result;
}

export function summarizeRetention(result: RetentionResult): string {
  const failures = result.failed.length + result.pruneFailures.length;
  return (
    `Deleted ${result.deleted.length} of ${result.scanned} artifact(s), ` +
    `removed ${result.prunedDirs.length} empty director${result.prunedDirs.length === 1 ? "y" : "ies"}, ` +
    `${failures} failure(s).`
  );
}
