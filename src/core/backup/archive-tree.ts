/**
 * Walking the YEAR/MONTH/DAY archive tree
 */

import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import type { ArtifactInfo, RetentionFailure } from "../../types";
import { errorMessage, isNotFoundError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { DEFAULT_ARTIFACT_EXTENSION, parseArtifactName } from "../../utils/naming";

// root/YEAR/MONTH/DAY
export const ARTIFACT_DIR_DEPTH = 3;

export interface CollectedArtifacts {
  files: string[];
  errors: RetentionFailure[];
}

async function collectFromDir(
  dir: string,
  depth: number,
  extension: string,
  out: CollectedArtifacts,
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (depth === 0 && isNotFoundError(error)) {
      return;
    }
    logger.warn(`Cannot read directory ${dir}: ${errorMessage(error)}`);
    out.errors.push({ path: dir, error: errorMessage(error) });
    return;
  }

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);

    if (depth < ARTIFACT_DIR_DEPTH) {
      if (entry.isDirectory()) {
        await collectFromDir(entryPath, depth + 1, extension, out);
      }
      continue;
    }

    if (!entry.isFile() || !entry.name.endsWith(extension)) continue;

    if (!parseArtifactName(entry.name, extension)) {
      logger.debug(`Ignoring file that does not follow the artifact naming: ${entryPath}`);
      continue;
    }

    out.files.push(entryPath);
  }
}

/**
 * Find artifact files in day directories at exactly root/YEAR/MONTH/DAY.
 * A missing root yields an empty result.
 */
export async function collectArtifactFiles(
  root: string,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
): Promise<CollectedArtifacts> {
  const out: CollectedArtifacts = { files: [], errors: [] };
  await collectFromDir(root, 0, extension, out);
  out.files.sort();
  return out;
}

/**
 * Artifacts in the tree, newest first.
 */
export async function listArtifacts(
  root: string,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
): Promise<ArtifactInfo[]> {
  const { files } = await collectArtifactFiles(root, extension);
  const artifacts: ArtifactInfo[] = [];

  for (const filePath of files) {
    const name = path.basename(filePath);
    try {
      const info = await stat(filePath);
      artifacts.push({
        path: filePath,
        name,
        databaseName: parseArtifactName(name, extension)?.databaseName ?? null,
        sizeBytes: info.size,
        modifiedAt: info.mtime,
      });
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
      logger.debug(`Artifact disappeared while listing: ${filePath}`);
    }
  }

  return artifacts.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
}
