/**
 * Archive tree layout: root/YYYY/MM/DD/{database}_{timestamp}{extension}
 */

import { mkdir, stat } from "node:fs/promises";
import * as path from "node:path";
import type { ArchivePlan } from "../../types";
import { dateParts } from "../../utils/format";
import { DEFAULT_ARTIFACT_EXTENSION, generateArtifactName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";

// Same-second collisions beyond this are treated as a runaway caller
const MAX_COLLISION_SEQUENCE = 1000;

export function datedDir(root: string, date: Date): string {
  const { year, month, day } = dateParts(date);
  return path.join(root, year, month, day);
}

/**
 * Pure path computation; touches nothing on disk.
 */
export function planArchivePath(
  root: string,
  now: Date,
  databaseName: string,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
  sequence = 0,
): ArchivePlan {
  const destDir = datedDir(root, now);
  const artifactName = generateArtifactName(databaseName, now, extension, sequence);
  const artifactPath = path.join(destDir, artifactName);

  if (!isPathWithinDir(artifactPath, destDir)) {
    throw new Error(`Artifact path escapes the archive tree: ${artifactPath}`);
  }

  return { destDir, artifactName, artifactPath };
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create the dated directory and pick an artifact path that does not exist
 * yet. A second run within the same second gets a `-1`, `-2`, ... suffix.
 */
export async function prepareArchivePath(
  root: string,
  now: Date,
  databaseName: string,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
): Promise<ArchivePlan> {
  const first = planArchivePath(root, now, databaseName, extension);
  await mkdir(first.destDir, { recursive: true });

  for (let sequence = 0; sequence <= MAX_COLLISION_SEQUENCE; sequence++) {
    const plan = sequence === 0 ? first : planArchivePath(root, now, databaseName, extension, sequence);
    if (!(await pathExists(plan.artifactPath))) {
      return plan;
    }
  }

  throw new Error(`Too many artifacts for ${databaseName} at ${first.artifactName}`);
}
