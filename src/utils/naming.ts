/**
 * Artifact naming utilities
 */

import { dateParts } from "./format";

export const DEFAULT_ARTIFACT_EXTENSION = ".sql.gz";

// Pattern: database_YYYY-MM-DD-HH-MM-SS[-n]<extension>
const TIMESTAMP_SOURCE = String.raw`\d{4}-\d{2}-\d{2}-\d{2}-\d{2}-\d{2}`;

export interface ParsedArtifactName {
  databaseName: string;
  timestamp: string;
  /** Collision suffix, 0 when absent */
  sequence: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * YYYY-MM-DD-HH-MM-SS (local time, second precision)
 */
export function formatArtifactTimestamp(date: Date): string {
  const p = dateParts(date);
  return `${p.year}-${p.month}-${p.day}-${p.hours}-${p.minutes}-${p.seconds}`;
}

export function generateArtifactName(
  databaseName: string,
  date: Date,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
  sequence = 0,
): string {
  const suffix = sequence > 0 ? `-${sequence}` : "";
  return `${databaseName}_${formatArtifactTimestamp(date)}${suffix}${extension}`;
}

export function parseArtifactName(
  fileName: string,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
): ParsedArtifactName | null {
  const pattern = new RegExp(`^(.+)_(${TIMESTAMP_SOURCE})(?:-(\\d+))?${escapeRegExp(extension)}$`);
  const match = fileName.match(pattern);
  if (!match) return null;

  const [, databaseName = "", timestamp = "", sequence] = match;
  return {
    databaseName,
    timestamp,
    sequence: sequence ? parseInt(sequence, 10) : 0,
  };
}

export function isArtifactName(
  fileName: string,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
): boolean {
  return parseArtifactName(fileName, extension) !== null;
}
