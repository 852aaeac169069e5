/**
 * Append-only audit trail stored beside the archive tree
 */

import { appendFile, stat } from "node:fs/promises";
import * as path from "node:path";
import { errorMessage } from "./errors";
import { formatLogTimestamp } from "./format";
import { logger } from "./logger";

export const AUDIT_LOG_NAME = "backup.log";

export type AuditLevel = "info" | "warn" | "error";

export function formatAuditRecord(date: Date, message: string): string {
  return `${formatLogTimestamp(date)} - ${message}`;
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

export class AuditLog {
  // Records made before the backup root existed
  private pending: string[] = [];

  /**
   * @param filePath - null keeps records on the console only
   */
  constructor(
    readonly filePath: string | null,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  static forBackupDir(backupDir: string, clock?: () => Date): AuditLog {
    // No root configured: there is nowhere to keep the file
    if (!backupDir.trim()) {
      return new AuditLog(null, clock);
    }
    return new AuditLog(path.join(backupDir, AUDIT_LOG_NAME), clock);
  }

  /**
   * Append one record. The record is always echoed to the console. The log
   * never creates the backup root: while the directory is missing, records
   * are held in memory and written ahead of the first record made after it
   * appears. A failed write is reported on the console and does not throw;
   * the held lines are kept for the next attempt.
   */
  async record(message: string, level: AuditLevel = "info"): Promise<void> {
    logger[level](message);

    if (this.filePath === null) return;

    const line = formatAuditRecord(this.clock(), message);
    if (!(await isDirectory(path.dirname(this.filePath)))) {
      logger.debug(`Audit log directory missing, record held: ${this.filePath}`);
      this.pending.push(line);
      return;
    }

    const lines = [...this.pending, line];
    try {
      await appendFile(this.filePath, lines.map((entry) => `${entry}\n`).join(""), "utf8");
      this.pending = [];
    } catch (error) {
      logger.warn(`Cannot write audit log ${this.filePath}: ${errorMessage(error)}`);
      this.pending = lines;
    }
  }
}
