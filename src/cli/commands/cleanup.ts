import * as path from "node:path";
import { parseArgs } from "node:util";
import { enforceRetention, summarizeRetention } from "../../core";
import { AuditLog } from "../../utils/audit-log";
import { errorMessage } from "../../utils/errors";
import { setLogLevel } from "../../utils/logger";
import { COMMON_HELP, COMMON_OPTIONS, loadRunConfig } from "../options";
import { color, formatSummary, ui } from "../ui";

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    const config = await loadRunConfig(values);

    ui.intro("dumpkeeper cleanup");

    if (!config.backupDir) {
      ui.error("Backup directory is required (--backup-dir or backupDir in the config file)");
      return 1;
    }

    if (config.retentionDays === 0) {
      ui.info("Retention is disabled (retention days = 0), nothing to clean up");
      ui.outro("Nothing to do");
      return 0;
    }

    // Preview what will be deleted first
    const preview = await enforceRetention(config.backupDir, config.retentionDays, {
      extension: config.artifactExtension,
      dryRun: true,
    });

    if (preview.deleted.length === 0) {
      ui.success(`No artifacts older than ${config.retentionDays} day(s)`);
      ui.outro("Nothing to do");
      return 0;
    }

    ui.step(`Found ${preview.deleted.length} artifact(s) older than ${config.retentionDays} day(s):`);
    for (const filePath of preview.deleted) {
      ui.message(`  ${color.dim("•")} ${path.relative(config.backupDir, filePath)}`);
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return 0;
    }

    if (!values.force) {
      const confirmed = await ui.confirm({
        message: `Delete ${preview.deleted.length} artifact(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Cleanup cancelled");
        return 1;
      }
    }

    const audit = AuditLog.forBackupDir(config.backupDir);
    await audit.record(
      `Starting manual backup rotation. Retaining backups from the last ${config.retentionDays} day(s).`,
    );

    const s = ui.spinner();
    s.start("Deleting old artifacts...");
    const result = await enforceRetention(config.backupDir, config.retentionDays, {
      extension: config.artifactExtension,
    });
    s.stop("Cleanup complete");

    const failures = [...result.failed, ...result.pruneFailures];
    for (const failure of failures) {
      await audit.record(`Rotation could not remove ${failure.path}: ${failure.error}`, "warn");
    }
    await audit.record(`Backup rotation completed. ${summarizeRetention(result)}`, failures.length > 0 ? "warn" : "info");

    ui.note(
      formatSummary([
        { label: "Scanned", value: result.scanned },
        { label: "Deleted", value: result.deleted.length },
        { label: "Directories pruned", value: result.prunedDirs.length },
        { label: "Failures", value: failures.length },
      ]),
      "Cleanup Summary",
    );

    if (failures.length > 0) {
      ui.warn("Some files or directories could not be removed, see backup.log");
      ui.outro("Cleanup finished with warnings");
      return 1;
    }

    ui.outro("Cleanup complete!");
    return 0;
  } catch (error) {
    ui.error(`Cleanup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dumpkeeper cleanup")} - Apply the retention policy without taking a backup

${color.dim("USAGE:")}
  dumpkeeper cleanup [OPTIONS]

${color.dim("OPTIONS:")}
      --dry-run                  Show what would be deleted without doing it
      --force                    Skip the confirmation prompt
${COMMON_HELP}

${color.dim("RULES:")}
  Only files named <db>_<YYYY-MM-DD-HH-MM-SS>.sql.gz inside BACKUP_DIR/YYYY/MM/DD/
  are considered. A file is deleted when its modification time is more than
  --retention-days days ago. Empty day, month and year directories are removed
  afterwards; BACKUP_DIR itself is always kept.

${color.dim("EXAMPLES:")}
  dumpkeeper cleanup -b /home/backups/mysql --retention-days 7 --dry-run
  dumpkeeper cleanup -c /etc/dumpkeeper/shop.conf --force
`);
}
