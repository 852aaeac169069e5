import { parseArgs } from "node:util";
import { createDefaultDependencies, runBackup } from "../../core";
import { errorMessage } from "../../utils/errors";
import { formatDuration } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { COMMON_HELP, COMMON_OPTIONS, loadRunConfig } from "../options";
import { color, formatSummary, ui } from "../ui";

const OUTCOME_LABELS = {
  success: "Backup complete!",
  preflight_failed: "Preflight checks failed",
  export_failed: "Database export failed",
  replication_failed: "Replication failed",
} as const;

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: COMMON_OPTIONS,
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

    ui.intro("dumpkeeper backup");

    const result = await runBackup(config, createDefaultDependencies(config));
    const retention = result.retention;

    ui.note(
      formatSummary([
        { label: "Database", value: config.databaseName },
        { label: "Artifact", value: result.artifactPath },
        {
          label: "Rotation",
          value: retention
            ? `${retention.deleted.length} deleted, ${retention.prunedDirs.length} dir(s) pruned, ${
                retention.failed.length + retention.pruneFailures.length
              } failure(s)`
            : null,
        },
        { label: "Replicated to", value: result.replication?.success ? result.replication.destination : null },
        { label: "Duration", value: formatDuration(result.durationMs) },
        { label: "Exit code", value: result.exitCode },
      ]),
      "Backup Summary",
    );

    if (result.outcome !== "success") {
      ui.error(`${OUTCOME_LABELS[result.outcome]}: ${result.error ?? "see backup.log"}`);
      return result.exitCode;
    }

    ui.outro(OUTCOME_LABELS.success);
    return result.exitCode;
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dumpkeeper backup")} - Export a database into the dated archive tree

${color.dim("USAGE:")}
  dumpkeeper backup [OPTIONS]

${color.dim("OPTIONS:")}
${COMMON_HELP}

${color.dim("STAGES:")}
  1. Preflight: required settings, clpctl (and rsync + ssh host alias when replicating)
  2. Export:    clpctl db:export into BACKUP_DIR/YYYY/MM/DD/<db>_<timestamp>.sql.gz
  3. Rotation:  delete artifacts older than --retention-days, prune empty directories
  4. Replicate: rsync -avz [--delete] BACKUP_DIR/ HOST:TARGET_DIR

  A failed export stops the run before rotation and replication.
  Every step is appended to BACKUP_DIR/backup.log.

${color.dim("EXIT CODES:")}
  0 success, 1 usage or config error, 2 preflight failed,
  3 export failed, 4 replication failed

${color.dim("EXAMPLES:")}
  dumpkeeper backup -d shop -b /home/backups/mysql
  dumpkeeper backup -d shop -b /home/backups/mysql --retention-days 14
  dumpkeeper backup -c /etc/dumpkeeper/shop.conf --enable-rsync -H backup-box -r /srv/mysql
`);
}
