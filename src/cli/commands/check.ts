import { parseArgs } from "node:util";
import { createDefaultDependencies, EXIT_CODES, runPreflight } from "../../core";
import { errorMessage } from "../../utils/errors";
import { setLogLevel } from "../../utils/logger";
import { COMMON_HELP, COMMON_OPTIONS, loadRunConfig } from "../options";
import { color, formatSummary, ui } from "../ui";

export async function checkCommand(args: string[]): Promise<number> {
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

    ui.intro("dumpkeeper check");

    ui.note(
      formatSummary([
        { label: "Database", value: config.databaseName || color.red("(missing)") },
        { label: "Backup directory", value: config.backupDir || color.red("(missing)") },
        { label: "Retention", value: config.retentionDays > 0 ? `${config.retentionDays} day(s)` : "disabled" },
        {
          label: "Replication",
          value: config.sync.enabled
            ? `${config.sync.remoteHost}:${config.sync.targetDir}${config.sync.deleteRemote ? " (--delete)" : ""}`
            : "disabled",
        },
        { label: "clpctl", value: config.tools.clpctl },
        { label: "rsync", value: config.sync.enabled ? config.tools.rsync : null },
      ]),
      "Configuration",
    );

    const result = await runPreflight(config, createDefaultDependencies(config));

    if (!result.ok) {
      ui.error(`Preflight failed (${result.check}): ${result.reason}`);
      return EXIT_CODES.preflight_failed;
    }

    ui.success("All preflight checks passed");
    ui.outro("Ready to back up");
    return 0;
  } catch (error) {
    ui.error(`Check failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dumpkeeper check")} - Run the preflight checks without taking a backup

${color.dim("USAGE:")}
  dumpkeeper check [OPTIONS]

${color.dim("OPTIONS:")}
${COMMON_HELP}

${color.dim("CHECKS:")}
  1. Database name and backup directory are set
  2. clpctl is on PATH
  3. With replication: rsync is on PATH, target directory and host are set,
     and the host alias exists in the ssh config

  Nothing is created or modified.
`);
}
