import { parseArgs } from "node:util";
import { listArtifacts } from "../../core";
import type { ArtifactInfo } from "../../types";
import { errorMessage } from "../../utils/errors";
import { formatBytes, formatLogTimestamp } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { COMMON_HELP, COMMON_OPTIONS, loadRunConfig } from "../options";
import { color, csvField, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
      all: { type: "boolean", default: false },
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

    if (!config.backupDir) {
      ui.error("Backup directory is required (--backup-dir or backupDir in the config file)");
      return 1;
    }

    let artifacts = await listArtifacts(config.backupDir, config.artifactExtension);

    if (!values.all && config.databaseName) {
      artifacts = artifacts.filter((a) => a.databaseName === config.databaseName);
    }

    const limit = values.limit ? parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      artifacts = artifacts.slice(0, limit);
    }

    // No intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(artifacts, null, 2));
        return 0;
      case "csv":
        printCsv(artifacts);
        return 0;
      default:
        ui.intro("dumpkeeper list");

        if (artifacts.length === 0) {
          ui.info(`No artifacts found under ${config.backupDir}`);
          ui.outro("Done");
          return 0;
        }

        printTable(artifacts);

        ui.outro(`${artifacts.length} artifact(s) total`);
        return 0;
    }
  } catch (error) {
    ui.error(`List failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(artifacts: ArtifactInfo[]): void {
  const widths = [TABLE_WIDTHS.database, TABLE_WIDTHS.created, TABLE_WIDTHS.size, TABLE_WIDTHS.artifact];
  const headers = ["Database", "Modified", "Size", "Artifact"];

  ui.step("Artifacts:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const artifact of artifacts) {
    console.log(
      formatTableRow(
        [
          artifact.databaseName ?? color.dim("?"),
          formatLogTimestamp(artifact.modifiedAt),
          formatBytes(artifact.sizeBytes),
          artifact.name,
        ],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

function printCsv(artifacts: ArtifactInfo[]): void {
  console.log("database,name,path,size_bytes,modified_at");

  for (const artifact of artifacts) {
    console.log(
      [
        artifact.databaseName ?? "",
        artifact.name,
        artifact.path,
        artifact.sizeBytes,
        artifact.modifiedAt.toISOString(),
      ]
        .map(csvField)
        .join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("dumpkeeper list")} - List artifacts in the archive tree

${color.dim("USAGE:")}
  dumpkeeper list [OPTIONS]

${color.dim("OPTIONS:")}
  -n, --limit <n>                Show only the newest n artifacts
      --format <fmt>             table (default), json or csv
      --all                      Include every database, not only --database-name
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  dumpkeeper list -b /home/backups/mysql --all
  dumpkeeper list -c /etc/dumpkeeper/shop.conf -n 5
  dumpkeeper list -b /home/backups/mysql --format json
`);
}
