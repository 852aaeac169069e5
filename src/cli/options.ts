/**
 * Options shared by every command that needs a run configuration
 */

import { extractInlineOptions, INLINE_CONFIG_OPTIONS, type InlineOptionValues } from "../config/inline";
import { resolveRunConfig } from "../config/loader";
import type { RunConfig } from "../types";

export const COMMON_OPTIONS = {
  config: { type: "string", short: "c" },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
  ...INLINE_CONFIG_OPTIONS,
} as const;

export const COMMON_HELP = `  -c, --config <path>            Config file (default: ./dumpkeeper.config.yaml if present)
  -d, --database-name <name>     Database to export
  -b, --backup-dir <dir>         Root of the YEAR/MONTH/DAY archive tree
      --retention-days <n>       Keep artifacts for n days (0 disables rotation)
      --enable-rsync             Replicate the archive tree after the backup
      --no-rsync                 Disable replication set in the config file
  -r, --rsync-target-dir <dir>   Remote directory for replication
  -H, --remote-host <alias>      Host alias defined in the ssh config
      --rsync-delete             Delete remote files that no longer exist locally
      --ssh-config <path>        ssh config used to resolve the host alias
  -v, --verbose                  Verbose output
  -h, --help                     Show this help message`;

export function loadRunConfig(values: InlineOptionValues & { config?: string }): Promise<RunConfig> {
  return resolveRunConfig({
    configPath: values.config,
    inline: extractInlineOptions(values),
  });
}
