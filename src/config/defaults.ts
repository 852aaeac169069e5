/**
 * Default configuration values
 */

import * as os from "node:os";
import * as path from "node:path";
import type { DumpkeeperConfig, PartialDumpkeeperConfig } from "../types";
import { DEFAULT_ARTIFACT_EXTENSION } from "../utils/naming";

// About 100 years; keeps the retention cutoff well inside the Date range
export const MAX_RETENTION_DAYS = 36500;

export function createDefaultConfig(): DumpkeeperConfig {
  return {
    // databaseName and backupDir have no sensible default; preflight rejects them empty
    databaseName: "",
    backupDir: "",
    retentionDays: 0,
    artifactExtension: DEFAULT_ARTIFACT_EXTENSION,
    sync: {
      enabled: false,
      targetDir: "",
      remoteHost: "",
      deleteRemote: false,
      sshConfigPath: path.join(os.homedir(), ".ssh", "config"),
    },
    tools: {
      clpctl: "clpctl",
      rsync: "rsync",
    },
  };
}

/**
 * Apply layers in order, later layers winning. Layers must not carry
 * explicit undefined values; the validator and the inline builder only set
 * keys that were given.
 */
export function mergeConfig(
  base: DumpkeeperConfig,
  ...layers: PartialDumpkeeperConfig[]
): DumpkeeperConfig {
  return layers.reduce<DumpkeeperConfig>((merged, layer) => {
    const { sync, tools, ...rest } = layer;
    return {
      ...merged,
      ...rest,
      sync: { ...merged.sync, ...sync },
      tools: { ...merged.tools, ...tools },
    };
  }, base);
}
