/**
 * Command-line configuration options
 */

import type { PartialDumpkeeperConfig, SyncConfig } from "../types";
import { parseRetentionDays } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Database to export */
  databaseName?: string;
  /** Root of the archive tree */
  backupDir?: string;
  /** Remote directory mirroring the archive tree */
  rsyncTargetDir?: string;
  /** Host alias from the ssh client configuration */
  remoteHost?: string;
  enableRsync?: boolean;
  /** Turn off replication configured in a config file */
  noRsync?: boolean;
  rsyncDelete?: boolean;
  retentionDays?: number;
  sshConfig?: string;
}

/**
 * CLI option definitions for inline config (for parseArgs). Booleans carry no
 * default so that an absent flag leaves the config file value alone.
 */
export const INLINE_CONFIG_OPTIONS = {
  "backup-dir": { type: "string" as const, short: "b" },
  "database-name": { type: "string" as const, short: "d" },
  "rsync-target-dir": { type: "string" as const, short: "r" },
  "remote-host": { type: "string" as const, short: "H" },
  "enable-rsync": { type: "boolean" as const },
  "no-rsync": { type: "boolean" as const },
  "rsync-delete": { type: "boolean" as const },
  "retention-days": { type: "string" as const },
  "ssh-config": { type: "string" as const },
} as const;

/**
 * Parsed values for INLINE_CONFIG_OPTIONS as parseArgs returns them
 */
export interface InlineOptionValues {
  "backup-dir"?: string;
  "database-name"?: string;
  "rsync-target-dir"?: string;
  "remote-host"?: string;
  "enable-rsync"?: boolean;
  "no-rsync"?: boolean;
  "rsync-delete"?: boolean;
  "retention-days"?: string;
  "ssh-config"?: string;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: InlineOptionValues): InlineConfigOptions {
  return {
    databaseName: values["database-name"],
    backupDir: values["backup-dir"],
    rsyncTargetDir: values["rsync-target-dir"],
    remoteHost: values["remote-host"],
    enableRsync: values["enable-rsync"],
    noRsync: values["no-rsync"],
    rsyncDelete: values["rsync-delete"],
    retentionDays:
      values["retention-days"] !== undefined
        ? parseRetentionDays(values["retention-days"], "--retention-days")
        : undefined,
    sshConfig: values["ssh-config"],
  };
}

/**
 * Build a partial config from inline options. Only flags that were given end
 * up in the result.
 */
export function buildInlineConfig(options: InlineConfigOptions): PartialDumpkeeperConfig {
  const config: PartialDumpkeeperConfig = {};

  if (options.databaseName !== undefined) {
    config.databaseName = options.databaseName;
  }
  if (options.backupDir !== undefined) {
    config.backupDir = options.backupDir;
  }
  if (options.retentionDays !== undefined) {
    config.retentionDays = options.retentionDays;
  }

  const sync: Partial<SyncConfig> = {
    ...(options.rsyncTargetDir !== undefined && { targetDir: options.rsyncTargetDir }),
    ...(options.remoteHost !== undefined && { remoteHost: options.remoteHost }),
    ...(options.rsyncDelete && { deleteRemote: true }),
    ...(options.sshConfig !== undefined && { sshConfigPath: options.sshConfig }),
  };

  // --no-rsync wins over --enable-rsync
  if (options.noRsync) {
    sync.enabled = false;
  } else if (options.enableRsync) {
    sync.enabled = true;
  }

  if (Object.keys(sync).length > 0) {
    config.sync = sync;
  }

  return config;
}
