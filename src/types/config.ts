/**
 * Configuration type definitions for dumpkeeper
 */

export interface SyncConfig {
  /** Replicate the archive tree to the remote host after each backup */
  enabled: boolean;
  /** Directory on the remote host that mirrors the backup root */
  targetDir: string;
  /** Host alias defined in the ssh client configuration */
  remoteHost: string;
  /** Delete remote files that no longer exist locally (rsync --delete) */
  deleteRemote: boolean;
  /** ssh client configuration used to resolve the host alias */
  sshConfigPath: string;
}

export interface ToolsConfig {
  /** CloudPanel CLI used for database exports */
  clpctl: string;
  rsync: string;
}

export interface DumpkeeperConfig {
  databaseName: string;
  backupDir: string;
  /** Days to keep artifacts; 0 disables retention */
  retentionDays: number;
  artifactExtension: string;
  sync: SyncConfig;
  tools: ToolsConfig;
}

/**
 * Resolved, frozen configuration for a single invocation.
 */
export type RunConfig = Readonly<
  Omit<DumpkeeperConfig, "sync" | "tools"> & {
    sync: Readonly<SyncConfig>;
    tools: Readonly<ToolsConfig>;
  }
>;

/**
 * Configuration as it appears in a config file or on the command line,
 * before defaults are applied.
 */
export type PartialDumpkeeperConfig = Partial<
  Omit<DumpkeeperConfig, "sync" | "tools"> & {
    sync: Partial<SyncConfig>;
    tools: Partial<ToolsConfig>;
  }
>;
