/**
 * Centralized type exports for dumpkeeper
 */

// Backup types
export type {
  ArchivePlan,
  ArtifactInfo,
  BackupRunResult,
  ExportStageResult,
  PreflightCheck,
  PreflightResult,
  ReplicationStageResult,
  RetentionFailure,
  RetentionResult,
  RunOutcome,
  RunState,
} from "./backup";
// Config types
export type {
  DumpkeeperConfig,
  PartialDumpkeeperConfig,
  RunConfig,
  SyncConfig,
  ToolsConfig,
} from "./config";
// Collaborator types
export type { Exporter, HostAliasResolver, Syncer, SyncRequest, ToolResult } from "./tools";
