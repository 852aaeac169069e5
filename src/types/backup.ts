/**
 * Backup run type definitions
 */

export type RunState = "init" | "preflight" | "exporting" | "retention" | "replication" | "done";

export type RunOutcome = "success" | "preflight_failed" | "export_failed" | "replication_failed";

export type PreflightCheck = "required_fields" | "export_tool" | "sync_tool" | "sync_target" | "host_profile";

export type PreflightResult =
  | { ok: true }
  | {
      ok: false;
      check: PreflightCheck;
      reason: string;
    };

export interface ArchivePlan {
  /** root/YYYY/MM/DD */
  destDir: string;
  artifactName: string;
  artifactPath: string;
}

export interface ExportStageResult {
  success: boolean;
  exitCode: number | null;
  error?: string;
}

export interface RetentionFailure {
  path: string;
  error: string;
}

export interface RetentionResult {
  /** True when the retention window is 0 and nothing was inspected */
  skipped: boolean;
  cutoff: Date | null;
  /** Artifacts inspected */
  scanned: number;
  /** Artifacts removed (or, on a dry run, that would be removed) */
  deleted: string[];
  failed: RetentionFailure[];
  prunedDirs: string[];
  pruneFailures: RetentionFailure[];
}

export interface ReplicationStageResult {
  success: boolean;
  exitCode: number | null;
  destination: string;
  error?: string;
}

export interface ArtifactInfo {
  path: string;
  name: string;
  databaseName: string | null;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface BackupRunResult {
  outcome: RunOutcome;
  exitCode: number;
  /** States entered, in order */
  states: RunState[];
  artifactPath: string | null;
  retention: RetentionResult | null;
  replication: ReplicationStageResult | null;
  durationMs: number;
  error?: string;
}
