/**
 * Backup orchestration: preflight, export, retention, replication.
 */

import { ClpctlExporter } from "../../tools/clpctl";
import { RsyncSyncer } from "../../tools/rsync";
import { SshConfigHostResolver } from "../../tools/ssh-config";
import type {
  ArchivePlan,
  BackupRunResult,
  ReplicationStageResult,
  RetentionResult,
  RunConfig,
  RunOutcome,
  RunState,
} from "../../types";
import { AuditLog } from "../../utils/audit-log";
import { errorMessage } from "../../utils/errors";
import { formatDuration } from "../../utils/format";
import { enforceRetention, summarizeRetention } from "../cleanup/retention";
import { type PreflightDependencies, runPreflight } from "../preflight/validator";
import { runReplicationStage } from "../sync/replication";
import { runExportStage } from "./export-stage";
import { prepareArchivePath } from "./path-planner";

export const EXIT_CODES: Record<RunOutcome, number> = {
  success: 0,
  preflight_failed: 2,
  export_failed: 3,
  replication_failed: 4,
};

// Outcome of an unexpected throw while a state is active
const STATE_FAILURES: Partial<Record<RunState, RunOutcome>> = {
  init: "preflight_failed",
  preflight: "preflight_failed",
  exporting: "export_failed",
  replication: "replication_failed",
};

export interface BackupDependencies extends PreflightDependencies {
  /** Defaults to backup.log in the backup root */
  auditLog?: AuditLog;
  clock?: () => Date;
}

export function createDefaultDependencies(config: RunConfig): PreflightDependencies {
  return {
    exporter: new ClpctlExporter(config.tools.clpctl),
    syncer: new RsyncSyncer(config.tools.rsync),
    hostResolver: new SshConfigHostResolver(config.sync.sshConfigPath),
  };
}

export async function runBackup(
  config: RunConfig,
  deps: BackupDependencies,
): Promise<BackupRunResult> {
  const clock = deps.clock ?? (() => new Date());
  const startTime = clock().getTime();
  const audit = deps.auditLog ?? AuditLog.forBackupDir(config.backupDir, clock);

  const states: RunState[] = [];
  let artifactPath: string | null = null;
  let retention: RetentionResult | null = null;
  let replication: ReplicationStageResult | null = null;

  const enter = async (state: RunState, message: string): Promise<void> => {
    states.push(state);
    await audit.record(message);
  };

  const finish = async (outcome: RunOutcome, error?: string): Promise<BackupRunResult> => {
    const durationMs = clock().getTime() - startTime;
    if (error) {
      await audit.record(`Error: ${error}`, "error");
      await audit.record(`Backup run for '${config.databaseName}' failed (${outcome}).`, "error");
    }
    return {
      outcome,
      exitCode: EXIT_CODES[outcome],
      states,
      artifactPath,
      retention,
      replication,
      durationMs,
      ...(error !== undefined && { error }),
    };
  };

  const execute = async (): Promise<BackupRunResult> => {
    await enter("init", `Backup run started for database '${config.databaseName}'.`);

    // Preflight
    await enter("preflight", "Running preflight checks.");
    const preflight = await runPreflight(config, deps);
    if (!preflight.ok) {
      return finish("preflight_failed", preflight.reason);
    }

    // Export
    await enter("exporting", `Starting database export for '${config.databaseName}'.`);
    let plan: ArchivePlan;
    try {
      plan = await prepareArchivePath(config.backupDir, clock(), config.databaseName, config.artifactExtension);
    } catch (error) {
      return finish("export_failed", `Cannot prepare archive directory: ${errorMessage(error)}`);
    }
    artifactPath = plan.artifactPath;

    const exported = await runExportStage(deps.exporter, config.databaseName, plan.artifactPath);
    if (!exported.success) {
      return finish("export_failed", `Database export failed (${exported.error ?? "unknown error"}).`);
    }
    await audit.record(`Database export completed successfully. Dump file: ${plan.artifactPath}`);

    // Retention
    if (config.retentionDays > 0) {
      await enter(
        "retention",
        `Starting backup rotation. Retaining backups from the last ${config.retentionDays} day(s).`,
      );
      try {
        retention = await enforceRetention(config.backupDir, config.retentionDays, {
          now: clock(),
          extension: config.artifactExtension,
        });
        const failures = retention.failed.length + retention.pruneFailures.length;
        for (const failure of [...retention.failed, ...retention.pruneFailures]) {
          await audit.record(`Rotation could not remove ${failure.path}: ${failure.error}`, "warn");
        }
        await audit.record(`Backup rotation completed. ${summarizeRetention(retention)}`, failures > 0 ? "warn" : "info");
      } catch (error) {
        // Retention never decides the outcome of a run
        await audit.record(`Backup rotation aborted: ${errorMessage(error)}`, "warn");
      }
    }

    // Replication
    if (config.sync.enabled) {
      const { remoteHost, targetDir, deleteRemote } = config.sync;
      await enter("replication", `Starting rsync synchronization to '${remoteHost}:${targetDir}'.`);
      if (deleteRemote) {
        await audit.record("Rsync will delete files on remote server that no longer exist locally.");
      }

      replication = await runReplicationStage(deps.syncer, {
        localDir: config.backupDir,
        remoteHost,
        remoteDir: targetDir,
        mirrorDeletes: deleteRemote,
      });
      if (!replication.success) {
        return finish("replication_failed", `Rsync synchronization failed (${replication.error ?? "unknown error"}).`);
      }
      await audit.record("Rsync synchronization completed successfully.");
    }

    await enter(
      "done",
      `Backup run completed successfully in ${formatDuration(clock().getTime() - startTime)}.`,
    );
    return finish("success");
  };

  try {
    return await execute();
  } catch (error) {
    const state = states[states.length - 1] ?? "init";
    const outcome = STATE_FAILURES[state];
    if (!outcome) throw error;
    return finish(outcome, `Unexpected error during ${state}: ${errorMessage(error)}`);
  }
}
