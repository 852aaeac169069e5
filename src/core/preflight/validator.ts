/**
 * Preflight checks. Read-only: nothing here may create, modify or delete
 * anything on disk.
 */

import { MAX_RETENTION_DAYS } from "../../config/defaults";
import type { Exporter, HostAliasResolver, PreflightCheck, PreflightResult, RunConfig, Syncer } from "../../types";
import { errorMessage } from "../../utils/errors";
import { isSafeFileComponent } from "../../utils/path";

export interface PreflightDependencies {
  exporter: Exporter;
  syncer: Syncer;
  hostResolver: HostAliasResolver;
}

export class PreflightError extends Error {
  constructor(
    readonly check: PreflightCheck,
    message: string,
  ) {
    super(message);
    this.name = "PreflightError";
  }
}

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

function checkRequiredFields(config: RunConfig): void {
  if (isBlank(config.backupDir)) {
    throw new PreflightError("required_fields", "Backup directory is required.");
  }
  if (isBlank(config.databaseName)) {
    throw new PreflightError("required_fields", "Database name is required.");
  }
  if (!isSafeFileComponent(config.databaseName)) {
    throw new PreflightError(
      "required_fields",
      `Database name '${config.databaseName}' cannot be used in a file name.`,
    );
  }
  if (!Number.isInteger(config.retentionDays) || config.retentionDays < 0) {
    throw new PreflightError(
      "required_fields",
      `Retention days must be a non-negative integer, got ${config.retentionDays}.`,
    );
  }
  if (config.retentionDays > MAX_RETENTION_DAYS) {
    throw new PreflightError(
      "required_fields",
      `Retention days must be at most ${MAX_RETENTION_DAYS}, got ${config.retentionDays}.`,
    );
  }
}

/**
 * Run a collaborator query, reporting a throw as a failure of the given check.
 */
async function queryCollaborator<T>(check: PreflightCheck, what: string, query: () => Promise<T>): Promise<T> {
  try {
    return await query();
  } catch (error) {
    throw new PreflightError(check, `${what}: ${errorMessage(error)}`);
  }
}

async function checkExportTool(exporter: Exporter): Promise<void> {
  const available = await queryCollaborator("export_tool", `Cannot look up '${exporter.name}'`, () =>
    exporter.isAvailable(),
  );
  if (!available) {
    throw new PreflightError("export_tool", `'${exporter.name}' command not found.`);
  }
}

async function checkSync(config: RunConfig, deps: PreflightDependencies): Promise<void> {
  const { sync } = config;

  const available = await queryCollaborator("sync_tool", `Cannot look up '${deps.syncer.name}'`, () =>
    deps.syncer.isAvailable(),
  );
  if (!available) {
    throw new PreflightError("sync_tool", `'${deps.syncer.name}' command not found.`);
  }

  if (isBlank(sync.targetDir) || isBlank(sync.remoteHost)) {
    throw new PreflightError(
      "sync_target",
      "Rsync target directory and remote host must be specified when rsync is enabled.",
    );
  }

  const hasProfile = await queryCollaborator(
    "host_profile",
    `Cannot read SSH config ${sync.sshConfigPath} for host '${sync.remoteHost}'`,
    () => deps.hostResolver.hasProfile(sync.remoteHost),
  );
  if (!hasProfile) {
    throw new PreflightError(
      "host_profile",
      `SSH config for host '${sync.remoteHost}' not found in ${sync.sshConfigPath}.`,
    );
  }
}

/**
 * Run every check in order and stop at the first failure.
 */
export async function runPreflight(
  config: RunConfig,
  deps: PreflightDependencies,
): Promise<PreflightResult> {
  try {
    checkRequiredFields(config);
    await checkExportTool(deps.exporter);
    if (config.sync.enabled) {
      await checkSync(config, deps);
    }
    return { ok: true };
  } catch (error) {
    if (error instanceof PreflightError) {
      return { ok: false, check: error.check, reason: error.message };
    }
    throw error;
  }
}
