/**
 * Configuration validation
 */

import type { PartialDumpkeeperConfig, SyncConfig, ToolsConfig } from "../types";
import { logger } from "../utils/logger";
import { MAX_RETENTION_DAYS } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type RawObject = Record<string, unknown>;

const TOP_LEVEL_KEYS = new Set([
  "databaseName",
  "backupDir",
  "retentionDays",
  "artifactExtension",
  "sync",
  "tools",
]);

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(obj: RawObject, key: string, label: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${label} must be a string`);
  }
  return value;
}

function optionalBoolean(obj: RawObject, key: string, label: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`${label} must be a boolean`);
  }
  return value;
}

export function parseRetentionDays(value: unknown, label = "retentionDays"): number {
  const days = typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof days !== "number" || !Number.isInteger(days) || days < 0) {
    throw new ConfigError(`${label} must be a non-negative integer`);
  }
  if (days > MAX_RETENTION_DAYS) {
    throw new ConfigError(`${label} must be at most ${MAX_RETENTION_DAYS}`);
  }
  return days;
}

function validateSync(raw: unknown): Partial<SyncConfig> | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isObject(raw)) {
    throw new ConfigError("sync must be an object");
  }

  const enabled = optionalBoolean(raw, "enabled", "sync.enabled");
  const targetDir = optionalString(raw, "targetDir", "sync.targetDir");
  const remoteHost = optionalString(raw, "remoteHost", "sync.remoteHost");
  const deleteRemote = optionalBoolean(raw, "deleteRemote", "sync.deleteRemote");
  const sshConfigPath = optionalString(raw, "sshConfigPath", "sync.sshConfigPath");

  return {
    ...(enabled !== undefined && { enabled }),
    ...(targetDir !== undefined && { targetDir }),
    ...(remoteHost !== undefined && { remoteHost }),
    ...(deleteRemote !== undefined && { deleteRemote }),
    ...(sshConfigPath !== undefined && { sshConfigPath }),
  };
}

function validateTools(raw: unknown): Partial<ToolsConfig> | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isObject(raw)) {
    throw new ConfigError("tools must be an object");
  }

  const clpctl = optionalString(raw, "clpctl", "tools.clpctl");
  const rsync = optionalString(raw, "rsync", "tools.rsync");

  return {
    ...(clpctl !== undefined && { clpctl }),
    ...(rsync !== undefined && { rsync }),
  };
}

/**
 * Validate the structure of a parsed config file and return only the keys it
 * sets. Empty values are accepted here; preflight decides whether a run can
 * go ahead with them.
 */
export function validateConfig(raw: unknown): PartialDumpkeeperConfig {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isObject(raw)) {
    throw new ConfigError("Config must be an object");
  }

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      logger.warn(`Ignoring unknown config key: ${key}`);
    }
  }

  const databaseName = optionalString(raw, "databaseName", "databaseName");
  const backupDir = optionalString(raw, "backupDir", "backupDir");
  const artifactExtension = optionalString(raw, "artifactExtension", "artifactExtension");
  const retentionDays =
    raw.retentionDays === undefined || raw.retentionDays === null
      ? undefined
      : parseRetentionDays(raw.retentionDays);

  if (artifactExtension !== undefined && !/^\.[A-Za-z0-9.]+$/.test(artifactExtension)) {
    throw new ConfigError("artifactExtension must start with '.' and contain only letters, digits and dots");
  }

  const sync = validateSync(raw.sync);
  const tools = validateTools(raw.tools);

  return {
    ...(databaseName !== undefined && { databaseName }),
    ...(backupDir !== undefined && { backupDir }),
    ...(retentionDays !== undefined && { retentionDays }),
    ...(artifactExtension !== undefined && { artifactExtension }),
    ...(sync !== undefined && { sync }),
    ...(tools !== undefined && { tools }),
  };
}
