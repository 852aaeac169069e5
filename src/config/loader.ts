/**
 * Configuration file loading and run config resolution
 */

import { readFile, stat } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { PartialDumpkeeperConfig, RunConfig } from "../types";
import { errorMessage, isNotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { createDefaultConfig, mergeConfig } from "./defaults";
import { buildInlineConfig, type InlineConfigOptions } from "./inline";
import { freezeConfig, resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "dumpkeeper.config.yaml",
  "dumpkeeper.config.yml",
  "dumpkeeper.config.json",
] as const;

// key=value files sourced by older shell deployments
const LEGACY_KEYS: Record<string, (raw: Record<string, unknown>, sync: Record<string, unknown>, value: string) => void> = {
  DATABASE_NAME: (raw, _sync, value) => {
    raw.databaseName = value;
  },
  BACKUP_DIR: (raw, _sync, value) => {
    raw.backupDir = value;
  },
  RETENTION_DAYS: (raw, _sync, value) => {
    raw.retentionDays = value;
  },
  RSYNC_TARGET_DIR: (_raw, sync, value) => {
    sync.targetDir = value;
  },
  REMOTE_HOST: (_raw, sync, value) => {
    sync.remoteHost = value;
  },
  ENABLE_RSYNC: (_raw, sync, value) => {
    sync.enabled = parseLegacyBoolean("ENABLE_RSYNC", value);
  },
  RSYNC_DELETE: (_raw, sync, value) => {
    sync.deleteRemote = parseLegacyBoolean("RSYNC_DELETE", value);
  },
};

function parseLegacyBoolean(key: string, value: string): boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  throw new ConfigError(`${key} must be true or false, got '${value}'`);
}

function unquote(value: string): string {
  const trimmed = value.trim();
  const quoted = trimmed.match(/^(["'])(.*)\1$/);
  if (quoted) return quoted[2] ?? "";
  return trimmed.replace(/\s+#.*$/, "");
}

/**
 * Parse the legacy key=value format into the nested config shape.
 */
export function parseLegacyConf(content: string): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  const sync: Record<string, unknown> = {};

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) return;

    const match = line.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!match) {
      throw new ConfigError(`Line ${index + 1}: expected KEY=value`);
    }

    const [, key = "", value = ""] = match;
    const apply = LEGACY_KEYS[key];
    if (!apply) {
      throw new ConfigError(`Line ${index + 1}: unknown setting '${key}'`);
    }
    apply(raw, sync, unquote(value));
  });

  if (Object.keys(sync).length > 0) {
    raw.sync = sync;
  }
  return raw;
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  if (ext === ".conf" || ext === ".env" || ext === "") {
    return parseLegacyConf(content);
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, .json or .conf`);
}

/**
 * Load, validate and path-resolve a config file
 */
export async function loadConfigFile(configPath: string): Promise<PartialDumpkeeperConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${errorMessage(error)}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  const validated = validateConfig(parsed);

  logger.debug(`Loaded config file: ${absolutePath}`);
  return resolvePaths(validated, path.dirname(absolutePath));
}

/**
 * Find a config file in the given directory
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    try {
      if ((await stat(configPath)).isFile()) {
        return configPath;
      }
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
    }
  }

  return null;
}

export interface ResolveOptions {
  /** Explicit --config path; must exist when given */
  configPath?: string;
  inline?: InlineConfigOptions;
  cwd?: string;
}

/**
 * Build the immutable run configuration: defaults, then the config file, then
 * command-line flags.
 */
export async function resolveRunConfig(options: ResolveOptions = {}): Promise<RunConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ?? (await findConfigFile(cwd));

  const fileLayer: PartialDumpkeeperConfig = configPath
    ? await loadConfigFile(path.resolve(cwd, configPath))
    : {};
  const inlineLayer = resolvePaths(buildInlineConfig(options.inline ?? {}), cwd);

  return freezeConfig(mergeConfig(createDefaultConfig(), fileLayer, inlineLayer));
}
