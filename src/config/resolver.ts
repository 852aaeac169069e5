/**
 * Configuration path resolution
 */

import * as os from "node:os";
import * as path from "node:path";
import type { DumpkeeperConfig, PartialDumpkeeperConfig, RunConfig } from "../types";

export function expandHome(filePath: string): string {
  if (filePath === "~") return os.homedir();
  if (filePath.startsWith("~/")) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

function resolvePath(filePath: string, baseDir: string): string {
  // Empty stays empty so preflight can report it
  if (!filePath) return filePath;
  return path.resolve(baseDir, expandHome(filePath));
}

/**
 * Resolve relative paths in a config layer against a base directory: the
 * config file's directory for file layers, the working directory for
 * command-line layers.
 */
export function resolvePaths(config: PartialDumpkeeperConfig, baseDir: string): PartialDumpkeeperConfig {
  const resolved: PartialDumpkeeperConfig = { ...config };

  if (config.backupDir !== undefined) {
    resolved.backupDir = resolvePath(config.backupDir, baseDir);
  }

  if (config.sync?.sshConfigPath !== undefined) {
    resolved.sync = { ...config.sync, sshConfigPath: resolvePath(config.sync.sshConfigPath, baseDir) };
  }

  return resolved;
}

export function freezeConfig(config: DumpkeeperConfig): RunConfig {
  return Object.freeze({
    ...config,
    sync: Object.freeze({ ...config.sync }),
    tools: Object.freeze({ ...config.tools }),
  });
}
