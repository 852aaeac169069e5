import { mkdir, mkdtemp, readdir, rm, utimes, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import { createDefaultConfig, freezeConfig, mergeConfig } from "../src/config";
import type { PartialDumpkeeperConfig, RunConfig, SyncRequest, ToolResult } from "../src/types";

export const DAY_MS = 24 * 60 * 60 * 1000;

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `dumpkeeper-${prefix}-`));
}

export function removeTempDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}

export function buildConfig(overrides: PartialDumpkeeperConfig = {}): RunConfig {
  return freezeConfig(mergeConfig(createDefaultConfig(), overrides));
}

export function toolResult(exitCode = 0, stderr = ""): ToolResult {
  return { success: exitCode === 0, exitCode, stdout: "", stderr };
}

/**
 * Write a file (creating its directories) and set its mtime.
 */
export async function writeFileAt(filePath: string, modifiedAt: Date, content = "dump"): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
  await utimes(filePath, modifiedAt, modifiedAt);
}

/**
 * Every file below dir, relative and sorted.
 */
export async function listTree(dir: string): Promise<string[]> {
  const files: string[] = [];
  const walk = async (current: string): Promise<void> => {
    for (const entry of await readdir(current, { withFileTypes: true })) {
      const entryPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
      } else {
        files.push(path.relative(dir, entryPath));
      }
    }
  };
  await walk(dir);
  return files.sort();
}

interface FakeExporterOptions {
  available?: boolean;
  exitCode?: number;
  startError?: Error;
}

/**
 * Exporter that writes a small file on success.
 */
export function fakeExporter(options: FakeExporterOptions = {}) {
  return {
    name: "clpctl",
    isAvailable: vi.fn(async () => options.available ?? true),
    export: vi.fn(async (_databaseName: string, destPath: string): Promise<ToolResult> => {
      if (options.startError) throw options.startError;
      const exitCode = options.exitCode ?? 0;
      if (exitCode === 0) {
        await writeFile(destPath, "-- dump\n");
        return toolResult();
      }
      return toolResult(exitCode, "Database not found");
    }),
  };
}

export function fakeSyncer(options: { available?: boolean; exitCode?: number } = {}) {
  return {
    name: "rsync",
    isAvailable: vi.fn(async () => options.available ?? true),
    sync: vi.fn(async (_request: SyncRequest): Promise<ToolResult> => {
      const exitCode = options.exitCode ?? 0;
      return toolResult(exitCode, exitCode === 0 ? "" : "ssh: connect to host backup-host port 22: Connection refused");
    }),
  };
}

export function fakeHostResolver(knownHosts: string[] = ["backup-host"]) {
  return {
    hasProfile: vi.fn(async (host: string) => knownHosts.includes(host)),
  };
}
