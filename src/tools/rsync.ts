/**
 * rsync replication wrapper
 */

import type { Syncer, SyncRequest, ToolResult } from "../types";
import { ensureTrailingSep } from "../utils/path";
import { commandExists, runCommand } from "./process";

export const RSYNC_BASE_OPTIONS = ["-avz"] as const;

export function formatRemoteTarget(remoteHost: string, remoteDir: string): string {
  return `${remoteHost}:${remoteDir}`;
}

/**
 * Archive mode, compressed transfer; the trailing separator on the source
 * makes rsync copy the YEAR/MONTH/DAY tree rather than the root directory.
 */
export function buildRsyncArgs(request: SyncRequest): string[] {
  const args: string[] = [...RSYNC_BASE_OPTIONS];
  if (request.mirrorDeletes) {
    args.push("--delete");
  }
  args.push(ensureTrailingSep(request.localDir), formatRemoteTarget(request.remoteHost, request.remoteDir));
  return args;
}

export class RsyncSyncer implements Syncer {
  readonly name = "rsync";

  constructor(private readonly binary: string = "rsync") {}

  isAvailable(): Promise<boolean> {
    return commandExists(this.binary);
  }

  sync(request: SyncRequest): Promise<ToolResult> {
    return runCommand(this.binary, buildRsyncArgs(request));
  }
}
