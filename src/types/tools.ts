/**
 * External collaborator interfaces
 */

export interface ToolResult {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Produces one compressed, self-contained database snapshot at a given path.
 */
export interface Exporter {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  export(databaseName: string, destPath: string): Promise<ToolResult>;
}

export interface SyncRequest {
  localDir: string;
  remoteHost: string;
  remoteDir: string;
  mirrorDeletes: boolean;
}

/**
 * One-way mirror of a local directory to a remote host.
 */
export interface Syncer {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  sync(request: SyncRequest): Promise<ToolResult>;
}

export interface HostAliasResolver {
  hasProfile(host: string): Promise<boolean>;
}
