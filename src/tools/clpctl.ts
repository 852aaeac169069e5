/**
 * CloudPanel database export wrapper
 */

import type { Exporter, ToolResult } from "../types";
import { commandExists, runCommand } from "./process";

export function buildExportArgs(databaseName: string, destPath: string): string[] {
  return ["db:export", `--databaseName=${databaseName}`, `--file=${destPath}`];
}

/**
 * Exports a MySQL database through `clpctl db:export`, which writes a gzipped
 * dump to the requested file.
 */
export class ClpctlExporter implements Exporter {
  readonly name = "clpctl";

  constructor(private readonly binary: string = "clpctl") {}

  isAvailable(): Promise<boolean> {
    return commandExists(this.binary);
  }

  export(databaseName: string, destPath: string): Promise<ToolResult> {
    return runCommand(this.binary, buildExportArgs(databaseName, destPath));
  }
}
