/**
 * Export stage: one call to the export tool, no retry.
 */

import { describeFailure } from "../../tools/process";
import type { Exporter, ExportStageResult, ToolResult } from "../../types";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";

export async function runExportStage(
  exporter: Exporter,
  databaseName: string,
  artifactPath: string,
): Promise<ExportStageResult> {
  let result: ToolResult;
  try {
    result = await exporter.export(databaseName, artifactPath);
  } catch (error) {
    // The tool could not be started at all (e.g. removed after preflight)
    const message = errorMessage(error);
    return { success: false, exitCode: null, error: `${exporter.name} could not be started: ${message}` };
  }

  if (!result.success) {
    return { success: false, exitCode: result.exitCode, error: describeFailure(result) };
  }

  if (result.stdout) {
    logger.debug(`${exporter.name} output: ${result.stdout}`);
  }

  return { success: true, exitCode: result.exitCode };
}
