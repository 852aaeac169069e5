/**
 * Replication stage: one-way mirror of the archive tree to a remote host.
 */

import { describeFailure } from "../../tools/process";
import { formatRemoteTarget } from "../../tools/rsync";
import type { ReplicationStageResult, Syncer, SyncRequest, ToolResult } from "../../types";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";

export async function runReplicationStage(
  syncer: Syncer,
  request: SyncRequest,
): Promise<ReplicationStageResult> {
  const destination = formatRemoteTarget(request.remoteHost, request.remoteDir);

  let result: ToolResult;
  try {
    result = await syncer.sync(request);
  } catch (error) {
    const message = errorMessage(error);
    return {
      success: false,
      exitCode: null,
      destination,
      error: `${syncer.name} could not be started: ${message}`,
    };
  }

  if (!result.success) {
    return { success: false, exitCode: result.exitCode, destination, error: describeFailure(result) };
  }

  if (result.stdout) {
    logger.debug(`${syncer.name} output:\n${result.stdout}`);
  }

  return { success: true, exitCode: result.exitCode, destination };
}
