/**
 * Backup module exports
 */

export {
  ARTIFACT_DIR_DEPTH,
  type CollectedArtifacts,
  collectArtifactFiles,
  listArtifacts,
} from "./archive-tree";
export { runExportStage } from "./export-stage";
export {
  type BackupDependencies,
  createDefaultDependencies,
  EXIT_CODES,
  runBackup,
} from "./orchestrator";
export { datedDir, planArchivePath, prepareArchivePath } from "./path-planner";
