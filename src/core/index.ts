/**
 * Core module exports
 */

// Backup
export {
  type BackupDependencies,
  collectArtifactFiles,
  createDefaultDependencies,
  datedDir,
  EXIT_CODES,
  listArtifacts,
  planArchivePath,
  prepareArchivePath,
  runBackup,
  runExportStage,
} from "./backup";

// Cleanup
export { enforceRetention, pruneEmptyDirs, type RetentionOptions, summarizeRetention } from "./cleanup";

// Preflight
export { type PreflightDependencies, PreflightError, runPreflight } from "./preflight";

// Replication
export { runReplicationStage } from "./sync";
