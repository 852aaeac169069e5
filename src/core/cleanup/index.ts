/**
 * Cleanup module exports
 */

export {
  enforceRetention,
  pruneEmptyDirs,
  type RetentionOptions,
  retentionCutoff,
  summarizeRetention,
} from "./retention";
