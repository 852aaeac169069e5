/**
 * Replication module exports
 */

export { runReplicationStage } from "./replication";
