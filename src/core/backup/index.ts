/**
 * Backup module exports
 */

export { dumpDatabase } from "./database-dump";
export { backupFilesystem } from "./filesystem";
export {
  type BackupContext,
  checkEnvironment,
  runBackup,
} from "./orchestrator";
