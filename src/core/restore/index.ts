/**
 * Restore module exports
 */

export {
  restoreDatabase,
  SEARCH_PATH_FIX,
  type Sleep,
  waitForDatabase,
} from "./database";
export { restoreFilesystem } from "./filesystem";
export {
  checkContainers,
  type FetchLike,
  type PingResponse,
  pingServer,
  verifyHealth,
} from "./health";
export { type RestoreContext, runRestore } from "./orchestrator";
export {
  type BackupSource,
  closeBackupSource,
  extractBackup,
  openBackupSource,
} from "./source";
