/**
 * Core module exports
 */

export {
  createArchive,
  extractArchive,
  extractMembers,
  listArchive,
} from "./archive";
// Backup
export { type BackupContext, checkEnvironment, runBackup } from "./backup";
export { inspectBackup } from "./inspect";
export {
  createManifest,
  FILESYSTEM_DIR,
  hasManifest,
  MANIFEST_FILENAME,
  parseManifest,
  readManifest,
  resolveManifestPaths,
  UPLOAD_BACKUP_DIR,
  writeManifest,
} from "./manifest";
export {
  resolveBackupPaths,
  resolveDbDataLocation,
  resolveUploadLocation,
} from "./paths";
// Restore
export {
  type FetchLike,
  pingServer,
  verifyHealth,
  type RestoreContext,
  runRestore,
} from "./restore";
