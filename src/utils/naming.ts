/**
 * Backup naming utilities
 *
 * Every artifact of one backup shares the same local-time stamp:
 *   immich_backup_20240131_235959/           working and archive root directory
 *   immich_backup_20240131_235959.tar.gz     archive
 *   immich_db_backup_20240131_235959.sql.gz  database dump inside the archive
 */

export const BACKUP_PREFIX = "immich_backup_";
export const DATABASE_DUMP_PREFIX = "immich_db_backup_";
export const ARCHIVE_EXTENSION = ".tar.gz";
export const RESTORE_TEMP_PREFIX = "immich_restore_";

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Format a date as YYYYMMDD_HHMMSS in local time
 */
export function formatTimestamp(date: Date = new Date()): string {
  const day = [date.getFullYear(), date.getMonth() + 1, date.getDate()]
    .map(pad)
    .join("");
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map(pad)
    .join("");
  return `${day}_${time}`;
}

export function backupDirName(timestamp: string): string {
  return `${BACKUP_PREFIX}${timestamp}`;
}

export function archiveName(timestamp: string): string {
  return `${backupDirName(timestamp)}${ARCHIVE_EXTENSION}`;
}

export function databaseDumpName(timestamp: string): string {
  return `${DATABASE_DUMP_PREFIX}${timestamp}.sql.gz`;
}

export function isArchivePath(filePath: string): boolean {
  return filePath.endsWith(ARCHIVE_EXTENSION);
}

/**
 * Whether a directory entry follows the backup directory naming convention
 */
export function isBackupDirName(name: string): boolean {
  return name.startsWith(BACKUP_PREFIX) && !isArchivePath(name);
}
