/**
 * Backup and restore type definitions
 */

export interface ResolvedPaths {
  uploadLocation: string;
  dbDataLocation: string;
  /** Subfolders of the upload location that exist on disk */
  criticalFolders: string[];
}

/**
 * Record written as backup_manifest.json inside every backup.
 * Field names are part of the on-disk format.
 */
export interface BackupManifest {
  timestamp: string;
  immich_version: string;
  database_backup: string;
  filesystem_backup: string;
  original_paths: {
    upload_location: string;
    db_data_location: string;
    critical_folders: string[];
  };
  env_vars: Record<string, string>;
}

export interface BackupResult {
  archivePath: string;
  archiveName: string;
  sizeBytes: number;
  /** SHA256 checksum of the archive */
  checksum: string;
  paths: ResolvedPaths;
  /** Containers stopped for the duration of the backup */
  pausedContainers: string[];
  /** Containers that could not be started again afterwards */
  failedToRestart: string[];
  durationMs: number;
}

export interface ContainerHealth {
  name: string;
  status: string;
  running: boolean;
}

export interface PingResult {
  ok: boolean;
  attempts: number;
  lastStatus: number | null;
}

export interface HealthReport {
  containers: ContainerHealth[];
  api: PingResult | null;
}

export interface RestoreResult {
  backupDir: string;
  fromArchive: boolean;
  manifest: BackupManifest;
  uploadLocation: string;
  health: HealthReport;
  durationMs: number;
}

export interface InspectResult {
  location: string;
  fromArchive: boolean;
  backupName: string;
  manifest: BackupManifest;
  /** Top-level entries of the backup directory */
  members: string[];
  databaseDumpPresent: boolean;
  filesystemPresent: boolean;
}
