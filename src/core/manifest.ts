/**
 * Backup manifest: what a backup contains and where it came from
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { getEnv } from "../config/env-file";
import { errorMessage, InvalidBackup } from "../errors";
import type { BackupManifest, DeploymentConfig, ResolvedPaths } from "../types";
import { logger } from "../utils/logger";
import { isFile, isPathWithinDir } from "../utils/path";

export const MANIFEST_FILENAME = "backup_manifest.json";
export const FILESYSTEM_DIR = "filesystem";
export const UPLOAD_BACKUP_DIR = "upload_location";

export interface ManifestInput {
  config: DeploymentConfig;
  databaseBackupFile: string;
  filesystemBackupDir: string;
  paths: ResolvedPaths;
  createdAt?: Date;
}

export function createManifest(input: ManifestInput): BackupManifest {
  const { config, paths } = input;

  return {
    timestamp: (input.createdAt ?? new Date()).toISOString(),
    immich_version: getEnv(config.env, "IMMICH_VERSION", "unknown"),
    database_backup: path.basename(input.databaseBackupFile),
    filesystem_backup: path.basename(input.filesystemBackupDir),
    original_paths: {
      upload_location: paths.uploadLocation,
      db_data_location: paths.dbDataLocation,
      critical_folders: [...paths.criticalFolders],
    },
    env_vars: Object.fromEntries(config.env),
  };
}

export function manifestPath(backupDir: string): string {
  return path.join(backupDir, MANIFEST_FILENAME);
}

export async function hasManifest(backupDir: string): Promise<boolean> {
  return isFile(manifestPath(backupDir));
}

export async function writeManifest(
  backupDir: string,
  manifest: BackupManifest,
): Promise<string> {
  const file = manifestPath(backupDir);
  await fs.writeFile(file, `${JSON.stringify(manifest, null, 2)}\n`, "utf8");
  logger.info(`Backup manifest created: ${file}`);
  return file;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    isRecord(value) &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function stringField(
  record: Record<string, unknown>,
  key: string,
  fallback: string,
): string {
  const value = record[key];
  return typeof value === "string" ? value : fallback;
}

/**
 * Check the shape of a parsed manifest.
 * Manifests written by the shell tooling lack original_paths and env_vars.
 */
export function parseManifest(document: unknown): BackupManifest {
  if (!isRecord(document)) {
    throw new InvalidBackup("Invalid backup: manifest is not an object");
  }

  const databaseBackup = stringField(document, "database_backup", "");
  const filesystemBackup = stringField(document, "filesystem_backup", "");
  if (!databaseBackup) {
    throw new InvalidBackup(
      'Invalid backup: manifest field "database_backup" is missing',
    );
  }
  if (!filesystemBackup) {
    throw new InvalidBackup(
      'Invalid backup: manifest field "filesystem_backup" is missing',
    );
  }

  const originalPaths: Record<string, unknown> = isRecord(
    document.original_paths,
  )
    ? document.original_paths
    : {};

  return {
    timestamp: stringField(document, "timestamp", ""),
    immich_version: stringField(document, "immich_version", "unknown"),
    database_backup: databaseBackup,
    filesystem_backup: filesystemBackup,
    original_paths: {
      upload_location: stringField(originalPaths, "upload_location", ""),
      db_data_location: stringField(originalPaths, "db_data_location", ""),
      critical_folders: isStringArray(originalPaths.critical_folders)
        ? originalPaths.critical_folders
        : [],
    },
    env_vars: isStringRecord(document.env_vars) ? document.env_vars : {},
  };
}

export async function readManifest(backupDir: string): Promise<BackupManifest> {
  const file = manifestPath(backupDir);

  let content: string;
  try {
    content = await fs.readFile(file, "utf8");
  } catch (error) {
    throw new InvalidBackup("Invalid backup: manifest file not found", {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new InvalidBackup(
      `Invalid backup: manifest is not valid JSON (${errorMessage(error)})`,
      { cause: error },
    );
  }

  return parseManifest(document);
}

export interface ManifestPaths {
  databaseDump: string;
  uploadBackup: string;
}

/**
 * Locations inside a backup directory named by its manifest
 */
export function resolveManifestPaths(
  backupDir: string,
  manifest: BackupManifest,
): ManifestPaths {
  const databaseDump = path.join(backupDir, manifest.database_backup);
  const uploadBackup = path.join(
    backupDir,
    manifest.filesystem_backup,
    UPLOAD_BACKUP_DIR,
  );

  if (
    !isPathWithinDir(databaseDump, backupDir) ||
    !isPathWithinDir(uploadBackup, backupDir)
  ) {
    throw new InvalidBackup(
      "Invalid backup: manifest points outside the backup directory",
    );
  }

  return { databaseDump, uploadBackup };
}
