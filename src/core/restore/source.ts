/**
 * Locating the backup directory to restore from
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorMessage, InvalidArchive, InvalidBackup } from "../../errors";
import type { CommandRunner } from "../../system/exec";
import { logger } from "../../utils/logger";
import {
  isArchivePath,
  isBackupDirName,
  RESTORE_TEMP_PREFIX,
} from "../../utils/naming";
import { isDirectory, isFile } from "../../utils/path";
import { extractArchive } from "../archive";
import { hasManifest } from "../manifest";

export interface BackupSource {
  /** Directory holding the manifest, dump and filesystem tree */
  backupDir: string;
  /** Extraction directory to remove afterwards, when an archive was given */
  extractDir: string | null;
}

/**
 * Extract an archive into a fresh temporary directory and locate its backup
 * directory. The extraction directory is removed again on failure.
 */
export async function extractBackup(
  runner: CommandRunner,
  archivePath: string,
  tempRoot: string,
): Promise<BackupSource> {
  const extractDir = await fs.mkdtemp(
    path.join(tempRoot, RESTORE_TEMP_PREFIX),
  );

  try {
    try {
      await extractArchive(runner, archivePath, extractDir);
    } catch (error) {
      throw new InvalidArchive(
        `Invalid backup archive: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const entries = await fs.readdir(extractDir, { withFileTypes: true });
    const backupEntry = entries.find(
      (entry) => entry.isDirectory() && isBackupDirName(entry.name),
    );
    if (!backupEntry) {
      throw new InvalidArchive(
        "Invalid backup archive: no backup directory found",
      );
    }

    const backupDir = path.join(extractDir, backupEntry.name);
    if (!(await hasManifest(backupDir))) {
      throw new InvalidArchive(
        "Invalid backup archive: manifest file not found",
      );
    }

    return { backupDir, extractDir };
  } catch (error) {
    await fs.rm(extractDir, { recursive: true, force: true });
    throw error;
  }
}

/**
 * Accept a .tar.gz archive or an already extracted backup directory
 */
export async function openBackupSource(
  runner: CommandRunner,
  location: string,
  tempRoot: string,
): Promise<BackupSource> {
  const resolved = path.resolve(location);

  if ((await isFile(resolved)) && isArchivePath(resolved)) {
    logger.info(`Using backup archive: ${resolved}`);
    return extractBackup(runner, resolved, tempRoot);
  }

  if (await isDirectory(resolved)) {
    logger.info(`Using backup directory: ${resolved}`);
    if (!(await hasManifest(resolved))) {
      throw new InvalidBackup("Invalid backup: manifest file not found");
    }
    return { backupDir: resolved, extractDir: null };
  }

  throw new InvalidBackup(`Backup location not found or invalid: ${location}`);
}

export async function closeBackupSource(source: BackupSource): Promise<void> {
  if (source.extractDir) {
    await fs.rm(source.extractDir, { recursive: true, force: true });
    logger.debug(`Removed extraction directory: ${source.extractDir}`);
  }
}
