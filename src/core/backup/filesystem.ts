/**
 * Upload tree copy into the backup working directory
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { EnvironmentNotReady } from "../../errors";
import { logger } from "../../utils/logger";
import { isDirectory } from "../../utils/path";
import { FILESYSTEM_DIR, UPLOAD_BACKUP_DIR } from "../manifest";

/**
 * Copy the upload location to <workDir>/filesystem/upload_location,
 * overwriting anything already there
 * @returns Path of the filesystem directory inside the working directory
 */
export async function backupFilesystem(
  workDir: string,
  uploadLocation: string,
): Promise<string> {
  if (!(await isDirectory(uploadLocation))) {
    throw new EnvironmentNotReady(
      `Upload location not found: ${uploadLocation}`,
    );
  }

  logger.info("Backing up filesystem data...");

  const filesystemDir = path.join(workDir, FILESYSTEM_DIR);
  const uploadBackup = path.join(filesystemDir, UPLOAD_BACKUP_DIR);
  await fs.mkdir(filesystemDir, { recursive: true });

  logger.info(
    `Backing up upload location: ${uploadLocation} -> ${uploadBackup}`,
  );
  await fs.cp(uploadLocation, uploadBackup, { recursive: true, force: true });

  return filesystemDir;
}
