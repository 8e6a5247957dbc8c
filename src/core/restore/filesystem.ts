/**
 * Upload tree replacement
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { FilesystemBackupMissing } from "../../errors";
import { logger } from "../../utils/logger";
import { isDirectory } from "../../utils/path";

/**
 * Replace the live upload tree with the archived copy. The existing tree is
 * removed in full first; nothing is rolled back if the copy fails.
 */
export async function restoreFilesystem(
  uploadBackup: string,
  uploadLocation: string,
): Promise<void> {
  if (!(await isDirectory(uploadBackup))) {
    throw new FilesystemBackupMissing(
      `Filesystem backup not found: ${uploadBackup}`,
    );
  }

  logger.info(`Restoring filesystem: ${uploadBackup} -> ${uploadLocation}`);

  await fs.rm(uploadLocation, { recursive: true, force: true });
  await fs.mkdir(path.dirname(uploadLocation), { recursive: true });
  await fs.cp(uploadBackup, uploadLocation, { recursive: true });

  logger.info("Filesystem restored successfully");
}
