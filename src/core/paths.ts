/**
 * Host path resolution for the upload tree and the database data directory
 */

import * as path from "node:path";
import { getEnv } from "../config/env-file";
import { findHostPath } from "../docker/compose";
import type { DeploymentConfig, ResolvedPaths } from "../types";
import { logger } from "../utils/logger";
import { isDirectory } from "../utils/path";

/**
 * Resolve the upload location: a compose volume bound to the server's data
 * path wins over UPLOAD_LOCATION, which wins over the built-in default.
 */
export function resolveUploadLocation(
  config: DeploymentConfig,
  cwd: string = process.cwd(),
): string {
  const { settings, env, topology } = config;
  const fromTopology = findHostPath(topology, settings.uploadContainerPath);
  const location =
    fromTopology || getEnv(env, "UPLOAD_LOCATION", settings.uploadLocation);
  return path.resolve(cwd, location);
}

export function resolveDbDataLocation(
  config: DeploymentConfig,
  cwd: string = process.cwd(),
): string {
  const { settings, env, topology } = config;
  const fromTopology = findHostPath(topology, settings.dbDataContainerPath);
  const location =
    fromTopology || getEnv(env, "DB_DATA_LOCATION", settings.dbDataLocation);
  return path.resolve(cwd, location);
}

export async function resolveBackupPaths(
  config: DeploymentConfig,
  cwd: string = process.cwd(),
): Promise<ResolvedPaths> {
  const uploadLocation = resolveUploadLocation(config, cwd);
  const dbDataLocation = resolveDbDataLocation(config, cwd);

  const criticalFolders: string[] = [];
  for (const folder of config.settings.criticalFolders) {
    const folderPath = path.join(uploadLocation, folder);
    if (await isDirectory(folderPath)) {
      criticalFolders.push(folderPath);
    }
  }

  logger.info(`Detected upload location: ${uploadLocation}`);
  logger.info(`Detected database location: ${dbDataLocation}`);
  if (criticalFolders.length > 0) {
    logger.debug(`Critical folders present: ${criticalFolders.join(", ")}`);
  }

  return { uploadLocation, dbDataLocation, criticalFolders };
}
