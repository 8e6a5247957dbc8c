/**
 * Backup orchestration
 *
 * Sequence: pre-flight, pause services, dump database, copy uploads, write
 * manifest, archive. Paused services are started again and the working
 * directory removed whether or not the backup succeeded.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DockerClient } from "../../docker/client";
import {
  getDatabaseContainer,
  getPausableContainers,
} from "../../docker/compose";
import { ConfigNotFound, EnvironmentNotReady } from "../../errors";
import type { CommandRunner } from "../../system/exec";
import type { BackupResult, DeploymentConfig } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import {
  archiveName,
  backupDirName,
  formatTimestamp,
} from "../../utils/naming";
import { isFile } from "../../utils/path";
import { createArchive } from "../archive";
import { createManifest, writeManifest } from "../manifest";
import { resolveBackupPaths } from "../paths";
import { dumpDatabase } from "./database-dump";
import { backupFilesystem } from "./filesystem";

export interface BackupContext {
  config: DeploymentConfig;
  runner: CommandRunner;
  docker?: DockerClient;
  now?: () => Date;
}

/**
 * Verify the compose file is present and the database container exists
 */
export async function checkEnvironment(
  config: DeploymentConfig,
  docker: DockerClient,
): Promise<string> {
  if (!(await isFile(config.composeFile))) {
    throw new ConfigNotFound(
      `Docker compose file ${config.composeFile} not found`,
    );
  }

  const databaseContainer = getDatabaseContainer(
    config.topology,
    config.settings,
  );
  if (!(await docker.containerExists(databaseContainer))) {
    throw new EnvironmentNotReady(
      `Database container "${databaseContainer}" not found. Please ensure Immich is deployed.`,
    );
  }

  return databaseContainer;
}

export async function runBackup(
  context: BackupContext,
  destination: string,
): Promise<BackupResult> {
  const { config, runner } = context;
  const docker = context.docker ?? new DockerClient(runner, config);
  const startTime = Date.now();

  logger.info("Starting Immich backup process...");

  const databaseContainer = await checkEnvironment(config, docker);
  const paths = await resolveBackupPaths(config);

  const createdAt = context.now?.() ?? new Date();
  const timestamp = formatTimestamp(createdAt);
  const workDir = path.join(config.settings.tempDir, backupDirName(timestamp));
  const destinationDir = path.resolve(destination);
  const archivePath = path.join(destinationDir, archiveName(timestamp));

  logger.info(`Temporary backup directory: ${workDir}`);
  logger.info(`Final archive: ${archivePath}`);

  await fs.rm(workDir, { recursive: true, force: true });
  await fs.mkdir(workDir, { recursive: true });

  const pausedContainers: string[] = [];
  let failedToRestart: string[] = [];

  try {
    await fs.mkdir(destinationDir, { recursive: true });

    // The database keeps running so pg_dumpall can connect
    const toPause = getPausableContainers(config.topology, config.settings);
    if (toPause.length > 0) {
      logger.info(`Stopping Immich containers: ${toPause.join(" ")}`);
      pausedContainers.push(...toPause);
      await docker.stopContainers(toPause);
    }

    const dumpFile = await dumpDatabase({
      config,
      runner,
      docker,
      databaseContainer,
      workDir,
      timestamp,
    });

    const filesystemDir = await backupFilesystem(
      workDir,
      paths.uploadLocation,
    );

    await writeManifest(
      workDir,
      createManifest({
        config,
        databaseBackupFile: dumpFile,
        filesystemBackupDir: filesystemDir,
        paths,
        createdAt,
      }),
    );

    await createArchive(runner, workDir, archivePath);
  } finally {
    if (pausedContainers.length > 0) {
      logger.info(`Restarting Immich services: ${pausedContainers.join(" ")}`);
      const restarted = await docker.startContainers(pausedContainers);
      if (!restarted) {
        failedToRestart = [...pausedContainers];
        logger.warn(
          "Some services did not restart. Start them manually with docker start.",
        );
      }
    }

    await fs.rm(workDir, { recursive: true, force: true });
    logger.debug(`Cleaned up temp directory: ${workDir}`);
  }

  const { size: sizeBytes } = await fs.stat(archivePath);
  const checksum = await computeFileChecksum(archivePath);
  const durationMs = Date.now() - startTime;

  logger.info(
    `Backup completed successfully: ${archivePath} (${formatBytes(sizeBytes)})`,
  );
  logger.debug(`Backup took ${formatDuration(durationMs)}`);

  return {
    archivePath,
    archiveName: path.basename(archivePath),
    sizeBytes,
    checksum,
    paths,
    pausedContainers,
    failedToRestart,
    durationMs,
  };
}
