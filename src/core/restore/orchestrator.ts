/**
 * Restore orchestration
 *
 * Sequence: open the archive or directory, reload the database, replace the
 * upload tree, check health. A partial restore is not rolled back; the
 * extraction directory is always removed.
 */

import { setTimeout as delay } from "node:timers/promises";
import { DockerClient } from "../../docker/client";
import { errorMessage } from "../../errors";
import type { CommandRunner } from "../../system/exec";
import type { DeploymentConfig, RestoreResult } from "../../types";
import { formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { readManifest, resolveManifestPaths } from "../manifest";
import { resolveUploadLocation } from "../paths";
import { restoreDatabase, type Sleep } from "./database";
import { restoreFilesystem } from "./filesystem";
import { type FetchLike, verifyHealth } from "./health";
import { closeBackupSource, openBackupSource } from "./source";

export interface RestoreContext {
  config: DeploymentConfig;
  runner: CommandRunner;
  docker?: DockerClient;
  sleep?: Sleep;
  fetch?: FetchLike;
}

const defaultSleep: Sleep = (ms) => delay(ms);

export async function runRestore(
  context: RestoreContext,
  location: string,
): Promise<RestoreResult> {
  const { config, runner } = context;
  const docker = context.docker ?? new DockerClient(runner, config);
  const sleep = context.sleep ?? defaultSleep;
  const fetchImpl = context.fetch ?? fetch;
  const startTime = Date.now();

  logger.info(`Starting Immich restore from: ${location}`);

  const source = await openBackupSource(
    runner,
    location,
    config.settings.tempDir,
  );

  try {
    const manifest = await readManifest(source.backupDir);
    const { databaseDump, uploadBackup } = resolveManifestPaths(
      source.backupDir,
      manifest,
    );
    const createdAt = manifest.timestamp || "at an unknown time";
    logger.info(
      `Backup created ${createdAt} (Immich ${manifest.immich_version})`,
    );

    const uploadLocation = resolveUploadLocation(config);
    logger.info(`Detected upload location: ${uploadLocation}`);

    await restoreDatabase({
      config,
      runner,
      docker,
      sleep,
      dumpFile: databaseDump,
    });
    await restoreFilesystem(uploadBackup, uploadLocation);

    const health = await verifyHealth({
      docker,
      settings: config.settings,
      fetch: fetchImpl,
      sleep,
    });

    const durationMs = Date.now() - startTime;
    logger.info(
      `Restore completed successfully in ${formatDuration(durationMs)}`,
    );

    return {
      backupDir: source.backupDir,
      fromArchive: source.extractDir !== null,
      manifest,
      uploadLocation,
      health,
      durationMs,
    };
  } catch (error) {
    logger.error(`Restore failed: ${errorMessage(error)}`);
    throw error;
  } finally {
    await closeBackupSource(source);
  }
}
