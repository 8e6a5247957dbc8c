/**
 * Database reload from a pg_dumpall archive
 */

import { getEnv } from "../../config/env-file";
import type { DockerClient } from "../../docker/client";
import { getDatabaseContainer } from "../../docker/compose";
import {
  DatabaseRestoreFailed,
  errorMessage,
  InvalidBackup,
} from "../../errors";
import type { CommandRunner } from "../../system/exec";
import type { DeploymentConfig } from "../../types";
import { logger } from "../../utils/logger";
import { isFile } from "../../utils/path";

export type Sleep = (ms: number) => Promise<void>;

// pg_dumpall output empties search_path; the reload needs public on it
export const SEARCH_PATH_FIX =
  "s/SELECT pg_catalog.set_config('search_path', '', false);" +
  "/SELECT pg_catalog.set_config('search_path', 'public, pg_catalog', true);/g";

export interface DatabaseRestoreOptions {
  config: DeploymentConfig;
  runner: CommandRunner;
  docker: DockerClient;
  sleep: Sleep;
  dumpFile: string;
}

/**
 * Poll pg_isready until the server accepts connections
 * @returns false when every attempt failed
 */
export async function waitForDatabase(
  docker: DockerClient,
  container: string,
  username: string,
  attempts: number,
  intervalMs: number,
  sleep: Sleep,
): Promise<boolean> {
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (await docker.isPostgresReady(container, username)) {
      logger.info(
        `PostgreSQL is accepting connections (attempt ${attempt}/${attempts})`,
      );
      return true;
    }
    if (attempt < attempts) {
      logger.debug(`PostgreSQL not ready yet (attempt ${attempt}/${attempts})`);
      await sleep(intervalMs);
    }
  }
  return false;
}

/**
 * Tear the stack down, bring up only the database and stream the dump into psql
 */
export async function restoreDatabase(
  options: DatabaseRestoreOptions,
): Promise<void> {
  const { config, runner, docker, sleep, dumpFile } = options;
  const { settings } = config;

  if (!(await isFile(dumpFile))) {
    throw new InvalidBackup(`Database backup file not found: ${dumpFile}`);
  }

  const username = getEnv(config.env, "DB_USERNAME", settings.dbUsername);
  const container = getDatabaseContainer(config.topology, settings);

  logger.info("Stopping all Immich services...");
  await docker.composeDown();

  logger.info("Starting PostgreSQL container...");
  await docker.composeCreate();
  await docker.startContainer(container);

  logger.info("Waiting for PostgreSQL to start...");
  const ready = await waitForDatabase(
    docker,
    container,
    username,
    settings.dbReadyAttempts,
    settings.dbReadyIntervalMs,
    sleep,
  );
  if (!ready) {
    logger.warn("PostgreSQL did not report ready; attempting restore anyway");
  }

  logger.info(`Restoring database from: ${dumpFile}`);
  const stages = [
    ["gunzip", "--stdout", dumpFile],
    ["sed", SEARCH_PATH_FIX],
    docker.execCommand(
      container,
      ["psql", "--dbname=postgres", `--username=${username}`],
      { interactive: true },
    ),
  ];

  let success: boolean;
  try {
    success = await runner.pipeline(stages, { check: false });
  } catch (error) {
    throw new DatabaseRestoreFailed(
      `Database restore failed: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (!success) {
    throw new DatabaseRestoreFailed("Database restore failed");
  }

  logger.info("Database restored successfully");
}
