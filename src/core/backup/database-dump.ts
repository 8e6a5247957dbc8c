/**
 * Database cluster dump via pg_dumpall inside the database container
 */

import * as path from "node:path";
import { getEnv } from "../../config/env-file";
import type { DockerClient } from "../../docker/client";
import { DatabaseBackupFailed, errorMessage } from "../../errors";
import type { CommandRunner } from "../../system/exec";
import type { DeploymentConfig } from "../../types";
import { logger } from "../../utils/logger";
import { databaseDumpName } from "../../utils/naming";

export interface DumpOptions {
  config: DeploymentConfig;
  runner: CommandRunner;
  docker: DockerClient;
  databaseContainer: string;
  workDir: string;
  timestamp: string;
}

/**
 * Dump every database, role and schema to a gzip file in the working directory
 * @returns Path of the dump file
 */
export async function dumpDatabase(options: DumpOptions): Promise<string> {
  const { config, runner, docker } = options;
  const username = getEnv(
    config.env,
    "DB_USERNAME",
    config.settings.dbUsername,
  );
  const dumpFile = path.join(
    options.workDir,
    databaseDumpName(options.timestamp),
  );

  logger.info(`Creating database backup: ${dumpFile}`);

  const dump = docker.execCommand(
    options.databaseContainer,
    ["pg_dumpall", "--clean", "--if-exists", `--username=${username}`],
    { tty: true },
  );

  let success: boolean;
  try {
    success = await runner.pipeline([dump, ["gzip"]], {
      stdoutFile: dumpFile,
      check: false,
    });
  } catch (error) {
    throw new DatabaseBackupFailed(
      `Database backup failed: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (!success) {
    throw new DatabaseBackupFailed("Database backup failed");
  }

  return dumpFile;
}
