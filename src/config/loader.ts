/**
 * Deployment configuration loading
 */

import * as path from "node:path";
import { buildTopology, parseComposeFile } from "../docker/compose";
import type { DeploymentConfig, KeeperSettings } from "../types";
import { logger } from "../utils/logger";
import {
  DEFAULT_COMPOSE_FILE,
  DEFAULT_ENV_FILE,
  resolveSettings,
} from "./defaults";
import { loadEnvFile } from "./env-file";
import { validateSettings } from "./validator";

export interface LoadConfigOptions {
  composeFile?: string;
  envFile?: string;
  settings?: Partial<KeeperSettings>;
}

/**
 * Load the environment file and the compose topology it parameterises.
 * The result is frozen and handed to each step explicitly.
 */
export async function loadDeploymentConfig(
  options: LoadConfigOptions = {},
): Promise<DeploymentConfig> {
  const composeFile = path.resolve(
    options.composeFile ?? DEFAULT_COMPOSE_FILE,
  );
  const envFile = path.resolve(options.envFile ?? DEFAULT_ENV_FILE);

  const settings = resolveSettings(options.settings);
  validateSettings(settings);

  const env = await loadEnvFile(envFile);
  const composeDocument = await parseComposeFile(composeFile);
  const topology = buildTopology(composeDocument, env);

  const count = Object.keys(topology).length;
  logger.debug(`Loaded ${count} service(s) from ${composeFile}`);

  return Object.freeze({
    composeFile,
    envFile,
    env,
    topology: Object.freeze(topology),
    settings: Object.freeze(settings),
  });
}
