/**
 * Default configuration values
 */

import * as os from "node:os";
import type { KeeperSettings } from "../types";

export const DEFAULT_COMPOSE_FILE = "docker-compose.yml";
export const DEFAULT_ENV_FILE = ".env";

export const DEFAULT_SETTINGS: KeeperSettings = {
  uploadLocation: "./library",
  dbDataLocation: "./postgres",
  dbUsername: "postgres",
  databaseContainer: "immich_postgres",
  databaseServiceMarker: "database",
  uploadContainerPath: "/data",
  dbDataContainerPath: "/var/lib/postgresql/data",
  criticalFolders: ["library", "upload", "profile"],
  healthContainers: [
    "immich_server",
    "immich_postgres",
    "immich_redis",
    "immich_machine_learning",
  ],
  pingUrl: "http://localhost:2283/api/server/ping",
  pingTimeoutMs: 10_000,
  pingAttempts: 6,
  pingRetryDelayMs: 10_000,
  servicesSettleMs: 30_000,
  dbReadyAttempts: 30,
  dbReadyIntervalMs: 2_000,
  tempDir: os.tmpdir(),
};

/**
 * Apply overrides on top of the defaults; undefined values keep the default
 */
export function resolveSettings(
  overrides: Partial<KeeperSettings> = {},
): KeeperSettings {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return { ...DEFAULT_SETTINGS, ...defined };
}
