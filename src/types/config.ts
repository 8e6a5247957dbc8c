/**
 * Configuration type definitions
 */

/** Key/value pairs from the environment file, in file order */
export type EnvMap = ReadonlyMap<string, string>;

export interface VolumeBinding {
  hostPath: string;
  containerPath: string;
  /** Mount options after the second colon, e.g. "ro" */
  options: string;
}

export interface ServiceTopology {
  name: string;
  /** `container_name` when declared, else the service name */
  containerName: string;
  volumes: VolumeBinding[];
}

/** Services of the compose file keyed by service name */
export type Topology = Readonly<Record<string, ServiceTopology>>;

/**
 * Tunables of the backup and restore flows
 */
export interface KeeperSettings {
  /** Used when neither a volume nor UPLOAD_LOCATION names the upload path */
  uploadLocation: string;
  /** Used when neither a volume nor DB_DATA_LOCATION names the data path */
  dbDataLocation: string;
  dbUsername: string;
  /** Container used when no service name marks the database role */
  databaseContainer: string;
  /** Services whose name contains this marker keep running during a backup */
  databaseServiceMarker: string;
  uploadContainerPath: string;
  dbDataContainerPath: string;
  criticalFolders: string[];
  /** Containers checked for an "Up" status after a restore */
  healthContainers: string[];
  pingUrl: string;
  pingTimeoutMs: number;
  pingAttempts: number;
  pingRetryDelayMs: number;
  /** Pause after `docker compose up -d` before probing */
  servicesSettleMs: number;
  dbReadyAttempts: number;
  dbReadyIntervalMs: number;
  /** Directory for working and extraction directories */
  tempDir: string;
}

export interface DeploymentConfig {
  composeFile: string;
  envFile: string;
  env: EnvMap;
  topology: Topology;
  settings: KeeperSettings;
}
