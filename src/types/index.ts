/**
 * Centralized type exports
 */

// Backup types
export type {
  BackupManifest,
  BackupResult,
  ContainerHealth,
  HealthReport,
  InspectResult,
  PingResult,
  ResolvedPaths,
  RestoreResult,
} from "./backup";
// Config types
export type {
  DeploymentConfig,
  EnvMap,
  KeeperSettings,
  ServiceTopology,
  Topology,
  VolumeBinding,
} from "./config";
