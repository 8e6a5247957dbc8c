/**
 * Docker Compose topology support
 */

import * as fs from "node:fs/promises";
import * as yaml from "js-yaml";
import { expandVariables } from "../config/env-file";
import { ConfigNotFound, ConfigParseError, errorMessage } from "../errors";
import type {
  EnvMap,
  KeeperSettings,
  ServiceTopology,
  Topology,
  VolumeBinding,
} from "../types";
import { logger } from "../utils/logger";

export interface ComposeFile {
  services: Record<string, ComposeServiceDefinition>;
}

export interface ComposeServiceDefinition {
  container_name?: string;
  volumes?: Array<string | ComposeVolumeLongSyntax>;
}

interface ComposeVolumeLongSyntax {
  type?: string;
  source?: string;
  target: string;
  read_only?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toVolumeSpec(value: unknown): string | ComposeVolumeLongSyntax | null {
  if (typeof value === "string") return value;
  if (isRecord(value) && typeof value.target === "string") {
    return {
      type: typeof value.type === "string" ? value.type : undefined,
      source: typeof value.source === "string" ? value.source : undefined,
      target: value.target,
      read_only: value.read_only === true,
    };
  }
  return null;
}

function toServiceDefinition(
  name: string,
  value: unknown,
): ComposeServiceDefinition {
  // `service:` with no body is valid compose
  if (value === null || value === undefined) return {};

  if (!isRecord(value)) {
    throw new ConfigParseError(`Service "${name}" must be a mapping`);
  }

  const definition: ComposeServiceDefinition = {};
  if (typeof value.container_name === "string") {
    definition.container_name = value.container_name;
  }
  if (Array.isArray(value.volumes)) {
    definition.volumes = value.volumes
      .map(toVolumeSpec)
      .filter(
        (spec): spec is string | ComposeVolumeLongSyntax => spec !== null,
      );
  }
  return definition;
}

/**
 * Validate the document produced by the YAML parser
 */
export function toComposeFile(document: unknown, source: string): ComposeFile {
  if (!isRecord(document) || !isRecord(document.services)) {
    throw new ConfigParseError(`No services found in compose file: ${source}`);
  }

  const services: Record<string, ComposeServiceDefinition> = {};
  for (const [name, value] of Object.entries(document.services)) {
    services[name] = toServiceDefinition(name, value);
  }
  return { services };
}

/**
 * Parse a docker-compose.yml file
 */
export async function parseComposeFile(
  composePath: string,
): Promise<ComposeFile> {
  let content: string;
  try {
    content = await fs.readFile(composePath, "utf8");
  } catch (error) {
    throw new ConfigNotFound(`Docker compose file ${composePath} not found`, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigParseError(
      `Failed to parse ${composePath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  return toComposeFile(document, composePath);
}

/**
 * Split a short-syntax volume on colons that are not inside ${...}
 */
export function splitVolumeSpec(spec: string): string[] {
  const parts: string[] = [];
  let current = "";
  let depth = 0;

  for (let i = 0; i < spec.length; i++) {
    const char = spec.charAt(i);
    if (char === "$" && spec[i + 1] === "{") {
      depth++;
      current += "${";
      i++;
      continue;
    }
    if (char === "}" && depth > 0) {
      depth--;
    } else if (char === ":" && depth === 0) {
      parts.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  parts.push(current);

  return parts;
}

/**
 * Parse a volume mount string (short syntax)
 * Formats: "volume_name:/path", "./host/path:/path", "${VAR:-./dir}:/path:ro"
 */
export function parseVolumeShortSyntax(
  volumeString: string,
  env: EnvMap,
): VolumeBinding | null {
  const [source, target, options = ""] = splitVolumeSpec(volumeString);

  if (!source || !target) {
    return null;
  }

  return {
    hostPath: expandVariables(source, env),
    containerPath: target,
    options,
  };
}

/**
 * Get all volume bindings for a service with placeholders expanded
 */
export function getServiceVolumes(
  service: ComposeServiceDefinition,
  env: EnvMap,
): VolumeBinding[] {
  const bindings: VolumeBinding[] = [];

  for (const volumeSpec of service.volumes ?? []) {
    if (typeof volumeSpec === "string") {
      const binding = parseVolumeShortSyntax(volumeSpec, env);
      if (binding) {
        bindings.push(binding);
      } else {
        logger.debug(
          `Skipping volume without container path: ${volumeSpec}`,
        );
      }
    } else if (volumeSpec.source) {
      bindings.push({
        hostPath: expandVariables(volumeSpec.source, env),
        containerPath: volumeSpec.target,
        options: volumeSpec.read_only ? "ro" : "",
      });
    }
  }

  return bindings;
}

export function buildTopology(composeFile: ComposeFile, env: EnvMap): Topology {
  const topology: Record<string, ServiceTopology> = {};

  for (const [name, service] of Object.entries(composeFile.services)) {
    topology[name] = {
      name,
      containerName: service.container_name ?? name,
      volumes: getServiceVolumes(service, env),
    };
  }

  return topology;
}

/**
 * Host path bound to a container path. When several services bind the same
 * container path, the last one declared wins.
 */
export function findHostPath(
  topology: Topology,
  containerPath: string,
): string | null {
  let hostPath: string | null = null;

  for (const service of Object.values(topology)) {
    for (const binding of service.volumes) {
      if (binding.containerPath === containerPath) {
        hostPath = binding.hostPath;
      }
    }
  }

  return hostPath;
}

export function isDatabaseService(
  service: ServiceTopology,
  settings: KeeperSettings,
): boolean {
  return service.name.includes(settings.databaseServiceMarker);
}

/**
 * Containers to stop for a consistent backup: everything but the database
 */
export function getPausableContainers(
  topology: Topology,
  settings: KeeperSettings,
): string[] {
  return Object.values(topology)
    .filter((service) => !isDatabaseService(service, settings))
    .map((service) => service.containerName);
}

export function getDatabaseContainer(
  topology: Topology,
  settings: KeeperSettings,
): string {
  const service = Object.values(topology).find((s) =>
    isDatabaseService(s, settings),
  );
  return service?.containerName ?? settings.databaseContainer;
}
