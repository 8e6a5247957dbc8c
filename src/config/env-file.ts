/**
 * Environment file parsing and ${VAR} expansion
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import dotenv from "dotenv";
import { ConfigNotFound } from "../errors";
import type { EnvMap } from "../types";
import { logger } from "../utils/logger";

// ${NAME} or ${NAME:-default}; anything else is left as written
const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Parse dotenv-style KEY=value content; a repeated key keeps its last value
 */
export function parseEnvContent(content: string): Map<string, string> {
  return new Map(Object.entries(dotenv.parse(content)));
}

export async function loadEnvFile(envPath: string): Promise<EnvMap> {
  const absolutePath = path.resolve(envPath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, "utf8");
  } catch (error) {
    throw new ConfigNotFound(`Environment file ${envPath} not found`, {
      cause: error,
    });
  }

  const env = parseEnvContent(content);
  logger.debug(`Loaded ${env.size} variable(s) from ${absolutePath}`);
  return env;
}

export function getEnv(env: EnvMap, key: string, fallback: string): string {
  return env.get(key) ?? fallback;
}

/**
 * Expand ${NAME} (empty when undefined) and ${NAME:-default}
 */
export function expandVariables(value: string, env: EnvMap): string {
  return value.replace(
    VARIABLE_PATTERN,
    (_match, name: string, fallback: string | undefined) => {
      const resolved = env.get(name);
      if (resolved !== undefined) return resolved;
      return fallback ?? "";
    },
  );
}
