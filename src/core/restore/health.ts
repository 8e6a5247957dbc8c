/**
 * Post-restore health check. Never throws: every failure becomes a warning.
 */

import type { DockerClient } from "../../docker/client";
import { errorMessage } from "../../errors";
import type {
  ContainerHealth,
  HealthReport,
  KeeperSettings,
  PingResult,
} from "../../types";
import { logger } from "../../utils/logger";
import type { Sleep } from "./database";

export interface PingResponse {
  status: number;
  body?: { cancel(): Promise<void> } | null;
}

export type FetchLike = (
  url: string,
  init?: { signal?: AbortSignal },
) => Promise<PingResponse>;

export interface PingOptions {
  attempts: number;
  retryDelayMs: number;
  timeoutMs: number;
  fetch: FetchLike;
  sleep: Sleep;
}

/**
 * GET the ping endpoint until it answers 200 or the attempts run out
 */
export async function pingServer(
  url: string,
  options: PingOptions,
): Promise<PingResult> {
  let lastStatus: number | null = null;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    const prefix = `Attempt ${attempt}/${options.attempts}`;
    try {
      const response = await options.fetch(url, {
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      lastStatus = response.status;
      await discardBody(response);
      if (response.status === 200) {
        logger.info("Immich API is responding");
        return { ok: true, attempts: attempt, lastStatus };
      }
      logger.warn(`${prefix}: API returned status ${response.status}`);
    } catch (error) {
      logger.warn(`${prefix}: ${errorMessage(error)}`);
    }

    if (attempt < options.attempts) {
      const seconds = options.retryDelayMs / 1000;
      logger.info(`Waiting ${seconds} seconds before retry...`);
      await options.sleep(options.retryDelayMs);
    }
  }

  logger.warn(
    "API health check failed after all retries. Check logs: docker logs immich_server",
  );
  return { ok: false, attempts: options.attempts, lastStatus };
}

// The ping body is never read; release the connection
async function discardBody(response: PingResponse): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug(`Could not discard response body: ${errorMessage(error)}`);
  }
}

export async function checkContainers(
  docker: DockerClient,
  names: string[],
): Promise<ContainerHealth[]> {
  const results: ContainerHealth[] = [];

  for (const name of names) {
    let status = "";
    try {
      status = await docker.containerStatus(name);
    } catch (error) {
      logger.warn(
        `Could not query status of ${name}: ${errorMessage(error)}`,
      );
    }

    const running = status.includes("Up");
    if (running) {
      logger.info(`${name} is running`);
    } else {
      logger.warn(`${name} may not be running properly`);
    }
    results.push({ name, status, running });
  }

  return results;
}

export interface HealthCheckOptions {
  docker: DockerClient;
  settings: KeeperSettings;
  fetch: FetchLike;
  sleep: Sleep;
}

/**
 * Start every service, give them time to settle, then check container
 * status and the API ping endpoint
 */
export async function verifyHealth(
  options: HealthCheckOptions,
): Promise<HealthReport> {
  const { docker, settings, sleep } = options;
  const report: HealthReport = { containers: [], api: null };

  logger.info("Testing Immich health...");

  try {
    await docker.composeUp();

    logger.info("Waiting for services to start...");
    await sleep(settings.servicesSettleMs);

    report.containers = await checkContainers(
      docker,
      settings.healthContainers,
    );
    report.api = await pingServer(settings.pingUrl, {
      attempts: settings.pingAttempts,
      retryDelayMs: settings.pingRetryDelayMs,
      timeoutMs: settings.pingTimeoutMs,
      fetch: options.fetch,
      sleep,
    });
  } catch (error) {
    logger.warn(
      `Could not complete health check: ${errorMessage(error)}`,
    );
  }

  return report;
}
