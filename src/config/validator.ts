/**
 * Settings validation
 */

import { KeeperError } from "../errors";
import type { KeeperSettings } from "../types";

export class SettingsError extends KeeperError {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

const POSITIVE_INTEGERS = [
  "pingAttempts",
  "dbReadyAttempts",
] as const satisfies ReadonlyArray<keyof KeeperSettings>;

const NON_NEGATIVE_DURATIONS = [
  "pingTimeoutMs",
  "pingRetryDelayMs",
  "servicesSettleMs",
  "dbReadyIntervalMs",
] as const satisfies ReadonlyArray<keyof KeeperSettings>;

/**
 * Validate resolved settings
 */
export function validateSettings(settings: KeeperSettings): void {
  for (const key of POSITIVE_INTEGERS) {
    const value = settings[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new SettingsError(`${key} must be a positive integer`);
    }
  }

  for (const key of NON_NEGATIVE_DURATIONS) {
    const value = settings[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new SettingsError(
        `${key} must be a non-negative number of milliseconds`,
      );
    }
  }

  let url: URL;
  try {
    url = new URL(settings.pingUrl);
  } catch {
    throw new SettingsError(`pingUrl is not a valid URL: ${settings.pingUrl}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new SettingsError(
      `pingUrl must use http or https: ${settings.pingUrl}`,
    );
  }

  if (!settings.tempDir) {
    throw new SettingsError("tempDir must not be empty");
  }
}
