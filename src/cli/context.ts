/**
 * What a command needs besides its parsed options
 */

import { loadDeploymentConfig } from "../config/loader";
import type { FetchLike } from "../core/restore/health";
import type { Sleep } from "../core/restore/database";
import { errorMessage } from "../errors";
import { type CommandRunner, ShellRunner } from "../system/exec";
import type { DeploymentConfig } from "../types";
import type { CliOptions } from "./options";
import { ui } from "./ui";

export interface CommandDeps {
  runner?: CommandRunner;
  sleep?: Sleep;
  fetch?: FetchLike;
  now?: () => Date;
}

export function resolveRunner(deps: CommandDeps): CommandRunner {
  return deps.runner ?? new ShellRunner();
}

export function loadConfigFor(options: CliOptions): Promise<DeploymentConfig> {
  return loadDeploymentConfig({
    composeFile: options.composeFile,
    envFile: options.envFile,
  });
}

/**
 * Report a failed command and produce its exit code
 */
export function reportFailure(
  action: string,
  error: unknown,
  verbose: boolean,
): number {
  ui.error(`${action} failed: ${errorMessage(error)}`);
  if (verbose) {
    console.error(error);
  }
  return 1;
}
