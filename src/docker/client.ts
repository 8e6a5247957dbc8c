/**
 * Docker CLI client wrapper
 */

import type { Command, CommandRunner } from "../system/exec";
import { logger } from "../utils/logger";

export interface ComposeTarget {
  composeFile: string;
  envFile: string;
}

export interface ExecOptions {
  /** Allocate a pseudo-TTY (-t) */
  tty?: boolean;
  /** Keep stdin open (-i) */
  interactive?: boolean;
}

export class DockerClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly target: ComposeTarget,
  ) {}

  /**
   * Names of all containers, running or stopped
   */
  async listContainerNames(): Promise<string[]> {
    const output = await this.runner.capture([
      "docker",
      "ps",
      "-a",
      "--format",
      "{{.Names}}",
    ]);
    return output
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }

  async containerExists(name: string): Promise<boolean> {
    const names = await this.listContainerNames();
    return names.includes(name);
  }

  /**
   * Stop containers; failures are logged, not thrown
   * @returns true if every container stopped
   */
  async stopContainers(names: string[]): Promise<boolean> {
    if (names.length === 0) return true;

    const success = await this.runner.run(["docker", "stop", ...names], {
      check: false,
    });
    if (!success) {
      logger.error(`Failed to stop containers: ${names.join(" ")}`);
    }
    return success;
  }

  /**
   * Start previously stopped containers; failures are logged, not thrown
   * @returns true if every container started
   */
  async startContainers(names: string[]): Promise<boolean> {
    if (names.length === 0) return true;

    const success = await this.runner.run(["docker", "start", ...names], {
      check: false,
    });
    if (!success) {
      logger.error(`Failed to start containers: ${names.join(" ")}`);
    }
    return success;
  }

  async startContainer(name: string): Promise<void> {
    await this.runner.run(["docker", "start", name]);
  }

  /**
   * Status column of `docker ps` for containers matching a name filter
   */
  async containerStatus(name: string): Promise<string> {
    return this.runner.capture(
      ["docker", "ps", "--filter", `name=${name}`, "--format", "{{.Status}}"],
      { check: false },
    );
  }

  execCommand(
    container: string,
    command: Command,
    options: ExecOptions = {},
  ): Command {
    const flags: string[] = [];
    if (options.interactive) flags.push("-i");
    if (options.tty) flags.push("-t");
    return ["docker", "exec", ...flags, container, ...command];
  }

  composeCommand(...args: string[]): Command {
    return [
      "docker",
      "compose",
      "--file",
      this.target.composeFile,
      "--env-file",
      this.target.envFile,
      ...args,
    ];
  }

  /**
   * Tear down all services and their volumes; best effort
   */
  async composeDown(): Promise<boolean> {
    return this.runner.run(this.composeCommand("down", "-v"), { check: false });
  }

  /**
   * Create containers without starting them
   */
  async composeCreate(): Promise<void> {
    await this.runner.run(this.composeCommand("create"));
  }

  async composeUp(): Promise<boolean> {
    return this.runner.run(this.composeCommand("up", "-d"), { check: false });
  }

  async isPostgresReady(container: string, username: string): Promise<boolean> {
    return this.runner.run(
      this.execCommand(container, ["pg_isready", `--username=${username}`]),
      { check: false },
    );
  }
}
