/**
 * External command execution
 *
 * Commands are argument arrays, never shell strings. Pipelines are an ordered
 * list of stages whose stdout feeds the next stage's stdin, with optional file
 * redirection at either end.
 */

import { type ChildProcess, spawn } from "node:child_process";
import { createReadStream, createWriteStream } from "node:fs";
import { finished } from "node:stream/promises";
import { CommandFailed } from "../errors";
import { logger } from "../utils/logger";

export type Command = readonly string[];

export interface CommandOptions {
  /** Throw CommandFailed on a non-zero exit (default: true) */
  check?: boolean;
  cwd?: string;
}

export interface PipelineOptions extends CommandOptions {
  /** File fed to the first stage's stdin */
  stdinFile?: string;
  /** File receiving the last stage's stdout */
  stdoutFile?: string;
}

export interface CommandRunner {
  /** Run with inherited output; resolves to whether the exit code was zero */
  run(command: Command, options?: CommandOptions): Promise<boolean>;
  /** Run and resolve to trimmed stdout */
  capture(command: Command, options?: CommandOptions): Promise<string>;
  /** Run piped stages; resolves to whether the pipeline succeeded */
  pipeline(
    stages: readonly Command[],
    options?: PipelineOptions,
  ): Promise<boolean>;
}

const SAFE_ARG = /^[\w@%+=:,./-]+$/;

function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command the way it would be typed into a shell
 */
export function formatCommand(command: Command): string {
  return command.map(quoteArg).join(" ");
}

export function formatPipeline(
  stages: readonly Command[],
  options: PipelineOptions = {},
): string {
  let text = stages.map(formatCommand).join(" | ");
  if (options.stdinFile) text = `${text} < ${quoteArg(options.stdinFile)}`;
  if (options.stdoutFile) text = `${text} > ${quoteArg(options.stdoutFile)}`;
  return text;
}

function splitCommand(command: Command): [string, string[]] {
  const [file, ...args] = command;
  if (file === undefined || file === "") {
    throw new Error("Command array cannot be empty");
  }
  return [file, args];
}

/**
 * Resolve with the exit status; spawn failures count as 127 like a shell
 */
function waitForExit(child: ChildProcess, label: string): Promise<number> {
  return new Promise((resolve) => {
    child.once("error", (err) => {
      logger.error(`Failed to start ${label}: ${err.message}`);
      resolve(127);
    });
    child.once("close", (code, signal) => {
      if (code !== null) {
        resolve(code);
      } else {
        logger.debug(`${label} terminated by ${signal ?? "unknown signal"}`);
        resolve(128);
      }
    });
  });
}

/**
 * Exit status of a pipeline: the rightmost non-zero stage status, else zero
 */
export function pipelineStatus(codes: readonly number[]): number {
  for (let i = codes.length - 1; i >= 0; i--) {
    const code = codes[i];
    if (code !== undefined && code !== 0) return code;
  }
  return 0;
}

export class ShellRunner implements CommandRunner {
  async run(command: Command, options: CommandOptions = {}): Promise<boolean> {
    const text = formatCommand(command);
    logger.info(`Executing: ${text}`);

    const [file, args] = splitCommand(command);
    const child = spawn(file, args, { cwd: options.cwd, stdio: "inherit" });
    const exitCode = await waitForExit(child, file);

    if (exitCode !== 0 && options.check !== false) {
      throw new CommandFailed(text, exitCode);
    }
    return exitCode === 0;
  }

  async capture(
    command: Command,
    options: CommandOptions = {},
  ): Promise<string> {
    const text = formatCommand(command);
    logger.info(`Executing: ${text}`);

    const [file, args] = splitCommand(command);
    const child = spawn(file, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout?.on("data", (d: Buffer) => stdout.push(d));
    child.stderr?.on("data", (d: Buffer) => stderr.push(d));

    const exitCode = await waitForExit(child, file);

    if (exitCode !== 0 && options.check !== false) {
      const message = Buffer.concat(stderr).toString().trim();
      throw new CommandFailed(text, exitCode, message);
    }
    return Buffer.concat(stdout).toString().trim();
  }

  async pipeline(
    stages: readonly Command[],
    options: PipelineOptions = {},
  ): Promise<boolean> {
    if (stages.length === 0) {
      throw new Error("Pipeline must have at least one stage");
    }

    const text = formatPipeline(stages, options);
    logger.info(`Executing: ${text}`);

    const children: ChildProcess[] = [];
    const exits: Promise<number>[] = [];

    stages.forEach((stage, index) => {
      const [file, args] = splitCommand(stage);
      const isFirst = index === 0;
      const isLast = index === stages.length - 1;

      const stdin = isFirst && !options.stdinFile ? "inherit" : "pipe";
      const stdout = isLast && !options.stdoutFile ? "inherit" : "pipe";
      const child = spawn(file, args, {
        cwd: options.cwd,
        stdio: [stdin, stdout, "inherit"],
      });

      // A downstream stage exiting early closes this pipe; its status
      // reports the failure
      child.stdin?.on("error", (err) =>
        logger.debug(`${file} stdin closed: ${err.message}`),
      );

      const previous = children[children.length - 1];
      if (previous?.stdout && child.stdin) {
        previous.stdout.pipe(child.stdin);
      }

      children.push(child);
      exits.push(waitForExit(child, file));
    });

    const first = children[0];
    if (options.stdinFile && first?.stdin) {
      const source = createReadStream(options.stdinFile);
      const stdin = first.stdin;
      source.on("error", (err) => {
        logger.error(`Failed to read ${options.stdinFile}: ${err.message}`);
        stdin.end();
      });
      source.pipe(stdin);
    }

    let outputError: Promise<Error | null> = Promise.resolve(null);
    const last = children[children.length - 1];
    if (options.stdoutFile && last?.stdout) {
      const sink = createWriteStream(options.stdoutFile);
      last.stdout.pipe(sink);
      outputError = finished(sink).then(
        () => null,
        (err: unknown) => {
          // Unpiped stages block on a full pipe; stop them
          for (const child of children) {
            child.stdout?.destroy();
            child.kill();
          }
          return err instanceof Error ? err : new Error(String(err));
        },
      );
    }

    const codes = await Promise.all(exits);
    const writeError = await outputError;
    const exitCode = pipelineStatus(codes);

    // A lost output file fails the pipeline whatever the stage statuses
    if (writeError) {
      logger.error(`Pipeline output not written: ${writeError.message}`);
      throw new CommandFailed(text, exitCode || 1, writeError.message);
    }

    if (exitCode !== 0 && options.check !== false) {
      throw new CommandFailed(text, exitCode);
    }
    return exitCode === 0;
  }
}
