/**
 * Command-line argument parsing
 */

import { parseArgs } from "node:util";
import { DEFAULT_COMPOSE_FILE, DEFAULT_ENV_FILE } from "../config/defaults";
import { errorMessage, KeeperError } from "../errors";

export const MODES = ["backup", "restore", "inspect"] as const;
export type Mode = (typeof MODES)[number];

export interface CliOptions {
  mode: Mode | null;
  location: string | null;
  composeFile: string;
  envFile: string;
  /** Whether the compose file came from a flag or the environment */
  composeFileGiven: boolean;
  envFileGiven: boolean;
  interactive: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export class UsageError extends KeeperError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

const OPTIONS = {
  "compose-file": { type: "string", short: "c" },
  "env-file": { type: "string", short: "e" },
  interactive: { type: "boolean", short: "i", default: false },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
  version: { type: "boolean", default: false },
} as const;

function parseRaw(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

export function parseCliArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): CliOptions {
  const { values, positionals } = parseRaw(argv);
  if (positionals.length > 2) {
    throw new UsageError(`Unexpected argument: ${positionals[2]}`);
  }

  const [modeArg, locationArg] = positionals;
  if (modeArg !== undefined && !isMode(modeArg)) {
    throw new UsageError(`Unknown mode: ${modeArg}`);
  }

  const composeFlag = values["compose-file"] ?? env.COMPOSE_FILE;
  const envFlag = values["env-file"] ?? env.ENV_FILE;

  return {
    mode: modeArg ?? null,
    location: locationArg ?? null,
    composeFile: composeFlag ?? DEFAULT_COMPOSE_FILE,
    envFile: envFlag ?? DEFAULT_ENV_FILE,
    composeFileGiven: composeFlag !== undefined,
    envFileGiven: envFlag !== undefined,
    interactive: values.interactive ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
  };
}
