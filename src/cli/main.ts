import * as p from "@clack/prompts";
import color from "picocolors";
import { setLogLevel } from "../utils/logger";
import { backupCommand } from "./commands/backup";
import { inspectCommand } from "./commands/inspect";
import { restoreCommand } from "./commands/restore";
import type { CommandDeps } from "./context";
import { confirmRestore, promptForMissing } from "./interactive";
import { type CliOptions, parseCliArgs, UsageError } from "./options";
import { PROGRAM, VERSION } from "./ui";

export function printHelp(): void {
  p.intro(
    `${color.cyan(PROGRAM)} ${color.dim(`v${VERSION}`)} - Backup and restore for Immich`,
  );

  p.note(
    `${color.cyan("backup")}  <dir>             Dump the database and uploads into <dir>
${color.cyan("restore")} <archive|dir>     Restore the database and uploads from a backup
${color.cyan("inspect")} <archive|dir>     Show what a backup contains`,
    "Modes",
  );

  p.note(
    `-c, --compose-file <path>   Compose file (default: $COMPOSE_FILE or docker-compose.yml)
-e, --env-file <path>       Environment file (default: $ENV_FILE or .env)
-i, --interactive           Prompt for missing arguments
-v, --verbose               Verbose output
-h, --help                  Show this help message
    --version               Show version`,
    "Options",
  );

  p.note(
    `${PROGRAM} backup ./backups
${PROGRAM} restore ./backups/immich_backup_20240101_020000.tar.gz
${PROGRAM} inspect ./backups/immich_backup_20240101_020000.tar.gz
${PROGRAM} -i`,
    "Examples",
  );

  p.outro(`Usage: ${PROGRAM} <mode> <location> [options]`);
}

async function complete(options: CliOptions): Promise<CliOptions | null> {
  if (!options.interactive) return options;
  return promptForMissing(options);
}

/**
 * Parse arguments, fill in the gaps, and run the chosen mode
 * @returns process exit code
 */
export async function main(
  argv: string[],
  deps: CommandDeps = {},
): Promise<number> {
  let parsed: CliOptions;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${color.red("Error:")} ${error.message}`);
      const help = color.cyan(`${PROGRAM} --help`);
      console.error(`Run ${help} for usage information.`);
      return 1;
    }
    throw error;
  }

  if (parsed.help) {
    printHelp();
    return 0;
  }

  if (parsed.version) {
    console.log(`${PROGRAM} v${VERSION}`);
    return 0;
  }

  if (parsed.verbose) {
    setLogLevel("debug");
  }

  const options = await complete(parsed);
  if (!options) {
    p.cancel("Cancelled");
    return 1;
  }

  const { mode, location } = options;
  if (!mode || !location) {
    printHelp();
    return 1;
  }

  switch (mode) {
    case "backup":
      return backupCommand(options, location, deps);

    case "restore":
      if (options.interactive && !(await confirmRestore(location))) {
        p.cancel("Restore cancelled");
        return 1;
      }
      return restoreCommand(options, location, deps);

    case "inspect":
      return inspectCommand(options, location, deps);
  }
}
