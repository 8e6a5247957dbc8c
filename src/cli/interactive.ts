/**
 * Prompts for whatever the command line left out
 */

import { type CliOptions, isMode, type Mode } from "./options";
import { ui } from "./ui";

const LOCATION_MESSAGES: Record<Mode, string> = {
  backup: "Backup destination directory",
  restore: "Backup archive or directory to restore",
  inspect: "Backup archive or directory to inspect",
};

/**
 * @returns the completed options, or null if a prompt was cancelled
 */
export async function promptForMissing(
  options: CliOptions,
): Promise<CliOptions | null> {
  ui.intro("immich-keeper");

  let { composeFile, envFile, mode, location } = options;

  if (!options.composeFileGiven) {
    const answer = await ui.text({
      message: "Docker compose file",
      initialValue: composeFile,
      validate: (value) =>
        value.trim() ? undefined : "A compose file is required",
    });
    if (ui.isCancel(answer)) return null;
    composeFile = answer.trim();
  }

  if (!options.envFileGiven) {
    const answer = await ui.text({
      message: "Environment file",
      initialValue: envFile,
      validate: (value) =>
        value.trim() ? undefined : "An environment file is required",
    });
    if (ui.isCancel(answer)) return null;
    envFile = answer.trim();
  }

  if (!mode) {
    const answer = await ui.select({
      message: "What would you like to do?",
      options: [
        {
          value: "backup",
          label: "backup",
          hint: "Dump the database and copy uploads into an archive",
        },
        {
          value: "restore",
          label: "restore",
          hint: "Replace the database and uploads from a backup",
        },
        {
          value: "inspect",
          label: "inspect",
          hint: "Show what a backup contains",
        },
      ],
    });
    if (ui.isCancel(answer) || !isMode(answer)) return null;
    mode = answer;
  }

  if (!location) {
    const answer = await ui.text({
      message: LOCATION_MESSAGES[mode],
      placeholder:
        mode === "backup"
          ? "./backups"
          : "./backups/immich_backup_20240101_020000.tar.gz",
      validate: (value) =>
        value.trim() ? undefined : "A location is required",
    });
    if (ui.isCancel(answer)) return null;
    location = answer.trim();
  }

  return { ...options, composeFile, envFile, mode, location };
}

/**
 * Ask before a restore overwrites the running deployment
 */
export async function confirmRestore(location: string): Promise<boolean> {
  const answer = await ui.confirm({
    message: `Restore from ${location}? The current database and uploads will be replaced.`,
    initialValue: false,
  });
  return !ui.isCancel(answer) && answer;
}
