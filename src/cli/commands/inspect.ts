import { DEFAULT_SETTINGS } from "../../config/defaults";
import { inspectBackup } from "../../core";
import { type CommandDeps, reportFailure, resolveRunner } from "../context";
import type { CliOptions } from "../options";
import { formatCheck, formatList, formatSummary, ui } from "../ui";

export async function inspectCommand(
  options: CliOptions,
  location: string,
  deps: CommandDeps = {},
): Promise<number> {
  ui.banner("inspect");

  try {
    const result = await inspectBackup(
      resolveRunner(deps),
      location,
      DEFAULT_SETTINGS.tempDir,
    );
    const { manifest } = result;
    const originalPaths = manifest.original_paths;

    ui.note(
      formatSummary([
        { label: "Backup", value: result.backupName },
        { label: "Location", value: result.location },
        { label: "Created", value: manifest.timestamp || "unknown" },
        { label: "Immich version", value: manifest.immich_version },
        { label: "Database dump", value: manifest.database_backup },
        {
          label: "Upload location",
          value: originalPaths.upload_location || null,
        },
        {
          label: "Database location",
          value: originalPaths.db_data_location || null,
        },
      ]),
      "Backup",
    );

    ui.note(
      [
        formatCheck(result.databaseDumpPresent, "database dump present"),
        formatCheck(result.filesystemPresent, "upload files present"),
      ].join("\n"),
      "Contents",
    );

    if (result.members.length > 0) {
      ui.message(formatList(result.members));
    }

    const complete = result.databaseDumpPresent && result.filesystemPresent;
    if (!complete) {
      ui.warn("Backup is incomplete and cannot be restored.");
      return 1;
    }

    ui.outro("Backup looks complete");
    return 0;
  } catch (error) {
    return reportFailure("Inspect", error, options.verbose);
  }
}
