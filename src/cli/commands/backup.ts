import { runBackup } from "../../core";
import { formatBytes, formatDuration } from "../../utils/format";
import {
  type CommandDeps,
  loadConfigFor,
  reportFailure,
  resolveRunner,
} from "../context";
import type { CliOptions } from "../options";
import { formatSummary, ui } from "../ui";

export async function backupCommand(
  options: CliOptions,
  destination: string,
  deps: CommandDeps = {},
): Promise<number> {
  ui.banner("backup");

  try {
    const config = await loadConfigFor(options);
    const runner = resolveRunner(deps);
    const result = await runBackup(
      { config, runner, now: deps.now },
      destination,
    );

    ui.note(
      formatSummary([
        { label: "Archive", value: result.archivePath },
        { label: "Size", value: formatBytes(result.sizeBytes) },
        { label: "Checksum", value: `sha256:${result.checksum}` },
        { label: "Upload location", value: result.paths.uploadLocation },
        { label: "Database location", value: result.paths.dbDataLocation },
        {
          label: "Containers paused",
          value: result.pausedContainers.join(", ") || "none",
        },
        {
          label: "Failed to restart",
          value:
            result.failedToRestart.length > 0
              ? `${result.failedToRestart.join(", ")} (manual restart required)`
              : null,
        },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Backup Summary",
    );

    if (result.failedToRestart.length > 0) {
      ui.warn("Some services are still stopped. Start them with docker start.");
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    return reportFailure("Backup", error, options.verbose);
  }
}
