import { runRestore } from "../../core";
import type { HealthReport } from "../../types";
import { formatDuration } from "../../utils/format";
import {
  type CommandDeps,
  loadConfigFor,
  reportFailure,
  resolveRunner,
} from "../context";
import type { CliOptions } from "../options";
import { formatCheck, formatList, formatSummary, ui } from "../ui";

function formatHealth(health: HealthReport): string {
  const lines = health.containers.map((c) =>
    formatCheck(c.running, `${c.name} ${c.status || "not running"}`),
  );
  if (health.api) {
    const { ok, attempts, lastStatus } = health.api;
    const detail = ok
      ? `API responded after ${attempts} attempt(s)`
      : `API not responding (last status: ${lastStatus ?? "no response"})`;
    lines.push(formatCheck(ok, detail));
  }
  return lines.join("\n");
}

export async function restoreCommand(
  options: CliOptions,
  location: string,
  deps: CommandDeps = {},
): Promise<number> {
  ui.banner("restore");

  try {
    const config = await loadConfigFor(options);
    const result = await runRestore(
      {
        config,
        runner: resolveRunner(deps),
        sleep: deps.sleep,
        fetch: deps.fetch,
      },
      location,
    );
    const { manifest } = result;

    ui.note(
      formatSummary([
        { label: "Backup", value: result.backupDir },
        {
          label: "Source",
          value: result.fromArchive ? "archive" : "directory",
        },
        { label: "Backup created", value: manifest.timestamp || "unknown" },
        { label: "Immich version", value: manifest.immich_version },
        { label: "Upload location", value: result.uploadLocation },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Restore Summary",
    );

    const health = formatHealth(result.health);
    if (health) {
      ui.note(health, "Health");
    }

    if (result.health.api && !result.health.api.ok) {
      ui.warn("Immich may need more time to start. Check the server logs.");
      ui.message(formatList(["docker compose logs immich_server"]));
    }

    ui.outro("Restore complete!");
    return 0;
  } catch (error) {
    return reportFailure("Restore", error, options.verbose);
  }
}
