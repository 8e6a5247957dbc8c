/**
 * tar.gz archive creation and extraction through the system tar
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../system/exec";
import { logger } from "../utils/logger";

const PARTIAL_SUFFIX = ".partial";

/**
 * Pack a directory into a tar.gz whose single top-level entry is that
 * directory. The archive is written under a temporary name and renamed into
 * place, so a failed run never leaves an archive with the final name.
 */
export async function createArchive(
  runner: CommandRunner,
  sourceDir: string,
  archivePath: string,
): Promise<void> {
  const partialPath = `${archivePath}${PARTIAL_SUFFIX}`;
  const parent = path.dirname(sourceDir);
  const entry = path.basename(sourceDir);

  logger.info("Creating compressed archive...");

  try {
    await runner.run(["tar", "-czf", partialPath, "-C", parent, entry]);
    await fs.rename(partialPath, archivePath);
  } catch (error) {
    await fs.rm(partialPath, { force: true });
    throw error;
  }
}

export async function extractArchive(
  runner: CommandRunner,
  archivePath: string,
  destination: string,
): Promise<void> {
  logger.info(`Extracting backup archive: ${archivePath}`);
  await runner.run(["tar", "-xzf", archivePath, "-C", destination]);
}

/**
 * Member paths of an archive, without trailing slashes
 */
export async function listArchive(
  runner: CommandRunner,
  archivePath: string,
): Promise<string[]> {
  const output = await runner.capture(["tar", "-tzf", archivePath]);
  return output
    .split("\n")
    .map((line) => line.trim().replace(/\/+$/, ""))
    .filter(Boolean);
}

/**
 * Extract only the named members
 */
export async function extractMembers(
  runner: CommandRunner,
  archivePath: string,
  destination: string,
  members: string[],
): Promise<void> {
  await runner.run(["tar", "-xzf", archivePath, "-C", destination, ...members]);
}
