/**
 * Read-only inspection of a backup archive or directory.
 * Archives are listed, and only their manifest is extracted.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorMessage, InvalidArchive, InvalidBackup } from "../errors";
import type { CommandRunner } from "../system/exec";
import type { InspectResult } from "../types";
import {
  isArchivePath,
  isBackupDirName,
  RESTORE_TEMP_PREFIX,
} from "../utils/naming";
import { isDirectory, isFile } from "../utils/path";
import { extractMembers, listArchive } from "./archive";
import {
  hasManifest,
  MANIFEST_FILENAME,
  readManifest,
  resolveManifestPaths,
} from "./manifest";

/**
 * Entries directly below a directory, from a flat member listing
 */
export function childEntries(members: string[], dirName: string): string[] {
  const prefix = `${dirName}/`;
  const entries = new Set<string>();

  for (const member of members) {
    if (!member.startsWith(prefix)) continue;
    const [first] = member.slice(prefix.length).split("/");
    if (first) entries.add(first);
  }

  return [...entries].sort();
}

async function inspectArchive(
  runner: CommandRunner,
  archivePath: string,
  tempRoot: string,
): Promise<InspectResult> {
  let members: string[];
  try {
    members = await listArchive(runner, archivePath);
  } catch (error) {
    throw new InvalidArchive(
      `Invalid backup archive: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const backupName = members
    .map((member) => member.split("/")[0] ?? "")
    .find((name) => isBackupDirName(name));
  if (!backupName) {
    throw new InvalidArchive(
      "Invalid backup archive: no backup directory found",
    );
  }

  const manifestMember = `${backupName}/${MANIFEST_FILENAME}`;
  if (!members.includes(manifestMember)) {
    throw new InvalidArchive("Invalid backup archive: manifest file not found");
  }

  const extractDir = await fs.mkdtemp(path.join(tempRoot, RESTORE_TEMP_PREFIX));
  try {
    await extractMembers(runner, archivePath, extractDir, [manifestMember]);
    const backupDir = path.join(extractDir, backupName);
    const manifest = await readManifest(backupDir);
    const { databaseDump, uploadBackup } = resolveManifestPaths(
      backupDir,
      manifest,
    );
    const relative = (target: string) =>
      path.relative(extractDir, target).split(path.sep).join("/");

    return {
      location: archivePath,
      fromArchive: true,
      backupName,
      manifest,
      members: childEntries(members, backupName),
      databaseDumpPresent: members.includes(relative(databaseDump)),
      filesystemPresent: members.includes(relative(uploadBackup)),
    };
  } finally {
    await fs.rm(extractDir, { recursive: true, force: true });
  }
}

async function inspectDirectory(backupDir: string): Promise<InspectResult> {
  if (!(await hasManifest(backupDir))) {
    throw new InvalidBackup("Invalid backup: manifest file not found");
  }

  const manifest = await readManifest(backupDir);
  const { databaseDump, uploadBackup } = resolveManifestPaths(
    backupDir,
    manifest,
  );

  return {
    location: backupDir,
    fromArchive: false,
    backupName: path.basename(backupDir),
    manifest,
    members: (await fs.readdir(backupDir)).sort(),
    databaseDumpPresent: await isFile(databaseDump),
    filesystemPresent: await isDirectory(uploadBackup),
  };
}

export async function inspectBackup(
  runner: CommandRunner,
  location: string,
  tempRoot: string,
): Promise<InspectResult> {
  const resolved = path.resolve(location);

  if ((await isFile(resolved)) && isArchivePath(resolved)) {
    return inspectArchive(runner, resolved, tempRoot);
  }
  if (await isDirectory(resolved)) {
    return inspectDirectory(resolved);
  }

  throw new InvalidBackup(`Backup location not found or invalid: ${location}`);
}
