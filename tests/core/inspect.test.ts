import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { childEntries, inspectBackup } from "../../src/core/inspect";
import { InvalidArchive } from "../../src/errors";
import { setLogLevel } from "../../src/utils/logger";
import {
  FIXTURE_DUMP,
  FIXTURE_NAME,
  type FixtureOptions,
  fixtureManifest,
  writeBackupFixture,
} from "../helpers/backup-fixture";
import { makeTempDir } from "../helpers/config";
import { FakeRunner } from "../helpers/fake-runner";

describe("inspect", () => {
  let root: string;
  let tempRoot: string;
  let runner: FakeRunner;

  beforeEach(async () => {
    setLogLevel("error");
    root = await makeTempDir("inspect");
    tempRoot = path.join(root, "tmp");
    await fs.mkdir(tempRoot);
    runner = new FakeRunner();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function archiveFixture(
    options: FixtureOptions = {},
  ): Promise<string> {
    const staging = path.join(root, "staging");
    await writeBackupFixture(staging, options);
    const archive = path.join(root, `${FIXTURE_NAME}.tar.gz`);
    await runner.run(["tar", "-czf", archive, "-C", staging, FIXTURE_NAME]);
    return archive;
  }

  test("childEntries lists direct children only", () => {
    expect(
      childEntries(
        [
          "immich_backup_x",
          "immich_backup_x/backup_manifest.json",
          "immich_backup_x/filesystem",
          "immich_backup_x/filesystem/upload_location",
          "other/file",
        ],
        "immich_backup_x",
      ),
    ).toEqual(["backup_manifest.json", "filesystem"]);
  });

  test("describes a complete archive", async () => {
    const archive = await archiveFixture();

    const result = await inspectBackup(runner, archive, tempRoot);

    expect(result).toEqual({
      location: archive,
      fromArchive: true,
      backupName: FIXTURE_NAME,
      manifest: fixtureManifest(),
      members: ["backup_manifest.json", "filesystem", FIXTURE_DUMP],
      databaseDumpPresent: true,
      filesystemPresent: true,
    });
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  test("flags an archive missing its dump", async () => {
    const archive = await archiveFixture({ withDump: false });

    const result = await inspectBackup(runner, archive, tempRoot);

    expect(result.databaseDumpPresent).toBe(false);
    expect(result.filesystemPresent).toBe(true);
  });

  test("describes a backup directory", async () => {
    const backupDir = await writeBackupFixture(root, { withUploads: false });

    const result = await inspectBackup(runner, backupDir, tempRoot);

    expect(result.fromArchive).toBe(false);
    expect(result.backupName).toBe(FIXTURE_NAME);
    expect(result.members).toEqual(["backup_manifest.json", FIXTURE_DUMP]);
    expect(result.databaseDumpPresent).toBe(true);
    expect(result.filesystemPresent).toBe(false);
  });

  test("an archive without a manifest is an InvalidArchive", async () => {
    const archive = await archiveFixture({ manifest: null });

    await expect(inspectBackup(runner, archive, tempRoot)).rejects.toThrow(
      new InvalidArchive("Invalid backup archive: manifest file not found"),
    );
  });

  test("an unreadable archive is an InvalidArchive", async () => {
    const archive = path.join(root, "corrupt.tar.gz");
    await fs.writeFile(archive, "not gzip data");

    await expect(inspectBackup(runner, archive, tempRoot)).rejects.toThrow(
      InvalidArchive,
    );
  });

  test("a missing location is rejected", async () => {
    const missing = path.join(root, "nowhere");
    await expect(inspectBackup(runner, missing, tempRoot)).rejects.toThrow(
      `Backup location not found or invalid: ${missing}`,
    );
  });
});
