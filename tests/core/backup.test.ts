import * as fs from "node:fs/promises";
import * as path from "node:path";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { runBackup } from "../../src/core/backup";
import {
  CommandFailed,
  DatabaseBackupFailed,
  EnvironmentNotReady,
} from "../../src/errors";
import type { BackupResult, DeploymentConfig } from "../../src/types";
import { setLogLevel } from "../../src/utils/logger";
import { makeConfig, makeTempDir, standardTopology } from "../helpers/config";
import { FakeRunner } from "../helpers/fake-runner";

const CREATED_AT = new Date(2024, 0, 2, 3, 4, 5);
const NAME = "immich_backup_20240102_030405";
const DUMP = "immich_db_backup_20240102_030405.sql.gz";
const SERVICES = "immich_server immich_machine_learning immich_redis";

describe("runBackup", () => {
  let root: string;
  let uploads: string;
  let destination: string;
  let config: DeploymentConfig;
  let runner: FakeRunner;

  const backup = (): Promise<BackupResult> =>
    runBackup({ config, runner, now: () => CREATED_AT }, destination);

  beforeEach(async () => {
    setLogLevel("error");
    root = await makeTempDir("backup");
    uploads = path.join(root, "library");
    destination = path.join(root, "backups");

    const album = path.join(uploads, "library", "admin");
    await fs.mkdir(album, { recursive: true });
    await fs.mkdir(path.join(uploads, "upload"), { recursive: true });
    await fs.writeFile(path.join(album, "IMG_0001.jpg"), "photo-bytes");

    const composeFile = path.join(root, "docker-compose.yml");
    await fs.writeFile(composeFile, "services: {}\n");

    config = makeConfig({
      composeFile,
      env: {
        UPLOAD_LOCATION: uploads,
        IMMICH_VERSION: "release",
        DB_USERNAME: "immich",
      },
      topology: standardTopology(uploads),
      settings: { tempDir: path.join(root, "tmp") },
    });
    runner = new FakeRunner();
    runner.dumpContent = "CREATE TABLE assets ();\n";
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  test("produces an archive with dump, uploads and manifest", async () => {
    const result = await backup();

    expect(result.archivePath).toBe(path.join(destination, `${NAME}.tar.gz`));
    expect(result.archiveName).toBe(`${NAME}.tar.gz`);
    expect(result.checksum).toMatch(/^[0-9a-f]{64}$/);
    expect(result.sizeBytes).toBe((await fs.stat(result.archivePath)).size);
    expect(result.failedToRestart).toEqual([]);

    const extracted = path.join(root, "extracted");
    await fs.mkdir(extracted);
    await runner.run(["tar", "-xzf", result.archivePath, "-C", extracted]);

    const backupDir = path.join(extracted, NAME);
    expect((await fs.readdir(backupDir)).sort()).toEqual([
      "backup_manifest.json",
      "filesystem",
      DUMP,
    ]);

    const manifestFile = path.join(backupDir, "backup_manifest.json");
    const manifest: unknown = JSON.parse(
      await fs.readFile(manifestFile, "utf8"),
    );
    expect(manifest).toEqual({
      timestamp: CREATED_AT.toISOString(),
      immich_version: "release",
      database_backup: DUMP,
      filesystem_backup: "filesystem",
      original_paths: {
        upload_location: uploads,
        db_data_location: path.resolve("./postgres"),
        critical_folders: [
          path.join(uploads, "library"),
          path.join(uploads, "upload"),
        ],
      },
      env_vars: {
        UPLOAD_LOCATION: uploads,
        IMMICH_VERSION: "release",
        DB_USERNAME: "immich",
      },
    });

    const dump = await fs.readFile(path.join(backupDir, DUMP));
    expect(gunzipSync(dump).toString()).toBe("CREATE TABLE assets ();\n");

    const photo = path.join(
      backupDir,
      "filesystem",
      "upload_location",
      "library",
      "admin",
      "IMG_0001.jpg",
    );
    expect(await fs.readFile(photo, "utf8")).toBe("photo-bytes");
  });

  test("pauses everything but the database and resumes afterwards", async () => {
    await backup();

    expect(runner.commands).toEqual([
      "docker ps -a --format {{.Names}}",
      `docker stop ${SERVICES}`,
      `docker start ${SERVICES}`,
    ]);
    expect(runner.pipelines).toHaveLength(1);
    expect(runner.pipelines[0]?.stages).toEqual([
      "docker exec -t immich_postgres pg_dumpall --clean --if-exists " +
        "--username=immich",
      "gzip",
    ]);
  });

  test("removes the working directory and leaves no partial archive", async () => {
    await backup();

    expect(await fs.readdir(path.join(root, "tmp"))).toEqual([]);
    expect(await fs.readdir(destination)).toEqual([`${NAME}.tar.gz`]);
  });

  test("a failed dump still resumes services", async () => {
    runner.pipelineSucceeds = false;

    await expect(backup()).rejects.toThrow(DatabaseBackupFailed);

    expect(runner.commands).toContain(`docker start ${SERVICES}`);
    expect(await fs.readdir(path.join(root, "tmp"))).toEqual([]);
    expect(await fs.readdir(destination)).toEqual([]);
  });

  test("an unwritable dump still resumes services and cleans up", async () => {
    runner.pipelineError = new CommandFailed(
      "docker exec -t immich_postgres pg_dumpall | gzip",
      1,
      "ENOSPC: no space left on device, write",
    );

    const failure = backup();
    await expect(failure).rejects.toBeInstanceOf(DatabaseBackupFailed);
    await expect(failure).rejects.toThrow(
      "Database backup failed: Command failed with exit code 1: " +
        "docker exec -t immich_postgres pg_dumpall | gzip: " +
        "ENOSPC: no space left on device, write",
    );

    expect(runner.commands.at(-1)).toBe(`docker start ${SERVICES}`);
    expect(await fs.readdir(path.join(root, "tmp"))).toEqual([]);
    expect(await fs.readdir(destination)).toEqual([]);
  });

  test("a missing upload location fails after resuming services", async () => {
    await fs.rm(uploads, { recursive: true, force: true });

    await expect(backup()).rejects.toThrow(EnvironmentNotReady);
    expect(runner.commands.at(-1)).toBe(`docker start ${SERVICES}`);
  });

  test("refuses to run when the database container does not exist", async () => {
    runner.containers = ["immich_server"];

    await expect(backup()).rejects.toThrow(
      'Database container "immich_postgres" not found. ' +
        "Please ensure Immich is deployed.",
    );
    expect(runner.commands).toEqual(["docker ps -a --format {{.Names}}"]);
  });

  test("refuses to run without the compose file", async () => {
    const composeFile = path.join(root, "absent.yml");
    const missing = makeConfig({ ...config, env: {}, composeFile });

    await expect(
      runBackup({ config: missing, runner }, destination),
    ).rejects.toThrow(`Docker compose file ${composeFile} not found`);
    expect(runner.commands).toEqual([]);
  });

  test("reports services that did not restart", async () => {
    runner.failing = ["docker start"];

    const result = await backup();
    expect(result.failedToRestart).toEqual([
      "immich_server",
      "immich_machine_learning",
      "immich_redis",
    ]);
  });
});
