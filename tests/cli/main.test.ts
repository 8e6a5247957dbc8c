import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  type MockInstance,
  test,
  vi,
} from "vitest";
import { main } from "../../src/cli/main";
import { VERSION } from "../../src/cli/ui";
import { getLogLevel, setLogLevel } from "../../src/utils/logger";
import { writeBackupFixture } from "../helpers/backup-fixture";
import { makeTempDir } from "../helpers/config";
import { FakeRunner } from "../helpers/fake-runner";

describe("main", () => {
  let root: string;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;
  let stdoutSpy: MockInstance;

  beforeEach(async () => {
    setLogLevel("error");
    root = await makeTempDir("cli");
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    stdoutSpy = vi
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    setLogLevel("info");
    await fs.rm(root, { recursive: true, force: true });
  });

  test("--help exits 0", async () => {
    expect(await main(["--help"])).toBe(0);
    expect(stdoutSpy).toHaveBeenCalled();
  });

  test("--version prints the version", async () => {
    expect(await main(["--version"])).toBe(0);
    expect(consoleLogSpy).toHaveBeenCalledWith(`immich-keeper v${VERSION}`);
  });

  test("an unknown mode exits 1 with an error line", async () => {
    expect(await main(["export", "out"])).toBe(1);
    expect(String(consoleErrorSpy.mock.calls[0]?.[0])).toContain(
      "Unknown mode: export",
    );
  });

  test("a missing location exits 1 without prompting", async () => {
    const runner = new FakeRunner();
    expect(await main(["backup"], { runner })).toBe(1);
    expect(runner.commands).toEqual([]);
  });

  test("--verbose raises the log level", async () => {
    await main(["--verbose"]);
    expect(getLogLevel()).toBe("debug");
  });

  test("a missing env file fails the backup with exit 1", async () => {
    const runner = new FakeRunner();
    const code = await main(
      [
        "backup",
        path.join(root, "out"),
        "-c",
        path.join(root, "docker-compose.yml"),
        "-e",
        path.join(root, ".env"),
      ],
      { runner },
    );

    expect(code).toBe(1);
    expect(runner.commands).toEqual([]);
  });

  test("inspect of a complete backup directory exits 0", async () => {
    const backupDir = await writeBackupFixture(root);
    const runner = new FakeRunner();
    expect(await main(["inspect", backupDir], { runner })).toBe(0);
  });

  test("inspect of an incomplete backup exits 1", async () => {
    const backupDir = await writeBackupFixture(root, { withDump: false });
    const runner = new FakeRunner();
    expect(await main(["inspect", backupDir], { runner })).toBe(1);
  });
});
