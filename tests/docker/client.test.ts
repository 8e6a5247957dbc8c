import { beforeEach, describe, expect, test } from "vitest";
import { DockerClient } from "../../src/docker/client";
import { CommandFailed } from "../../src/errors";
import { setLogLevel } from "../../src/utils/logger";
import { FakeRunner } from "../helpers/fake-runner";

const COMPOSE =
  "docker compose --file /srv/immich/docker-compose.yml --env-file /srv/immich/.env";

describe("DockerClient", () => {
  let runner: FakeRunner;
  let docker: DockerClient;

  beforeEach(() => {
    setLogLevel("error");
    runner = new FakeRunner();
    docker = new DockerClient(runner, {
      composeFile: "/srv/immich/docker-compose.yml",
      envFile: "/srv/immich/.env",
    });
  });

  test("listContainerNames splits docker ps output", async () => {
    runner.containers = ["immich_server", "immich_postgres"];
    expect(await docker.listContainerNames()).toEqual([
      "immich_server",
      "immich_postgres",
    ]);
    expect(runner.commands).toEqual(["docker ps -a --format {{.Names}}"]);
  });

  test("containerExists", async () => {
    runner.containers = ["immich_postgres"];
    expect(await docker.containerExists("immich_postgres")).toBe(true);
    expect(await docker.containerExists("immich_server")).toBe(false);
  });

  test("stopContainers issues one docker stop", async () => {
    const ok = await docker.stopContainers(["immich_server", "immich_redis"]);
    expect(ok).toBe(true);
    expect(runner.commands).toEqual(["docker stop immich_server immich_redis"]);
  });

  test("stopContainers and startContainers do nothing for an empty list", async () => {
    expect(await docker.stopContainers([])).toBe(true);
    expect(await docker.startContainers([])).toBe(true);
    expect(runner.commands).toEqual([]);
  });

  test("startContainers reports failure without throwing", async () => {
    runner.failing = ["docker start"];
    expect(await docker.startContainers(["immich_server"])).toBe(false);
  });

  test("startContainer throws on failure", async () => {
    runner.failing = ["docker start"];
    await expect(docker.startContainer("immich_postgres")).rejects.toThrow(
      CommandFailed,
    );
  });

  test("containerStatus filters by name", async () => {
    runner.statuses = { immich_server: "Up 2 minutes" };
    expect(await docker.containerStatus("immich_server")).toBe("Up 2 minutes");
    expect(runner.commands).toEqual([
      "docker ps --filter name=immich_server --format {{.Status}}",
    ]);
  });

  test("execCommand builds docker exec with flags", () => {
    const flags = { interactive: true, tty: true };
    expect(docker.execCommand("immich_postgres", ["psql"], flags)).toEqual([
      "docker",
      "exec",
      "-i",
      "-t",
      "immich_postgres",
      "psql",
    ]);
    expect(docker.execCommand("immich_postgres", ["pg_isready"])).toEqual([
      "docker",
      "exec",
      "immich_postgres",
      "pg_isready",
    ]);
  });

  test("compose commands target the deployment files", async () => {
    await docker.composeDown();
    await docker.composeCreate();
    await docker.composeUp();

    expect(runner.commands).toEqual([
      `${COMPOSE} down -v`,
      `${COMPOSE} create`,
      `${COMPOSE} up -d`,
    ]);
  });

  test("isPostgresReady runs pg_isready in the container", async () => {
    runner.failing = ["docker exec immich_postgres pg_isready"];
    const ready = await docker.isPostgresReady("immich_postgres", "postgres");
    expect(ready).toBe(false);
    expect(runner.commands).toEqual([
      "docker exec immich_postgres pg_isready --username=postgres",
    ]);
  });
});
