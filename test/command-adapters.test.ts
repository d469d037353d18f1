import { describe, expect, test } from "vitest";
import {
  parsePostmasterPid,
  PgCtlDatabaseControl,
} from "../src/adapters/pg-ctl-database-control.js";
import { PsProcessLister } from "../src/adapters/ps-process-lister.js";
import { PsqlScalarExecutor } from "../src/adapters/psql-scalar-executor.js";
import { SystemctlClusterService } from "../src/adapters/systemctl-cluster-service.js";
import { CommandFailedError } from "../src/domain/coded-error.js";
import { PrivilegedExecutor } from "../src/services/privileged-executor.js";
import { FakeCommandRunner, FakeInspector, TEST_TARGET } from "./fakes.js";

const AS_DBSU = { currentUser: "postgres", isRoot: false, nonInteractive: false };
const AS_ROOT = { currentUser: "root", isRoot: true, nonInteractive: false };

describe("parsePostmasterPid", () => {
  test("should read the pid from the first line", () => {
    expect(parsePostmasterPid("4242\n/pg/data\n1735689600\n5432\n")).toBe(4242);
  });

  test("should treat garbage as no pid", () => {
    expect(parsePostmasterPid("")).toBe(0);
    expect(parsePostmasterPid("-1\n")).toBe(0);
    expect(parsePostmasterPid("postmaster\n")).toBe(0);
  });
});

describe("PgCtlDatabaseControl", () => {
  function createControl(alivePids: readonly number[] = []) {
    const runner = new FakeCommandRunner();
    const inspector = new FakeInspector();
    const control = new PgCtlDatabaseControl({
      executor: new PrivilegedExecutor(runner, AS_DBSU),
      inspector,
      pgBinDir: "/usr/pgsql-16/bin",
      probe: (pid) => alivePids.includes(pid),
      clock: () => new Date("2025-01-01T00:00:00Z"),
    });
    return { control, runner, inspector };
  }

  test("should report a live postmaster", async () => {
    const { control, inspector } = createControl([4242]);
    inspector.files.set("postmaster.pid", "4242\n/pg/data\n");

    expect(await control.checkRunning(TEST_TARGET)).toEqual({
      running: true,
      pid: 4242,
      checkedAt: new Date("2025-01-01T00:00:00Z"),
    });
  });

  test("should keep the pid of a stale pid file", async () => {
    const { control, inspector } = createControl();
    inspector.files.set("postmaster.pid", "4242\n");

    const status = await control.checkRunning(TEST_TARGET);

    expect(status.running).toBe(false);
    expect(status.pid).toBe(4242);
  });

  test("should report stopped without a pid file", async () => {
    const { control } = createControl();

    expect((await control.checkRunning(TEST_TARGET)).running).toBe(false);
  });

  test("should build pg_ctl command lines", async () => {
    const { control, runner } = createControl();

    await control.stop(TEST_TARGET, { mode: "fast", timeoutSeconds: 30 });
    await control.start(TEST_TARGET, { timeoutSeconds: 120 });
    await control.promote(TEST_TARGET);
    await control.kill(TEST_TARGET, 4242);

    expect(runner.invocations).toEqual([
      {
        command: "/usr/pgsql-16/bin/pg_ctl",
        args: ["stop", "-D", "/pg/data", "-m", "fast", "-w", "-t", "30"],
      },
      {
        command: "/usr/pgsql-16/bin/pg_ctl",
        args: ["start", "-D", "/pg/data", "-w", "-t", "120"],
      },
      { command: "/usr/pgsql-16/bin/pg_ctl", args: ["promote", "-D", "/pg/data", "-w"] },
      { command: "kill", args: ["-9", "4242"] },
    ]);
  });

  test("should reject on a non-zero pg_ctl exit", async () => {
    const { control, runner } = createControl();
    runner.outcome = { exitCode: 1, stdout: "", stderr: "pg_ctl: server is not in standby mode" };

    await expect(control.promote(TEST_TARGET)).rejects.toBeInstanceOf(CommandFailedError);
  });
});

describe("PsqlScalarExecutor", () => {
  test.each<[string, boolean | null]>([
    ["t\n", true],
    ["f\n", false],
    ["", null],
  ])("should map %j to %s", async (stdout, expected) => {
    const runner = new FakeCommandRunner();
    runner.outcome = { exitCode: 0, stdout, stderr: "" };
    const executor = new PsqlScalarExecutor(new PrivilegedExecutor(runner, AS_DBSU));

    expect(await executor.queryBoolean(TEST_TARGET, "SELECT pg_is_in_recovery()")).toBe(expected);
    expect(runner.invocations[0]).toEqual({
      command: "psql",
      args: ["-AXtqw", "-d", "postgres", "-c", "SELECT pg_is_in_recovery()"],
    });
  });

  test("should return null when psql cannot connect", async () => {
    const runner = new FakeCommandRunner();
    runner.outcome = { exitCode: 2, stdout: "", stderr: "psql: error: connection refused" };
    const executor = new PsqlScalarExecutor(new PrivilegedExecutor(runner, AS_DBSU));

    expect(await executor.queryBoolean(TEST_TARGET, "SELECT pg_is_in_recovery()")).toBeNull();
  });
});

describe("SystemctlClusterService", () => {
  test("should stop the unit and report failures", async () => {
    const runner = new FakeCommandRunner();
    const service = new SystemctlClusterService(new PrivilegedExecutor(runner, AS_ROOT), "patroni-pg-test");

    await service.stop();
    expect(runner.invocations).toEqual([
      { command: "systemctl", args: ["stop", "patroni-pg-test"] },
    ]);

    runner.outcome = { exitCode: 5, stdout: "", stderr: "Unit patroni-pg-test.service not loaded." };
    await expect(service.stop()).rejects.toThrow(
      "systemctl exited with code 5: Unit patroni-pg-test.service not loaded.",
    );
  });

  test("should read activity from the exit code", async () => {
    const runner = new FakeCommandRunner();
    const service = new SystemctlClusterService(new PrivilegedExecutor(runner, AS_DBSU));

    expect(await service.isActive()).toBe(true);
    runner.outcome = { exitCode: 3, stdout: "", stderr: "" };
    expect(await service.isActive()).toBe(false);
    expect(runner.invocations[0]).toEqual({
      command: "systemctl",
      args: ["is-active", "--quiet", "patroni"],
    });
  });
});

describe("PsProcessLister", () => {
  test("should list non-empty command lines", async () => {
    const runner = new FakeCommandRunner();
    runner.outcome = {
      exitCode: 0,
      stdout: "/usr/pgsql/bin/postgres -D /pg/data\n  postgres: logger  \n\n",
      stderr: "",
    };

    expect(await new PsProcessLister(runner).listCommands("postgres")).toEqual([
      "/usr/pgsql/bin/postgres -D /pg/data",
      "postgres: logger",
    ]);
    expect(runner.invocations[0]).toEqual({
      command: "ps",
      args: ["h", "-u", "postgres", "-o", "command"],
    });
  });

  test("should treat a user without processes as empty", async () => {
    const runner = new FakeCommandRunner();
    runner.outcome = { exitCode: 1, stdout: "", stderr: "" };

    expect(await new PsProcessLister(runner).listCommands("postgres")).toEqual([]);
  });
});
