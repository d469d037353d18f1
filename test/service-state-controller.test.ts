import { describe, expect, test } from "vitest";
import { CodedError } from "../src/domain/coded-error.js";
import { PgCode, PitrCode } from "../src/domain/error-codes.js";
import { captureSystemState } from "../src/domain/system-state.js";
import { ServiceStateController } from "../src/services/service-state-controller.js";
import {
  FakeClusterService,
  FakeDatabase,
  recordingSleep,
  TEST_TARGET,
} from "./fakes.js";

const STATE = captureSystemState({
  patroniActive: true,
  pgRunning: true,
  pgPid: 4242,
  dataDir: TEST_TARGET.dataDir,
  dbsu: TEST_TARGET.dbsu,
  capturedAt: new Date("2025-01-01T00:00:00Z"),
});

function createController() {
  const cluster = new FakeClusterService();
  const database = new FakeDatabase();
  const { sleep, delays } = recordingSleep();
  const controller = new ServiceStateController({ cluster, database, sleep });
  return { controller, cluster, database, delays };
}

describe("ServiceStateController.stopCluster", () => {
  test("should stop the cluster service", async () => {
    const { controller, cluster } = createController();

    await controller.stopCluster();

    expect(cluster.calls).toEqual(["stop"]);
    expect(cluster.active).toBe(false);
  });

  test("should wrap stop failures", async () => {
    const { controller, cluster } = createController();
    cluster.failStop = new Error("unit not found");

    await expect(controller.stopCluster()).rejects.toMatchObject({
      code: PitrCode.stopFailed,
      message: "failed to stop patroni: unit not found",
    });
  });
});

describe("ServiceStateController.ensureDatabaseStopped", () => {
  test("should do nothing when the database is already down", async () => {
    const { controller, database, delays } = createController();
    database.runningSequence = [false];

    await controller.ensureDatabaseStopped(STATE, false);

    expect(database.calls).toEqual([]);
    expect(delays).toEqual([]);
  });

  test("should wait for the database to follow the cluster service down", async () => {
    const { controller, database, delays } = createController();
    database.runningSequence = [true, false];

    await controller.ensureDatabaseStopped(STATE, true);

    expect(database.calls).toEqual([]);
    expect(delays).toEqual([5_000, 5_000]);
  });

  test("should retry fast stops with doubling backoff", async () => {
    const { controller, database, delays } = createController();
    database.runningSequence = [true, true, true, false];

    await controller.ensureDatabaseStopped(STATE, false);

    expect(database.calls).toEqual(["stop:fast", "stop:fast", "stop:fast"]);
    expect(delays).toEqual([2_000, 4_000]);
  });

  test("should fall back to an immediate stop", async () => {
    const { controller, database, delays } = createController();
    database.runningSequence = [true, true, true, true, false];

    await controller.ensureDatabaseStopped(STATE, false);

    expect(database.calls).toEqual([
      "stop:fast",
      "stop:fast",
      "stop:fast",
      "stop:immediate",
    ]);
    expect(delays).toEqual([2_000, 4_000]);
  });

  test("should kill the postmaster when every stop fails", async () => {
    const { controller, database, delays } = createController();
    database.runningSequence = [true, true, true, true, true, true, false];

    await controller.ensureDatabaseStopped(STATE, false);

    expect(database.calls).toEqual([
      "stop:fast",
      "stop:fast",
      "stop:fast",
      "stop:immediate",
      "kill:4242",
    ]);
    expect(delays).toEqual([2_000, 4_000, 2_000]);
  });

  test("should skip re-checks after a failing stop command", async () => {
    const { controller, database } = createController();
    database.runningSequence = [true, true, false];
    database.stopError = new Error("pg_ctl: server does not shut down");

    await controller.ensureDatabaseStopped(STATE, false);

    expect(database.checkCount).toBe(3);
    expect(database.calls.at(-1)).toBe("kill:4242");
  });

  test("should require manual intervention when kill does not help", async () => {
    const { controller, database } = createController();
    database.runningSequence = [true];

    await expect(controller.ensureDatabaseStopped(STATE, false)).rejects.toMatchObject({
      code: PitrCode.databaseRunning,
      message: "postgresql still running after kill -9, manual intervention required",
    });
  });

  test("should refuse to kill an unknown pid", async () => {
    const { controller, database } = createController();
    database.runningSequence = [true];
    database.pid = 0;

    await expect(controller.ensureDatabaseStopped(STATE, false)).rejects.toMatchObject({
      code: PitrCode.databaseRunning,
      message: "postgresql still running with unknown pid, manual intervention required",
    });
    expect(database.calls).not.toContain("kill:0");
  });

  test("should report kill failures", async () => {
    const { controller, database } = createController();
    database.runningSequence = [true];
    database.killError = new Error("operation not permitted");

    await expect(controller.ensureDatabaseStopped(STATE, false)).rejects.toMatchObject({
      code: PitrCode.stopFailed,
      message: "failed to kill PostgreSQL process (PID: 4242): operation not permitted",
    });
  });
});

describe("ServiceStateController status check failures", () => {
  const denied = new Error("sudo: a password is required");
  const stopCheckFailure = {
    code: PitrCode.stopFailed,
    message: "failed to check postgresql status: sudo: a password is required",
    cause: denied,
  };

  test("should fail the stop while waiting on the cluster service", async () => {
    const { controller, database, delays } = createController();
    database.checkError = denied;

    await expect(controller.ensureDatabaseStopped(STATE, true)).rejects.toMatchObject(
      stopCheckFailure,
    );
    expect(database.calls).toEqual([]);
    expect(delays).toEqual([5_000]);
  });

  test("should fail the stop on the initial check", async () => {
    const { controller, database } = createController();
    database.checkError = denied;

    await expect(controller.ensureDatabaseStopped(STATE, false)).rejects.toMatchObject(
      stopCheckFailure,
    );
    expect(database.calls).toEqual([]);
  });

  test("should not retry when a fast stop cannot be verified", async () => {
    const { controller, database, delays } = createController();
    database.runningSequence = [true];
    database.checkError = denied;
    database.checkErrorFrom = 1;

    await expect(controller.ensureDatabaseStopped(STATE, false)).rejects.toMatchObject(
      stopCheckFailure,
    );
    expect(database.calls).toEqual(["stop:fast"]);
    expect(delays).toEqual([]);
  });

  test("should fail when the immediate stop cannot be verified", async () => {
    const { controller, database } = createController();
    database.runningSequence = [true];
    database.checkError = denied;
    database.checkErrorFrom = 4;

    await expect(controller.ensureDatabaseStopped(STATE, false)).rejects.toMatchObject(
      stopCheckFailure,
    );
    expect(database.calls).toEqual([
      "stop:fast",
      "stop:fast",
      "stop:fast",
      "stop:immediate",
    ]);
  });

  test("should not kill when the surviving process cannot be checked", async () => {
    const { controller, database } = createController();
    database.runningSequence = [true];
    database.stopError = new Error("pg_ctl: server does not shut down");
    database.checkError = denied;
    database.checkErrorFrom = 1;

    await expect(controller.ensureDatabaseStopped(STATE, false)).rejects.toMatchObject(
      stopCheckFailure,
    );
    expect(database.calls).not.toContain("kill:4242");
  });

  test("should fail when the kill cannot be verified", async () => {
    const { controller, database } = createController();
    database.runningSequence = [true];
    database.stopError = new Error("pg_ctl: server does not shut down");
    database.checkError = denied;
    database.checkErrorFrom = 2;

    await expect(controller.ensureDatabaseStopped(STATE, false)).rejects.toMatchObject(
      stopCheckFailure,
    );
    expect(database.calls.at(-1)).toBe("kill:4242");
  });

  test("should fail the start when it cannot be verified", async () => {
    const { controller, database, delays } = createController();
    database.checkError = denied;

    await expect(controller.startDatabase(STATE)).rejects.toMatchObject({
      code: PitrCode.startFailed,
      message: "failed to verify postgresql start: sudo: a password is required",
      cause: denied,
    });
    expect(database.calls).toEqual(["start"]);
    expect(delays).toEqual([]);
  });
});

describe("ServiceStateController.startDatabase", () => {
  test("should poll until the database reports running", async () => {
    const { controller, database, delays } = createController();
    database.runningSequence = [false, false, true];

    await controller.startDatabase(STATE);

    expect(database.calls).toEqual(["start"]);
    expect(delays).toEqual([1_000, 1_000]);
  });

  test("should time out when the process never appears", async () => {
    const database = new FakeDatabase();
    const { sleep, delays } = recordingSleep();
    const controller = new ServiceStateController({
      cluster: new FakeClusterService(),
      database,
      sleep,
      startPolicy: { verifyTimeoutMs: 3_000 },
    });

    await expect(controller.startDatabase(STATE)).rejects.toMatchObject({
      code: PitrCode.startTimeout,
      message: "postgresql did not report a running process within 3s after start",
    });
    expect(database.checkCount).toBe(3);
    expect(delays).toEqual([1_000, 1_000]);
  });

  test("should report start command failures separately", async () => {
    const { controller, database } = createController();
    database.startError = new Error("could not start server");

    await expect(controller.startDatabase(STATE)).rejects.toMatchObject({
      code: PitrCode.startFailed,
      message: "failed to start postgresql: could not start server",
    });
    expect(database.checkCount).toBe(0);
  });
});

describe("ServiceStateController.promoteDatabase", () => {
  test("should promote through the database control", async () => {
    const { controller, database } = createController();

    await controller.promoteDatabase(TEST_TARGET);

    expect(database.calls).toEqual(["promote"]);
  });

  test("should map promote failures to the database module", async () => {
    const { controller, database } = createController();
    database.promoteError = new Error("server is not in standby mode");

    const error = await controller.promoteDatabase(TEST_TARGET).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CodedError);
    expect(error).toMatchObject({
      code: PgCode.promoteFailed,
      message: "failed to promote postgresql: server is not in standby mode",
    });
  });
});
