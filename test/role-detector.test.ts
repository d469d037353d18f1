import { describe, expect, test } from "vitest";
import {
  classifyProcessLines,
  DataDirRoleStrategy,
  ProcessRoleStrategy,
  QueryRoleStrategy,
  RECOVERY_STATUS_QUERY,
  RoleDetector,
} from "../src/services/role-detector.js";
import type { Logger, LogContext } from "../src/observability/logger.js";
import {
  BASE_DATA_DIR_ENTRIES,
  FakeInspector,
  FakeProcessLister,
  FakeSqlExecutor,
  TEST_TARGET,
} from "./fakes.js";

const PRIMARY_PS = [
  "/usr/pgsql/bin/postgres -D /pg/data",
  "postgres: pg-test: logger",
  "postgres: pg-test: checkpointer",
  "postgres: pg-test: walwriter",
];
const REPLICA_PS = [
  "/usr/pgsql/bin/postgres -D /pg/data",
  "postgres: pg-test: startup recovering 000000010000000000000003",
  "postgres: pg-test: walreceiver streaming 0/3000148",
];

class RecordingLogger implements Logger {
  readonly warnings: { message: string; fields?: LogContext }[] = [];
  child(): Logger {
    return this;
  }
  debug(): void {}
  info(): void {}
  warn(message: string, fields?: LogContext): void {
    this.warnings.push({ message, fields });
  }
  error(): void {}
}

function createDetector() {
  const lister = new FakeProcessLister();
  const sql = new FakeSqlExecutor();
  const inspector = new FakeInspector();
  inspector.entries = [...BASE_DATA_DIR_ENTRIES];
  const logger = new RecordingLogger();
  const detector = new RoleDetector(
    [
      new ProcessRoleStrategy(lister),
      new QueryRoleStrategy(sql),
      new DataDirRoleStrategy(inspector),
    ],
    logger,
  );
  return { detector, lister, sql, inspector, logger };
}

describe("classifyProcessLines", () => {
  test("should detect a live primary", () => {
    expect(classifyProcessLines(PRIMARY_PS)).toEqual({ alive: true, replaying: false });
  });

  test("should detect replay markers", () => {
    expect(classifyProcessLines(REPLICA_PS)).toEqual({ alive: true, replaying: true });
  });

  test("should ignore unrelated processes", () => {
    expect(classifyProcessLines(["-bash", "sshd: postgres@pts/0", ""])).toEqual({
      alive: false,
      replaying: false,
    });
  });

  test("should count walsender as alive", () => {
    expect(classifyProcessLines(["postgres: pg-test: walsender replicator 10.0.0.2"])).toEqual({
      alive: true,
      replaying: false,
    });
  });
});

describe("RoleDetector", () => {
  test("should trust the live query over process inspection", async () => {
    const { detector, lister, sql, logger } = createDetector();
    lister.lines = PRIMARY_PS;
    sql.value = true;

    const result = await detector.detectRole(TEST_TARGET);

    expect(result).toEqual({ role: "replica", alive: true, source: "psql" });
    expect(sql.queries).toEqual([RECOVERY_STATUS_QUERY]);
    expect(logger.warnings.map((warning) => warning.message)).toEqual([
      "role disagreement, trusting live query",
    ]);
  });

  test("should keep the process role when the query cannot connect", async () => {
    const { detector, lister, sql, inspector } = createDetector();
    lister.lines = REPLICA_PS;
    sql.value = null;

    const result = await detector.detectRole(TEST_TARGET);

    expect(result).toEqual({ role: "replica", alive: true, source: "ps" });
    expect(inspector.calls).toEqual([]);
  });

  test("should not query a server that is not running", async () => {
    const { detector, sql } = createDetector();

    await detector.detectRole(TEST_TARGET);

    expect(sql.queries).toEqual([]);
  });

  test("should report replica from a standby marker once on-disk inspection runs", async () => {
    const { detector, inspector } = createDetector();
    inspector.entries = [...BASE_DATA_DIR_ENTRIES, "standby.signal"];

    const result = await detector.detectRole(TEST_TARGET);

    expect(result).toEqual({ role: "replica", alive: false, source: "pgdata" });
  });

  test("should default a usable data directory to primary", async () => {
    const { detector } = createDetector();

    expect(await detector.detectRole(TEST_TARGET)).toEqual({
      role: "primary",
      alive: false,
      source: "pgdata",
    });
  });

  test("should read legacy recovery.conf directives", async () => {
    const { detector, inspector } = createDetector();
    inspector.entries = [...BASE_DATA_DIR_ENTRIES, "recovery.conf"];
    inspector.files.set(
      "recovery.conf",
      "# primary_conninfo = 'host=old'\nstandby_mode = 'on'\n",
    );

    expect((await detector.detectRole(TEST_TARGET)).role).toBe("replica");
  });

  test("should ignore commented recovery.conf directives", async () => {
    const { detector, inspector } = createDetector();
    inspector.entries = [...BASE_DATA_DIR_ENTRIES, "recovery.conf"];
    inspector.files.set("recovery.conf", "# restore_command = 'cp %f %p'\n");

    expect((await detector.detectRole(TEST_TARGET)).role).toBe("primary");
  });

  test("should mark alive from postmaster.pid", async () => {
    const { detector, inspector } = createDetector();
    inspector.entries = [...BASE_DATA_DIR_ENTRIES, "postmaster.pid"];

    expect(await detector.detectRole(TEST_TARGET)).toEqual({
      role: "primary",
      alive: true,
      source: "pgdata",
    });
  });

  test("should treat a sparse data directory as unusable", async () => {
    const { detector, inspector } = createDetector();
    inspector.entries = ["PG_VERSION", "standby.signal"];

    expect(await detector.detectRole(TEST_TARGET)).toEqual({
      role: "unknown",
      alive: false,
      source: "none",
    });
  });

  test("should degrade strategy failures to unknown", async () => {
    const { detector, lister, inspector, logger } = createDetector();
    lister.error = new Error("ps: not found");
    inspector.status = { exists: false, initialized: false };

    expect(await detector.detectRole(TEST_TARGET)).toEqual({
      role: "unknown",
      alive: false,
      source: "none",
    });
    expect(logger.warnings).toEqual([
      { message: "role strategy failed", fields: { source: "ps", error: "ps: not found" } },
    ]);
  });
});
