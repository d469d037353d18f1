import { describe, expect, test } from "vitest";
import { renderPlanText } from "../src/domain/execution-plan.js";
import { captureSystemState, type SystemState } from "../src/domain/system-state.js";
import {
  buildCommand,
  buildPlan,
  planPhases,
  quoteIfNeeded,
} from "../src/services/pitr-plan.js";

const CONCURRENCY_RISK =
  "No clean cancellation once stop/restore has started; do not run concurrent recoveries on this data directory";

function state(overrides: Partial<SystemState> = {}): SystemState {
  return captureSystemState({
    patroniActive: true,
    pgRunning: true,
    pgPid: 4242,
    dataDir: "/pg/data",
    dbsu: "postgres",
    capturedAt: new Date("2025-01-01T00:00:00Z"),
    ...overrides,
  });
}

describe("planPhases", () => {
  test("should run every phase on a managed running node", () => {
    expect(planPhases(state(), {})).toEqual([
      "stop-cluster",
      "ensure-stopped",
      "restore",
      "start",
      "guidance",
    ]);
  });

  test("should still make sure the database is down when the cluster is skipped", () => {
    expect(planPhases(state(), { skipPatroni: true, noRestart: true })).toEqual([
      "ensure-stopped",
      "restore",
      "guidance",
    ]);
  });

  test("should go straight to restore on a stopped unmanaged node", () => {
    expect(
      planPhases(state({ patroniActive: false, pgRunning: false }), {}),
    ).toEqual(["restore", "start", "guidance"]);
  });
});

describe("buildPlan", () => {
  test("should describe a time recovery on a managed node", () => {
    const plan = buildPlan({
      state: state(),
      options: { time: "2025-01-01 12:00:00+08", set: "20250101-010101F" },
      target: { kind: "time", value: "2025-01-01 12:00:00+08" },
    });

    expect(plan.command).toBe(
      'pitrctl pitr -t "2025-01-01 12:00:00+08" -b 20250101-010101F',
    );
    expect(plan.actions).toEqual([
      { step: 1, description: "Stop Patroni service" },
      { step: 2, description: "Ensure PostgreSQL is stopped" },
      { step: 3, description: "Execute pgBackRest restore" },
      { step: 4, description: "Start PostgreSQL" },
      { step: 5, description: "Print post-restore guidance" },
    ]);
    expect(plan.affects).toEqual([
      {
        type: "service",
        name: "patroni",
        impact: "stop",
        detail: "cluster management paused",
      },
      { type: "service", name: "postgresql", impact: "stop" },
      {
        type: "backup",
        name: "20250101-010101F",
        impact: "restore",
        detail: "pgBackRest",
      },
      { type: "target", name: "Time: 2025-01-01 12:00:00+08", impact: "recovery" },
      {
        type: "data",
        name: "/pg/data",
        impact: "overwrite",
        detail: "data directory restored",
      },
    ]);
    expect(plan.expected).toBe(
      "PostgreSQL restored to Time: 2025-01-01 12:00:00+08 (data dir: /pg/data)",
    );
    expect(plan.risks).toEqual([
      "Current data directory will be overwritten",
      "Patroni will be stopped; HA management suspended",
      CONCURRENCY_RISK,
    ]);
  });

  test("should flag skipped cluster management and a stopped result", () => {
    const plan = buildPlan({
      state: state({ pgRunning: false }),
      options: {
        default: true,
        skipPatroni: true,
        noRestart: true,
        exclusive: true,
        promote: true,
        plan: true,
      },
      target: { kind: "default" },
      clusterService: "patroni-pg-test",
    });

    expect(plan.command).toBe("pitrctl pitr -d --skip-patroni --no-restart -X -P --plan");
    expect(plan.affects.map((resource) => resource.name)).toEqual([
      "postgresql",
      "latest",
      "Latest (end of WAL stream)",
      "/pg/data",
    ]);
    expect(plan.expected).toBe(
      "PostgreSQL restored to Latest (end of WAL stream) (data dir: /pg/data); PostgreSQL remains stopped; auto-promote enabled",
    );
    expect(plan.risks).toEqual([
      "Current data directory will be overwritten",
      "Patroni is not stopped; ensure cluster safety before restoring",
      "PostgreSQL will remain stopped after restore",
      "Exclusive recovery stops before target; data beyond target not applied",
      CONCURRENCY_RISK,
    ]);
  });

  test("should name a custom cluster service", () => {
    const plan = buildPlan({
      state: state(),
      options: { immediate: true },
      target: { kind: "immediate" },
      clusterService: "patroni-pg-test",
    });

    expect(plan.affects[0]?.name).toBe("patroni-pg-test");
  });
});

describe("buildCommand", () => {
  test("should pick the first target flag only", () => {
    expect(buildCommand({ lsn: "0/7C82CB8", xid: "1024" })).toBe(
      "pitrctl pitr -l 0/7C82CB8",
    );
  });

  test("should mark dry runs as plan mode", () => {
    expect(buildCommand({ xid: "1024", dryRun: true })).toBe("pitrctl pitr -x 1024 --plan");
  });

  test("should quote values with whitespace", () => {
    expect(quoteIfNeeded("2025-01-01")).toBe("2025-01-01");
    expect(quoteIfNeeded("2025-01-01\t12:00")).toBe('"2025-01-01\\t12:00"');
  });
});

describe("renderPlanText", () => {
  test("should align the affects table", () => {
    const text = renderPlanText({
      command: "pitrctl pitr -I",
      actions: [{ step: 1, description: "Execute pgBackRest restore" }],
      affects: [
        { type: "backup", name: "latest", impact: "restore" },
        { type: "data", name: "/pg/data", impact: "overwrite", detail: "restored" },
      ],
      expected: "PostgreSQL restored",
      risks: ["Current data directory will be overwritten"],
    });

    expect(text.split("\n")).toEqual([
      "Execution Plan",
      "Command: pitrctl pitr -I",
      "",
      "Actions:",
      "  [1] Execute pgBackRest restore",
      "",
      "Affects:",
      "  Type    Name      Impact     Detail",
      "  ------  --------  ---------  --------",
      "  backup  latest    restore",
      "  data    /pg/data  overwrite  restored",
      "",
      "Expected:",
      "  PostgreSQL restored",
      "",
      "Risks:",
      "  - Current data directory will be overwritten",
    ]);
  });
});
