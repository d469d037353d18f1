import type {
  ExecutionPlan,
  PlanAction,
  PlanResource,
} from "../domain/execution-plan.js";
import type { PitrOptions } from "../domain/pitr-options.js";
import { isPlanMode } from "../domain/pitr-options.js";
import {
  describeTarget,
  type RecoveryTarget,
} from "../domain/recovery-target.js";
import type { SystemState } from "../domain/system-state.js";

export type PitrPhase =
  | "stop-cluster"
  | "ensure-stopped"
  | "restore"
  | "start"
  | "guidance";

export const PHASE_DESCRIPTIONS: Readonly<Record<PitrPhase, string>> = {
  "stop-cluster": "Stop Patroni service",
  "ensure-stopped": "Ensure PostgreSQL is stopped",
  restore: "Execute pgBackRest restore",
  start: "Start PostgreSQL",
  guidance: "Print post-restore guidance",
};

export const DEFAULT_CLUSTER_SERVICE = "patroni";
export const CLI_NAME = "pitrctl";

type PhaseOptions = Pick<PitrOptions, "skipPatroni" | "noRestart">;
type PhaseState = Pick<SystemState, "patroniActive" | "pgRunning">;

export function stopsCluster(state: PhaseState, options: PhaseOptions): boolean {
  return state.patroniActive && !options.skipPatroni;
}

/**
 * The ordered phases a run performs. Both the plan and the orchestrator
 * are derived from this list.
 */
export function planPhases(
  state: PhaseState,
  options: PhaseOptions,
): PitrPhase[] {
  const phases: PitrPhase[] = [];
  if (stopsCluster(state, options)) {
    phases.push("stop-cluster");
  }
  if (state.pgRunning || state.patroniActive) {
    phases.push("ensure-stopped");
  }
  phases.push("restore");
  if (!options.noRestart) {
    phases.push("start");
  }
  phases.push("guidance");
  return phases;
}

export interface PlanInput {
  readonly state: SystemState;
  readonly options: PitrOptions;
  /** Normalized target; its description appears in the plan. */
  readonly target: RecoveryTarget;
  readonly clusterService?: string;
}

export function buildPlan(input: PlanInput): ExecutionPlan {
  return {
    command: buildCommand(input.options),
    actions: buildActions(input.state, input.options),
    affects: buildAffects(input),
    expected: buildExpected(input),
    risks: buildRisks(input.state, input.options),
  };
}

export function buildActions(
  state: PhaseState,
  options: PhaseOptions,
): PlanAction[] {
  return planPhases(state, options).map((phase, index) => ({
    step: index + 1,
    description: PHASE_DESCRIPTIONS[phase],
  }));
}

function buildAffects(input: PlanInput): PlanResource[] {
  const { state, options } = input;
  const affects: PlanResource[] = [];

  if (stopsCluster(state, options)) {
    affects.push({
      type: "service",
      name: input.clusterService ?? DEFAULT_CLUSTER_SERVICE,
      impact: "stop",
      detail: "cluster management paused",
    });
  }
  if (state.pgRunning || state.patroniActive) {
    affects.push({ type: "service", name: "postgresql", impact: "stop" });
  }

  affects.push(
    {
      type: "backup",
      name: options.set ?? "latest",
      impact: "restore",
      detail: "pgBackRest",
    },
    { type: "target", name: describeTarget(input.target), impact: "recovery" },
    {
      type: "data",
      name: state.dataDir,
      impact: "overwrite",
      detail: "data directory restored",
    },
  );
  return affects;
}

function buildExpected(input: PlanInput): string {
  let expected = `PostgreSQL restored to ${describeTarget(input.target)} (data dir: ${input.state.dataDir})`;
  if (input.options.noRestart) {
    expected += "; PostgreSQL remains stopped";
  }
  if (input.options.promote) {
    expected += "; auto-promote enabled";
  }
  return expected;
}

function buildRisks(state: PhaseState, options: PitrOptions): string[] {
  const risks = ["Current data directory will be overwritten"];
  if (stopsCluster(state, options)) {
    risks.push("Patroni will be stopped; HA management suspended");
  }
  if (options.skipPatroni) {
    risks.push("Patroni is not stopped; ensure cluster safety before restoring");
  }
  if (options.noRestart) {
    risks.push("PostgreSQL will remain stopped after restore");
  }
  if (options.exclusive) {
    risks.push(
      "Exclusive recovery stops before target; data beyond target not applied",
    );
  }
  risks.push(
    "No clean cancellation once stop/restore has started; do not run concurrent recoveries on this data directory",
  );
  return risks;
}

/** Rebuilds the equivalent command line, for display. */
export function buildCommand(options: PitrOptions): string {
  const args = [CLI_NAME, "pitr"];

  if (options.default) {
    args.push("-d");
  } else if (options.immediate) {
    args.push("-I");
  } else if (options.time) {
    args.push("-t", quoteIfNeeded(options.time));
  } else if (options.name) {
    args.push("-n", options.name);
  } else if (options.lsn) {
    args.push("-l", options.lsn);
  } else if (options.xid) {
    args.push("-x", options.xid);
  }

  if (options.set) {
    args.push("-b", options.set);
  }
  if (options.skipPatroni) {
    args.push("--skip-patroni");
  }
  if (options.noRestart) {
    args.push("--no-restart");
  }
  if (options.exclusive) {
    args.push("-X");
  }
  if (options.promote) {
    args.push("-P");
  }
  if (isPlanMode(options)) {
    args.push("--plan");
  }
  return args.join(" ");
}

export function quoteIfNeeded(value: string): string {
  return /[ \t]/.test(value) ? JSON.stringify(value) : value;
}
