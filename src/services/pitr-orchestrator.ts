import { errorMessage, PitrError } from "../domain/coded-error.js";
import { PitrCode } from "../domain/error-codes.js";
import { renderPlanText, type ExecutionPlan } from "../domain/execution-plan.js";
import { isPlanMode, type PitrOptions } from "../domain/pitr-options.js";
import { describeTarget, type RecoveryTarget } from "../domain/recovery-target.js";
import {
  fail,
  failFromError,
  ok,
  type CommandResult,
} from "../domain/result.js";
import type { SystemState } from "../domain/system-state.js";
import type { Logger } from "../observability/logger.js";
import { silentLogger } from "../observability/logger.js";
import type { InterruptSource } from "../ports/interrupt-source.js";
import type { OutputSink } from "../ports/output-sink.js";
import {
  ConfirmationCancelledError,
  confirmWithCountdown,
} from "./confirmation.js";
import { buildPlan, planPhases, type PitrPhase } from "./pitr-plan.js";
import { renderGuidance } from "./post-restore-guidance.js";
import type { PreflightValidator } from "./preflight-validator.js";
import type { RestoreCoordinator } from "./restore-coordinator.js";
import type { ServiceStateController } from "./service-state-controller.js";
import type { Sleep } from "./sleep.js";

export type OrchestratorState =
  | "init"
  | "prechecked"
  | "confirm-pending"
  | "cluster-stopping"
  | "database-stopping"
  | "restoring"
  | "database-starting"
  | "guidance-printed"
  | "failed";

const PHASE_STATES: Readonly<Record<PitrPhase, OrchestratorState>> = {
  "stop-cluster": "cluster-stopping",
  "ensure-stopped": "database-stopping",
  restore: "restoring",
  start: "database-starting",
  guidance: "guidance-printed",
};

export interface PitrResultData {
  readonly target: string;
  readonly dataDir: string;
  readonly backupSet: string;
  readonly patroniStopped: boolean;
  readonly postgresRestarted: boolean;
  readonly promote: boolean;
  readonly exclusive: boolean;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly durationSeconds: number;
}

export interface PitrOrchestratorDeps {
  readonly preflight: PreflightValidator;
  readonly controller: ServiceStateController;
  readonly restorer: RestoreCoordinator;
  readonly interrupts: InterruptSource;
  /** Receives the plan, the countdown and the post-restore guidance. */
  readonly output: OutputSink;
  readonly clusterService?: string;
  readonly clock?: () => Date;
  readonly sleep?: Sleep;
  readonly countdownTicks?: number;
  readonly logger?: Logger;
  readonly onPhase?: (phase: PitrPhase) => void;
}

/** Seconds between two instants, clamped at zero for clock skew. */
export function computeDurationSeconds(startedAt: Date, completedAt: Date): number {
  return Math.max(0, (completedAt.getTime() - startedAt.getTime()) / 1000);
}

export class PitrOrchestrator {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly deps: PitrOrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? silentLogger;
  }

  /** Preflight and plan only. Nothing is stopped or written. */
  async plan(options: PitrOptions): Promise<CommandResult<ExecutionPlan>> {
    try {
      const { state, target } = await this.deps.preflight.validate(options);
      return ok("pitr plan", this.buildPlan(state, target, options));
    } catch (error) {
      return failFromError(error, PitrCode.precheckFailed);
    }
  }

  async execute(options: PitrOptions): Promise<CommandResult<PitrResultData>> {
    if (isPlanMode(options)) {
      return fail(
        PitrCode.invalidArgs,
        "plan mode does not execute a recovery",
        "request the plan instead of an execution",
      );
    }

    const startedAt = this.clock();
    let current: OrchestratorState = "init";
    const transition = (next: OrchestratorState): void => {
      this.logger.info("pitr state transition", { from: current, to: next });
      current = next;
    };

    let state: SystemState;
    let target: RecoveryTarget;
    try {
      ({ state, target } = await this.deps.preflight.validate(options));
    } catch (error) {
      transition("failed");
      return failFromError(error, PitrCode.precheckFailed);
    }
    transition("prechecked");

    const log = this.logger.child({ dataDir: state.dataDir, dbsu: state.dbsu });

    try {
      await this.deps.output.write(
        `${renderPlanText(this.buildPlan(state, target, options))}\n`,
      );

      if (!options.yes) {
        transition("confirm-pending");
        await confirmWithCountdown({
          warning: "This will overwrite the current database!",
          action: "pitr",
          interrupts: this.deps.interrupts,
          output: this.deps.output,
          ticks: this.deps.countdownTicks,
          sleep: this.deps.sleep,
        });
      }
    } catch (error) {
      transition("failed");
      if (error instanceof ConfirmationCancelledError) {
        log.warn("pitr confirmation cancelled", { signal: error.signal });
        return fail(PitrCode.invalidArgs, "pitr confirmation cancelled", error.message);
      }
      // nothing has been touched yet
      log.error("pitr confirmation failed", { error: errorMessage(error) });
      return fail(
        PitrCode.precheckFailed,
        `failed to present execution plan: ${errorMessage(error)}`,
      );
    }

    let clusterStopped = false;
    let restarted = false;

    try {
      for (const phase of planPhases(state, options)) {
        this.deps.onPhase?.(phase);
        if (phase !== "guidance") {
          transition(PHASE_STATES[phase]);
        }

        switch (phase) {
          case "stop-cluster":
            await this.deps.controller.stopCluster();
            clusterStopped = true;
            break;
          case "ensure-stopped":
            await this.deps.controller.ensureDatabaseStopped(state, clusterStopped);
            break;
          case "restore":
            await this.deps.restorer.restore(state, target, options);
            break;
          case "start":
            await this.deps.controller.startDatabase(state);
            restarted = true;
            break;
          case "guidance":
            await this.printGuidance(options, clusterStopped);
            transition(PHASE_STATES[phase]);
            break;
        }
      }
    } catch (error) {
      transition("failed");
      log.error("pitr failed", { error: errorMessage(error) });
      return failFromError(error);
    }

    const completedAt = this.clock();
    return ok("pitr completed", {
      target: describeTarget(target),
      dataDir: state.dataDir,
      backupSet: options.set ?? "latest",
      patroniStopped: clusterStopped,
      postgresRestarted: restarted,
      promote: Boolean(options.promote),
      exclusive: Boolean(options.exclusive),
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationSeconds: computeDurationSeconds(startedAt, completedAt),
    });
  }

  private buildPlan(
    state: SystemState,
    target: RecoveryTarget,
    options: PitrOptions,
  ): ExecutionPlan {
    return buildPlan({
      state,
      options,
      target,
      clusterService: this.deps.clusterService,
    });
  }

  private async printGuidance(
    options: PitrOptions,
    clusterWasStopped: boolean,
  ): Promise<void> {
    const text = renderGuidance({
      noRestart: Boolean(options.noRestart),
      promote: Boolean(options.promote),
      clusterWasStopped,
      clusterService: this.deps.clusterService,
    });
    try {
      await this.deps.output.write(text);
    } catch (error) {
      throw new PitrError(
        PitrCode.postFailed,
        `failed to write post-restore guidance: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
