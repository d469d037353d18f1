import { CodedError, errorMessage, PitrError } from "../domain/coded-error.js";
import { PgCode, PitrCode } from "../domain/error-codes.js";
import type { SystemState } from "../domain/system-state.js";
import type { Logger } from "../observability/logger.js";
import { silentLogger } from "../observability/logger.js";
import type { ClusterServiceControl } from "../ports/cluster-service.js";
import type {
  DatabaseControl,
  DatabaseProcessStatus,
  DatabaseTarget,
  StopMode,
} from "../ports/database-control.js";
import { sleep as defaultSleep, type Sleep } from "./sleep.js";

export interface StopPolicy {
  readonly maxStopRetries: number;
  readonly initialBackoffMs: number;
  readonly postClusterStopChecks: number;
  readonly postClusterStopIntervalMs: number;
  readonly stopTimeoutSeconds: number;
  readonly killSettleMs: number;
}

export interface StartPolicy {
  readonly startTimeoutSeconds: number;
  readonly verifyIntervalMs: number;
  readonly verifyTimeoutMs: number;
}

export const DEFAULT_STOP_POLICY: StopPolicy = {
  maxStopRetries: 3,
  initialBackoffMs: 2_000,
  postClusterStopChecks: 6,
  postClusterStopIntervalMs: 5_000,
  stopTimeoutSeconds: 30,
  killSettleMs: 2_000,
};

export const DEFAULT_START_POLICY: StartPolicy = {
  // recovery replay can take a while
  startTimeoutSeconds: 120,
  verifyIntervalMs: 1_000,
  verifyTimeoutMs: 30_000,
};

export interface ServiceStateControllerOptions {
  readonly cluster: ClusterServiceControl;
  readonly database: DatabaseControl;
  readonly stopPolicy?: Partial<StopPolicy>;
  readonly startPolicy?: Partial<StartPolicy>;
  readonly sleep?: Sleep;
  readonly logger?: Logger;
}

export class ServiceStateController {
  private readonly cluster: ClusterServiceControl;
  private readonly database: DatabaseControl;
  private readonly stopPolicy: StopPolicy;
  private readonly startPolicy: StartPolicy;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(options: ServiceStateControllerOptions) {
    this.cluster = options.cluster;
    this.database = options.database;
    this.stopPolicy = { ...DEFAULT_STOP_POLICY, ...options.stopPolicy };
    this.startPolicy = { ...DEFAULT_START_POLICY, ...options.startPolicy };
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;
  }

  async stopCluster(): Promise<void> {
    this.logger.info("stopping cluster service", {
      service: this.cluster.serviceName,
    });
    try {
      await this.cluster.stop();
    } catch (error) {
      throw new PitrError(
        PitrCode.stopFailed,
        `failed to stop ${this.cluster.serviceName}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    this.logger.info("cluster service stopped", {
      service: this.cluster.serviceName,
    });
  }

  /**
   * Waits for the cluster service's own shutdown, then escalates through fast
   * stops with backoff, one immediate stop and finally SIGKILL. Every stop
   * is re-verified against the process table.
   */
  async ensureDatabaseStopped(
    state: SystemState,
    clusterWasStopped: boolean,
  ): Promise<void> {
    const target = targetOf(state);
    const policy = this.stopPolicy;

    if (clusterWasStopped) {
      for (let check = 1; check <= policy.postClusterStopChecks; check += 1) {
        await this.sleep(policy.postClusterStopIntervalMs);
        if (!(await this.isRunning(target))) {
          this.logger.info("database stopped with cluster service");
          return;
        }
        this.logger.debug("database still running after cluster stop", {
          check,
          checks: policy.postClusterStopChecks,
        });
      }
      this.logger.info("database did not stop with cluster service, stopping it");
    }

    const initial = await this.checkStopped(target);
    if (!initial.running) {
      this.logger.info("database is not running");
      return;
    }

    let backoffMs = policy.initialBackoffMs;
    for (let attempt = 1; attempt <= policy.maxStopRetries; attempt += 1) {
      if (await this.tryStop(target, "fast", attempt)) {
        this.logger.info("database stopped", { mode: "fast", attempt });
        return;
      }
      if (attempt < policy.maxStopRetries) {
        this.logger.warn("stop attempt failed, backing off", {
          attempt,
          backoffMs,
        });
        await this.sleep(backoffMs);
        backoffMs *= 2;
      }
    }

    this.logger.warn("graceful stop failed, trying immediate mode");
    if (await this.tryStop(target, "immediate", 1)) {
      this.logger.info("database stopped", { mode: "immediate" });
      return;
    }

    const survivor = await this.checkStopped(target);
    if (!survivor.running) {
      return;
    }
    if (survivor.pid <= 0) {
      throw new PitrError(
        PitrCode.databaseRunning,
        "postgresql still running with unknown pid, manual intervention required",
      );
    }

    this.logger.warn("immediate stop failed, sending SIGKILL", {
      pid: survivor.pid,
    });
    try {
      await this.database.kill(target, survivor.pid);
    } catch (error) {
      throw new PitrError(
        PitrCode.stopFailed,
        `failed to kill PostgreSQL process (PID: ${survivor.pid}): ${errorMessage(error)}`,
        { cause: error },
      );
    }

    await this.sleep(policy.killSettleMs);
    if (await this.isRunning(target)) {
      throw new PitrError(
        PitrCode.databaseRunning,
        "postgresql still running after kill -9, manual intervention required",
      );
    }
    this.logger.warn("database killed", { pid: survivor.pid });
  }

  async startDatabase(state: SystemState): Promise<void> {
    const target = targetOf(state);
    const policy = this.startPolicy;

    this.logger.info("starting database", {
      timeoutSeconds: policy.startTimeoutSeconds,
    });
    try {
      await this.database.start(target, {
        timeoutSeconds: policy.startTimeoutSeconds,
      });
    } catch (error) {
      throw new PitrError(
        PitrCode.startFailed,
        `failed to start postgresql: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const checks = Math.max(
      1,
      Math.floor(policy.verifyTimeoutMs / policy.verifyIntervalMs),
    );
    for (let check = 1; check <= checks; check += 1) {
      let status: DatabaseProcessStatus;
      try {
        status = await this.database.checkRunning(target);
      } catch (error) {
        throw new PitrError(
          PitrCode.startFailed,
          `failed to verify postgresql start: ${errorMessage(error)}`,
          { cause: error },
        );
      }
      if (status.running) {
        this.logger.info("database started", { pid: status.pid });
        return;
      }
      if (check < checks) {
        await this.sleep(policy.verifyIntervalMs);
      }
    }

    throw new PitrError(
      PitrCode.startTimeout,
      `postgresql did not report a running process within ${Math.round(policy.verifyTimeoutMs / 1000)}s after start`,
    );
  }

  async promoteDatabase(target: DatabaseTarget): Promise<void> {
    this.logger.info("promoting database", { dataDir: target.dataDir });
    try {
      await this.database.promote(target);
    } catch (error) {
      throw new CodedError(
        PgCode.promoteFailed,
        `failed to promote postgresql: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async tryStop(
    target: DatabaseTarget,
    mode: StopMode,
    attempt: number,
  ): Promise<boolean> {
    try {
      await this.database.stop(target, {
        mode,
        timeoutSeconds: this.stopPolicy.stopTimeoutSeconds,
      });
    } catch (error) {
      this.logger.warn("stop command failed", {
        mode,
        attempt,
        error: errorMessage(error),
      });
      return false;
    }
    return !(await this.isRunning(target));
  }

  /** Status check during the stop phase; a check that cannot run is a stop failure. */
  private async checkStopped(target: DatabaseTarget): Promise<DatabaseProcessStatus> {
    try {
      return await this.database.checkRunning(target);
    } catch (error) {
      throw new PitrError(
        PitrCode.stopFailed,
        `failed to check postgresql status: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async isRunning(target: DatabaseTarget): Promise<boolean> {
    const status = await this.checkStopped(target);
    return status.running;
  }
}

function targetOf(state: SystemState): DatabaseTarget {
  return { dataDir: state.dataDir, dbsu: state.dbsu };
}
