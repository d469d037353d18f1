import { PitrError } from "../domain/coded-error.js";
import { PitrCode } from "../domain/error-codes.js";
import type { PitrOptions } from "../domain/pitr-options.js";
import {
  selectedTargets,
  TARGET_FLAG_HINT,
  type RecoveryTarget,
} from "../domain/recovery-target.js";
import { captureSystemState, type SystemState } from "../domain/system-state.js";
import type { Logger } from "../observability/logger.js";
import { silentLogger } from "../observability/logger.js";
import type { ClusterServiceControl } from "../ports/cluster-service.js";
import type { DatabaseControl } from "../ports/database-control.js";
import type { DataDirectoryInspector } from "../ports/data-directory.js";
import { isRecognizedTimeFormat, normalizeTime } from "./time-normalizer.js";

const LSN_PATTERN = /^[0-9A-Fa-f]+\/[0-9A-Fa-f]+$/;
const XID_PATTERN = /^\d+$/;
const MAX_XID = 4_294_967_295;

export interface PreflightDefaults {
  readonly dbsu: string;
  readonly dataDir: string;
}

export interface PreflightOutcome {
  readonly state: SystemState;
  readonly target: RecoveryTarget;
}

export class PreflightValidator {
  constructor(
    private readonly deps: {
      readonly inspector: DataDirectoryInspector;
      readonly database: DatabaseControl;
      readonly cluster: ClusterServiceControl;
      readonly defaults: PreflightDefaults;
      readonly now?: () => Date;
      readonly logger?: Logger;
    },
  ) {}

  async validate(options: PitrOptions): Promise<PreflightOutcome> {
    const logger = this.deps.logger ?? silentLogger;
    const now = this.deps.now ?? (() => new Date());

    const target = resolveRecoveryTarget(options, now(), logger);

    const dbsu = options.dbsu ?? this.deps.defaults.dbsu;
    const dataDir = options.dataDir ?? this.deps.defaults.dataDir;
    const databaseTarget = { dataDir, dbsu };

    const directory = await this.deps.inspector.inspect(databaseTarget);
    if (!directory.exists) {
      throw new PitrError(
        PitrCode.precheckFailed,
        `data directory ${dataDir} does not exist`,
      );
    }
    if (!directory.initialized) {
      throw new PitrError(
        PitrCode.precheckFailed,
        `data directory ${dataDir} is not initialized (no PG_VERSION)`,
      );
    }

    const patroniActive = await this.deps.cluster.isActive();
    const status = await this.deps.database.checkRunning(databaseTarget);

    const state = captureSystemState({
      patroniActive,
      pgRunning: status.running,
      pgPid: status.pid,
      dataDir,
      dbsu,
      capturedAt: now(),
    });

    logger.info("preflight passed", {
      dataDir,
      dbsu,
      patroniActive,
      pgRunning: status.running,
      pgPid: status.pid,
    });
    return { state, target };
  }
}

/**
 * Applies the exactly-one-target rule, validates LSN and XID syntax and
 * normalizes time input. Throws a PitrError with the invalid-arguments code.
 */
export function resolveRecoveryTarget(
  options: PitrOptions,
  now: Date = new Date(),
  logger: Logger = silentLogger,
): RecoveryTarget {
  const targets = selectedTargets(options);
  const [target] = targets;
  if (target === undefined) {
    throw new PitrError(
      PitrCode.invalidArgs,
      `no recovery target specified, use one of: ${TARGET_FLAG_HINT}`,
    );
  }
  if (targets.length > 1) {
    throw new PitrError(
      PitrCode.invalidArgs,
      `multiple recovery targets specified, choose only one of: ${TARGET_FLAG_HINT}`,
    );
  }

  switch (target.kind) {
    case "lsn":
      if (!LSN_PATTERN.test(target.value)) {
        throw new PitrError(
          PitrCode.invalidArgs,
          `invalid LSN format: ${target.value} (use: X/X, e.g., 0/7C82CB8)`,
        );
      }
      return target;
    case "xid":
      if (!isValidXid(target.value)) {
        throw new PitrError(
          PitrCode.invalidArgs,
          `invalid XID: ${target.value} (must be a positive integer)`,
        );
      }
      return target;
    case "time":
      if (!isRecognizedTimeFormat(target.value)) {
        logger.warn("time format may not be recognized, proceeding anyway", {
          time: target.value,
        });
      }
      return { kind: "time", value: normalizeTime(target.value, now) };
    default:
      return target;
  }
}

function isValidXid(value: string): boolean {
  if (!XID_PATTERN.test(value)) {
    return false;
  }
  const parsed = Number(value);
  return parsed > 0 && parsed <= MAX_XID;
}
