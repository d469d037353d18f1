import { errorMessage } from "../domain/coded-error.js";
import {
  unknownRole,
  type Role,
  type RoleResult,
  type RoleSource,
} from "../domain/role.js";
import type { Logger } from "../observability/logger.js";
import { silentLogger } from "../observability/logger.js";
import type { DatabaseTarget } from "../ports/database-control.js";
import type { DataDirectoryInspector } from "../ports/data-directory.js";
import type { ProcessLister } from "../ports/process-lister.js";
import type { SqlScalarExecutor } from "../ports/sql-executor.js";

export const RECOVERY_STATUS_QUERY = "SELECT pg_is_in_recovery()";

/** Fewer entries than this and the data directory is not considered usable. */
export const MIN_DATA_DIR_ENTRIES = 10;

const BACKGROUND_PROCESSES = [
  "logger",
  "checkpointer",
  "background writer",
  "stats collector",
  "walwriter",
  "walsender",
];

const STANDBY_SIGNAL_FILES = ["standby.signal", "recovery.signal"];
const LEGACY_RECOVERY_FILE = "recovery.conf";
const LEGACY_REPLICA_DIRECTIVES = [
  "primary_conninfo",
  "restore_command",
  "standby_mode",
];

export interface RoleStrategyOutcome extends RoleResult {
  /** An authoritative answer ends the chain. */
  readonly authoritative: boolean;
}

export interface RoleStrategy {
  readonly source: RoleSource;
  /** Whether the strategy has anything to add to the evidence gathered so far. */
  canRun(evidence: RoleResult): boolean;
  detect(target: DatabaseTarget): Promise<RoleStrategyOutcome>;
}

export interface ProcessClassification {
  readonly alive: boolean;
  readonly replaying: boolean;
}

export function classifyProcessLines(
  lines: readonly string[],
): ProcessClassification {
  let alive = false;
  let replaying = false;

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) {
      continue;
    }

    if (line.includes("post") && line.includes("-D")) {
      alive = true;
    }

    if (!line.includes("postgres:")) {
      continue;
    }

    if (BACKGROUND_PROCESSES.some((name) => line.includes(name))) {
      alive = true;
    }
    if (line.includes("walreceiver") || line.includes("recovering")) {
      replaying = true;
    }
  }

  return { alive, replaying };
}

export class ProcessRoleStrategy implements RoleStrategy {
  readonly source = "ps";

  constructor(private readonly lister: ProcessLister) {}

  canRun(): boolean {
    return true;
  }

  async detect(target: DatabaseTarget): Promise<RoleStrategyOutcome> {
    const lines = await this.lister.listCommands(target.dbsu);
    const { alive, replaying } = classifyProcessLines(lines);
    let role: Role = "unknown";
    if (alive) {
      role = replaying ? "replica" : "primary";
    }
    return { role, alive, source: this.source, authoritative: false };
  }
}

export class QueryRoleStrategy implements RoleStrategy {
  readonly source = "psql";

  constructor(private readonly executor: SqlScalarExecutor) {}

  canRun(evidence: RoleResult): boolean {
    return evidence.alive;
  }

  async detect(target: DatabaseTarget): Promise<RoleStrategyOutcome> {
    const inRecovery = await this.executor.queryBoolean(
      target,
      RECOVERY_STATUS_QUERY,
    );
    if (inRecovery === null) {
      return { ...unknownRole(false), authoritative: false };
    }
    return {
      role: inRecovery ? "replica" : "primary",
      alive: true,
      source: this.source,
      authoritative: true,
    };
  }
}

export class DataDirRoleStrategy implements RoleStrategy {
  readonly source = "pgdata";

  constructor(private readonly inspector: DataDirectoryInspector) {}

  canRun(evidence: RoleResult): boolean {
    return !evidence.alive || evidence.role === "unknown";
  }

  async detect(target: DatabaseTarget): Promise<RoleStrategyOutcome> {
    const notUsable = { ...unknownRole(false), authoritative: false };

    const status = await this.inspector.inspect(target);
    if (!status.exists || !status.initialized) {
      return notUsable;
    }

    const entries = new Set(await this.inspector.list(target));
    if (entries.size < MIN_DATA_DIR_ENTRIES) {
      return notUsable;
    }

    // postmaster.pid may be stale after a crash
    const alive = entries.has("postmaster.pid");

    if (STANDBY_SIGNAL_FILES.some((name) => entries.has(name))) {
      return { role: "replica", alive, source: this.source, authoritative: false };
    }

    if (entries.has(LEGACY_RECOVERY_FILE)) {
      const content = await this.inspector.readFile(target, LEGACY_RECOVERY_FILE);
      if (content !== null && hasReplicaDirective(content)) {
        return { role: "replica", alive, source: this.source, authoritative: false };
      }
    }

    return { role: "primary", alive, source: this.source, authoritative: false };
  }
}

function hasReplicaDirective(content: string): boolean {
  return content.split("\n").some((raw) => {
    const line = raw.trim();
    if (!line || line.startsWith("#")) {
      return false;
    }
    return LEGACY_REPLICA_DIRECTIVES.some((directive) =>
      line.startsWith(directive),
    );
  });
}

/**
 * Runs the strategies in order. The first non-authoritative answer becomes the
 * tentative role; an authoritative answer replaces it and ends the chain.
 * `alive` is sticky once any stage observes it.
 */
export class RoleDetector {
  constructor(
    private readonly strategies: readonly RoleStrategy[],
    private readonly logger: Logger = silentLogger,
  ) {}

  async detectRole(target: DatabaseTarget): Promise<RoleResult> {
    let evidence: RoleResult = unknownRole(false);

    for (const strategy of this.strategies) {
      if (!strategy.canRun(evidence)) {
        continue;
      }

      let outcome: RoleStrategyOutcome;
      try {
        outcome = await strategy.detect(target);
      } catch (error) {
        this.logger.warn("role strategy failed", {
          source: strategy.source,
          error: errorMessage(error),
        });
        continue;
      }

      this.logger.debug("role strategy result", {
        source: strategy.source,
        role: outcome.role,
        alive: outcome.alive,
      });

      const alive = evidence.alive || outcome.alive;

      if (outcome.authoritative && outcome.role !== "unknown") {
        if (evidence.role !== "unknown" && evidence.role !== outcome.role) {
          this.logger.warn("role disagreement, trusting live query", {
            tentativeRole: evidence.role,
            tentativeSource: evidence.source,
            role: outcome.role,
          });
        }
        return { role: outcome.role, alive, source: outcome.source };
      }

      if (evidence.role === "unknown" && outcome.role !== "unknown") {
        evidence = { role: outcome.role, alive, source: outcome.source };
      } else {
        evidence = { ...evidence, alive };
      }
    }

    return evidence;
  }
}
