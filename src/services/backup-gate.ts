import { BackupError, errorMessage } from "../domain/coded-error.js";
import { BackupCode } from "../domain/error-codes.js";
import { failFromError, ok, type CommandResult } from "../domain/result.js";
import type { RoleResult } from "../domain/role.js";
import type { Logger } from "../observability/logger.js";
import { silentLogger } from "../observability/logger.js";
import type {
  BackupTool,
  BackupToolConfig,
  BackupToolOutcome,
} from "../ports/backup-tool.js";
import type { DatabaseTarget } from "../ports/database-control.js";
import type { RoleDetector } from "./role-detector.js";

export const BACKUP_TYPES = ["full", "diff", "incr"] as const;
export type BackupType = (typeof BACKUP_TYPES)[number];

export function isBackupType(value: string): value is BackupType {
  return BACKUP_TYPES.some((type) => type === value);
}

export interface BackupRequest {
  /** Omitted lets pgBackRest choose: full when none exists, else incremental. */
  readonly type?: string;
  /** Skips the primary role check. */
  readonly force?: boolean;
}

export interface BackupResultData {
  readonly type: string;
  readonly role?: RoleResult;
}

/** Throws BackupError unless the role is primary. */
export function assertPrimary(role: RoleResult): void {
  switch (role.role) {
    case "primary":
      return;
    case "replica":
      throw new BackupError(
        BackupCode.notPrimary,
        `backup should run on primary instance, current is replica (source: ${role.source})`,
      );
    case "unknown":
      if (!role.alive) {
        throw new BackupError(
          BackupCode.pgNotRunning,
          "PostgreSQL is not running, cannot perform backup",
        );
      }
      throw new BackupError(
        BackupCode.roleUnknown,
        "cannot confirm primary role, use --force to override",
        { detail: `role source: ${role.source}` },
      );
  }
}

export class BackupGate {
  constructor(
    private readonly detector: RoleDetector,
    private readonly tool: BackupTool,
    private readonly config: BackupToolConfig & DatabaseTarget,
    private readonly logger: Logger = silentLogger,
  ) {}

  async runBackup(request: BackupRequest): Promise<CommandResult<BackupResultData>> {
    try {
      const type = request.type?.trim() ?? "";
      if (type && !isBackupType(type)) {
        throw new BackupError(
          BackupCode.invalidBackupType,
          `invalid backup type: ${type} (use: ${BACKUP_TYPES.join(", ")})`,
        );
      }

      let role: RoleResult | undefined;
      if (!request.force) {
        role = await this.detector.detectRole(this.config);
        assertPrimary(role);
        this.logger.info("confirmed running on primary instance", {
          source: role.source,
        });
      }

      const args = type ? [`--type=${type}`] : [];
      this.logger.info("executing pgbackrest backup", { args });
      let outcome: BackupToolOutcome;
      try {
        outcome = await this.tool.backup(this.config, args);
      } catch (error) {
        throw new BackupError(
          BackupCode.backupFailed,
          `pgbackrest backup failed: ${errorMessage(error)}`,
          { cause: error },
        );
      }
      if (outcome.exitCode !== 0) {
        throw new BackupError(
          BackupCode.backupFailed,
          `pgbackrest backup exited with code ${outcome.exitCode}`,
          { detail: outcome.output },
        );
      }

      return ok("backup completed", { type: type || "auto", role });
    } catch (error) {
      return failFromError(error, BackupCode.backupFailed);
    }
  }
}
