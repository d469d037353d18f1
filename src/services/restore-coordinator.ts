import { errorMessage, PitrError } from "../domain/coded-error.js";
import { PitrCode, type PitrCodeValue } from "../domain/error-codes.js";
import type { PitrOptions } from "../domain/pitr-options.js";
import type { RecoveryTarget } from "../domain/recovery-target.js";
import type { SystemState } from "../domain/system-state.js";
import type { Logger } from "../observability/logger.js";
import { silentLogger } from "../observability/logger.js";
import type { BackupTool, BackupToolConfig } from "../ports/backup-tool.js";

export interface RestoreDefaults {
  readonly configPath?: string;
  readonly stanza?: string;
  readonly repo?: string;
}

export function buildRestoreArgs(
  dataDir: string,
  target: RecoveryTarget,
  options: Pick<PitrOptions, "set" | "exclusive" | "promote">,
): string[] {
  const args: string[] = [];
  if (dataDir) {
    args.push(`--pg1-path=${dataDir}`);
  }
  if (options.set) {
    args.push(`--set=${options.set}`);
  }

  switch (target.kind) {
    case "default":
      // pgBackRest defaults to end of WAL stream
      break;
    case "immediate":
      args.push("--type=immediate");
      break;
    default:
      args.push(`--type=${target.kind}`, `--target=${target.value}`);
  }

  if (options.exclusive) {
    args.push("--target-exclusive");
  }
  if (options.promote) {
    args.push("--target-action=promote");
  }
  return args;
}

export function isNoBackupOutput(output: string): boolean {
  const text = output.toLowerCase();
  const missing = text.includes("not found") || text.includes("does not exist");

  return (
    text.includes("no prior backup exists") ||
    text.includes("unable to find backup") ||
    text.includes("no backup set") ||
    (text.includes("backup set") && missing) ||
    (text.includes("backup") && missing)
  );
}

/**
 * Heuristic: pgBackRest reports a missing backup only in free text.
 */
export function classifyFailure(output: string): PitrCodeValue {
  return isNoBackupOutput(output) ? PitrCode.noBackup : PitrCode.restoreFailed;
}

export class RestoreCoordinator {
  constructor(
    private readonly tool: BackupTool,
    private readonly defaults: RestoreDefaults = {},
    private readonly logger: Logger = silentLogger,
  ) {}

  async restore(
    state: SystemState,
    target: RecoveryTarget,
    options: PitrOptions,
  ): Promise<void> {
    const config: BackupToolConfig = {
      dbsu: state.dbsu,
      configPath: options.configPath ?? this.defaults.configPath,
      stanza: options.stanza ?? this.defaults.stanza,
      repo: options.repo ?? this.defaults.repo,
    };
    const args = buildRestoreArgs(state.dataDir, target, options);
    this.logger.info("executing pgbackrest restore", { args });

    let output: string;
    try {
      const outcome = await this.tool.restore(config, args);
      if (outcome.exitCode === 0) {
        this.logger.info("pgbackrest restore completed");
        return;
      }
      output = outcome.output || `pgbackrest exited with code ${outcome.exitCode}`;
    } catch (error) {
      output = errorMessage(error);
    }

    const code = classifyFailure(output);
    this.logger.error("pgbackrest restore failed", { code, output });
    throw new PitrError(
      code,
      code === PitrCode.noBackup
        ? "backup not found"
        : "pgbackrest restore failed",
      { detail: output },
    );
  }
}
