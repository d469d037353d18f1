import { readFile } from "node:fs/promises";
import { combinedOutput } from "../domain/coded-error.js";
import type { Logger } from "../observability/logger.js";
import { silentLogger } from "../observability/logger.js";
import type {
  BackupTool,
  BackupToolConfig,
  BackupToolOutcome,
} from "../ports/backup-tool.js";
import type { PrivilegedExecutor } from "../services/privileged-executor.js";

export const DEFAULT_PGBACKREST_CONFIG = "/etc/pgbackrest/pgbackrest.conf";

const SECTION = /^\[([^\]]+)\]$/;

/** Section names of a pgBackRest INI file, minus the global ones. */
export function parseStanzaNames(content: string): string[] {
  const stanzas: string[] = [];
  for (const raw of content.split("\n")) {
    const match = SECTION.exec(raw.trim());
    const section = match?.[1];
    if (section && !section.startsWith("global")) {
      stanzas.push(section);
    }
  }
  return stanzas;
}

export function buildPgBackRestArgv(
  config: Required<Pick<BackupToolConfig, "stanza">> & BackupToolConfig,
  command: string,
  extraArgs: readonly string[],
  binary = "pgbackrest",
): string[] {
  const argv = [binary];
  if (config.configPath && config.configPath !== DEFAULT_PGBACKREST_CONFIG) {
    argv.push(`--config=${config.configPath}`);
  }
  argv.push(`--stanza=${config.stanza}`);
  if (config.repo) {
    argv.push(`--repo=${config.repo}`);
  }
  argv.push(...extraArgs, command);
  return argv;
}

export class StanzaDetectionError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(`cannot detect stanza: ${message} (use --stanza to specify)`, options);
    this.name = "StanzaDetectionError";
  }
}

export class PgBackRestCli implements BackupTool {
  constructor(
    private readonly executor: PrivilegedExecutor,
    private readonly logger: Logger = silentLogger,
    private readonly binary = "pgbackrest",
  ) {}

  async restore(
    config: BackupToolConfig,
    args: readonly string[],
  ): Promise<BackupToolOutcome> {
    return this.runCommand(config, "restore", args);
  }

  async backup(
    config: BackupToolConfig,
    args: readonly string[],
  ): Promise<BackupToolOutcome> {
    return this.runCommand(config, "backup", args);
  }

  async detectStanza(config: BackupToolConfig): Promise<string> {
    const path = config.configPath ?? DEFAULT_PGBACKREST_CONFIG;
    const content = await this.readConfig(path, config.dbsu);
    const [first, ...rest] = parseStanzaNames(content);
    if (first === undefined) {
      throw new StanzaDetectionError("no stanza found in config file");
    }
    if (rest.length > 0) {
      this.logger.warn("multiple stanzas found, using the first", {
        stanzas: [first, ...rest],
        stanza: first,
      });
    }
    return first;
  }

  private async runCommand(
    config: BackupToolConfig,
    command: string,
    args: readonly string[],
  ): Promise<BackupToolOutcome> {
    const stanza = config.stanza ?? (await this.detectStanza(config));
    const argv = buildPgBackRestArgv({ ...config, stanza }, command, args, this.binary);
    this.logger.info("running pgbackrest", { command, argv });
    const outcome = await this.executor.runAs(config.dbsu, argv);
    return { exitCode: outcome.exitCode, output: combinedOutput(outcome) };
  }

  private async readConfig(path: string, dbsu: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (error) {
      const denied =
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        (error.code === "EACCES" || error.code === "EPERM");
      if (!denied) {
        throw new StanzaDetectionError(`cannot read config file ${path}`, {
          cause: error,
        });
      }
    }

    const outcome = await this.executor.runAs(dbsu, ["cat", path]);
    if (outcome.exitCode !== 0) {
      throw new StanzaDetectionError(
        `cannot read config file ${path}: ${combinedOutput(outcome)}`,
      );
    }
    return outcome.stdout;
  }
}
