export interface BackupToolConfig {
  readonly dbsu: string;
  readonly configPath?: string;
  readonly stanza?: string;
  readonly repo?: string;
}

export interface BackupToolOutcome {
  readonly exitCode: number;
  readonly output: string;
}

export interface BackupTool {
  restore(
    config: BackupToolConfig,
    args: readonly string[],
  ): Promise<BackupToolOutcome>;
  backup(
    config: BackupToolConfig,
    args: readonly string[],
  ): Promise<BackupToolOutcome>;
}
