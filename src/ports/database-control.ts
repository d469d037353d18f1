export type StopMode = "smart" | "fast" | "immediate";

export interface DatabaseTarget {
  readonly dataDir: string;
  readonly dbsu: string;
}

export interface DatabaseProcessStatus {
  readonly running: boolean;
  readonly pid: number;
  readonly checkedAt: Date;
}

export interface DatabaseControl {
  checkRunning(target: DatabaseTarget): Promise<DatabaseProcessStatus>;
  stop(
    target: DatabaseTarget,
    options: { readonly mode: StopMode; readonly timeoutSeconds: number },
  ): Promise<void>;
  start(
    target: DatabaseTarget,
    options: { readonly timeoutSeconds: number },
  ): Promise<void>;
  promote(target: DatabaseTarget): Promise<void>;
  kill(target: DatabaseTarget, pid: number): Promise<void>;
}
