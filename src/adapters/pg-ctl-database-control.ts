import { join } from "node:path";
import type {
  DatabaseControl,
  DatabaseProcessStatus,
  DatabaseTarget,
  StopMode,
} from "../ports/database-control.js";
import type { DataDirectoryInspector } from "../ports/data-directory.js";
import type { PrivilegedExecutor } from "../services/privileged-executor.js";

export type ProcessProbe = (pid: number) => boolean;

/** Signal 0 probe. EPERM means the process exists under another user. */
export const probeProcess: ProcessProbe = (pid) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return (
      typeof error === "object" &&
      error !== null &&
      "code" in error &&
      error.code === "EPERM"
    );
  }
};

export function parsePostmasterPid(content: string): number {
  const [firstLine = ""] = content.split("\n");
  const pid = Number.parseInt(firstLine.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : 0;
}

export interface PgCtlDatabaseControlOptions {
  readonly executor: PrivilegedExecutor;
  readonly inspector: DataDirectoryInspector;
  readonly pgBinDir?: string;
  readonly probe?: ProcessProbe;
  readonly clock?: () => Date;
}

export class PgCtlDatabaseControl implements DatabaseControl {
  private readonly pgCtl: string;
  private readonly probe: ProcessProbe;
  private readonly clock: () => Date;

  constructor(private readonly options: PgCtlDatabaseControlOptions) {
    this.pgCtl = options.pgBinDir ? join(options.pgBinDir, "pg_ctl") : "pg_ctl";
    this.probe = options.probe ?? probeProcess;
    this.clock = options.clock ?? (() => new Date());
  }

  async checkRunning(target: DatabaseTarget): Promise<DatabaseProcessStatus> {
    const checkedAt = this.clock();
    const content = await this.options.inspector.readFile(target, "postmaster.pid");
    if (content === null) {
      return { running: false, pid: 0, checkedAt };
    }
    const pid = parsePostmasterPid(content);
    if (pid === 0) {
      return { running: false, pid: 0, checkedAt };
    }
    // a stale pid file keeps its pid but reports not running
    return { running: this.probe(pid), pid, checkedAt };
  }

  async stop(
    target: DatabaseTarget,
    options: { readonly mode: StopMode; readonly timeoutSeconds: number },
  ): Promise<void> {
    await this.options.executor.runAsOrThrow(target.dbsu, [
      this.pgCtl,
      "stop",
      "-D",
      target.dataDir,
      "-m",
      options.mode,
      "-w",
      "-t",
      String(options.timeoutSeconds),
    ]);
  }

  async start(
    target: DatabaseTarget,
    options: { readonly timeoutSeconds: number },
  ): Promise<void> {
    await this.options.executor.runAsOrThrow(target.dbsu, [
      this.pgCtl,
      "start",
      "-D",
      target.dataDir,
      "-w",
      "-t",
      String(options.timeoutSeconds),
    ]);
  }

  async promote(target: DatabaseTarget): Promise<void> {
    await this.options.executor.runAsOrThrow(target.dbsu, [
      this.pgCtl,
      "promote",
      "-D",
      target.dataDir,
      "-w",
    ]);
  }

  async kill(target: DatabaseTarget, pid: number): Promise<void> {
    await this.options.executor.runAsOrThrow(target.dbsu, [
      "kill",
      "-9",
      String(pid),
    ]);
  }
}
