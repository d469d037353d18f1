import { join } from "node:path";
import type { DatabaseTarget } from "../ports/database-control.js";
import type { SqlScalarExecutor } from "../ports/sql-executor.js";
import type { PrivilegedExecutor } from "../services/privileged-executor.js";

export class PsqlScalarExecutor implements SqlScalarExecutor {
  private readonly psql: string;

  constructor(
    private readonly executor: PrivilegedExecutor,
    pgBinDir?: string,
  ) {
    this.psql = pgBinDir ? join(pgBinDir, "psql") : "psql";
  }

  async queryBoolean(target: DatabaseTarget, sql: string): Promise<boolean | null> {
    const outcome = await this.executor.runAs(target.dbsu, [
      this.psql,
      "-AXtqw",
      "-d",
      "postgres",
      "-c",
      sql,
    ]);
    if (outcome.exitCode !== 0) {
      return null;
    }
    switch (outcome.stdout.trim()) {
      case "t":
        return true;
      case "f":
        return false;
      default:
        return null;
    }
  }
}
