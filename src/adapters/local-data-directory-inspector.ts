import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { CommandFailedError } from "../domain/coded-error.js";
import type { DatabaseTarget } from "../ports/database-control.js";
import type {
  DataDirectoryInspector,
  DataDirectoryStatus,
} from "../ports/data-directory.js";
import {
  resolveInvocation,
  type PrivilegedExecutor,
} from "../services/privileged-executor.js";

function errnoOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function isPermissionError(error: unknown): boolean {
  const code = errnoOf(error);
  return code === "EACCES" || code === "EPERM";
}

function isMissing(error: unknown): boolean {
  const code = errnoOf(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

/**
 * Reads the data directory directly and falls back to commands run as the
 * DBSU when the current user is denied access (the directory is usually 0700).
 */
export class LocalDataDirectoryInspector implements DataDirectoryInspector {
  constructor(private readonly executor: PrivilegedExecutor) {}

  async inspect(target: DatabaseTarget): Promise<DataDirectoryStatus> {
    const exists = await this.testPath(target, "-d", target.dataDir);
    if (!exists) {
      return { exists: false, initialized: false };
    }
    const initialized = await this.testPath(
      target,
      "-f",
      join(target.dataDir, "PG_VERSION"),
    );
    return { exists: true, initialized };
  }

  async list(target: DatabaseTarget): Promise<readonly string[]> {
    try {
      return await readdir(target.dataDir);
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      if (!isPermissionError(error)) {
        throw error;
      }
    }

    const outcome = await this.executor.runAsOrThrow(target.dbsu, [
      "ls",
      "-A",
      target.dataDir,
    ]);
    return outcome.stdout
      .split("\n")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }

  async readFile(target: DatabaseTarget, name: string): Promise<string | null> {
    const path = join(target.dataDir, name);
    try {
      return await readFile(path, "utf8");
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      if (!isPermissionError(error)) {
        throw error;
      }
    }

    if (!(await this.testPath(target, "-f", path))) {
      return null;
    }
    const outcome = await this.executor.runAsOrThrow(target.dbsu, ["cat", path]);
    return outcome.stdout;
  }

  private async testPath(
    target: DatabaseTarget,
    flag: "-d" | "-f",
    path: string,
  ): Promise<boolean> {
    try {
      const info = await stat(path);
      return flag === "-d" ? info.isDirectory() : info.isFile();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      if (!isPermissionError(error)) {
        throw error;
      }
    }

    const argv = ["test", flag, path];
    const outcome = await this.executor.runAs(target.dbsu, argv);
    if (outcome.exitCode === 0) {
      return true;
    }
    // test(1) answers "no" with a bare exit 1; anything else means the
    // command never got to look (sudo refused, su failed, bad usage)
    if (outcome.exitCode === 1 && outcome.stderr.trim() === "") {
      return false;
    }
    throw new CommandFailedError(
      resolveInvocation(this.executor.context, target.dbsu, argv),
      outcome,
    );
  }
}
