import type { DatabaseTarget } from "./database-control.js";

export interface DataDirectoryStatus {
  readonly exists: boolean;
  readonly initialized: boolean;
}

export interface DataDirectoryInspector {
  inspect(target: DatabaseTarget): Promise<DataDirectoryStatus>;
  list(target: DatabaseTarget): Promise<readonly string[]>;
  /** Resolves null when the file does not exist. */
  readFile(target: DatabaseTarget, name: string): Promise<string | null>;
}
