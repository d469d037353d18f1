import type { DatabaseTarget } from "./database-control.js";

export interface SqlScalarExecutor {
  /** Resolves null when the server cannot be reached or the value is not a boolean. */
  queryBoolean(target: DatabaseTarget, sql: string): Promise<boolean | null>;
}
