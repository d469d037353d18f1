import type { Pool, QueryResult, QueryResultRow } from "pg";
import { errorMessage } from "../domain/coded-error.js";
import type { Logger } from "../observability/logger.js";
import { silentLogger } from "../observability/logger.js";
import type { DatabaseTarget } from "../ports/database-control.js";
import type { SqlScalarExecutor } from "../ports/sql-executor.js";

export type PoolFactory = (user: string) => Pool;

export class PgScalarExecutor implements SqlScalarExecutor {
  private readonly pools = new Map<string, Pool>();

  constructor(
    private readonly createPool: PoolFactory,
    private readonly logger: Logger = silentLogger,
  ) {}

  async queryBoolean(target: DatabaseTarget, sql: string): Promise<boolean | null> {
    let result: QueryResult<QueryResultRow>;
    try {
      result = await this.poolFor(target.dbsu).query<QueryResultRow>(sql);
    } catch (error) {
      this.logger.debug("status query failed", { error: errorMessage(error) });
      return null;
    }

    const [row] = result.rows;
    const [value] = row ? Object.values(row) : [];
    return typeof value === "boolean" ? value : null;
  }

  async close(): Promise<void> {
    const pools = [...this.pools.values()];
    this.pools.clear();
    await Promise.all(pools.map((pool) => pool.end()));
  }

  private poolFor(user: string): Pool {
    let pool = this.pools.get(user);
    if (!pool) {
      pool = this.createPool(user);
      this.pools.set(user, pool);
    }
    return pool;
  }
}
