import { Pool } from "pg";

export interface PostgresPoolOptions {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly database?: string;
}

/** Small pool for local status queries over the server socket. */
export function createPostgresPool(options: PostgresPoolOptions): Pool {
  return new Pool({
    host: options.host,
    port: options.port,
    user: options.user,
    database: options.database ?? "postgres",
    max: 1,
    idleTimeoutMillis: 1_000,
    connectionTimeoutMillis: 5_000,
  });
}
