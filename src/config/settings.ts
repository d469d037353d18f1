import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((value) => {
    if (!value) {
      return false;
    }
    return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
  });

const blankAsUndefined = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const settingsSchema = z.object({
  PITR_DBSU: z.string().trim().min(1).default("postgres"),
  PGDATA: z.string().trim().min(1).default("/pg/data"),
  PG_BIN_DIR: blankAsUndefined,
  PGBACKREST_CONFIG: z
    .string()
    .trim()
    .min(1)
    .default("/etc/pgbackrest/pgbackrest.conf"),
  PGBACKREST_STANZA: blankAsUndefined,
  PGBACKREST_REPO: z
    .string()
    .trim()
    .regex(/^\d*$/, "must be a repository number")
    .optional()
    .transform((value) => (value ? value : undefined)),
  PITR_CLUSTER_SERVICE: z.string().trim().min(1).default("patroni"),
  PITR_NON_INTERACTIVE: flag,
  PITR_SQL_DRIVER: z.enum(["psql", "pg"]).default("psql"),
  PGHOST: z.string().trim().min(1).default("/var/run/postgresql"),
  PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface Settings {
  readonly dbsu: string;
  readonly dataDir: string;
  readonly pgBinDir?: string;
  readonly pgbackrestConfig: string;
  readonly stanza?: string;
  readonly repo?: string;
  readonly clusterService: string;
  readonly nonInteractive: boolean;
  readonly sqlDriver: "psql" | "pg";
  readonly pgHost: string;
  readonly pgPort: number;
  readonly port: number;
  readonly logLevel: "debug" | "info" | "warn" | "error";
}

export class SettingsError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`invalid settings: ${issues.join("; ")}`);
    this.name = "SettingsError";
  }
}

export function loadSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Settings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const value = parsed.data;
  return {
    dbsu: value.PITR_DBSU,
    dataDir: value.PGDATA,
    pgBinDir: value.PG_BIN_DIR,
    pgbackrestConfig: value.PGBACKREST_CONFIG,
    stanza: value.PGBACKREST_STANZA,
    repo: value.PGBACKREST_REPO,
    clusterService: value.PITR_CLUSTER_SERVICE,
    nonInteractive: value.PITR_NON_INTERACTIVE,
    sqlDriver: value.PITR_SQL_DRIVER,
    pgHost: value.PGHOST,
    pgPort: value.PGPORT,
    port: value.PORT,
    logLevel: value.LOG_LEVEL,
  };
}
