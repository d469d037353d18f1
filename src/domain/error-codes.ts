// Status codes follow the MMCCNN layout:
// MM module, CC category, NN specific error within the module/category.
// Module numbers start at 10 so no code has a leading zero.

export const Module = {
  pg: 130000,
  pgbackrest: 140000,
  patroni: 150000,
  pitr: 160000,
  system: 990000,
} as const;

export const Category = {
  success: 0,
  param: 100,
  permission: 200,
  dependency: 300,
  network: 400,
  resource: 500,
  state: 600,
  config: 700,
  operation: 800,
  internal: 900,
} as const;

export const PitrCode = {
  invalidArgs: Module.pitr + Category.param + 1,
  noBackup: Module.pitr + Category.dependency + 1,
  precheckFailed: Module.pitr + Category.state + 1,
  databaseRunning: Module.pitr + Category.state + 2,
  stopFailed: Module.pitr + Category.operation + 1,
  restoreFailed: Module.pitr + Category.operation + 2,
  startFailed: Module.pitr + Category.operation + 3,
  postFailed: Module.pitr + Category.operation + 4,
  startTimeout: Module.pitr + Category.operation + 5,
} as const;

export const BackupCode = {
  invalidBackupType: Module.pgbackrest + Category.param + 1,
  notPrimary: Module.pgbackrest + Category.state + 1,
  pgNotRunning: Module.pgbackrest + Category.state + 2,
  roleUnknown: Module.pgbackrest + Category.state + 5,
  backupFailed: Module.pgbackrest + Category.operation + 2,
} as const;

export const PgCode = {
  promoteFailed: Module.pg + Category.operation + 7,
} as const;

export const SystemCode = {
  invalidArgs: Module.system + Category.param + 1,
  commandFailed: Module.system + Category.operation + 1,
  internal: Module.system + Category.internal + 1,
} as const;

export type PitrCodeValue = (typeof PitrCode)[keyof typeof PitrCode];

const EXIT_CODE_BY_CATEGORY: Readonly<Record<number, number>> = {
  0: 0,
  1: 2,
  2: 3,
  3: 4,
  4: 5,
  5: 6,
  6: 9,
  7: 8,
  8: 1,
  9: 1,
};

export function categoryOf(code: number): number {
  return Math.floor(code / 100) % 100;
}

/**
 * Maps a status code to a shell exit code using only its category, so scripts
 * keyed on exit codes keep working when messages change.
 */
export function exitCodeOf(code: number): number {
  if (code === 0) {
    return 0;
  }
  if (code < 0 || !Number.isInteger(code)) {
    return 1;
  }
  return EXIT_CODE_BY_CATEGORY[categoryOf(code)] ?? 1;
}
