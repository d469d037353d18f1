import { ExecFileCommandRunner } from "./adapters/exec-file-command-runner.js";
import { LocalDataDirectoryInspector } from "./adapters/local-data-directory-inspector.js";
import { PgBackRestCli } from "./adapters/pgbackrest-cli.js";
import { PgCtlDatabaseControl } from "./adapters/pg-ctl-database-control.js";
import { PgScalarExecutor } from "./adapters/pg-scalar-executor.js";
import { createPostgresPool } from "./adapters/postgres-pool.js";
import { ProcessInterruptSource } from "./adapters/process-interrupt-source.js";
import { PsProcessLister } from "./adapters/ps-process-lister.js";
import { PsqlScalarExecutor } from "./adapters/psql-scalar-executor.js";
import { StreamOutputSink } from "./adapters/stream-output-sink.js";
import { SystemctlClusterService } from "./adapters/systemctl-cluster-service.js";
import type { Settings } from "./config/settings.js";
import type { Logger } from "./observability/logger.js";
import type { DatabaseTarget } from "./ports/database-control.js";
import type { SqlScalarExecutor } from "./ports/sql-executor.js";
import { BackupGate } from "./services/backup-gate.js";
import { PitrOrchestrator } from "./services/pitr-orchestrator.js";
import { PreflightValidator } from "./services/preflight-validator.js";
import {
  PrivilegedExecutor,
  type ExecutionContext,
} from "./services/privileged-executor.js";
import { RestoreCoordinator } from "./services/restore-coordinator.js";
import {
  DataDirRoleStrategy,
  ProcessRoleStrategy,
  QueryRoleStrategy,
  RoleDetector,
} from "./services/role-detector.js";
import { ServiceStateController } from "./services/service-state-controller.js";

export interface RecoveryServices {
  readonly defaults: DatabaseTarget;
  readonly roleDetector: RoleDetector;
  readonly orchestrator: PitrOrchestrator;
  readonly controller: ServiceStateController;
  readonly backupGate: BackupGate;
  close(): Promise<void>;
}

/** Wires the real adapters from settings and the resolved execution context. */
export function createRecoveryServices(
  settings: Settings,
  context: ExecutionContext,
  logger: Logger,
): RecoveryServices {
  const runner = new ExecFileCommandRunner();
  const executor = new PrivilegedExecutor(
    runner,
    context,
    logger.child({ component: "privileged-executor" }),
  );
  const inspector = new LocalDataDirectoryInspector(executor);
  const database = new PgCtlDatabaseControl({
    executor,
    inspector,
    pgBinDir: settings.pgBinDir,
  });
  const cluster = new SystemctlClusterService(executor, settings.clusterService);
  const backupTool = new PgBackRestCli(executor, logger.child({ component: "pgbackrest" }));

  let pgExecutor: PgScalarExecutor | null = null;
  let sqlExecutor: SqlScalarExecutor;
  if (settings.sqlDriver === "pg") {
    pgExecutor = new PgScalarExecutor(
      (user) =>
        createPostgresPool({ host: settings.pgHost, port: settings.pgPort, user }),
      logger.child({ component: "pg" }),
    );
    sqlExecutor = pgExecutor;
  } else {
    sqlExecutor = new PsqlScalarExecutor(executor, settings.pgBinDir);
  }

  const defaults: DatabaseTarget = { dataDir: settings.dataDir, dbsu: settings.dbsu };
  const roleDetector = new RoleDetector(
    [
      new ProcessRoleStrategy(new PsProcessLister(runner)),
      new QueryRoleStrategy(sqlExecutor),
      new DataDirRoleStrategy(inspector),
    ],
    logger.child({ component: "role-detector" }),
  );

  const controller = new ServiceStateController({
    cluster,
    database,
    logger: logger.child({ component: "service-state" }),
  });

  const orchestrator = new PitrOrchestrator({
    preflight: new PreflightValidator({
      inspector,
      database,
      cluster,
      defaults,
      logger: logger.child({ component: "preflight" }),
    }),
    controller,
    restorer: new RestoreCoordinator(
      backupTool,
      {
        configPath: settings.pgbackrestConfig,
        stanza: settings.stanza,
        repo: settings.repo,
      },
      logger.child({ component: "restore" }),
    ),
    interrupts: new ProcessInterruptSource(),
    output: new StreamOutputSink(process.stderr),
    clusterService: settings.clusterService,
    logger: logger.child({ component: "pitr" }),
  });

  const backupGate = new BackupGate(
    roleDetector,
    backupTool,
    {
      ...defaults,
      configPath: settings.pgbackrestConfig,
      stanza: settings.stanza,
      repo: settings.repo,
    },
    logger.child({ component: "backup" }),
  );

  return {
    defaults,
    roleDetector,
    orchestrator,
    controller,
    backupGate,
    async close() {
      await pgExecutor?.close();
    },
  };
}
