export * from "./domain/coded-error.js";
export * from "./domain/error-codes.js";
export * from "./domain/execution-plan.js";
export * from "./domain/pitr-options.js";
export * from "./domain/recovery-target.js";
export * from "./domain/result.js";
export * from "./domain/role.js";
export * from "./domain/system-state.js";
export type * from "./ports/backup-tool.js";
export type * from "./ports/cluster-service.js";
export type * from "./ports/command-runner.js";
export type * from "./ports/data-directory.js";
export type * from "./ports/database-control.js";
export type * from "./ports/interrupt-source.js";
export type * from "./ports/output-sink.js";
export type * from "./ports/process-lister.js";
export type * from "./ports/sql-executor.js";
export { createRecoveryAgentApp } from "./app.js";
export { loadSettings, SettingsError, type Settings } from "./config/settings.js";
export { createRecoveryServices, type RecoveryServices } from "./container.js";
export { createLogger, silentLogger, type Logger } from "./observability/logger.js";
export { BackupGate, assertPrimary } from "./services/backup-gate.js";
export { PitrOrchestrator, type PitrResultData } from "./services/pitr-orchestrator.js";
export { buildPlan, planPhases } from "./services/pitr-plan.js";
export { PreflightValidator, resolveRecoveryTarget } from "./services/preflight-validator.js";
export {
  PrivilegedExecutor,
  resolveExecutionContext,
  resolveInvocation,
} from "./services/privileged-executor.js";
export { RestoreCoordinator, classifyFailure } from "./services/restore-coordinator.js";
export { RoleDetector } from "./services/role-detector.js";
export { ServiceStateController } from "./services/service-state-controller.js";
export { normalizeTime } from "./services/time-normalizer.js";
