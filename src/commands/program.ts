import { Command } from "commander";
import { createBackupCommand } from "./backup.js";
import { createPitrCommand } from "./pitr.js";
import { createPromoteCommand } from "./promote.js";
import { createRoleCommand } from "./role.js";
import type { CliEnvironment } from "./runtime.js";
import { createServeCommand } from "./serve.js";

export function createProgram(env: CliEnvironment): Command {
  return new Command("pitrctl")
    .description("PostgreSQL point-in-time recovery orchestrator")
    .version("0.1.0")
    .addCommand(createPitrCommand(env))
    .addCommand(createRoleCommand(env))
    .addCommand(createBackupCommand(env))
    .addCommand(createPromoteCommand(env))
    .addCommand(createServeCommand(env));
}
