import { Command } from "commander";
import { z } from "zod";
import {
  emitResult,
  parseFlags,
  runCommand,
  type CliEnvironment,
} from "./runtime.js";

const backupFlagsSchema = z.object({
  type: z.string().optional(),
  force: z.boolean().optional(),
  output: z.enum(["text", "json"]).default("text"),
});

export function createBackupCommand(env: CliEnvironment): Command {
  return new Command("backup")
    .description("Run a pgBackRest backup, only on the primary unless forced")
    .option("-t, --type <type>", "backup type: full, diff or incr")
    .option("-f, --force", "skip the primary role check")
    .option("-o, --output <format>", "output format: text or json", "text")
    .action(async (raw: unknown) => {
      const flags = parseFlags(env, backupFlagsSchema, raw);
      if (!flags) {
        return;
      }
      await runCommand(env, flags.output, async ({ services }) => {
        const result = await services.backupGate.runBackup({
          type: flags.type,
          force: flags.force,
        });
        emitResult(env.stdout, result, flags.output);
      });
    });
}
