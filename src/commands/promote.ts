import { Command } from "commander";
import { z } from "zod";
import { failFromError, ok } from "../domain/result.js";
import {
  emitResult,
  parseFlags,
  runCommand,
  type CliEnvironment,
} from "./runtime.js";

const promoteFlagsSchema = z.object({
  dbsu: z.string().trim().min(1).optional(),
  data: z.string().trim().min(1).optional(),
  output: z.enum(["text", "json"]).default("text"),
});

export function createPromoteCommand(env: CliEnvironment): Command {
  return new Command("promote")
    .description("Promote a recovered or standby instance to primary")
    .option("-U, --dbsu <user>", "database superuser")
    .option("-D, --data <dir>", "data directory")
    .option("-o, --output <format>", "output format: text or json", "text")
    .action(async (raw: unknown) => {
      const flags = parseFlags(env, promoteFlagsSchema, raw);
      if (!flags) {
        return;
      }
      await runCommand(env, flags.output, async ({ services }) => {
        const target = {
          dataDir: flags.data ?? services.defaults.dataDir,
          dbsu: flags.dbsu ?? services.defaults.dbsu,
        };
        try {
          await services.controller.promoteDatabase(target);
        } catch (error) {
          emitResult(env.stdout, failFromError(error), flags.output);
          return;
        }
        emitResult(env.stdout, ok("PostgreSQL promoted", target), flags.output);
      });
    });
}
