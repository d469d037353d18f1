import { Command } from "commander";
import { z } from "zod";
import { ok } from "../domain/result.js";
import {
  parseFlags,
  runCommand,
  writeLine,
  type CliEnvironment,
} from "./runtime.js";

const roleFlagsSchema = z.object({
  verbose: z.boolean().optional(),
  dbsu: z.string().trim().min(1).optional(),
  data: z.string().trim().min(1).optional(),
  output: z.enum(["text", "json"]).default("text"),
});

export function createRoleCommand(env: CliEnvironment): Command {
  return new Command("role")
    .description("Detect whether this instance is a primary or a replica")
    .option("-v, --verbose", "also print the detection source and liveness")
    .option("-U, --dbsu <user>", "database superuser")
    .option("-D, --data <dir>", "data directory")
    .option("-o, --output <format>", "output format: text or json", "text")
    .action(async (raw: unknown) => {
      const flags = parseFlags(env, roleFlagsSchema, raw);
      if (!flags) {
        return;
      }
      await runCommand(env, flags.output, async ({ services }) => {
        const result = await services.roleDetector.detectRole({
          dataDir: flags.data ?? services.defaults.dataDir,
          dbsu: flags.dbsu ?? services.defaults.dbsu,
        });

        if (flags.output === "json") {
          writeLine(env.stdout, JSON.stringify(ok("role detected", result), null, 2));
        } else if (flags.verbose) {
          writeLine(
            env.stdout,
            `${result.role} (source: ${result.source}, alive: ${result.alive})`,
          );
        } else {
          writeLine(env.stdout, result.role);
        }
        process.exitCode = 0;
      });
    });
}
