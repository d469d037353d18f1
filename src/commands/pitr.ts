import { Command } from "commander";
import { z } from "zod";
import { PitrCode } from "../domain/error-codes.js";
import { renderPlan } from "../domain/execution-plan.js";
import {
  isPlanMode,
  pitrOptionsSchema,
  type PitrOptions,
} from "../domain/pitr-options.js";
import { fail } from "../domain/result.js";
import {
  emitResult,
  runCommand,
  writeLine,
  type CliEnvironment,
  type OutputFormat,
} from "./runtime.js";

const outputFormatSchema = z.enum(["text", "json"]);

const pitrFlagsSchema = z.object({
  default: z.boolean().optional(),
  immediate: z.boolean().optional(),
  time: z.string().optional(),
  name: z.string().optional(),
  lsn: z.string().optional(),
  xid: z.string().optional(),
  set: z.string().optional(),
  skipPatroni: z.boolean().optional(),
  // commander stores --no-restart as restart=false
  restart: z.boolean().optional(),
  exclusive: z.boolean().optional(),
  promote: z.boolean().optional(),
  yes: z.boolean().optional(),
  plan: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  stanza: z.string().optional(),
  config: z.string().optional(),
  repo: z.string().optional(),
  dbsu: z.string().optional(),
  data: z.string().optional(),
  output: outputFormatSchema.default("text"),
});

export type PitrFlagsParse =
  | { readonly ok: true; readonly options: PitrOptions; readonly format: OutputFormat }
  | { readonly ok: false; readonly message: string; readonly format: OutputFormat };

/** Maps commander's option bag to PitrOptions. */
export function parsePitrFlags(raw: unknown): PitrFlagsParse {
  const flags = pitrFlagsSchema.safeParse(raw);
  if (!flags.success) {
    return {
      ok: false,
      message: flags.error.issues.map((issue) => issue.message).join("; "),
      format: "text",
    };
  }

  const { restart, config, data, output, ...rest } = flags.data;
  const options = pitrOptionsSchema.safeParse({
    ...rest,
    noRestart: restart === false,
    configPath: config,
    dataDir: data,
  });
  if (!options.success) {
    return {
      ok: false,
      message: options.error.issues.map((issue) => issue.message).join("; "),
      format: output,
    };
  }
  return { ok: true, options: options.data, format: output };
}

export function createPitrCommand(env: CliEnvironment): Command {
  return new Command("pitr")
    .description(
      "Point-in-time recovery: stop Patroni and PostgreSQL, restore with pgBackRest, restart",
    )
    .option("-d, --default", "recover to end of WAL stream (latest)")
    .option("-I, --immediate", "recover to backup consistency point")
    .option("-t, --time <timestamp>", "recover to timestamp (date, time or both)")
    .option("-n, --name <name>", "recover to named restore point")
    .option("-l, --lsn <lsn>", "recover to LSN")
    .option("-x, --xid <xid>", "recover to transaction id")
    .option("-b, --set <label>", "restore from a specific backup set")
    .option("-S, --skip-patroni", "do not stop the Patroni service")
    .option("-N, --no-restart", "leave PostgreSQL stopped after restore")
    .option("-X, --exclusive", "stop just before the recovery target")
    .option("-P, --promote", "promote after recovery")
    .option("-y, --yes", "skip the confirmation countdown")
    .option("--plan", "show the execution plan without executing")
    .option("--dry-run", "alias of --plan")
    .option("-s, --stanza <stanza>", "pgBackRest stanza")
    .option("-c, --config <path>", "pgBackRest config file")
    .option("-r, --repo <repo>", "pgBackRest repository number")
    .option("-U, --dbsu <user>", "database superuser")
    .option("-D, --data <dir>", "target data directory")
    .option("-o, --output <format>", "output format: text or json", "text")
    .action(async (raw: unknown) => {
      const parsed = parsePitrFlags(raw);
      if (!parsed.ok) {
        emitResult(env.stdout, fail(PitrCode.invalidArgs, parsed.message), parsed.format);
        return;
      }
      const { options, format } = parsed;

      await runCommand(env, format, async ({ services }) => {
        if (isPlanMode(options)) {
          const result = await services.orchestrator.plan(options);
          if (result.success && result.data && format === "text") {
            writeLine(env.stdout, renderPlan(result.data, "text"));
            process.exitCode = 0;
            return;
          }
          emitResult(env.stdout, result, format);
          return;
        }

        const result = await services.orchestrator.execute(options);
        emitResult(env.stdout, result, format);
      });
    });
}
