import { Command } from "commander";
import { z } from "zod";
import { createRecoveryAgentApp } from "../app.js";
import {
  parseFlags,
  runCommand,
  type CliEnvironment,
} from "./runtime.js";

const serveFlagsSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).optional(),
});

export function createServeCommand(env: CliEnvironment): Command {
  return new Command("serve")
    .description("Serve health, role and plan preview endpoints over HTTP")
    .option("-p, --port <port>", "listen port (default: $PORT or 3000)")
    .action(async (raw: unknown) => {
      const flags = parseFlags(env, serveFlagsSchema, raw);
      if (!flags) {
        return;
      }
      await runCommand(env, "text", async ({ settings, logger, services }) => {
        const app = createRecoveryAgentApp({
          roleDetector: services.roleDetector,
          orchestrator: services.orchestrator,
          defaults: services.defaults,
          logger: logger.child({ component: "http" }),
        });
        const port = flags.port ?? settings.port;

        await new Promise<void>((resolve, reject) => {
          const server = app.listen(port, () => {
            logger.info(`pitrctl listening on :${port}`);
          });
          server.on("error", reject);
          server.on("close", () => resolve());
          for (const signal of ["SIGINT", "SIGTERM"] as const) {
            process.once(signal, () => {
              logger.info("shutting down", { signal });
              server.close();
            });
          }
        });
      });
    });
}
