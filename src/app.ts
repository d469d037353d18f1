import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { errorMessage } from "./domain/coded-error.js";
import { SystemCode } from "./domain/error-codes.js";
import { fail } from "./domain/result.js";
import { createLogger, type Logger } from "./observability/logger.js";
import type { DatabaseTarget } from "./ports/database-control.js";
import { createHealthRouter } from "./routes/health.js";
import { createPitrRouter } from "./routes/pitr.js";
import { createRoleRouter } from "./routes/role.js";
import type { PitrOrchestrator } from "./services/pitr-orchestrator.js";
import type { RoleDetector } from "./services/role-detector.js";

export interface CreateRecoveryAgentAppOptions {
  readonly roleDetector: RoleDetector;
  readonly orchestrator: Pick<PitrOrchestrator, "plan">;
  readonly defaults: DatabaseTarget;
  readonly logger?: Logger;
}

export function createRecoveryAgentApp(
  options: CreateRecoveryAgentAppOptions,
): Express {
  const logger = options.logger ?? createLogger({ component: "http" });
  const app = express();
  app.use(express.json());

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      const fields = {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      };
      if (res.statusCode >= 500) {
        logger.error("request completed", fields);
      } else if (res.statusCode >= 400) {
        logger.warn("request completed", fields);
      } else {
        logger.info("request completed", fields);
      }
    });
    next();
  });

  app.use(createHealthRouter());
  app.use(
    createRoleRouter({
      detector: options.roleDetector,
      defaults: options.defaults,
    }),
  );
  app.use(createPitrRouter({ orchestrator: options.orchestrator }));

  app.use((_req, res) => {
    res.status(404).json({ error: "not found" });
  });

  app.use(
    (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      logger.error("request failed", {
        method: req.method,
        path: req.path,
        error: errorMessage(error),
      });
      res.status(500).json(fail(SystemCode.internal, errorMessage(error)));
    },
  );

  return app;
}
