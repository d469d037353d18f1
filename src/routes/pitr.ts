import { Router } from "express";
import { pitrOptionsSchema } from "../domain/pitr-options.js";
import type { PitrOrchestrator } from "../services/pitr-orchestrator.js";
import { httpStatusForCode } from "./http-status.js";

export function createPitrRouter(input: {
  orchestrator: Pick<PitrOrchestrator, "plan">;
}): Router {
  const router = Router();

  // Preview only; recoveries are started from the CLI.
  router.post("/pitr/plan", async (req, res) => {
    const parsed = pitrOptionsSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    const result = await input.orchestrator.plan(parsed.data);
    if (!result.success) {
      return res.status(httpStatusForCode(result.code)).json(result);
    }
    return res.json(result);
  });

  return router;
}
