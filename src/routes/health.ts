import { Router } from "express";
import { CLI_NAME } from "../services/pitr-plan.js";

export function createHealthRouter(): Router {
  const router = Router();

  // Liveness of the agent only; database state is under /role.
  router.get("/health", (_req, res) => {
    res.json({ status: "ok", service: CLI_NAME, time: new Date().toISOString() });
  });

  return router;
}
