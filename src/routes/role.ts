import { Router } from "express";
import { z } from "zod";
import type { DatabaseTarget } from "../ports/database-control.js";
import type { RoleDetector } from "../services/role-detector.js";

const roleQuerySchema = z.object({
  dataDir: z.string().trim().min(1).optional(),
  dbsu: z.string().trim().min(1).optional(),
});

export function createRoleRouter(input: {
  detector: RoleDetector;
  defaults: DatabaseTarget;
}): Router {
  const router = Router();

  router.get("/role", async (req, res) => {
    const parsed = roleQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    const result = await input.detector.detectRole({
      dataDir: parsed.data.dataDir ?? input.defaults.dataDir,
      dbsu: parsed.data.dbsu ?? input.defaults.dbsu,
    });
    return res.json(result);
  });

  return router;
}
