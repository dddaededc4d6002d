/**
 * Health check route: reports process uptime and the state of the vector
 * index. Makes no calls to the embedding model or the LLM backend.
 */
import { Router } from "express";

import type { VectorIndexDescription } from "@infrastructure/vector/VectorIndexHandle";

export interface HealthSource {
  describe(): Promise<VectorIndexDescription>;
}

export function createHealthRouter(index: HealthSource): Router {
  const router = Router();

  router.get("/", async (_req, res, next) => {
    try {
      const description = await index.describe();
      res.json({
        status: "ok",
        uptimeSeconds: Math.round(process.uptime()),
        index: description,
      });
    } catch (err: unknown) {
      next(err);
    }
  });

  return router;
}
