/**
 * Route registration for the schema Q&A API.
 *
 * - POST /generate: answer a schema question (plain text in, plain text out)
 * - GET  /health:   index status for monitoring
 */
import type { Express } from "express";

import type { QueryPipeline } from "@app/query/QueryPipeline";
import { createGenerateRouter } from "@routes/generate";
import { createHealthRouter } from "@routes/health";
import type { HealthSource } from "@routes/health";

export interface RouteDeps {
  pipeline: Pick<QueryPipeline, "answer">;
  index: HealthSource;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  app.use("/generate", createGenerateRouter(deps.pipeline));
  app.use("/health", createHealthRouter(deps.index));
}
