import cors from "cors";
import express from "express";
import type { Express } from "express";

import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";
import type { RouteDeps } from "@routes/index";

/**
 * Builds the Express application around already constructed dependencies.
 * CORS is fully permissive: any origin, method and header.
 */
export function createHttpApp(deps: RouteDeps): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(cors());

  registerRoutes(app, deps);

  app.use(errorHandler);

  return app;
}
