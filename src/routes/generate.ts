import express, { Router } from "express";

import type { QueryPipeline } from "@app/query/QueryPipeline";
import { createGenerateController } from "@interfaces/http/GenerateController";

/** Request bodies are read as text whatever their declared content type. */
const MAX_QUESTION_BYTES = "64kb";

export function createGenerateRouter(
  pipeline: Pick<QueryPipeline, "answer">
): Router {
  const router = Router();

  router.post(
    "/",
    express.text({ type: () => true, limit: MAX_QUESTION_BYTES }),
    createGenerateController(pipeline)
  );

  return router;
}
