/**
 * HTTP controller for schema questions.
 *
 * Validates the raw-text body, runs the query pipeline and answers with the
 * generated text. Failures are forwarded to the global error handler.
 */
import type { NextFunction, Request, RequestHandler, Response } from "express";

import type { QueryPipeline } from "@app/query/QueryPipeline";
import { GenerateRequestSchema } from "@interfaces/http/generate/schema";
import { ValidationError } from "@typesLocal/AppError";

export function createGenerateController(
  pipeline: Pick<QueryPipeline, "answer">
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const parsed = GenerateRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      next(
        new ValidationError(
          parsed.error.issues[0]?.message ?? "Invalid request",
          { issues: parsed.error.issues }
        )
      );
      return;
    }

    try {
      const answer = await pipeline.answer(parsed.data);
      res.status(200).type("text/plain").send(answer);
    } catch (err: unknown) {
      next(err);
    }
  };
}
