import { z } from "zod";

/**
 * Request DTO for POST /generate.
 *
 * The body is the question itself as raw text, with no JSON envelope.
 * express.text() leaves `{}` behind when no body was sent.
 */
export const GenerateRequestSchema = z
  .string({
    invalid_type_error: "Request body must be the question as plain text",
  })
  .refine((text) => text.trim().length > 0, {
    message: "Request body must contain a question",
  });

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;
