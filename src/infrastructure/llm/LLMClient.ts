/**
 * Chat-completion client for the LLM backend.
 *
 * Sends one JSON POST per attempt to the configured endpoint with an
 * `api-key` header and extracts `choices[0].message.content` from the reply.
 * Every failure (network, non-2xx status, unparsable or unexpected body) is
 * reported as an LLMError; retryable ones go through bounded backoff first.
 */
import { z } from "zod";

import type {
  GenerationOptions,
  LLMPort,
  PromptMessage,
} from "@domain/rag/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { describeError, LLMError } from "@typesLocal/AppError";
import { DEFAULT_RETRY_POLICY, withRetry } from "@utils/retry";
import type { RetryPolicy } from "@utils/retry";

export const DEFAULT_MAX_TOKENS = 200;
export const DEFAULT_TEMPERATURE = 1.0;

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

/** Longest slice of an error body kept in error metadata. */
const ERROR_BODY_PREVIEW = 500;

export interface LLMClientOptions {
  apiUrl: string;
  apiKey: string;
  /** Per-attempt deadline; unset means wait for the backend indefinitely. */
  timeoutMs?: number;
  retry?: RetryPolicy;
}

export interface ChatCompletionRequestBody {
  messages: Array<{ role: string; content: string }>;
  max_tokens: number;
  temperature: number;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
});

export function buildRequestBody(
  messages: readonly PromptMessage[],
  options: GenerationOptions = {}
): ChatCompletionRequestBody {
  return {
    messages: messages.map(({ role, content }) => ({ role, content })),
    max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    temperature: options.temperature ?? DEFAULT_TEMPERATURE,
  };
}

/** Pulls `choices[0].message.content` out of a raw response body. */
export function extractContent(rawBody: string): string {
  let json: unknown;
  try {
    json = JSON.parse(rawBody);
  } catch (error: unknown) {
    throw new LLMError("LLM response is not valid JSON", {
      cause: error,
      metadata: { body: rawBody.slice(0, ERROR_BODY_PREVIEW) },
    });
  }

  const parsed = ChatCompletionResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new LLMError("LLM response has no choices[0].message.content", {
      metadata: { issues: parsed.error.issues },
    });
  }

  return parsed.data.choices[0].message.content;
}

export function isRetryableLLMError(error: unknown): boolean {
  return error instanceof LLMError && error.retryable;
}

export class LLMClient implements LLMPort {
  private readonly retry: RetryPolicy;

  constructor(private readonly options: LLMClientOptions) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  async send(
    messages: readonly PromptMessage[],
    options: GenerationOptions = {}
  ): Promise<string> {
    const body = buildRequestBody(messages, options);
    const startedAt = Date.now();

    try {
      const content = await withRetry(
        () => this.post(body),
        "llm.chat.completions",
        isRetryableLLMError,
        this.retry
      );

      logEvent("LLM_SUCCESS", {
        durationMs: Date.now() - startedAt,
        messageCount: body.messages.length,
        maxTokens: body.max_tokens,
        temperature: body.temperature,
        responseLength: content.length,
      });

      return content;
    } catch (error: unknown) {
      const caught = describeError(error);

      logEvent("LLM_FAILURE", {
        durationMs: Date.now() - startedAt,
        message: caught.message,
        name: caught.name,
        upstreamStatus: error instanceof LLMError ? error.upstreamStatus : undefined,
      });

      if (error instanceof LLMError) {
        throw error;
      }
      throw new LLMError(`LLM request failed: ${caught.message}`, { cause: error });
    }
  }

  private async post(body: ChatCompletionRequestBody): Promise<string> {
    let response: Response;

    try {
      response = await fetch(this.options.apiUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "api-key": this.options.apiKey,
        },
        body: JSON.stringify(body),
        signal:
          this.options.timeoutMs !== undefined
            ? AbortSignal.timeout(this.options.timeoutMs)
            : undefined,
      });
    } catch (error: unknown) {
      throw new LLMError(
        `LLM request failed: ${describeError(error).message}`,
        { cause: error, retryable: true }
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error: unknown) {
      throw new LLMError(
        `Failed to read LLM response body: ${describeError(error).message}`,
        { cause: error, upstreamStatus: response.status, retryable: true }
      );
    }

    if (!response.ok) {
      throw new LLMError(`LLM backend responded with status ${response.status}`, {
        upstreamStatus: response.status,
        retryable: RETRYABLE_STATUSES.has(response.status),
        metadata: { body: text.slice(0, ERROR_BODY_PREVIEW) },
      });
    }

    return extractContent(text);
  }
}
