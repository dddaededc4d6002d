import type { PromptMessage, SchemaPrompt } from "@domain/rag/ports";

export const SCHEMA_ASSISTANT_INSTRUCTIONS = [
  "You are an AI assistant that answers questions about database schemas and tables.",
  "Your answer always includes information about the relevant tables, columns and their purpose.",
  "If the user asks for a query, add it to the answer inside a fenced ```sql code block.",
  "When you list several tables, columns or steps, enumerate them with numbers.",
].join("\n");

/**
 * Builds the two-message chat prompt for one question: the fixed system
 * instruction followed by a user turn carrying the retrieved table
 * descriptions (in rank order, one per line) and the question itself.
 *
 * No truncation happens here; an oversized prompt is rejected by the LLM.
 */
export class PromptBuilder {
  constructor(
    private readonly systemPrompt: string = SCHEMA_ASSISTANT_INSTRUCTIONS
  ) {}

  build(contextTexts: readonly string[], query: string): SchemaPrompt {
    const system: PromptMessage = { role: "system", content: this.systemPrompt };
    const user: PromptMessage = {
      role: "user",
      content: renderUserMessage(contextTexts.join("\n"), query),
    };
    return [system, user];
  }
}

function renderUserMessage(context: string, query: string): string {
  return [
    "Here are the tables in our database:",
    context,
    "",
    "Based on the tables in our database given above, please answer the following question concisely and directly:",
    query,
  ].join("\n");
}
