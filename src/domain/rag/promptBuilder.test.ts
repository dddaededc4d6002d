import { describe, expect, it } from "vitest";

import { PromptBuilder, SCHEMA_ASSISTANT_INSTRUCTIONS } from "./promptBuilder";

const CONTEXTS = [
  "orders: order_id, customer_id, total",
  "customers: customer_id, name",
];

describe("PromptBuilder", () => {
  it("returns a system message followed by a user message", () => {
    const messages = new PromptBuilder().build(CONTEXTS, "which table has totals?");

    expect(messages).toHaveLength(2);
    expect(messages[0]).toEqual({
      role: "system",
      content: SCHEMA_ASSISTANT_INSTRUCTIONS,
    });
    expect(messages[1].role).toBe("user");
  });

  it("puts the contexts in order, newline-joined, before the literal query", () => {
    const query = "what tables store customer orders?";
    const [, user] = new PromptBuilder().build(CONTEXTS, query);

    const joined = "orders: order_id, customer_id, total\ncustomers: customer_id, name";
    expect(user.content).toContain(joined);
    expect(user.content).toContain(query);
    expect(user.content.indexOf(joined)).toBeLessThan(user.content.indexOf(query));
    expect(user.content.endsWith(query)).toBe(true);
  });

  it("renders the full user message", () => {
    const [, user] = new PromptBuilder().build(["t1: a", "t2: b"], "q?");

    expect(user.content).toBe(
      [
        "Here are the tables in our database:",
        "t1: a",
        "t2: b",
        "",
        "Based on the tables in our database given above, please answer the following question concisely and directly:",
        "q?",
      ].join("\n")
    );
  });

  it("still builds two messages when nothing was retrieved", () => {
    const messages = new PromptBuilder().build([], "anything?");

    expect(messages).toHaveLength(2);
    expect(messages[1].content).toContain("anything?");
  });

  it("uses a deployment-provided system instruction", () => {
    const [system] = new PromptBuilder("Answer in French.").build([], "q");

    expect(system).toEqual({ role: "system", content: "Answer in French." });
  });

  it("asks for fenced SQL and numbered lists by default", () => {
    expect(SCHEMA_ASSISTANT_INSTRUCTIONS).toContain("```sql");
    expect(SCHEMA_ASSISTANT_INSTRUCTIONS).toContain("enumerate them with numbers");
  });
});
