import type { Server } from "http";

import { afterEach, describe, expect, it, vi } from "vitest";

import { LLMError, StorageError } from "@typesLocal/AppError";

import { createHttpApp } from "./createHttpApp";

import type { RouteDeps } from "@routes/index";

const INDEX_STATUS = { collection: "schema_tables", dimension: 384, rows: 2 };

let server: Server | undefined;

async function start(deps: Partial<RouteDeps> = {}): Promise<string> {
  const app = createHttpApp({
    pipeline: deps.pipeline ?? { answer: async () => "The orders table stores order records." },
    index: deps.index ?? { describe: async () => INDEX_STATUS },
  });

  const listening = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  server = listening;

  const address = listening.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected a TCP address");
  }
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  const s = server;
  server = undefined;
  if (s) {
    await new Promise<void>((resolve, reject) =>
      s.close((err) => (err ? reject(err) : resolve()))
    );
  }
});

describe("POST /generate", () => {
  it("answers the question as plain text", async () => {
    const answer = vi.fn(async (_query: string) => "The orders table stores order records.");
    const baseUrl = await start({ pipeline: { answer } });

    const res = await fetch(`${baseUrl}/generate`, {
      method: "POST",
      body: "what tables store customer orders?",
    });

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toMatch(/^text\/plain/);
    await expect(res.text()).resolves.toBe("The orders table stores order records.");
    expect(answer).toHaveBeenCalledWith("what tables store customer orders?");
  });

  it("reads the body as text whatever its declared content type", async () => {
    const answer = vi.fn(async (query: string) => `echo: ${query}`);
    const baseUrl = await start({ pipeline: { answer } });

    const res = await fetch(`${baseUrl}/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{"q":"orders"}',
    });

    await expect(res.text()).resolves.toBe('echo: {"q":"orders"}');
  });

  it("replies 500 with the error string when the pipeline fails", async () => {
    const baseUrl = await start({
      pipeline: {
        answer: async () => {
          throw new LLMError("LLM backend responded with status 500", { upstreamStatus: 500 });
        },
      },
    });

    const res = await fetch(`${baseUrl}/generate`, { method: "POST", body: "orders?" });

    expect(res.status).toBe(500);
    expect(res.headers.get("content-type")).toMatch(/^text\/plain/);
    await expect(res.text()).resolves.toBe("LLMError: LLM backend responded with status 500");
  });

  it("replies 500 for a storage failure", async () => {
    const baseUrl = await start({
      pipeline: {
        answer: async () => {
          throw new StorageError("Collection \"schema_tables\" is closed");
        },
      },
    });

    const res = await fetch(`${baseUrl}/generate`, { method: "POST", body: "orders?" });

    expect(res.status).toBe(500);
    await expect(res.text()).resolves.toBe('StorageError: Collection "schema_tables" is closed');
  });

  it("rejects a blank question with 400 without running the pipeline", async () => {
    const answer = vi.fn(async (_query: string) => "unused");
    const baseUrl = await start({ pipeline: { answer } });

    const res = await fetch(`${baseUrl}/generate`, { method: "POST", body: "   " });

    expect(res.status).toBe(400);
    await expect(res.text()).resolves.toBe(
      "ValidationError: Request body must contain a question"
    );
    expect(answer).not.toHaveBeenCalled();
  });

  it("replies 413 for an oversized question", async () => {
    const baseUrl = await start();

    const res = await fetch(`${baseUrl}/generate`, {
      method: "POST",
      body: "x".repeat(70 * 1024),
    });

    expect(res.status).toBe(413);
    await expect(res.text()).resolves.toBe("AppError: request entity too large");
  });

  it("allows cross-origin callers", async () => {
    const baseUrl = await start();

    const res = await fetch(`${baseUrl}/generate`, {
      method: "POST",
      headers: { Origin: "http://elsewhere.test" },
      body: "orders?",
    });

    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("answers CORS preflight requests", async () => {
    const baseUrl = await start();

    const res = await fetch(`${baseUrl}/generate`, {
      method: "OPTIONS",
      headers: {
        Origin: "http://elsewhere.test",
        "Access-Control-Request-Method": "POST",
      },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });
});

describe("GET /health", () => {
  it("reports the index status", async () => {
    const baseUrl = await start();

    const res = await fetch(`${baseUrl}/health`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "ok", index: INDEX_STATUS });
    expect(body).toHaveProperty("uptimeSeconds", expect.any(Number));
  });

  it("replies 500 when the index cannot be described", async () => {
    const baseUrl = await start({
      index: {
        describe: async () => {
          throw new StorageError("Collection \"schema_tables\" is closed");
        },
      },
    });

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(500);
  });
});

it("does not advertise the framework", async () => {
  const baseUrl = await start();

  const res = await fetch(`${baseUrl}/health`);

  expect(res.headers.get("x-powered-by")).toBeNull();
});
