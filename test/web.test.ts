/**
 * HTTP API tests against an in-process server on an ephemeral port
 */

import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createAgent } from "../src/lib/agent.ts";
import { silentLogger } from "../src/logger.ts";
import { createWebApp, startWebServer } from "../src/web/server.ts";

let server: Server;
let baseUrl: string;

beforeEach(async () => {
  const agent = createAgent({ maxHistory: 100, historyDisplayLimit: 10, maxFactorial: 100 });
  server = await startWebServer(createWebApp(agent, silentLogger), "127.0.0.1", 0);
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
});

function postJson(path: string, body: string): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("GET /", () => {
  test("serves the browser page", async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");

    const html = await res.text();
    expect(html).toContain("<title>Calculator Agent</title>");
    expect(html).toContain('fetch("/calculate"');
    expect(html).toContain('fetch("/history")');
    expect(html).toContain('fetch("/clear"');
  });
});

describe("POST /calculate", () => {
  test("answers a question", async () => {
    const res = await postJson("/calculate", JSON.stringify({ query: "What's 25 + 17?" }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ result: "The answer is 42" });
  });

  test("errors are answers too", async () => {
    const res = await postJson("/calculate", JSON.stringify({ query: "Divide 1 by 0" }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ result: "Error: Cannot divide by zero" });
  });

  test("the query is recorded exactly as sent", async () => {
    const res = await postJson("/calculate", JSON.stringify({ query: "  5   squared  " }));
    expect(await res.json()).toEqual({ result: "The answer is 25" });

    const history = await fetch(`${baseUrl}/history`);
    expect(await history.json()).toEqual({
      history: [{ query: "  5   squared  ", result: "25", operation_type: "square", timestamp: expect.any(String) }],
    });
  });

  test("non-string query", async () => {
    const res = await postJson("/calculate", JSON.stringify({ query: 42 }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No query provided" });
  });

  test("missing query", async () => {
    const res = await postJson("/calculate", JSON.stringify({}));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No query provided" });
  });

  test("blank query", async () => {
    const res = await postJson("/calculate", JSON.stringify({ query: "   " }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No query provided" });
  });

  test("malformed JSON", async () => {
    const res = await postJson("/calculate", "{not json");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });
});

describe("history routes", () => {
  test("GET /history lists newest first", async () => {
    await postJson("/calculate", JSON.stringify({ query: "1 + 1" }));
    await postJson("/calculate", JSON.stringify({ query: "5 squared" }));

    const res = await fetch(`${baseUrl}/history`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      history: [
        { query: "5 squared", result: "25", operation_type: "square", timestamp: expect.any(String) },
        { query: "1 + 1", result: "2", operation_type: "add", timestamp: expect.any(String) },
      ],
    });
  });

  test("GET /history?limit", async () => {
    await postJson("/calculate", JSON.stringify({ query: "1 + 1" }));
    await postJson("/calculate", JSON.stringify({ query: "2 + 2" }));

    const res = await fetch(`${baseUrl}/history?limit=1`);
    expect(await res.json()).toEqual({
      history: [{ query: "2 + 2", result: "4", operation_type: "add", timestamp: expect.any(String) }],
    });
  });

  test("GET /history with a bad limit", async () => {
    const res = await fetch(`${baseUrl}/history?limit=0`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Bad Request",
      message: "limit must be an integer from 1 to 1000",
    });
  });

  test("GET /history/search", async () => {
    await postJson("/calculate", JSON.stringify({ query: "1 + 1" }));
    await postJson("/calculate", JSON.stringify({ query: "5 squared" }));

    const res = await fetch(`${baseUrl}/history/search?q=squared`);
    expect(await res.json()).toEqual({
      history: [{ query: "5 squared", result: "25", operation_type: "square", timestamp: expect.any(String) }],
    });
  });

  test("GET /history/search without q", async () => {
    const res = await fetch(`${baseUrl}/history/search`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Bad Request", message: "q is required" });
  });

  test("POST /clear", async () => {
    await postJson("/calculate", JSON.stringify({ query: "1 + 1" }));

    const res = await fetch(`${baseUrl}/clear`, { method: "POST" });
    expect(await res.json()).toEqual({ success: true });

    const after = await fetch(`${baseUrl}/history`);
    expect(await after.json()).toEqual({ history: [] });
  });
});
