/**
 * HTTP front end tests: real Express app on an ephemeral port, fake backend
 */

import http from "http";
import { EventBus } from "../src/core/eventBus";
import { createGatewayContext } from "../src/core/gateway";
import { startServer, stopServer } from "../src/server";
import { HEALTH_MESSAGE } from "../src/server/routes/status";
import { FakeInferenceClient } from "./helpers/fakeInferenceClient";
import { createMemoryLogger, LogLine } from "./helpers/memoryLogger";

const DEFAULT_MODEL = "llama3.2:1b";

describe("HTTP server", () => {
  let client: FakeInferenceClient;
  let eventBus: EventBus;
  let server: http.Server;
  let baseURL: string;
  let lines: LogLine[];

  beforeEach(async () => {
    client = new FakeInferenceClient({ installed: [DEFAULT_MODEL] });
    eventBus = new EventBus();
    const memory = createMemoryLogger("info");
    lines = memory.lines;
    const { gateway } = createGatewayContext(
      { ollamaBaseURL: "http://fake:11434", defaultModel: DEFAULT_MODEL },
      { logger: memory.logger, eventBus, client }
    );

    server = await startServer({
      host: "127.0.0.1",
      port: 0,
      gateway,
      client,
      logger: memory.logger,
      defaultModel: DEFAULT_MODEL,
      eventBus,
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no TCP address");
    baseURL = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await stopServer(server);
  });

  const post = (path: string, body: string) =>
    fetch(`${baseURL}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    });

  describe("GET /", () => {
    test("returns the static health payload", async () => {
      const res = await fetch(`${baseURL}/`);
      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({ message: HEALTH_MESSAGE });
    });

    test("does not depend on backend health", async () => {
      client.available = false;
      client.listError = new Error("down");

      const res = await fetch(`${baseURL}/`);
      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({ message: "Ollama LLM container is up" });
    });
  });

  describe("POST /generate and /ask", () => {
    test.each(["/generate", "/ask"])("%s returns the generated text", async (path) => {
      const res = await post(path, JSON.stringify({ model: "", prompt: "Hi" }));

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({ response: "[llama3.2:1b] Hi" });
    });

    test("both endpoints answer identical bodies byte-for-byte", async () => {
      const body = JSON.stringify({ model: "local-model", prompt: "Tell me something" });

      const a = await (await post("/generate", body)).text();
      const b = await (await post("/ask", body)).text();
      expect(a).toBe(b);
      expect(a).toBe('{"response":"[llama3.2:1b] Tell me something"}');
    });

    test("accepts a body without a model field", async () => {
      const res = await post("/ask", JSON.stringify({ prompt: "Hi" }));
      await expect(res.json()).resolves.toEqual({ response: "[llama3.2:1b] Hi" });
    });

    test("generation failures come back as 200 with error text", async () => {
      const res = await post("/generate", JSON.stringify({ model: "ghost-model", prompt: "Hi" }));

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({
        response: "Error: Unable to generate response using model 'ghost-model'. not found",
      });
    });

    test("long model names are passed on rather than rejected", async () => {
      const model = `org/${"x".repeat(400)}:latest`;
      const res = await post("/generate", JSON.stringify({ model, prompt: "Hi" }));

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({
        response: `Error: Unable to generate response using model '${model}'. not found`,
      });
      expect(client.pullCalls).toEqual([model]);
    });

    test("malformed JSON is a 500 with a detail body", async () => {
      const res = await post("/generate", '{"model": "x", "prompt": ');

      expect(res.status).toBe(500);
      await expect(res.json()).resolves.toMatchObject({ detail: expect.stringMatching(/\S/) });
      expect(client.generateCalls).toEqual([]);
    });

    test("a body without a prompt is rejected with 400", async () => {
      const res = await post("/ask", JSON.stringify({ model: "x" }));

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toMatchObject({ detail: "Validation failed: prompt: Required" });
    });
  });

  describe("supplementary endpoints", () => {
    test("GET /health reports backend state", async () => {
      client.available = false;
      const res = await fetch(`${baseURL}/health`);
      await expect(res.json()).resolves.toEqual({ status: "ok", backend: "down", defaultModel: DEFAULT_MODEL });
    });

    test("GET /models lists installed models", async () => {
      client.installed.add("mistral:7b");
      const res = await fetch(`${baseURL}/models`);
      await expect(res.json()).resolves.toEqual({ models: ["llama3.2:1b", "mistral:7b"] });
    });

    test("GET /models is a 503 when the backend is unreachable", async () => {
      client.listError = new Error("connection refused");
      const res = await fetch(`${baseURL}/models`);

      expect(res.status).toBe(503);
      await expect(res.json()).resolves.toEqual({ detail: "connection refused" });
    });

    test("unknown routes are a 404", async () => {
      const res = await fetch(`${baseURL}/nope`);
      expect(res.status).toBe(404);
      await expect(res.json()).resolves.toEqual({ detail: "Route GET /nope not found" });
    });
  });

  describe("request logging", () => {
    const requestLines = () => lines.filter((l) => l.type === "request");
    // "finish" can fire a tick after the client has the body
    const settle = () => new Promise((resolve) => setImmediate(resolve));

    test("records method, path, status and latency for every call", async () => {
      await (await fetch(`${baseURL}/`)).text();
      await (await post("/ask", "{oops")).text();
      await settle();

      const logged = requestLines();
      expect(logged).toHaveLength(2);
      expect(logged[0]).toMatchObject({ method: "GET", path: "/", statusCode: 200, level: "info" });
      expect(logged[1]).toMatchObject({ method: "POST", path: "/ask", statusCode: 500, level: "error" });
      expect(typeof logged[0].duration).toBe("number");
      expect(logged[0].msg).toMatch(/^GET \/ -> 200 \d+\.\d{2}ms$/);
    });

    test("publishes a RequestEvent per call", async () => {
      await (await post("/generate", JSON.stringify({ prompt: "Hi" }))).text();
      await settle();

      const events = eventBus.getHistory({ type: "RequestEvent" });
      expect(events).toHaveLength(1);
      expect(events[0].payload).toMatchObject({ method: "POST", path: "/generate", statusCode: 200 });
    });
  });
});
