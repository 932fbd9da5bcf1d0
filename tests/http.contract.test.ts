import request from "supertest";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { BridgeError } from "../src/errors.js";
import { createHttpApp } from "../src/http/server.js";
import { createLogger } from "../src/logger.js";
import { DeepSeekAdapter, DEEPSEEK_SPEC } from "../src/providers/deepseek.js";
import { ChatSession } from "../src/session/chatSession.js";
import type { QueueLike } from "../src/utils/queue.js";
import { SingleFlightQueue } from "../src/utils/queue.js";
import { createScriptedSite, FakeLauncher, FakePage } from "./support/fakePage.js";

class TestQueue implements QueueLike {
  public depth = 0;
  public forceError: BridgeError | null = null;

  public getDepth(): number {
    return this.depth;
  }

  public async add<T>(task: () => Promise<T>): Promise<T> {
    if (this.forceError) {
      throw this.forceError;
    }

    this.depth += 1;
    try {
      return await task();
    } finally {
      this.depth -= 1;
    }
  }
}

const REPLIES: Record<string, string> = {
  "[user] Hi": "Hello",
  "[user] How are you?": "Fine",
  Ping: "Pong",
};

function buildApp(overrides?: {
  queue?: QueueLike;
  launcher?: FakeLauncher;
  respond?: (prompt: string) => string | null;
  env?: Record<string, string>;
}) {
  const config = loadConfig({
    ...process.env,
    BRIDGE_MODE: "http",
    PROVIDER: "deepseek",
    MODEL_ID: "browser-chat",
    STREAM_DEFAULT: "false",
    BRIDGE_API_TOKEN: "",
    BRIDGE_VERSION: "9.9.9",
    ...overrides?.env,
  });
  const logger = createLogger({ level: "error", format: "json" });
  const respond = overrides?.respond ?? ((prompt: string) => REPLIES[prompt] ?? "Noted");
  const launcher =
    overrides?.launcher ?? new FakeLauncher(() => createScriptedSite(DEEPSEEK_SPEC.selectors, respond).page);
  const session = new ChatSession({
    adapter: new DeepSeekAdapter(),
    launcher,
    logger,
    loadTimeoutMs: 50,
    responseTimeoutMs: 50,
    pollIntervalMs: 5,
  });
  const queue = overrides?.queue ?? new SingleFlightQueue({ maxSize: 5, defaultTimeoutMs: 5_000 });

  return { app: createHttpApp({ config, logger, queue, session }), session, launcher };
}

function parseFrames(text: string): string[] {
  return text.split("\n\n").filter((frame) => frame.length > 0);
}

describe("HTTP contract", () => {
  it("answers a first completion with the cleaned reply and word-count usage", async () => {
    const { app, session } = buildApp();

    const response = await request(app)
      .post("/v1/chat/completions")
      .set("x-request-id", "req-1")
      .send({ model: "gpt-test", messages: [{ role: "user", content: "Hi" }], temperature: 0.2 });

    expect(response.status).toBe(200);
    expect(response.headers["x-bridge-request-id"]).toBe("req-1");
    expect(response.headers["x-bridge-version"]).toBe("9.9.9");
    expect(response.body).toMatchObject({
      id: "chatcmpl-req-1",
      object: "chat.completion",
      model: "gpt-test",
      choices: [{ index: 0, message: { role: "assistant", content: "Hello" }, finish_reason: "stop" }],
      usage: { prompt_tokens: 2, completion_tokens: 1, total_tokens: 3 },
    });
    expect(typeof response.body.created).toBe("number");
    expect(session.getLedger()).toEqual(["Hi", "Hello"]);
  });

  it("submits only the new messages on the following turn", async () => {
    const { app, session, launcher } = buildApp();
    await request(app).post("/chat/completions").send({ model: "m", messages: [{ role: "user", content: "Hi" }] });

    const response = await request(app)
      .post("/chat/completions")
      .send({
        model: "m",
        messages: [
          { role: "user", content: "Hi" },
          { role: "assistant", content: "Hello" },
          { role: "user", content: [{ type: "text", text: "How are you?" }] },
        ],
      });

    expect(response.status).toBe(200);
    expect(response.body.choices[0].message.content).toBe("Fine");
    expect(response.body.usage).toEqual({ prompt_tokens: 4, completion_tokens: 1, total_tokens: 5 });
    expect(session.getLedger()).toEqual(["Hi", "Hello", "How are you?", "Fine"]);
    expect(launcher.opened).toHaveLength(1);
  });

  it("streams exactly one data frame followed by [DONE]", async () => {
    const { app } = buildApp();

    const response = await request(app)
      .post("/v1/chat/completions")
      .set("x-request-id", "req-stream")
      .send({ model: "m", stream: true, messages: [{ role: "user", content: "Hi" }] });

    expect(response.status).toBe(200);
    expect(response.headers["content-type"]).toContain("text/event-stream");
    const frames = parseFrames(response.text);
    expect(frames).toHaveLength(2);
    expect(frames[1]).toBe("data: [DONE]");

    const payload = JSON.parse((frames[0] ?? "").replace(/^data: /, ""));
    expect(payload).toMatchObject({
      id: "chatcmpl-req-stream",
      object: "chat.completion.chunk",
      model: "m",
      choices: [{ index: 0, delta: { role: "assistant", content: "Hello" }, finish_reason: "stop" }],
    });
    expect(payload.choices[0].message).toBeUndefined();
  });

  it("streams when STREAM_DEFAULT is set even if the request does not ask", async () => {
    const { app } = buildApp({ env: { STREAM_DEFAULT: "true" } });

    const response = await request(app)
      .post("/v1/chat/completions")
      .send({ model: "m", stream: false, messages: [{ role: "user", content: "Hi" }] });

    expect(response.headers["content-type"]).toContain("text/event-stream");
    expect(parseFrames(response.text)).toHaveLength(2);
  });

  it("rejects an empty message list", async () => {
    const { app } = buildApp();

    const response = await request(app).post("/v1/chat/completions").send({ model: "m", messages: [] });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: {
        message: "At least one message is required",
        type: "invalid_request_error",
        param: "messages",
        code: "invalid_request_error",
      },
    });
  });

  it("rejects a missing message list", async () => {
    const { app } = buildApp();

    const response = await request(app).post("/v1/chat/completions").send({ model: "m" });

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe("Field 'messages' is missing or empty");
    expect(response.body.error.param).toBe("messages");
  });

  it("rejects malformed JSON", async () => {
    const { app } = buildApp();

    const response = await request(app)
      .post("/v1/chat/completions")
      .set("Content-Type", "application/json")
      .send('{"model": "m", "messages": [');

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe("invalid_json");
  });

  it("rejects oversized bodies", async () => {
    const { app } = buildApp({ env: { HTTP_BODY_LIMIT: "100b" } });

    const response = await request(app)
      .post("/v1/chat/completions")
      .send({ model: "m", messages: [{ role: "user", content: "x".repeat(500) }] });

    expect(response.status).toBe(413);
    expect(response.body.error.code).toBe("request_too_large");
  });

  it("maps a response timeout to 504", async () => {
    const { app, session } = buildApp({ respond: () => null });

    const response = await request(app).post("/v1/chat/completions").send({ model: "m", messages: [{ role: "user", content: "Hi" }] });

    expect(response.status).toBe(504);
    expect(response.body.error).toEqual({
      message: "Response timeout",
      type: "bridge_error",
      code: "response_timeout",
      param: null,
    });
    expect(session.getLedger()).toEqual(["Hi"]);
  });

  it("maps a load failure to 503 without recommending a restart", async () => {
    const { app } = buildApp({ launcher: new FakeLauncher(() => new FakePage()) });

    const response = await request(app).post("/v1/chat/completions").send({ model: "m", messages: [{ role: "user", content: "Hi" }] });

    expect(response.status).toBe(503);
    expect(response.body.error.code).toBe("load_timeout");
    expect(response.body.error.restart_recommended).toBe(false);
  });

  it("maps a closed browser to 503 and recommends a restart", async () => {
    const { app, launcher } = buildApp();
    await request(app).post("/v1/chat/completions").send({ model: "m", messages: [{ role: "user", content: "Hi" }] });
    await launcher.opened[0]?.close();

    const response = await request(app).post("/v1/chat/completions").send({ model: "m", messages: [{ role: "user", content: "Again" }] });

    expect(response.status).toBe(503);
    expect(response.body.error.code).toBe("transport_error");
    expect(response.body.error.restart_recommended).toBe(true);
  });

  it("maps a full queue to 429 with Retry-After", async () => {
    const queue = new TestQueue();
    queue.forceError = new BridgeError("queue_full", "Queue is full", { maxSize: 1 }, 10);
    const { app } = buildApp({ queue });

    const response = await request(app).post("/v1/chat/completions").send({ model: "m", messages: [{ role: "user", content: "Hi" }] });

    expect(response.status).toBe(429);
    expect(response.headers["retry-after"]).toBe("10");
    expect(response.body.error.code).toBe("queue_full");
  });

  it("maps unexpected failures to a server_error envelope", async () => {
    const queue = new TestQueue();
    queue.forceError = new BridgeError("unknown", "boom");
    const { app } = buildApp({ queue });

    const response = await request(app).post("/v1/chat/completions").send({ model: "m", messages: [{ role: "user", content: "Hi" }] });

    expect(response.status).toBe(500);
    expect(response.body.error).toEqual({
      message: "Internal server error: boom",
      type: "server_error",
      code: "internal_error",
      param: null,
    });
  });

  it("lists the configured model", async () => {
    const { app } = buildApp({ env: { MODEL_ID: "bridge-model" } });

    const response = await request(app).get("/v1/models");

    expect(response.status).toBe(200);
    expect(response.body.object).toBe("list");
    expect(response.body.data).toHaveLength(1);
    expect(response.body.data[0]).toMatchObject({
      id: "bridge-model",
      object: "model",
      permission: [],
      root: "bridge-model",
      parent: null,
    });
  });

  it("reports health and API info", async () => {
    const { app } = buildApp();

    const health = await request(app).get("/v1/health");
    expect(health.status).toBe(200);
    expect(health.body).toEqual({
      status: "healthy",
      service: "browser-chat-bridge",
      session: { state: "idle", provider: "deepseek", ledgerSize: 0, generation: 0, handleOpen: false },
    });

    const info = await request(app).get("/v1");
    expect(info.body.version).toBe("9.9.9");
    expect(info.body.endpoints.chat_completions).toBe("/v1/chat/completions");

    const root = await request(app).get("/");
    expect(root.body.endpoints.models).toBe("/models");
  });

  it("returns the not_found envelope for unknown routes", async () => {
    const { app } = buildApp();

    const response = await request(app).get("/v1/unknown");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: {
        message: "The requested resource was not found",
        type: "not_found",
        param: null,
        code: "not_found",
      },
    });
  });

  it("requires the bearer token when one is configured", async () => {
    const { app } = buildApp({ env: { BRIDGE_API_TOKEN: "test-secret" } });

    const denied = await request(app).get("/v1/models");
    expect(denied.status).toBe(401);
    expect(denied.body.error.code).toBe("unauthorized");

    const wrong = await request(app).get("/v1/models").set("Authorization", "Bearer nope");
    expect(wrong.status).toBe(401);

    const allowed = await request(app).get("/v1/models").set("Authorization", "Bearer test-secret");
    expect(allowed.status).toBe(200);

    const health = await request(app).get("/health");
    expect(health.status).toBe(200);
  });
});

describe("simplified facade", () => {
  it("returns the reply for one message", async () => {
    const { app, session } = buildApp();

    const response = await request(app).post("/chat").send({ message: "Ping" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ response: "Pong", model: "browser-chat", success: true, error: null });
    expect(session.getLedger()).toEqual(["Ping", "Pong"]);
  });

  it("reports failures through the sentinel string", async () => {
    const { app } = buildApp({ respond: () => null });

    const response = await request(app).post("/chat").send({ message: "Ping", model: "duck" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      response: "",
      model: "duck",
      success: false,
      error: "Error: Response timeout",
    });
  });

  it("validates the message field", async () => {
    const { app } = buildApp();

    const response = await request(app).post("/chat").send({});

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe("Field 'message' is required");
  });

  it("restarts the browser session", async () => {
    const { app, session, launcher } = buildApp();
    await request(app).post("/chat").send({ message: "Ping" });

    const response = await request(app).post("/restart");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: "Browser restarted successfully" });
    expect(launcher.opened).toHaveLength(2);
    expect(session.getLedger()).toEqual([]);
  });

  it("reports a restart that cannot load the chat", async () => {
    const { app } = buildApp({ launcher: new FakeLauncher(() => new FakePage()) });

    const response = await request(app).post("/restart");

    expect(response.status).toBe(500);
    expect(response.body.error).toEqual({
      message: "Failed to restart browser: Chat interface failed to load",
      type: "server_error",
      code: "restart_failed",
      param: null,
    });
  });
});
