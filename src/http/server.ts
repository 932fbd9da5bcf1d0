import type { Server } from "node:http";
import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { nanoid } from "nanoid";
import { SERVICE_NAME } from "../logger.js";
import { createOpenAiRouter, type OpenAiRouteDependencies } from "./openaiRoutes.js";
import { applyBaseHeaders, getRequestId, sendOpenAiError } from "./responses.js";
import { createSimpleRouter } from "./simpleRoutes.js";

export type HttpServerDependencies = OpenAiRouteDependencies;

function buildInfoPayload(deps: HttpServerDependencies, prefix: "" | "/v1"): unknown {
  return {
    name: "Browser Chat Bridge OpenAI-Compatible API",
    version: deps.config.version,
    description: "OpenAI-compatible endpoints backed by a chat site driven in a browser tab",
    provider: deps.session.getHealth().provider,
    endpoints: {
      models: `${prefix}/models`,
      chat_completions: `${prefix}/chat/completions`,
      health: `${prefix}/health`,
      chat: "/chat",
      restart: "/restart",
    },
    compatibility: "OpenAI API v1",
  };
}

function createAuthMiddleware(deps: HttpServerDependencies): RequestHandler {
  return (req, res, next) => {
    const expectedToken = deps.config.apiToken;
    if (!expectedToken) {
      next();
      return;
    }

    const match = req.header("authorization")?.match(/^Bearer\s+(.+)$/i);
    const token = match?.[1]?.trim();
    if (token === expectedToken) {
      next();
      return;
    }

    deps.logger.warn({ rid: getRequestId(res), event: "http_unauthorized", path: req.path }, "http_unauthorized");
    sendOpenAiError(res, {
      status: 401,
      type: "authentication_error",
      code: "unauthorized",
      message: "Missing or invalid Authorization header",
    });
  };
}

export function createHttpApp(deps: HttpServerDependencies): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const headerRequestId = req.header("x-request-id");
    const rid = typeof headerRequestId === "string" && headerRequestId.trim().length > 0 ? headerRequestId.trim() : nanoid();
    res.locals.rid = rid;
    const startedAt = Date.now();

    applyBaseHeaders(deps.config, deps.queue.getDepth(), rid, res);
    deps.logger.info({ rid, event: "http_request", method: req.method, path: req.path }, "http_request");
    res.on("finish", () => {
      deps.logger.info(
        { rid, event: "http_response", status: res.statusCode, durationMs: Date.now() - startedAt },
        "http_response",
      );
    });
    next();
  });

  app.use(express.json({ limit: deps.config.httpBodyLimit }));

  app.use((error: Error & { type?: string }, _req: Request, res: Response, next: NextFunction) => {
    if (error.type === "entity.too.large") {
      sendOpenAiError(res, {
        status: 413,
        type: "invalid_request_error",
        code: "request_too_large",
        message: "Request body is too large",
      });
      return;
    }

    if (error.type === "entity.parse.failed") {
      sendOpenAiError(res, {
        status: 400,
        type: "invalid_request_error",
        code: "invalid_json",
        message: "Invalid JSON body",
      });
      return;
    }

    next(error);
  });

  const health: RequestHandler = (_req, res) => {
    res.json({ status: "healthy", service: SERVICE_NAME, session: deps.session.getHealth() });
  };
  app.get("/health", health);
  app.get("/v1/health", health);

  app.get("/", (_req, res) => {
    res.json(buildInfoPayload(deps, ""));
  });
  app.get("/v1", (_req, res) => {
    res.json(buildInfoPayload(deps, "/v1"));
  });

  app.use(createAuthMiddleware(deps));
  app.use(createOpenAiRouter(deps));
  app.use(createSimpleRouter(deps));

  app.use((_req, res) => {
    sendOpenAiError(res, {
      status: 404,
      type: "not_found",
      code: "not_found",
      message: "The requested resource was not found",
    });
  });

  app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
    deps.logger.error(
      { rid: getRequestId(res), event: "http_unhandled_error", message: error.message, stack: error.stack },
      "http_unhandled_error",
    );
    sendOpenAiError(res, {
      status: 500,
      type: "server_error",
      code: "internal_error",
      message: `Internal server error: ${error.message}`,
    });
  });

  return app;
}

export async function startHttpServer(deps: HttpServerDependencies): Promise<Server> {
  const app = createHttpApp(deps);
  const requestTimeoutMs = deps.config.effectiveJobTimeoutMs + 5_000;

  return new Promise<Server>((resolve) => {
    const server = app.listen(deps.config.httpPort, deps.config.httpHost, () => {
      server.requestTimeout = requestTimeoutMs;
      server.timeout = requestTimeoutMs;
      server.headersTimeout = Math.max(server.headersTimeout, requestTimeoutMs + 1_000);

      deps.logger.info(
        {
          event: "http_server_started",
          mode: "http",
          host: deps.config.httpHost,
          port: deps.config.httpPort,
          provider: deps.config.provider,
          requestTimeoutMs,
        },
        "http_server_started",
      );
      resolve(server);
    });
  });
}
