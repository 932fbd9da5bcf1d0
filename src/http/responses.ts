import type { Response } from "express";
import type { BridgeConfig } from "../config.js";
import type { BridgeError } from "../errors.js";

export type OpenAiErrorType =
  | "invalid_request_error"
  | "authentication_error"
  | "not_found"
  | "rate_limit_error"
  | "bridge_error"
  | "server_error";

export interface ErrorResponseShape {
  status: number;
  type: OpenAiErrorType;
  code: string;
  message: string;
  param?: string | null;
  retryAfterSec?: number;
  restartRecommended?: boolean;
}

export interface OpenAiErrorPayload {
  error: {
    message: string;
    type: OpenAiErrorType;
    code: string;
    param: string | null;
    restart_recommended?: boolean;
  };
}

export function getRequestId(res: Response): string {
  const rid: unknown = res.locals.rid;
  return typeof rid === "string" ? rid : "";
}

export function applyBaseHeaders(config: BridgeConfig, queueDepth: number, rid: string, res: Response): void {
  res.setHeader("x-bridge-version", config.version);
  res.setHeader("x-bridge-request-id", rid);
  res.setHeader("x-bridge-queue-depth", String(queueDepth));
}

export function buildOpenAiErrorPayload(error: ErrorResponseShape): OpenAiErrorPayload {
  const payload: OpenAiErrorPayload = {
    error: {
      message: error.message,
      type: error.type,
      code: error.code,
      param: error.param ?? null,
    },
  };
  if (error.restartRecommended !== undefined) {
    payload.error.restart_recommended = error.restartRecommended;
  }
  return payload;
}

export function sendOpenAiError(res: Response, error: ErrorResponseShape): OpenAiErrorPayload {
  if (error.retryAfterSec !== undefined) {
    res.setHeader("Retry-After", String(error.retryAfterSec));
  }

  const payload = buildOpenAiErrorPayload(error);
  res.status(error.status).json(payload);
  return payload;
}

export function mapBridgeError(error: BridgeError): ErrorResponseShape {
  switch (error.code) {
    case "validation_error":
      return { status: 400, type: "invalid_request_error", code: "invalid_request_error", message: error.message };
    case "unauthorized":
      return { status: 401, type: "authentication_error", code: error.code, message: error.message };
    case "queue_full":
      return {
        status: 429,
        type: "rate_limit_error",
        code: error.code,
        message: error.message,
        retryAfterSec: error.retryAfterSec ?? 10,
      };
    case "response_timeout":
    case "timeout":
      return { status: 504, type: "bridge_error", code: error.code, message: error.message };
    case "send_failed":
    case "extract_failed":
      return { status: 502, type: "bridge_error", code: error.code, message: error.message };
    case "load_timeout":
    case "transport_error":
      return {
        status: 503,
        type: "bridge_error",
        code: error.code,
        message: error.message,
        restartRecommended: error.restartRecommended,
      };
    case "unsupported_provider":
    case "unknown":
    default:
      return {
        status: 500,
        type: "server_error",
        code: "internal_error",
        message: `Internal server error: ${error.message}`,
      };
  }
}
