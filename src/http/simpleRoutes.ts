import { type Request, type Response, Router } from "express";
import { z } from "zod";
import { toBridgeError } from "../errors.js";
import { isFailureText, resultToBridgeError, toReplyText } from "../interaction/result.js";
import type { OpenAiRouteDependencies } from "./openaiRoutes.js";
import { applyBaseHeaders, getRequestId, mapBridgeError, sendOpenAiError } from "./responses.js";

const chatRequestSchema = z.object({
  message: z.string({ required_error: "Field 'message' is required" }).min(1, "Field 'message' must not be empty"),
  model: z.string().optional(),
});

interface ChatResponse {
  response: string;
  model: string;
  success: boolean;
  error: string | null;
}

/** Single-message facade: one prompt in, one reply string out. */
export function createSimpleRouter(deps: OpenAiRouteDependencies): Router {
  const router = Router();

  router.post("/chat", async (req: Request, res: Response) => {
    const rid = getRequestId(res);
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      sendOpenAiError(res, {
        status: 400,
        type: "invalid_request_error",
        code: "invalid_request_error",
        message: issue?.message ?? "Invalid request parameters",
        param: "message",
      });
      return;
    }

    const model = parsed.data.model ?? deps.config.modelId;

    try {
      const outcome = await deps.queue.add(
        () => deps.session.ask(parsed.data.message, rid),
        deps.config.effectiveJobTimeoutMs,
        "chat",
      );
      applyBaseHeaders(deps.config, deps.queue.getDepth(), rid, res);

      const reply = toReplyText(outcome.result);
      const payload: ChatResponse = isFailureText(reply)
        ? { response: "", model, success: false, error: reply }
        : { response: reply, model, success: true, error: null };

      deps.logger.info(
        { rid, event: "chat_reply", success: payload.success, status: outcome.result.status },
        "chat_reply",
      );
      res.json(payload);
    } catch (error) {
      const bridgeError = toBridgeError(error);
      deps.logger.error({ rid, event: "chat_failed", errorCode: bridgeError.code }, bridgeError.message);
      applyBaseHeaders(deps.config, deps.queue.getDepth(), rid, res);
      sendOpenAiError(res, mapBridgeError(bridgeError));
    }
  });

  router.post("/restart", async (_req: Request, res: Response) => {
    const rid = getRequestId(res);

    try {
      const result = await deps.session.restart(rid);
      const failure = resultToBridgeError(result);
      if (failure) {
        deps.logger.error({ rid, event: "restart_failed", status: result.status }, "restart_failed");
        sendOpenAiError(res, {
          status: 500,
          type: "server_error",
          code: "restart_failed",
          message: `Failed to restart browser: ${failure.message}`,
        });
        return;
      }

      res.json({ message: "Browser restarted successfully" });
    } catch (error) {
      const bridgeError = toBridgeError(error);
      deps.logger.error({ rid, event: "restart_failed", errorCode: bridgeError.code }, bridgeError.message);
      sendOpenAiError(res, {
        status: 500,
        type: "server_error",
        code: "restart_failed",
        message: `Failed to restart browser: ${bridgeError.message}`,
      });
    }
  });

  return router;
}
