import { type Request, type Response, Router } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { BridgeConfig } from "../config.js";
import { toBridgeError } from "../errors.js";
import { resultToBridgeError } from "../interaction/result.js";
import type { ChatSession } from "../session/chatSession.js";
import { countWords, flattenContent, type ChatMessage } from "../session/messages.js";
import type { QueueLike } from "../utils/queue.js";
import { applyBaseHeaders, getRequestId, mapBridgeError, sendOpenAiError } from "./responses.js";
import { setupSseHeaders, writeSseData, type ChatCompletionChunk, type ChatCompletionUsage } from "./sse.js";

const contentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const chatCompletionMessageSchema = z
  .object({
    role: z.enum(["system", "user", "assistant"]),
    content: z.union([z.string(), z.array(contentPartSchema), z.null()]).optional(),
  })
  .passthrough();

// Sampling parameters are accepted and ignored: the chat site decides.
export const chatCompletionRequestSchema = z
  .object({
    model: z.string().optional(),
    messages: z
      .array(chatCompletionMessageSchema, { required_error: "Field 'messages' is missing or empty" })
      .min(1, "At least one message is required"),
    stream: z.boolean().optional(),
  })
  .passthrough();

export type ChatCompletionRequest = z.infer<typeof chatCompletionRequestSchema>;

export type CompletionSession = Pick<ChatSession, "complete" | "ask" | "restart" | "getHealth">;

export interface OpenAiRouteDependencies {
  config: BridgeConfig;
  logger: Logger;
  queue: QueueLike;
  session: CompletionSession;
}

interface ChatCompletionResponse {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: { role: "assistant"; content: string };
    finish_reason: "stop";
  }>;
  usage: ChatCompletionUsage;
}

export function toChatMessages(request: ChatCompletionRequest): ChatMessage[] {
  return request.messages.map((message) => ({
    role: message.role,
    content: flattenContent(message.content),
  }));
}

export function buildUsage(prompt: string, answer: string): ChatCompletionUsage {
  const promptTokens = countWords(prompt);
  const completionTokens = countWords(answer);
  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: promptTokens + completionTokens,
  };
}

function buildModelsPayload(config: BridgeConfig): unknown {
  return {
    object: "list",
    data: [
      {
        id: config.modelId,
        object: "model",
        created: Math.floor(Date.now() / 1000),
        owned_by: "browser-chat-bridge",
        permission: [],
        root: config.modelId,
        parent: null,
      },
    ],
  };
}

function sendChatCompletionResponse(res: Response, payload: ChatCompletionResponse, stream: boolean): void {
  if (!stream) {
    res.json(payload);
    return;
  }

  const [choice] = payload.choices;
  const chunk: ChatCompletionChunk = {
    id: payload.id,
    object: "chat.completion.chunk",
    created: payload.created,
    model: payload.model,
    choices: choice
      ? [{ index: choice.index, delta: choice.message, finish_reason: choice.finish_reason }]
      : [],
    usage: payload.usage,
  };

  setupSseHeaders(res);
  res.status(200);
  writeSseData(res, chunk);
  writeSseData(res, "[DONE]");
  res.end();
}

export function createOpenAiRouter(deps: OpenAiRouteDependencies): Router {
  const router = Router();

  const listModels = (_req: Request, res: Response): void => {
    res.json(buildModelsPayload(deps.config));
  };
  router.get("/models", listModels);
  router.get("/v1/models", listModels);

  const chatCompletions = async (req: Request, res: Response): Promise<void> => {
    const rid = getRequestId(res);
    const startedAt = Date.now();

    const parsed = chatCompletionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const param = issue && issue.path.length > 0 ? String(issue.path[0]) : null;
      deps.logger.warn({ rid, event: "http_validation_error", param }, "http_validation_error");
      sendOpenAiError(res, {
        status: 400,
        type: "invalid_request_error",
        code: "invalid_request_error",
        message: issue?.message ?? "Invalid request parameters",
        param,
      });
      return;
    }

    const body = parsed.data;
    const model = body.model ?? deps.config.modelId;
    const stream = body.stream === true || deps.config.streamDefault;
    const messages = toChatMessages(body);

    try {
      const outcome = await deps.queue.add(
        () => deps.session.complete(messages, rid),
        deps.config.effectiveJobTimeoutMs,
        "chat_completion",
      );
      applyBaseHeaders(deps.config, deps.queue.getDepth(), rid, res);

      const failure = resultToBridgeError(outcome.result);
      if (failure) {
        throw failure;
      }

      const answer = outcome.result.text ?? "";
      deps.logger.info(
        {
          rid,
          event: "chat_completion",
          stream,
          reconciliation: outcome.reconciliation?.reason,
          deltaSize: outcome.reconciliation?.deltaSize,
          durationMs: Date.now() - startedAt,
          answerChars: answer.length,
        },
        "chat_completion",
      );

      sendChatCompletionResponse(
        res,
        {
          id: `chatcmpl-${rid}`,
          object: "chat.completion",
          created: Math.floor(Date.now() / 1000),
          model,
          choices: [
            {
              index: 0,
              message: { role: "assistant", content: answer },
              finish_reason: "stop",
            },
          ],
          usage: buildUsage(outcome.prompt, answer),
        },
        stream,
      );
    } catch (error) {
      const bridgeError = toBridgeError(error);
      const mapped = mapBridgeError(bridgeError);
      deps.logger.error(
        {
          rid,
          event: "chat_completion_failed",
          errorCode: bridgeError.code,
          status: mapped.status,
          details: bridgeError.details,
          durationMs: Date.now() - startedAt,
        },
        bridgeError.message,
      );
      applyBaseHeaders(deps.config, deps.queue.getDepth(), rid, res);
      sendOpenAiError(res, mapped);
    }
  };
  router.post("/chat/completions", chatCompletions);
  router.post("/v1/chat/completions", chatCompletions);

  return router;
}
