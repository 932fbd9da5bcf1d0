import type { Logger } from "pino";
import { nanoid } from "nanoid";
import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type ListToolsResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type { BridgeConfig } from "../config.js";
import { BridgeError, toBridgeError } from "../errors.js";
import { FAILURE_SENTINEL, isFailureText, toReplyText } from "../interaction/result.js";
import type { CompletionSession } from "../http/openaiRoutes.js";
import type { QueueLike } from "../utils/queue.js";

export const CHAT_TOOL: Tool = {
  name: "chat",
  description: "Send one message to the chat site open in the bridge browser and return its answer",
  inputSchema: {
    type: "object",
    properties: {
      message: {
        type: "string",
        description: "The message to send, verbatim",
      },
    },
    required: ["message"],
  },
};

export const RESTART_TOOL: Tool = {
  name: "restart",
  description: "Close the bridge browser, forget the conversation and load a fresh chat",
  inputSchema: {
    type: "object",
    properties: {},
  },
};

const chatArgumentsSchema = z.object({
  message: z.string().min(1),
});

export interface StartMcpServerOptions {
  config: BridgeConfig;
  logger: Logger;
  queue: QueueLike;
  session: CompletionSession;
}

export interface McpCallToolRequestParams {
  name: string;
  arguments?: unknown;
}

function buildMcpTextPayload(text: string, isError: boolean): CallToolResult {
  return {
    content: [{ type: "text", text }],
    isError,
  };
}

export async function handleMcpListToolsRequest(): Promise<ListToolsResult> {
  return { tools: [CHAT_TOOL, RESTART_TOOL] };
}

export async function handleMcpCallToolRequest(
  options: StartMcpServerOptions,
  params: McpCallToolRequestParams,
  rid: string = `mcp_${nanoid()}`,
): Promise<CallToolResult> {
  options.logger.info(
    { rid, event: "mcp_call_tool", toolName: params.name, queueDepth: options.queue.getDepth() },
    "mcp_call_tool",
  );

  try {
    if (params.name === "restart") {
      const result = await options.session.restart(rid);
      const reply = result.status === "ok" ? "Browser restarted successfully" : toReplyText(result);
      return buildMcpTextPayload(reply, isFailureText(reply));
    }

    if (params.name !== "chat") {
      return buildMcpTextPayload(`Unknown tool: ${params.name}`, true);
    }

    const parsed = chatArgumentsSchema.safeParse(params.arguments);
    if (!parsed.success) {
      throw new BridgeError("validation_error", "Invalid arguments for chat tool", {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const outcome = await options.queue.add(
      () => options.session.ask(parsed.data.message, rid),
      options.config.effectiveJobTimeoutMs,
      "mcp_chat",
    );
    const reply = toReplyText(outcome.result);
    return buildMcpTextPayload(reply, isFailureText(reply));
  } catch (error) {
    const bridgeError = toBridgeError(error);
    options.logger.error(
      {
        rid,
        event: "mcp_error",
        errorCode: bridgeError.code,
        details: bridgeError.details,
      },
      bridgeError.message,
    );
    return buildMcpTextPayload(`${FAILURE_SENTINEL}${bridgeError.code}: ${bridgeError.message}`, true);
  }
}

export async function startMcpServer(options: StartMcpServerOptions): Promise<Server> {
  const server = new Server(
    {
      name: "browser-chat-bridge",
      version: options.config.version,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => handleMcpListToolsRequest());

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleMcpCallToolRequest(options, {
      name: request.params.name,
      arguments: request.params.arguments,
    }));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  options.logger.info({ event: "mcp_server_started", mode: "mcp", provider: options.config.provider }, "mcp_server_started");
  return server;
}
