import type { Response } from "express";

export interface ChatCompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: {
      role: "assistant";
      content: string;
    };
    finish_reason: "stop";
  }>;
  usage: ChatCompletionUsage;
}

export function setupSseHeaders(res: Response): void {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
}

export function writeSseData(res: Response, payload: ChatCompletionChunk | "[DONE]"): void {
  if (payload === "[DONE]") {
    res.write("data: [DONE]\n\n");
    return;
  }

  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}
