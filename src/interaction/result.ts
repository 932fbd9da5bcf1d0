import { BridgeError, type BridgeErrorCode } from "../errors.js";

export type InteractionStatus =
  | "ok"
  | "timeout"
  | "send_failed"
  | "extract_failed"
  | "load_timeout"
  | "transport_error";

export interface InteractionResult {
  status: InteractionStatus;
  text?: string;
  elapsedMs: number;
}

/** Prefix that marks a reply string as a failure on the simplified surfaces. */
export const FAILURE_SENTINEL = "Error: ";

const FAILURE_MESSAGES: Record<Exclude<InteractionStatus, "ok">, string> = {
  timeout: "Response timeout",
  send_failed: "Failed to send message",
  extract_failed: "Empty response from chat interface",
  load_timeout: "Chat interface failed to load",
  transport_error: "Browser session is closed",
};

const FAILURE_CODES: Record<Exclude<InteractionStatus, "ok">, BridgeErrorCode> = {
  timeout: "response_timeout",
  send_failed: "send_failed",
  extract_failed: "extract_failed",
  load_timeout: "load_timeout",
  transport_error: "transport_error",
};

export function isFailureText(text: string): boolean {
  return text.startsWith(FAILURE_SENTINEL);
}

/** Reply text for string-only callers: the answer, or the sentinel-prefixed failure. */
export function toReplyText(result: InteractionResult): string {
  if (result.status === "ok") {
    return result.text ?? "";
  }
  return `${FAILURE_SENTINEL}${FAILURE_MESSAGES[result.status]}`;
}

export function resultToBridgeError(result: InteractionResult): BridgeError | null {
  if (result.status === "ok") {
    return null;
  }

  const code = FAILURE_CODES[result.status];
  return new BridgeError(code, FAILURE_MESSAGES[result.status], {
    status: result.status,
    elapsedMs: result.elapsedMs,
    restartRecommended: code === "transport_error",
  });
}
