import type { SessionLedger } from "./ledger.js";
import { renderMessages, type ChatMessage } from "./messages.js";

/**
 * - matched: a delivered message was found and only what follows it is sent
 * - no_match: nothing in the request was delivered yet, the whole history is sent
 * - empty_delta: the last message itself was delivered, the whole history is resent
 */
export type ReconcileReason = "matched" | "no_match" | "empty_delta";

export interface ReconcileResult {
  prompt: string;
  matchedIndex: number;
  reason: ReconcileReason;
  deltaSize: number;
}

export class SessionReconciler {
  public constructor(private readonly ledger: SessionLedger) {}

  /** Highest index whose trimmed content the live chat already holds, or -1. */
  public findLastDelivered(messages: readonly ChatMessage[]): number {
    for (let index = messages.length - 1; index >= 0; index -= 1) {
      const message = messages[index];
      if (message && this.ledger.has(message.content)) {
        return index;
      }
    }
    return -1;
  }

  public computeDelta(messages: readonly ChatMessage[]): ReconcileResult {
    const matchedIndex = this.findLastDelivered(messages);
    const delta = messages.slice(matchedIndex + 1);

    if (matchedIndex === -1) {
      return { prompt: renderMessages(messages), matchedIndex, reason: "no_match", deltaSize: messages.length };
    }

    if (delta.length === 0) {
      return { prompt: renderMessages(messages), matchedIndex, reason: "empty_delta", deltaSize: messages.length };
    }

    return { prompt: renderMessages(delta), matchedIndex, reason: "matched", deltaSize: delta.length };
  }

  public recordRequest(messages: readonly ChatMessage[]): void {
    const last = messages.at(-1);
    if (last) {
      this.ledger.append(last.content);
    }
  }

  public recordAnswer(text: string): void {
    this.ledger.append(text);
  }
}
