export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  readonly role: MessageRole;
  readonly content: string;
}

export interface ContentPart {
  type: string;
  text?: string;
}

export type MessageContent = string | ContentPart[] | null | undefined;

/** Keeps only text parts, in order, separated by a blank line. */
export function flattenContent(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  if (!content) {
    return "";
  }

  return content
    .filter((part) => part.type === "text" && typeof part.text === "string")
    .map((part) => part.text ?? "")
    .join("\n\n");
}

export function renderMessages(messages: readonly ChatMessage[]): string {
  return messages.map((message) => `[${message.role}] ${message.content}`).join("\n\n");
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
