import type { PageHandle } from "../browser/handle.js";

export const PROVIDER_IDS = ["chatgpt", "deepseek", "qwen", "duckduckgo"] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export interface ProviderSelectors {
  /** Present once the chat input is usable. */
  ready: string;
  input: string;
  /** The last match in document order is clicked. */
  submit: string;
  answer: string;
}

export interface AnswerAuthorRule {
  attribute: string;
  value: string;
}

export interface AdapterSpec {
  readonly id: ProviderId;
  readonly url: string;
  readonly selectors: Readonly<ProviderSelectors>;
  /** Waited after submit and again after the answer shows up. */
  readonly settleDelayMs: number;
  readonly answerAuthor?: Readonly<AnswerAuthorRule>;
}

export interface ProviderAdapter {
  readonly spec: AdapterSpec;
  isReady(handle: PageHandle): Promise<boolean>;
  send(handle: PageHandle, text: string): Promise<boolean>;
  countAnswers(handle: PageHandle): Promise<number>;
  /** True once more answer containers exist than `baseline`. */
  isAnswered(handle: PageHandle, baseline?: number): Promise<boolean>;
  extractAnswer(handle: PageHandle): Promise<string>;
  cleanMarkup(raw: string): string;
}

export interface ProviderOptions {
  clipboardAttempts: number;
  clipboardIntervalMs: number;
}
