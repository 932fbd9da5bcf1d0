import type { PageHandle } from "../browser/handle.js";
import { sleep } from "../interaction/poll.js";
import { SelectorProviderAdapter } from "./base.js";
import type { MarkupRules } from "./markup.js";
import type { AdapterSpec } from "./types.js";

const PREFERRED_RESPONSE_SELECTOR = 'button[data-testid="paragen-prefer-response-button"]';

export const CHATGPT_SPEC: AdapterSpec = Object.freeze({
  id: "chatgpt",
  url: "https://chatgpt.com/",
  selectors: Object.freeze({
    ready: 'button[data-testid="composer-speech-button"]',
    input: 'div[contenteditable="true"]',
    submit: 'button[data-testid="send-button"]',
    // Every message bubble; the author check below tells turns apart.
    answer: "xpath=//div[@data-message-author-role]",
  }),
  // Controls render before the answer text has finished streaming.
  settleDelayMs: 1000,
  answerAuthor: Object.freeze({ attribute: "data-message-author-role", value: "assistant" }),
});

export const CHATGPT_MARKUP: MarkupRules = {
  format: "html",
  wrappers: [{ selector: 'pre[class~="!overflow-visible"]', keep: "code" }],
  code: "pre code",
};

export class ChatGptAdapter extends SelectorProviderAdapter {
  public constructor() {
    super(CHATGPT_SPEC, CHATGPT_MARKUP);
  }

  /** The speech button comes back once streaming stops. */
  public override async isAnswered(handle: PageHandle, baseline = 0): Promise<boolean> {
    if (!(await super.isAnswered(handle, baseline))) {
      return false;
    }
    return this.isReady(handle);
  }

  public override async extractAnswer(handle: PageHandle): Promise<string> {
    await this.choosePreferredResponse(handle);
    return super.extractAnswer(handle);
  }

  /** When two drafts are offered side by side, keep the first. */
  private async choosePreferredResponse(handle: PageHandle): Promise<void> {
    try {
      const button = await handle.find(PREFERRED_RESPONSE_SELECTOR);
      if (!button) {
        return;
      }
      await button.click();
      await sleep(this.spec.settleDelayMs);
    } catch {
      // The draft picker vanishing between lookup and click leaves the answer as is.
      return;
    }
  }
}
