import { SelectorProviderAdapter } from "./base.js";
import type { MarkupRules } from "./markup.js";
import type { AdapterSpec } from "./types.js";

export const QWEN_SPEC: AdapterSpec = Object.freeze({
  id: "qwen",
  url: "https://chat.qwen.ai/",
  selectors: Object.freeze({
    ready: "xpath=//textarea[@id='chat-input']",
    input: "textarea",
    submit: "#send-message-button",
    answer: "xpath=//div[@id='response-content-container']",
  }),
  settleDelayMs: 0,
});

// The class name is misspelled on the site itself.
export const QWEN_MARKUP: MarkupRules = {
  format: "html",
  hiddenStyle: "display: none;",
  wrappers: [{ selector: "div.code-cntainer", keep: "div.cm-content" }],
  code: "div.code-cntainer div.cm-content",
  blockSeparators: true,
  collapse: "single",
};

export class QwenAdapter extends SelectorProviderAdapter {
  public constructor() {
    super(QWEN_SPEC, QWEN_MARKUP);
  }
}
