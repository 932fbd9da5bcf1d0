import { SelectorProviderAdapter } from "./base.js";
import type { MarkupRules } from "./markup.js";
import type { AdapterSpec } from "./types.js";

export const DEEPSEEK_SPEC: AdapterSpec = Object.freeze({
  id: "deepseek",
  url: "https://chat.deepseek.com/",
  selectors: Object.freeze({
    ready: 'div[role="button"]',
    input: "textarea",
    submit: 'div[role="button"]',
    answer: "xpath=//div[contains(@class,'ds-markdown') and contains(@class,'ds-markdown--block')]",
  }),
  settleDelayMs: 0,
});

export const DEEPSEEK_MARKUP: MarkupRules = {
  format: "html",
  wrappers: [{ selector: "div.md-code-block", keep: "pre" }],
  code: "pre",
};

export class DeepSeekAdapter extends SelectorProviderAdapter {
  public constructor() {
    super(DEEPSEEK_SPEC, DEEPSEEK_MARKUP);
  }
}
