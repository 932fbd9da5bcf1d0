import type { ElementRef, PageHandle } from "../browser/handle.js";
import { retryWithInterval } from "../interaction/poll.js";
import { SelectorProviderAdapter } from "./base.js";
import type { MarkupRules } from "./markup.js";
import type { AdapterSpec, ProviderOptions } from "./types.js";

const COPY_BUTTON_SELECTOR = "xpath=//*[@data-copyairesponse='true']";
const SCROLL_SCRIPT = `(() => {
  const form = document.querySelector("form[autocomplete='off']");
  const scroller = form?.parentElement?.querySelector("div");
  if (scroller) scroller.scrollTop = scroller.scrollHeight;
  return Boolean(scroller);
})()`;

export const DUCKDUCKGO_SPEC: AdapterSpec = Object.freeze({
  id: "duckduckgo",
  url: "https://duck.ai/",
  selectors: Object.freeze({
    ready: 'button[type="submit"][aria-label="Send"]',
    input: "textarea",
    submit: 'button[type="submit"][aria-label="Send"]',
    answer: "xpath=//div[@heading]",
  }),
  settleDelayMs: 0,
});

export const DUCKDUCKGO_MARKUP: MarkupRules = { format: "text" };

/** Answers are copied out through the site's own copy control and the clipboard. */
export class DuckDuckGoAdapter extends SelectorProviderAdapter {
  public constructor(private readonly options: ProviderOptions) {
    super(DUCKDUCKGO_SPEC, DUCKDUCKGO_MARKUP);
  }

  protected override async readAnswer(handle: PageHandle, container: ElementRef): Promise<string> {
    await this.scrollToLatest(handle, container);
    return retryWithInterval(
      () => this.copyLatestAnswer(handle),
      (text) => text.trim().length > 0,
      { attempts: this.options.clipboardAttempts, intervalMs: this.options.clipboardIntervalMs },
    );
  }

  private async scrollToLatest(handle: PageHandle, container: ElementRef): Promise<void> {
    try {
      await handle.runScript(SCROLL_SCRIPT);
      await container.scrollIntoView();
    } catch {
      // Scrolling only helps the copy control render; reading continues without it.
      return;
    }
  }

  private async copyLatestAnswer(handle: PageHandle): Promise<string> {
    try {
      const copyButton = (await handle.findAll(COPY_BUTTON_SELECTOR)).at(-1);
      if (!copyButton) {
        return "";
      }
      await copyButton.click();
      return await handle.readClipboard();
    } catch {
      return "";
    }
  }
}
