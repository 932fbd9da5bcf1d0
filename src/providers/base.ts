import type { ElementRef, PageHandle } from "../browser/handle.js";
import { retryWithInterval } from "../interaction/poll.js";
import { cleanMarkup, type MarkupRules } from "./markup.js";
import type { AdapterSpec, ProviderAdapter } from "./types.js";

// Some composers only render the submit control once text is present.
const SUBMIT_LOOKUP = { attempts: 5, intervalMs: 200 };

async function findAllSafe(handle: PageHandle, selector: string): Promise<ElementRef[]> {
  try {
    return await handle.findAll(selector);
  } catch {
    return [];
  }
}

/**
 * Selector-driven adapter. Predicates swallow lookup failures and report
 * "not yet"; the state machine owns every deadline.
 */
export class SelectorProviderAdapter implements ProviderAdapter {
  public constructor(
    public readonly spec: AdapterSpec,
    protected readonly markupRules: MarkupRules,
  ) {}

  public async isReady(handle: PageHandle): Promise<boolean> {
    const markers = await findAllSafe(handle, this.spec.selectors.ready);
    return markers.length > 0;
  }

  public async send(handle: PageHandle, text: string): Promise<boolean> {
    try {
      const input = await handle.find(this.spec.selectors.input);
      if (!input) {
        return false;
      }

      await input.click();
      await input.insertText(text);

      const submitButtons = await retryWithInterval(
        () => findAllSafe(handle, this.spec.selectors.submit),
        (buttons) => buttons.length > 0,
        SUBMIT_LOOKUP,
      );
      const submit = submitButtons.at(-1);
      if (!submit) {
        return false;
      }

      await submit.click();
      return true;
    } catch {
      return false;
    }
  }

  public async countAnswers(handle: PageHandle): Promise<number> {
    const containers = await findAllSafe(handle, this.spec.selectors.answer);
    return containers.length;
  }

  public async isAnswered(handle: PageHandle, baseline = 0): Promise<boolean> {
    const containers = await findAllSafe(handle, this.spec.selectors.answer);
    const last = containers.at(-1);
    if (!last || containers.length <= baseline) {
      return false;
    }

    const author = this.spec.answerAuthor;
    if (!author) {
      return true;
    }

    try {
      return (await last.getAttribute(author.attribute)) === author.value;
    } catch {
      return false;
    }
  }

  public async extractAnswer(handle: PageHandle): Promise<string> {
    const last = (await findAllSafe(handle, this.spec.selectors.answer)).at(-1);
    if (!last) {
      return "";
    }

    try {
      return this.cleanMarkup(await this.readAnswer(handle, last)).trim();
    } catch {
      return "";
    }
  }

  public cleanMarkup(raw: string): string {
    return cleanMarkup(raw, this.markupRules);
  }

  protected async readAnswer(_handle: PageHandle, container: ElementRef): Promise<string> {
    return container.outerHtml();
  }
}
