import type { BrowserLauncher, ElementRef, PageHandle } from "../../src/browser/handle.js";
import type { ProviderSelectors } from "../../src/providers/types.js";

export class FakeElement implements ElementRef {
  public clicks = 0;
  public readonly inserted: string[] = [];

  public constructor(
    public html = "",
    public readonly attributes: Record<string, string> = {},
    private readonly onClick?: () => void,
  ) {}

  public async click(): Promise<void> {
    this.clicks += 1;
    this.onClick?.();
  }

  public async insertText(text: string): Promise<void> {
    this.inserted.push(text);
  }

  public async getAttribute(name: string): Promise<string | null> {
    return this.attributes[name] ?? null;
  }

  public async outerHtml(): Promise<string> {
    return this.html;
  }

  public async scrollIntoView(): Promise<void> {
    return;
  }
}

/** Selector-keyed stand-in for a browser tab. Lookups fail once it is closed. */
export class FakePage implements PageHandle {
  public readonly navigations: string[] = [];
  public readonly scripts: string[] = [];
  public clipboard = "";
  public closed = false;
  private readonly elements = new Map<string, FakeElement[]>();

  public set(selector: string, elements: FakeElement[]): this {
    this.elements.set(selector, elements);
    return this;
  }

  public add(selector: string, element: FakeElement): this {
    this.elements.set(selector, [...(this.elements.get(selector) ?? []), element]);
    return this;
  }

  public async navigate(url: string): Promise<void> {
    this.navigations.push(url);
  }

  public async findAll(selector: string): Promise<ElementRef[]> {
    if (this.closed) {
      throw new Error("Target page has been closed");
    }
    return [...(this.elements.get(selector) ?? [])];
  }

  public async find(selector: string): Promise<ElementRef | null> {
    const [first] = await this.findAll(selector);
    return first ?? null;
  }

  public async runScript(expression: string): Promise<unknown> {
    this.scripts.push(expression);
    return undefined;
  }

  public async readClipboard(): Promise<string> {
    return this.clipboard;
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeLauncher implements BrowserLauncher {
  public readonly opened: FakePage[] = [];

  public constructor(private readonly createPage: () => FakePage) {}

  public async open(): Promise<PageHandle> {
    const page = this.createPage();
    this.opened.push(page);
    return page;
  }
}

export interface ScriptedSite {
  page: FakePage;
  input: FakeElement;
  submit: FakeElement;
}

/**
 * A chat site that answers each submitted prompt with `respond(prompt)`,
 * wrapped the way the answer selector expects. A `null` reply never arrives.
 */
export function createScriptedSite(
  selectors: ProviderSelectors,
  respond: (prompt: string) => string | null,
  wrapAnswer: (text: string) => string = (text) => `<div class="ds-markdown ds-markdown--block"><p>${text}</p></div>`,
): ScriptedSite {
  const page = new FakePage();
  const input = new FakeElement();
  const submit = new FakeElement("", {}, () => {
    const reply = respond(input.inserted.at(-1) ?? "");
    if (reply !== null) {
      page.add(selectors.answer, new FakeElement(wrapAnswer(reply)));
    }
  });

  page.set(selectors.ready, [new FakeElement()]);
  page.set(selectors.input, [input]);
  page.set(selectors.submit, [submit]);
  return { page, input, submit };
}
