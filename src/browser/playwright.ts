import { mkdir } from "node:fs/promises";
import {
  chromium,
  type Browser,
  type BrowserContext,
  type LaunchOptions,
  type Locator,
  type Page,
} from "playwright-core";
import type { Logger } from "pino";
import type { BrowserLaunchConfig } from "../config.js";
import { BridgeError, describeError } from "../errors.js";
import type { BrowserLauncher, ElementRef, PageHandle } from "./handle.js";

const ACTION_TIMEOUT_MS = 10_000;
const NAVIGATION_TIMEOUT_MS = 60_000;

class PlaywrightElement implements ElementRef {
  public constructor(
    private readonly page: Page,
    private readonly locator: Locator,
  ) {}

  public async click(): Promise<void> {
    await this.locator.click({ timeout: ACTION_TIMEOUT_MS });
  }

  public async insertText(text: string): Promise<void> {
    // One insert event: newlines stay literal instead of pressing Enter.
    await this.locator.focus({ timeout: ACTION_TIMEOUT_MS });
    await this.page.keyboard.insertText(text);
  }

  public async getAttribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name, { timeout: ACTION_TIMEOUT_MS });
  }

  public async outerHtml(): Promise<string> {
    return this.locator.evaluate((element) => element.outerHTML, undefined, { timeout: ACTION_TIMEOUT_MS });
  }

  public async scrollIntoView(): Promise<void> {
    await this.locator.scrollIntoViewIfNeeded({ timeout: ACTION_TIMEOUT_MS });
  }
}

class PlaywrightPageHandle implements PageHandle {
  private closed = false;

  public constructor(
    private readonly page: Page,
    private readonly release: () => Promise<void>,
  ) {
    page.on("close", () => {
      this.closed = true;
    });
  }

  public async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT_MS });
  }

  public async findAll(selector: string): Promise<ElementRef[]> {
    const locator = this.page.locator(selector);
    const count = await locator.count();
    return Array.from({ length: count }, (_, index) => new PlaywrightElement(this.page, locator.nth(index)));
  }

  public async find(selector: string): Promise<ElementRef | null> {
    const matches = await this.findAll(selector);
    return matches[0] ?? null;
  }

  public async runScript(expression: string): Promise<unknown> {
    return this.page.evaluate(expression);
  }

  public async readClipboard(): Promise<string> {
    return this.page.evaluate(() => navigator.clipboard.readText());
  }

  public isClosed(): boolean {
    return this.closed || this.page.isClosed();
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.release();
  }
}

export class PlaywrightLauncher implements BrowserLauncher {
  public constructor(
    private readonly config: BrowserLaunchConfig,
    private readonly logger: Logger,
  ) {}

  public async open(): Promise<PageHandle> {
    try {
      return await this.openHandle();
    } catch (error) {
      if (error instanceof BridgeError) {
        throw error;
      }
      throw new BridgeError("transport_error", "Failed to open browser session", {
        reason: describeError(error),
      });
    }
  }

  private async openHandle(): Promise<PageHandle> {
    if (this.config.cdpUrl) {
      const browser = await chromium.connectOverCDP(this.config.cdpUrl);
      const context = browser.contexts()[0] ?? (await browser.newContext(this.contextOptions()));
      this.logger.info({ event: "browser_connected", cdpUrl: this.config.cdpUrl }, "browser_connected");
      return this.attach(context, async () => {
        await browser.close();
      });
    }

    if (this.config.profilePath) {
      await mkdir(this.config.profilePath, { recursive: true });
      const context = await chromium.launchPersistentContext(this.config.profilePath, {
        ...this.launchOptions(),
        ...this.contextOptions(),
      });
      this.logger.info(
        { event: "browser_launched", profilePath: this.config.profilePath, headless: this.config.headless },
        "browser_launched",
      );
      return this.attach(context, async () => {
        await context.close();
      });
    }

    const browser: Browser = await chromium.launch(this.launchOptions());
    const context = await browser.newContext(this.contextOptions());
    this.logger.info({ event: "browser_launched", headless: this.config.headless }, "browser_launched");
    return this.attach(context, async () => {
      await context.close();
      await browser.close();
    });
  }

  private async attach(context: BrowserContext, release: () => Promise<void>): Promise<PageHandle> {
    await context.grantPermissions(["clipboard-read", "clipboard-write"]);
    const page = context.pages()[0] ?? (await context.newPage());
    return new PlaywrightPageHandle(page, release);
  }

  private launchOptions(): LaunchOptions {
    return {
      headless: this.config.headless,
      channel: this.config.executablePath ? undefined : this.config.channel,
      executablePath: this.config.executablePath || undefined,
      proxy: this.config.proxy ? { server: this.config.proxy } : undefined,
      args: ["--disable-blink-features=AutomationControlled"],
    };
  }

  private contextOptions(): { userAgent?: string; viewport: null } {
    return {
      userAgent: this.config.userAgent || undefined,
      viewport: null,
    };
  }
}
