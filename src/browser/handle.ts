/**
 * Opaque view of one browser tab. Selectors are either CSS or prefixed with
 * `xpath=`; provider adapters only ever talk to the page through this seam.
 */
export interface ElementRef {
  click(): Promise<void>;
  insertText(text: string): Promise<void>;
  getAttribute(name: string): Promise<string | null>;
  outerHtml(): Promise<string>;
  scrollIntoView(): Promise<void>;
}

export interface PageHandle {
  navigate(url: string): Promise<void>;
  /** Matches in document order; empty when nothing matches. */
  findAll(selector: string): Promise<ElementRef[]>;
  find(selector: string): Promise<ElementRef | null>;
  runScript(expression: string): Promise<unknown>;
  readClipboard(): Promise<string>;
  isClosed(): boolean;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  open(): Promise<PageHandle>;
}
