/**
 * The slice of a browser the extractor needs. Kept narrow so extraction can
 * run against an in-process fake as easily as against Chromium.
 */
export interface PageElement {
  /** Rendered text, as a user would see it */
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  /** First descendant matching the selector, or null */
  query(selector: string): Promise<PageElement | null>;
  queryAll(selector: string): Promise<PageElement[]>;
  /** Synthetic click dispatched on the element itself (not a mouse click at its position) */
  click(): Promise<void>;
  /** Force display: none */
  hide(): Promise<void>;
  /** Detach from the document */
  remove(): Promise<void>;
}

export interface BrowserSession {
  navigate(url: string): Promise<void>;
  /** Resolve with the first element matching the selector; rejects with WaitTimeoutError */
  waitFor(selector: string, timeoutMs: number): Promise<PageElement>;
  queryAll(selector: string): Promise<PageElement[]>;
  /** Script evaluated in every document before the page's own scripts */
  injectScript(script: string): Promise<void>;
  close(): Promise<void>;
}

export class WaitTimeoutError extends Error {
  constructor(
    readonly selector: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${selector}`);
    this.name = "WaitTimeoutError";
  }
}

/** The browser or its connection is gone; nothing more can be done on this page */
export class SessionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionError";
  }
}

/** Hides navigator.webdriver from page scripts */
export const MASK_WEBDRIVER_SCRIPT =
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined })";
