// Playwright implementation of the browser capability
import {
  chromium,
  errors,
  type Browser,
  type BrowserContext,
  type ElementHandle,
  type Page,
} from "playwright-core";
import { SessionError, WaitTimeoutError, type BrowserSession, type PageElement } from "./types.js";

export const DESKTOP_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface LaunchOptions {
  headless: boolean;
  /** "host:port" or a full proxy URL */
  proxy?: string;
  /** Chrome/Chromium binary; playwright's own download is used when unset */
  executablePath?: string;
  navigationTimeoutMs: number;
  userAgent?: string;
}

const CLOSED_PATTERNS = [
  /target (page, context or browser )?(has been )?closed/i,
  /browser has been closed/i,
  /browser has disconnected/i,
  /protocol error/i,
  /net::err_/i,
];

/** Map playwright failures onto the session's error types */
function translate(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  if (CLOSED_PATTERNS.some((p) => p.test(err.message))) {
    return new SessionError(err.message, { cause: err });
  }
  return err;
}

async function guarded<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw translate(err);
  }
}

class PlaywrightElement implements PageElement {
  constructor(private readonly handle: ElementHandle<SVGElement | HTMLElement>) {}

  text(): Promise<string> {
    return guarded(() =>
      this.handle.evaluate((node) => (node instanceof HTMLElement ? node.innerText : node.textContent ?? ""))
    );
  }

  attribute(name: string): Promise<string | null> {
    return guarded(() => this.handle.getAttribute(name));
  }

  async query(selector: string): Promise<PageElement | null> {
    const found = await guarded(() => this.handle.$(selector));
    return found ? new PlaywrightElement(found) : null;
  }

  async queryAll(selector: string): Promise<PageElement[]> {
    const found = await guarded(() => this.handle.$$(selector));
    return found.map((h) => new PlaywrightElement(h));
  }

  click(): Promise<void> {
    return guarded(() => this.handle.dispatchEvent("click"));
  }

  hide(): Promise<void> {
    return guarded(() =>
      this.handle.evaluate((node) => {
        if (node instanceof HTMLElement) node.style.display = "none";
      })
    );
  }

  remove(): Promise<void> {
    return guarded(() =>
      this.handle.evaluate((node) => {
        node.remove();
      })
    );
  }
}

export class PlaywrightSession implements BrowserSession {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly navigationTimeoutMs: number
  ) {}

  static async launch(options: LaunchOptions): Promise<PlaywrightSession> {
    const browser = await chromium.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      proxy: options.proxy ? { server: options.proxy } : undefined,
      args: [
        "--no-sandbox",
        "--disable-dev-shm-usage",
        "--disable-blink-features=AutomationControlled",
        "--window-size=1920,1080",
      ],
      ignoreDefaultArgs: ["--enable-automation"],
      // The extract command owns shutdown so the sheet is saved before exit
      handleSIGINT: false,
      handleSIGTERM: false,
      handleSIGHUP: false,
    });

    try {
      const context = await browser.newContext({
        userAgent: options.userAgent ?? DESKTOP_USER_AGENT,
        viewport: { width: 1920, height: 1080 },
      });
      const page = await context.newPage();
      return new PlaywrightSession(browser, context, page, options.navigationTimeoutMs);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  async navigate(url: string): Promise<void> {
    await guarded(() =>
      this.page.goto(url, { timeout: this.navigationTimeoutMs, waitUntil: "domcontentloaded" })
    );
  }

  async waitFor(selector: string, timeoutMs: number): Promise<PageElement> {
    try {
      const handle = await this.page.waitForSelector(selector, { timeout: timeoutMs, state: "attached" });
      if (!handle) throw new WaitTimeoutError(selector, timeoutMs);
      return new PlaywrightElement(handle);
    } catch (err) {
      if (err instanceof errors.TimeoutError) throw new WaitTimeoutError(selector, timeoutMs);
      throw translate(err);
    }
  }

  async queryAll(selector: string): Promise<PageElement[]> {
    const found = await guarded(() => this.page.$$(selector));
    return found.map((h) => new PlaywrightElement(h));
  }

  async injectScript(script: string): Promise<void> {
    await guarded(() => this.context.addInitScript(script));
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}
