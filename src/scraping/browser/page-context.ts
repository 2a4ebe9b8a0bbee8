/**
 * Page Context
 *
 * Puppeteer implementation of the browser port: one browser, one working
 * page. Page commands are dispatched through a handler table so every
 * command name maps to exactly one in-page script.
 */
import type { Browser, Page } from "puppeteer-core";
import type {
  BrowserCommand,
  BrowserCommandInputs,
  BrowserCommandOutputs,
  BrowserHandle,
  BrowserPort,
} from "./browser-port";
import {
  dismissOverlaysScript,
  dragScript,
  extractProductPageScript,
  extractSearchCardsScript,
  fetchScript,
  keepaliveScript,
  probeBoundsScript,
  probeLayoutScript,
  readIndicatorScript,
  widgetPresentScript,
  type CaptchaSelectors,
  type OverlaySelectors,
} from "./page-scripts";
import { CAPTCHA, SHOPEE } from "../../config/constants";
import type { StoredCookie } from "../../shared/types/shopee.types";
import { logger as defaultLogger, type Logger } from "../../monitoring/logger";

const CAPTCHA_SELECTORS: CaptchaSelectors = {
  root: SHOPEE.SELECTORS.CAPTCHA_ROOT,
  slider: SHOPEE.SELECTORS.CAPTCHA_SLIDER,
  piece: SHOPEE.SELECTORS.CAPTCHA_PIECE,
  minBackgroundWidth: CAPTCHA.MIN_BACKGROUND_WIDTH_PX,
};

const OVERLAY_SELECTORS: OverlaySelectors = {
  popupClose: SHOPEE.SELECTORS.POPUP_CLOSE,
  overlay: SHOPEE.SELECTORS.MODAL_OVERLAY,
  languageButtonText: SHOPEE.SELECTORS.LANGUAGE_BUTTON_TEXT,
};

type CommandHandlers = {
  [C in BrowserCommand]: (
    page: Page,
    ...args: BrowserCommandInputs[C]
  ) => Promise<BrowserCommandOutputs[C]>;
};

const COMMAND_HANDLERS: CommandHandlers = {
  probeBounds: (page) => page.evaluate(probeBoundsScript, CAPTCHA_SELECTORS),
  probeLayout: (page) => page.evaluate(probeLayoutScript, CAPTCHA_SELECTORS),
  widgetPresent: (page) => page.evaluate(widgetPresentScript, CAPTCHA_SELECTORS.slider),
  keepalive: (page) => page.evaluate(keepaliveScript, CAPTCHA_SELECTORS),
  dismissOverlays: (page) => page.evaluate(dismissOverlaysScript, OVERLAY_SELECTORS),
  drag: (page, path) => page.evaluate(dragScript, CAPTCHA_SELECTORS.slider, path),
  readIndicator: (page) => page.evaluate(readIndicatorScript),
  fetch: (page, request) => page.evaluate(fetchScript, request),
  extractSearchCards: (page) =>
    page.evaluate(extractSearchCardsScript, SHOPEE.SELECTORS.SEARCH_ITEM),
  extractProductPage: (page) => page.evaluate(extractProductPageScript),
};

export class PuppeteerBrowserPort implements BrowserPort {
  constructor(private readonly page: Page) {}

  run<C extends BrowserCommand>(
    command: C,
    ...args: BrowserCommandInputs[C]
  ): Promise<BrowserCommandOutputs[C]> {
    const handler = COMMAND_HANDLERS[command];
    return handler(this.page, ...args);
  }

  screenshot(): Promise<Uint8Array> {
    return this.page.screenshot({ type: "png" });
  }

  async reload(): Promise<void> {
    await this.page.goto(this.page.url(), { waitUntil: "domcontentloaded" });
  }

  isConnected(): boolean {
    return this.page.browser().connected && !this.page.isClosed();
  }
}

export class PageContext implements BrowserHandle {
  readonly port: BrowserPort;
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly log: Logger = defaultLogger
  ) {
    this.port = new PuppeteerBrowserPort(page);
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async setCookies(cookies: StoredCookie[]): Promise<number> {
    let accepted = 0;
    for (const cookie of cookies) {
      try {
        await this.page.setCookie({
          name: cookie.name,
          value: cookie.value,
          ...(cookie.domain ? { domain: cookie.domain } : {}),
          ...(cookie.path ? { path: cookie.path } : {}),
        });
        accepted++;
      } catch (error) {
        // Stale or foreign-domain cookies are rejected one by one
        this.log.debug(
          { cookie: cookie.name, error: (error as Error).message },
          "Cookie rejected by browser"
        );
      }
    }
    return accepted;
  }

  async getCookies(): Promise<StoredCookie[]> {
    const cookies = await this.page.cookies();
    return cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires,
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
    }));
  }

  /**
   * Close the whole browser. Safe to call multiple times.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.browser.close();
    } catch (error) {
      this.log.warn({ error: (error as Error).message }, "Failed to close browser");
    }
  }
}
