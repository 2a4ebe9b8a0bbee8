/**
 * Shopee Client
 *
 * Browser-backed session: API calls are made with fetch() inside a real,
 * off-screen Chrome window so they carry the site's own anti-bot headers
 * and TLS fingerprint.
 *
 * When a navigation lands on the verification page:
 * 1. solve the slider CAPTCHA in place (browser stays off-screen)
 * 2. if that fails, close the browser and reopen it on-screen with the same
 *    cookies so a human can solve it, then wait for Enter
 * 3. close the visible browser, reopen off-screen and load the page again,
 *    accepting whatever it shows
 *
 * Only one browser exists at a time; it is always closed before the next
 * one is launched.
 */
import type {
  BrowserCommand,
  BrowserCommandInputs,
  BrowserCommandOutputs,
  BrowserHandle,
  BrowserLauncher,
} from "../browser/browser-port";
import { PuppeteerLauncher } from "../browser/browser-launcher";
import { SliderCaptchaSolver } from "../captcha/slider-captcha.solver";
import { TwoCaptchaClient } from "../captcha/twocaptcha.client";
import { isVerificationHeading } from "../captcha/widget-prober";
import { classifyResponse } from "./response-classifier";
import { TerminalPrompt, type HumanPrompt } from "./human-prompt";
import { CookieStore } from "../../persistence/cookie.store";
import { ERROR_CODES, SESSION, SHOPEE } from "../../config/constants";
import { logger as defaultLogger, type Logger } from "../../monitoring/logger";
import {
  AntiBotBlockedError,
  ClientError,
  NoSessionError,
  SessionExpiredError,
} from "../../shared/errors/client.errors";
import { sleep as defaultSleep, type Sleep } from "../../shared/utils/sleep";
import type {
  FetchRequest,
  NavigationOutcome,
  ShopeeResponse,
  StoredCookie,
} from "../../shared/types/shopee.types";

export type CaptchaSolver = Pick<SliderCaptchaSolver, "solve">;

/** Where saved cookies and the browser profile live */
export type SessionStore = Pick<CookieStore, "load" | "profileDir">;

export type QueryParams = Record<string, string | number>;

/** What page-level extractors need from a session */
export interface PageSession {
  navigate(url: string, waitMs?: number): Promise<NavigationOutcome>;
  run<C extends BrowserCommand>(
    command: C,
    ...args: BrowserCommandInputs[C]
  ): Promise<BrowserCommandOutputs[C]>;
  get(path: string, params?: QueryParams): Promise<ShopeeResponse>;
}

export interface ShopeeClientOptions {
  /** Refuse to start without saved cookies (default true) */
  requireAuth?: boolean;
  cookieStore?: SessionStore;
  launcher?: BrowserLauncher;
  /** null disables auto-solving; default uses 2Captcha when a key is configured */
  solver?: CaptchaSolver | null;
  prompt?: HumanPrompt;
  sleep?: Sleep;
  logger?: Logger;
}

interface ClientDeps {
  launcher: BrowserLauncher;
  solver: CaptchaSolver | null;
  prompt: HumanPrompt;
  sleep: Sleep;
  log: Logger;
}

function createDefaultSolver(log: Logger): CaptchaSolver | null {
  const oracle = new TwoCaptchaClient({ logger: log });
  if (!oracle.isConfigured()) {
    log.debug("No 2Captcha API key found, auto-solve disabled");
    return null;
  }
  return new SliderCaptchaSolver(oracle, { logger: log });
}

export class ShopeeClient implements PageSession {
  private handle: BrowserHandle | null = null;
  private cookies: StoredCookie[] | null;
  private deps: ClientDeps;

  private constructor(cookies: StoredCookie[] | null, deps: ClientDeps) {
    this.cookies = cookies;
    this.deps = deps;
  }

  /**
   * Start a session with an off-screen browser.
   * @throws NoSessionError if auth is required and no valid cookies are saved
   */
  static async open(options: ShopeeClientOptions = {}): Promise<ShopeeClient> {
    const log = options.logger ?? defaultLogger;
    const store = options.cookieStore ?? new CookieStore({ logger: log });
    const cookies = store.load();

    if (options.requireAuth !== false && !cookies) {
      throw new NoSessionError();
    }

    const client = new ShopeeClient(cookies, {
      launcher: options.launcher ?? new PuppeteerLauncher(store.profileDir(), log),
      solver: options.solver !== undefined ? options.solver : createDefaultSolver(log),
      prompt: options.prompt ?? new TerminalPrompt(),
      sleep: options.sleep ?? defaultSleep,
      log,
    });

    const handle = await client.deps.launcher.launch({ visible: false });
    client.handle = handle;
    try {
      await client.prime(handle);
    } catch (error) {
      await client.close();
      throw error;
    }
    return client;
  }

  /** GET via browser fetch() */
  get(path: string, params?: QueryParams): Promise<ShopeeResponse> {
    let url = SHOPEE.API_BASE_URL + path;
    if (params && Object.keys(params).length > 0) {
      const query = new URLSearchParams();
      for (const [key, value] of Object.entries(params)) {
        query.set(key, String(value));
      }
      url += `?${query.toString()}`;
    }
    return this.fetch({ url, method: "GET" });
  }

  /** POST a JSON body via browser fetch() */
  post(path: string, body?: object): Promise<ShopeeResponse> {
    return this.fetch({
      url: SHOPEE.API_BASE_URL + path,
      method: "POST",
      body: JSON.stringify(body ?? null),
    });
  }

  /**
   * Navigate, let the page settle, then deal with a verification page if
   * one was served.
   */
  async navigate(url: string, waitMs: number = SESSION.NAVIGATE_SETTLE_MS): Promise<NavigationOutcome> {
    await this.requireHandle().goto(url);
    await this.deps.sleep(waitMs);
    return this.handleCaptcha(url);
  }

  run<C extends BrowserCommand>(
    command: C,
    ...args: BrowserCommandInputs[C]
  ): Promise<BrowserCommandOutputs[C]> {
    return this.requireHandle().port.run(command, ...args);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }
  }

  private async fetch(request: FetchRequest): Promise<ShopeeResponse> {
    const response = await this.requireHandle().port.run("fetch", request);
    const result = classifyResponse(response);

    switch (result.kind) {
      case "ok":
        return result.data;
      case "api-error":
        this.deps.log.error(
          { apiCode: result.error.apiCode, url: request.url },
          `API Error: ${result.error.message}`
        );
        return result.data;
      case "anti-bot":
        this.deps.log.error({ status: result.status, url: request.url }, "Anti-bot challenge triggered");
        throw new AntiBotBlockedError();
      case "session-expired":
        throw new SessionExpiredError();
    }
  }

  private async isVerificationPage(): Promise<boolean> {
    try {
      const { heading, title } = await this.requireHandle().port.run("readIndicator");
      return isVerificationHeading(heading || title);
    } catch (error) {
      this.deps.log.debug({ error: (error as Error).message }, "Could not read page heading");
      return false;
    }
  }

  private async handleCaptcha(url: string): Promise<NavigationOutcome> {
    if (!(await this.isVerificationPage())) return "clear";

    this.deps.log.warn({ url }, "CAPTCHA detected");

    if (this.deps.solver) {
      const result = await this.deps.solver.solve(this.requireHandle().port);
      if (result.solved) {
        await this.deps.sleep(SESSION.POST_SOLVE_SETTLE_MS);
        return "auto-solved";
      }
    }

    await this.solveByHand(url);
    return "human-solved";
  }

  private async solveByHand(url: string): Promise<void> {
    this.deps.log.warn("Opening browser for manual CAPTCHA solve...");
    await this.close();

    const visible = await this.deps.launcher.launch({ visible: true });
    try {
      await this.prime(visible);
      await visible.goto(url);
      await this.deps.sleep(SESSION.VISIBLE_SETTLE_MS);
      await this.deps.prompt.waitForAcknowledgement("Press Enter once you've solved the CAPTCHA...");
    } finally {
      await visible.close();
    }
    await this.deps.sleep(SESSION.VISIBLE_CLOSE_SETTLE_MS);

    const handle = await this.deps.launcher.launch({ visible: false });
    this.handle = handle;
    await this.prime(handle);
    await handle.goto(url);
    await this.deps.sleep(SESSION.NAVIGATE_SETTLE_MS);
  }

  /** Load the home page and inject the saved cookies, if any */
  private async prime(handle: BrowserHandle): Promise<void> {
    await handle.goto(SHOPEE.HOME_URL);
    if (!this.cookies) {
      await this.deps.sleep(SESSION.HOME_SETTLE_MS);
      return;
    }

    await this.deps.sleep(SESSION.COOKIE_INJECT_SETTLE_MS);
    const accepted = await handle.setCookies(this.cookies);
    this.deps.log.debug({ accepted, total: this.cookies.length }, "Session cookies injected");
    await handle.goto(SHOPEE.HOME_URL);
    await this.deps.sleep(SESSION.HOME_SETTLE_MS);
  }

  private requireHandle(): BrowserHandle {
    if (!this.handle) {
      throw new ClientError("Browser session is closed", ERROR_CODES.NO_SESSION);
    }
    return this.handle;
  }
}
