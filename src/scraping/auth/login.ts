/**
 * Interactive Login
 *
 * Opens a visible browser on the login page and waits for the person at
 * the keyboard to sign in. Login is detected from the post-login URL or
 * the session cookie; the captured cookies are then saved for later
 * sessions.
 */
import type { BrowserHandle, BrowserLauncher } from "../browser/browser-port";
import config from "../../config";
import { SESSION, SHOPEE } from "../../config/constants";
import { logger as defaultLogger, type Logger } from "../../monitoring/logger";
import { CookieStore } from "../../persistence/cookie.store";
import { LoginFailedError } from "../../shared/errors/client.errors";
import { sleep as defaultSleep, type Sleep } from "../../shared/utils/sleep";
import type { StoredCookie } from "../../shared/types/shopee.types";

export interface LoginOptions {
  launcher: BrowserLauncher;
  store: Pick<CookieStore, "save">;
  timeoutMs?: number;
  pollMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export interface LoginResult {
  cookies: StoredCookie[];
  savedTo: string;
}

function hasSessionCookie(cookies: StoredCookie[]): boolean {
  return cookies.some((cookie) => cookie.name === SHOPEE.SESSION_COOKIE);
}

export function isPostLoginUrl(url: string): boolean {
  return SHOPEE.POST_LOGIN_INDICATORS.some((indicator) => url.includes(indicator));
}

async function waitForLogin(
  handle: BrowserHandle,
  checks: number,
  pollMs: number,
  sleep: Sleep
): Promise<boolean> {
  for (let i = 0; i < checks; i++) {
    await sleep(pollMs);
    if (!handle.port.isConnected()) {
      throw new LoginFailedError("Browser was closed before login completed.");
    }
    if (isPostLoginUrl(handle.currentUrl())) return true;
    if (hasSessionCookie(await handle.getCookies())) return true;
  }
  return false;
}

export async function login(options: LoginOptions): Promise<LoginResult> {
  const log = options.logger ?? defaultLogger;
  const sleep = options.sleep ?? defaultSleep;
  const pollMs = options.pollMs ?? SESSION.LOGIN_POLL_MS;
  const timeoutMs = options.timeoutMs ?? config.loginTimeoutMs;

  log.info("Opening Chrome for Shopee login. Log in manually; the browser closes once login is detected.");
  const handle = await options.launcher.launch({ visible: true });

  let cookies: StoredCookie[] = [];
  try {
    await handle.goto(SHOPEE.LOGIN_URL);
    log.info("Waiting for login...");

    const loggedIn = await waitForLogin(handle, Math.ceil(timeoutMs / pollMs), pollMs, sleep);
    if (!loggedIn) {
      throw new LoginFailedError("Timed out waiting for login.");
    }

    // Give the remaining cookies a moment to settle
    await sleep(SESSION.COOKIE_INJECT_SETTLE_MS);
    cookies = await handle.getCookies();
  } finally {
    await handle.close();
  }

  if (!hasSessionCookie(cookies)) {
    throw new LoginFailedError();
  }

  const savedTo = options.store.save(cookies);
  log.info({ path: savedTo, count: cookies.length }, "Login successful, cookies saved");
  return { cookies, savedTo };
}
