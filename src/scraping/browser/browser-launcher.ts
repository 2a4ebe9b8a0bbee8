/**
 * Browser Launcher
 *
 * Launches the single Chrome instance a session owns. Unattended runs put
 * the window off-screen; the human fallback and the login flow ask for a
 * visible one. The same persistent profile directory is reused so both
 * modes share Shopee's local storage.
 *
 * Callers own the returned handle and must close it before launching a
 * replacement.
 */
import type { Browser } from "puppeteer-core";
import { initStealthPuppeteer, LAUNCH_ARGS } from "./stealth.config";
import { PageContext } from "./page-context";
import type { BrowserHandle, BrowserLauncher, LaunchMode } from "./browser-port";
import config from "../../config";
import { SESSION } from "../../config/constants";
import { logger as defaultLogger, type Logger } from "../../monitoring/logger";

// Initialize puppeteer-extra with the stealth plugin
const puppeteer = initStealthPuppeteer();

export class PuppeteerLauncher implements BrowserLauncher {
  private profileDir: string;
  private log: Logger;

  constructor(profileDir: string, log: Logger = defaultLogger) {
    this.profileDir = profileDir;
    this.log = log;
  }

  async launch(mode: LaunchMode): Promise<BrowserHandle> {
    const headless = config.browserHeadless && !mode.visible;
    const args = [...LAUNCH_ARGS, `--window-size=${SESSION.WINDOW_WIDTH},${SESSION.WINDOW_HEIGHT}`];
    if (!mode.visible && !headless) {
      args.push(`--window-position=${SESSION.OFFSCREEN_POSITION}`);
    }

    const browser: Browser = await puppeteer.launch({
      headless,
      args,
      executablePath: config.chromePath || undefined,
      channel: config.chromePath ? undefined : "chrome",
      userDataDir: this.profileDir,
      defaultViewport: { width: SESSION.WINDOW_WIDTH, height: SESSION.WINDOW_HEIGHT },
      timeout: config.navigationTimeoutMs,
    });

    try {
      return await this.preparePage(browser, mode, headless);
    } catch (error) {
      this.log.error({ error: (error as Error).message }, "Browser setup failed, closing it");
      await browser.close();
      throw error;
    }
  }

  private async preparePage(browser: Browser, mode: LaunchMode, headless: boolean): Promise<BrowserHandle> {
    // Headless Chrome reports "HeadlessChrome/<version>", which the anti-bot
    // layer blocks outright. Replace it with the matching desktop UA.
    const version = await browser.version();
    const chromeVersion = version.replace("HeadlessChrome", "Chrome");
    const [existing] = await browser.pages();
    const page = existing ?? (await browser.newPage());
    if (version.includes("HeadlessChrome")) {
      await page.setUserAgent(
        `Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) ${chromeVersion} Safari/537.36`
      );
    }
    page.setDefaultNavigationTimeout(config.navigationTimeoutMs);

    this.log.info({ chromeVersion, visible: mode.visible, headless }, "Browser instance launched");
    return new PageContext(browser, page, this.log);
  }
}
