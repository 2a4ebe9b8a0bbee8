/**
 * Widget Prober
 *
 * Read-only queries against the live slider widget. Nothing is cached:
 * a refresh can swap the widget for a new one with different geometry.
 */
import type { BrowserPort } from "../browser/browser-port";
import { normalizeLayout } from "./coordinate-mapper";
import { CAPTCHA, SHOPEE } from "../../config/constants";
import { sleep as defaultSleep, type Sleep } from "../../shared/utils/sleep";
import type { WidgetBounds, WidgetLayout } from "../../shared/types/captcha.types";

export function probeBounds(port: BrowserPort): Promise<WidgetBounds | null> {
  return port.run("probeBounds");
}

/** Fresh layout with the track fallback applied, or null if a part is missing */
export async function probeLayout(port: BrowserPort): Promise<WidgetLayout | null> {
  const layout = await port.run("probeLayout");
  return layout ? normalizeLayout(layout) : null;
}

export function isWidgetPresent(port: BrowserPort): Promise<boolean> {
  return port.run("widgetPresent");
}

/** Pointer activity over the widget; resolves to whether it is still there */
export function keepalive(port: BrowserPort): Promise<boolean> {
  return port.run("keepalive");
}

export function isVerificationHeading(text: string): boolean {
  return text.toLowerCase().includes(SHOPEE.VERIFICATION_MARKER);
}

export interface WaitForWidgetOptions {
  timeoutMs?: number;
  pollMs?: number;
  sleep?: Sleep;
}

/**
 * Poll until the slider appears, bounded by timeoutMs / pollMs checks.
 * Resolves to false on timeout instead of throwing: later steps notice a
 * missing widget on their own.
 */
export async function waitForWidget(
  port: BrowserPort,
  options: WaitForWidgetOptions = {}
): Promise<boolean> {
  const timeoutMs = options.timeoutMs ?? CAPTCHA.WIDGET_WAIT_TIMEOUT_MS;
  const pollMs = options.pollMs ?? CAPTCHA.WIDGET_WAIT_POLL_MS;
  const sleep = options.sleep ?? defaultSleep;
  const checks = Math.max(1, Math.ceil(timeoutMs / pollMs));

  for (let i = 0; i < checks; i++) {
    if (await isWidgetPresent(port)) {
      await sleep(CAPTCHA.WIDGET_SETTLE_MS);
      return true;
    }
    await sleep(pollMs);
  }
  return false;
}
