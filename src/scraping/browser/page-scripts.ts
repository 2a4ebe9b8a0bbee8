/**
 * Page Scripts
 *
 * Functions serialized by Puppeteer and executed inside the page.
 * They must stay self-contained: no imports, no outer variables. Selectors
 * and other values are passed in as arguments.
 */
import type {
  DragPath,
  WidgetBounds,
  WidgetLayout,
} from "../../shared/types/captcha.types";
import type {
  FetchRequest,
  FetchResponse,
  PageIndicator,
  RawProductPage,
  RawSearchCard,
} from "../../shared/types/shopee.types";

export interface CaptchaSelectors {
  root: string;
  slider: string;
  piece: string;
  minBackgroundWidth: number;
}

export interface OverlaySelectors {
  popupClose: string;
  overlay: string;
  languageButtonText: string;
}

/** Union of the puzzle container and slider rects */
export function probeBoundsScript(selectors: CaptchaSelectors): WidgetBounds | null {
  const captcha = document.querySelector(selectors.root);
  const slider = document.querySelector(selectors.slider);
  if (!captcha || !slider) return null;

  const cr = captcha.getBoundingClientRect();
  const sr = slider.getBoundingClientRect();
  const x = Math.min(cr.x, sr.x);
  const y = Math.min(cr.y, sr.y);
  const right = Math.max(cr.x + cr.width, sr.x + sr.width);
  const bottom = Math.max(cr.y + cr.height, sr.y + sr.height);

  return { x, y, width: right - x, height: bottom - y };
}

export function probeLayoutScript(selectors: CaptchaSelectors): WidgetLayout | null {
  const slider = document.querySelector(selectors.slider);
  const captcha = document.querySelector(selectors.root);
  const piece = document.querySelector(selectors.piece);
  if (!slider || !captcha || !piece) return null;

  let background: Element | null = null;
  for (const img of Array.from(captcha.querySelectorAll("img"))) {
    if (img.getBoundingClientRect().width >= selectors.minBackgroundWidth) {
      background = img;
      break;
    }
  }
  if (!background) return null;

  const sr = slider.getBoundingClientRect();
  const ir = background.getBoundingClientRect();
  const pr = piece.getBoundingClientRect();
  const tr = slider.parentElement ? slider.parentElement.getBoundingClientRect() : sr;

  return {
    sliderX: sr.x,
    sliderCenterY: sr.y + sr.height / 2,
    sliderWidth: sr.width,
    imageX: ir.x,
    imageY: ir.y,
    imageWidth: ir.width,
    pieceWidth: pr.width,
    trackX: tr.x,
    trackWidth: tr.width,
  };
}

export function widgetPresentScript(sliderSelector: string): boolean {
  return document.querySelector(sliderSelector) !== null;
}

/** Pointer activity over the widget so it does not expire while waiting */
export function keepaliveScript(selectors: CaptchaSelectors): boolean {
  const captcha = document.querySelector(selectors.root);
  const slider = document.querySelector(selectors.slider);
  if (!captcha) return slider !== null;

  const rect = captcha.getBoundingClientRect();
  document.dispatchEvent(
    new MouseEvent("mousemove", {
      clientX: rect.x + rect.width / 2 + (Math.random() - 0.5) * 40,
      clientY: rect.y + rect.height / 2 + (Math.random() - 0.5) * 20,
      bubbles: true,
      cancelable: true,
    })
  );

  if (slider) {
    const sr = slider.getBoundingClientRect();
    slider.dispatchEvent(
      new MouseEvent("mouseover", {
        clientX: sr.x + sr.width / 2,
        clientY: sr.y + sr.height / 2,
        bubbles: true,
        cancelable: true,
      })
    );
  }
  return slider !== null;
}

/** Closes the language picker and promotional overlays */
export function dismissOverlaysScript(selectors: OverlaySelectors): number {
  let clicked = 0;

  const close = document.querySelector<HTMLElement>(selectors.popupClose);
  if (close) {
    close.click();
    clicked++;
  }

  const overlay = document.querySelector<HTMLElement>(selectors.overlay);
  if (overlay) {
    overlay.click();
    clicked++;
  }

  for (const button of Array.from(document.querySelectorAll("button"))) {
    if ((button.textContent || "").trim() === selectors.languageButtonText) {
      button.click();
      clicked++;
      break;
    }
  }
  return clicked;
}

export function dragScript(sliderSelector: string, path: DragPath): boolean {
  const slider = document.querySelector(sliderSelector);
  if (!slider) return false;

  const rect = slider.getBoundingClientRect();
  const startX = rect.x + rect.width / 2;
  const startY = rect.y + rect.height / 2;

  slider.dispatchEvent(
    new MouseEvent("mousedown", { clientX: startX, clientY: startY, bubbles: true, cancelable: true })
  );
  for (const move of path.moves) {
    document.dispatchEvent(
      new MouseEvent("mousemove", {
        clientX: startX + move.dx,
        clientY: startY + move.dy,
        bubbles: true,
        cancelable: true,
      })
    );
  }
  document.dispatchEvent(
    new MouseEvent("mouseup", {
      clientX: startX + path.distance,
      clientY: startY,
      bubbles: true,
      cancelable: true,
    })
  );
  return true;
}

export function readIndicatorScript(): PageIndicator {
  const heading = document.querySelector<HTMLElement>("h1");
  return {
    heading: heading ? heading.innerText : "",
    title: document.title || "",
  };
}

export async function fetchScript(request: FetchRequest): Promise<FetchResponse> {
  const init: RequestInit =
    request.method === "GET"
      ? { credentials: "include" }
      : {
          method: request.method,
          headers: { "Content-Type": "application/json" },
          body: request.body,
          credentials: "include",
        };
  const response = await fetch(request.url, init);
  return { status: response.status, body: await response.text() };
}

export function extractSearchCardsScript(itemSelector: string): RawSearchCard[] {
  const cards: RawSearchCard[] = [];
  for (const item of Array.from(document.querySelectorAll<HTMLElement>(itemSelector))) {
    const link = item.querySelector("a[href]");
    cards.push({
      href: link ? link.getAttribute("href") || "" : "",
      texts: item.innerText.split("\n").filter((text) => text.trim()),
    });
  }
  return cards;
}

export function extractProductPageScript(): RawProductPage {
  const heading = document.querySelector<HTMLElement>("h1");
  return {
    name: heading ? heading.innerText.trim() : "",
    body: document.body.innerText,
  };
}
