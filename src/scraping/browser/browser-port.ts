/**
 * Browser Control Port
 *
 * The seam between the core and the browser-automation collaborator.
 * Everything that runs inside the page goes through `run()` as a named
 * command with typed arguments and a typed result; the CAPTCHA solver and
 * the session only ever talk to these interfaces.
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
  StoredCookie,
} from "../../shared/types/shopee.types";

/** Arguments of each page command */
export interface BrowserCommandInputs {
  probeBounds: [];
  /** Raw geometry; see normalizeLayout() for the track fallback */
  probeLayout: [];
  widgetPresent: [];
  keepalive: [];
  dismissOverlays: [];
  drag: [path: DragPath];
  readIndicator: [];
  fetch: [request: FetchRequest];
  extractSearchCards: [];
  extractProductPage: [];
}

/** Result of each page command */
export interface BrowserCommandOutputs {
  probeBounds: WidgetBounds | null;
  probeLayout: WidgetLayout | null;
  widgetPresent: boolean;
  /** Whether the slider was still there after the pointer activity */
  keepalive: boolean;
  /** Number of overlay elements clicked */
  dismissOverlays: number;
  /** False when the slider handle was missing */
  drag: boolean;
  readIndicator: PageIndicator;
  fetch: FetchResponse;
  extractSearchCards: RawSearchCard[];
  extractProductPage: RawProductPage;
}

export type BrowserCommand = keyof BrowserCommandInputs;

export interface BrowserPort {
  run<C extends BrowserCommand>(
    command: C,
    ...args: BrowserCommandInputs[C]
  ): Promise<BrowserCommandOutputs[C]>;
  /** PNG of the current viewport */
  screenshot(): Promise<Uint8Array>;
  /** Navigate to the current URL again */
  reload(): Promise<void>;
  isConnected(): boolean;
}

/** One controlled browser instance with a single working page */
export interface BrowserHandle {
  readonly port: BrowserPort;
  goto(url: string): Promise<void>;
  currentUrl(): string;
  /** Resolves to the number of cookies the browser accepted */
  setCookies(cookies: StoredCookie[]): Promise<number>;
  getCookies(): Promise<StoredCookie[]>;
  close(): Promise<void>;
}

export interface LaunchMode {
  /** On-screen window for a human; otherwise off-screen */
  visible: boolean;
}

export interface BrowserLauncher {
  launch(mode: LaunchMode): Promise<BrowserHandle>;
}
