/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes Shopee URLs and selectors, slider CAPTCHA timing, and error codes.
 */

// --- Shopee Website Configuration ---
export const SHOPEE = {
  HOME_URL: "https://shopee.com.my",
  API_BASE_URL: "https://shopee.com.my/api/v4",
  LOGIN_URL: "https://shopee.com.my/buyer/login",
  SEARCH_URL: "https://shopee.com.my/search",
  PRODUCT_URL: "https://shopee.com.my/product",
  /** Cookie that proves an authenticated session */
  SESSION_COOKIE: "SPC_EC",
  /** URL fragments seen right after a successful login */
  POST_LOGIN_INDICATORS: ["shopee.com.my/user/", "shopee.com.my/?"],
  /** `error` value Shopee returns when its anti-bot layer blocks a request */
  ANTI_BOT_ERROR_CODE: 90309999,
  /** Case-insensitive marker in the heading of the verification interstitial */
  VERIFICATION_MARKER: "verify",
  /** Selectors used by Puppeteer to interact with Shopee pages */
  SELECTORS: {
    CAPTCHA_ROOT: "#NEW_CAPTCHA",
    CAPTCHA_SLIDER: "#sliderContainer",
    CAPTCHA_PIECE: "#puzzleImgComponent",
    POPUP_CLOSE: ".shopee-popup__close-btn",
    MODAL_OVERLAY: ".shopee-modal__overlay",
    LANGUAGE_BUTTON_TEXT: "English",
    SEARCH_ITEM: '[data-sqe="item"]',
  },
} as const;

// --- Slider CAPTCHA Solving ---
// Ordering matters: widget wait < oracle poll timeout, refresh settle > dismiss settle.
export const CAPTCHA = {
  MAX_ATTEMPTS: 8,
  /** Margin added around the widget when cropping the screenshot */
  CROP_MARGIN_PX: 10,
  /** Narrower images inside the widget are icons, not the puzzle background */
  MIN_BACKGROUND_WIDTH_PX: 100,
  WIDGET_WAIT_TIMEOUT_MS: 15000,
  WIDGET_WAIT_POLL_MS: 1000,
  /** Grace period after the widget shows up before it is touched */
  WIDGET_SETTLE_MS: 1000,
  REFRESH_WIDGET_WAIT_TIMEOUT_MS: 20000,
  POLL_INTERVAL_MS: 2000,
  POLL_TIMEOUT_MS: 60000,
  POST_DRAG_SETTLE_MS: 3000,
  POST_REFRESH_SETTLE_MS: 4000,
  MODAL_DISMISS_SETTLE_MS: 500,
  /** Pointer moves per drag: MIN_STEPS + [0, STEP_SPREAD) */
  DRAG_MIN_STEPS: 30,
  DRAG_STEP_SPREAD: 15,
  INSTRUCTION: "Click on the position where the puzzle piece should be placed",
} as const;

// --- Session ---
export const SESSION = {
  /** Saved cookies older than this are ignored */
  COOKIE_MAX_AGE_SECONDS: 24 * 60 * 60,
  NAVIGATE_SETTLE_MS: 5000,
  HOME_SETTLE_MS: 3000,
  COOKIE_INJECT_SETTLE_MS: 2000,
  POST_SOLVE_SETTLE_MS: 2000,
  VISIBLE_SETTLE_MS: 3000,
  VISIBLE_CLOSE_SETTLE_MS: 1000,
  LOGIN_POLL_MS: 2000,
  WINDOW_WIDTH: 1280,
  WINDOW_HEIGHT: 720,
  /** Window position that keeps the unattended browser off every screen */
  OFFSCREEN_POSITION: "-2000,-2000",
} as const;

// --- Error Codes ---
// Classified error types for log entries and retry decisions.
export const ERROR_CODES = {
  WIDGET_NOT_FOUND: "WIDGET_NOT_FOUND",
  ORACLE_SUBMIT_FAILED: "ORACLE_SUBMIT_FAILED",
  ORACLE_TIMEOUT: "ORACLE_TIMEOUT",
  ORACLE_ERROR: "ORACLE_ERROR",
  LAYOUT_UNAVAILABLE: "LAYOUT_UNAVAILABLE",
  DRAG_REJECTED: "DRAG_REJECTED",
  SESSION_EXPIRED: "SESSION_EXPIRED",
  ANTI_BOT_BLOCKED: "ANTI_BOT_BLOCKED",
  API_ERROR: "API_ERROR",
  NO_SESSION: "NO_SESSION",
  INVALID_RESPONSE: "INVALID_RESPONSE",
  LOGIN_FAILED: "LOGIN_FAILED",
  UNKNOWN: "UNKNOWN",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
