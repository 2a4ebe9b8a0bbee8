/**
 * CAPTCHA-Specific Error Classes
 *
 * Granular errors for the slider CAPTCHA pipeline. All of them are
 * recoverable: the solver catches them at the per-attempt boundary and turns
 * them into "refresh and retry". Callers only ever see a solved/unsolved result.
 */
import { ERROR_CODES, type ErrorCode } from "../../config/constants";

/**
 * Base class for a failed solve attempt.
 * `refreshWidget` tells the solver whether to reload the page before the
 * next attempt.
 */
export class CaptchaAttemptError extends Error {
  public readonly code: ErrorCode;
  public readonly refreshWidget: boolean;

  constructor(message: string, code: ErrorCode, refreshWidget: boolean = true) {
    super(message);
    this.name = "CaptchaAttemptError";
    this.code = code;
    this.refreshWidget = refreshWidget;
  }
}

/** Widget (or one of its required parts) is not on the page */
export class WidgetNotFoundError extends CaptchaAttemptError {
  constructor(message: string = "CAPTCHA widget not found") {
    super(message, ERROR_CODES.WIDGET_NOT_FOUND);
    this.name = "WidgetNotFoundError";
  }
}

/** 2Captcha refused the task; the widget itself is still usable */
export class OracleSubmitFailedError extends CaptchaAttemptError {
  constructor(message: string = "2Captcha did not accept the task") {
    super(message, ERROR_CODES.ORACLE_SUBMIT_FAILED, false);
    this.name = "OracleSubmitFailedError";
  }
}

/** No answer before the poll ceiling, or the widget expired while waiting */
export class OracleTimeoutError extends CaptchaAttemptError {
  constructor(message: string = "2Captcha did not answer in time") {
    super(message, ERROR_CODES.ORACLE_TIMEOUT);
    this.name = "OracleTimeoutError";
  }
}

/** 2Captcha returned an error, an empty answer, or could not be reached */
export class OracleError extends CaptchaAttemptError {
  constructor(message: string = "2Captcha API error") {
    super(message, ERROR_CODES.ORACLE_ERROR);
    this.name = "OracleError";
  }
}

/** Slider/background/piece geometry could not be read before dragging */
export class LayoutUnavailableError extends CaptchaAttemptError {
  constructor(message: string = "CAPTCHA layout unavailable") {
    super(message, ERROR_CODES.LAYOUT_UNAVAILABLE);
    this.name = "LayoutUnavailableError";
  }
}

/** The drag did not clear the verification page */
export class DragRejectedError extends CaptchaAttemptError {
  constructor(message: string = "Slider drag rejected") {
    super(message, ERROR_CODES.DRAG_REJECTED);
    this.name = "DragRejectedError";
  }
}
