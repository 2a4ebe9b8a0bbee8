/**
 * Custom Error Classes for Shopee Client Operations
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * The CLI prints the message of any ClientError and exits non-zero.
 */
import { ERROR_CODES, type ErrorCode } from "../../config/constants";

/**
 * Base class for all client errors.
 * Includes an error code for classification in logs.
 */
export class ClientError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, retryable: boolean = false) {
    super(message);
    this.name = "ClientError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Shopee rejected the session cookies (HTTP 401/403) */
export class SessionExpiredError extends ClientError {
  constructor(message: string = "Session expired. Run 'shopee login' to re-authenticate.") {
    super(message, ERROR_CODES.SESSION_EXPIRED);
    this.name = "SessionExpiredError";
  }
}

/** Shopee's anti-bot layer blocked the request; distinct from an expired session */
export class AntiBotBlockedError extends ClientError {
  constructor(message: string = "Anti-bot challenge triggered. Try again or re-login.") {
    super(message, ERROR_CODES.ANTI_BOT_BLOCKED, true);
    this.name = "AntiBotBlockedError";
  }
}

/**
 * Shopee answered with a non-zero `error`. Not fatal: it is logged and the
 * response body is still handed back to the caller.
 */
export class GenericApiError extends ClientError {
  public readonly apiCode: number;

  constructor(apiCode: number, message: string = `API error code: ${apiCode}`) {
    super(message, ERROR_CODES.API_ERROR);
    this.name = "GenericApiError";
    this.apiCode = apiCode;
  }
}

/** An authenticated operation was requested without valid saved cookies */
export class NoSessionError extends ClientError {
  constructor(message: string = "No valid session found. Run 'shopee login' first.") {
    super(message, ERROR_CODES.NO_SESSION);
    this.name = "NoSessionError";
  }
}

/** Response body was not the JSON object Shopee normally sends */
export class InvalidResponseError extends ClientError {
  constructor(message: string = "Shopee returned a non-JSON response") {
    super(message, ERROR_CODES.INVALID_RESPONSE, true);
    this.name = "InvalidResponseError";
  }
}

/** Interactive login did not produce a session cookie */
export class LoginFailedError extends ClientError {
  constructor(message: string = "Login failed - session cookie not found.") {
    super(message, ERROR_CODES.LOGIN_FAILED);
    this.name = "LoginFailedError";
  }
}
