/**
 * Response Classifier
 *
 * Sorts an in-page fetch result into the outcomes the client handles
 * differently: success, expired session, anti-bot block, or an API-level
 * error that is reported but not fatal.
 */
import { SHOPEE } from "../../config/constants";
import { GenericApiError, InvalidResponseError } from "../../shared/errors/client.errors";
import type { FetchResponse, ShopeeResponse } from "../../shared/types/shopee.types";

export type ResponseClassification =
  | { kind: "ok"; data: ShopeeResponse }
  | { kind: "session-expired"; status: number }
  | { kind: "anti-bot"; status: number }
  | { kind: "api-error"; data: ShopeeResponse; error: GenericApiError };

function isShopeeResponse(value: unknown): value is ShopeeResponse {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBody(body: string): ShopeeResponse | null {
  try {
    const parsed: unknown = JSON.parse(body);
    return isShopeeResponse(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * @throws InvalidResponseError when a non-auth response is not a JSON object
 */
export function classifyResponse(response: FetchResponse): ResponseClassification {
  const data = parseBody(response.body);

  if (response.status === 401 || response.status === 403) {
    if (data?.error === SHOPEE.ANTI_BOT_ERROR_CODE) {
      return { kind: "anti-bot", status: response.status };
    }
    return { kind: "session-expired", status: response.status };
  }

  if (!data) {
    throw new InvalidResponseError(`Shopee returned a non-JSON response (HTTP ${response.status})`);
  }

  const code = data.error;
  if (typeof code === "number" && code !== 0) {
    if (code === SHOPEE.ANTI_BOT_ERROR_CODE) {
      return { kind: "anti-bot", status: response.status };
    }
    const message = data.error_msg || `API error code: ${code}`;
    return { kind: "api-error", data, error: new GenericApiError(code, message) };
  }

  return { kind: "ok", data };
}
