import { describe, it, expect } from "vitest";
import { classifyResponse } from "../../scraping/session/response-classifier";
import { GenericApiError, InvalidResponseError } from "../../shared/errors/client.errors";

describe("classifyResponse", () => {
  it("passes a successful response through", () => {
    const result = classifyResponse({ status: 200, body: '{"error":0,"data":{"total":3}}' });
    expect(result).toEqual({ kind: "ok", data: { error: 0, data: { total: 3 } } });
  });

  it("accepts a body without an error field", () => {
    expect(classifyResponse({ status: 200, body: '{"items":[]}' }).kind).toBe("ok");
  });

  it("treats a null error as success", () => {
    expect(classifyResponse({ status: 200, body: '{"error":null}' }).kind).toBe("ok");
  });

  it("maps 401 and 403 to an expired session", () => {
    expect(classifyResponse({ status: 401, body: "" })).toEqual({ kind: "session-expired", status: 401 });
    expect(classifyResponse({ status: 403, body: '{"error":19}' })).toEqual({
      kind: "session-expired",
      status: 403,
    });
  });

  it("recognizes the anti-bot code on an auth failure", () => {
    expect(classifyResponse({ status: 403, body: '{"error":90309999}' })).toEqual({
      kind: "anti-bot",
      status: 403,
    });
  });

  it("recognizes the anti-bot code on a 2xx response", () => {
    expect(classifyResponse({ status: 200, body: '{"error":90309999}' })).toEqual({
      kind: "anti-bot",
      status: 200,
    });
  });

  it("reports other API error codes without failing", () => {
    const result = classifyResponse({ status: 200, body: '{"error":4,"error_msg":"invalid list type"}' });

    expect(result.kind).toBe("api-error");
    if (result.kind !== "api-error") return;
    expect(result.error).toBeInstanceOf(GenericApiError);
    expect(result.error.apiCode).toBe(4);
    expect(result.error.message).toBe("invalid list type");
    expect(result.data.error).toBe(4);
  });

  it("falls back to the numeric code when there is no message", () => {
    const result = classifyResponse({ status: 200, body: '{"error":77}' });
    if (result.kind !== "api-error") throw new Error(`unexpected ${result.kind}`);
    expect(result.error.message).toBe("API error code: 77");
  });

  it("rejects bodies that are not JSON objects", () => {
    expect(() => classifyResponse({ status: 200, body: "<html></html>" })).toThrow(InvalidResponseError);
    expect(() => classifyResponse({ status: 502, body: "[1,2]" })).toThrow(
      "Shopee returned a non-JSON response (HTTP 502)"
    );
  });
});
