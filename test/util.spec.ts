import { describe, it, expect } from "vitest";
import {
  checkPreflight,
  empty,
  getCorsHeaders,
  isAllowedOrigin,
  isPreflightRequest,
  json,
  parseJson,
  stringifyJson,
} from "../src/util";

const withOrigin = (origin: string, method = "GET", headers: Record<string, string> = {}): Request =>
  new Request("http://localhost:8080/forex_pairs", {
    method,
    headers: { Origin: origin, ...headers },
  });

describe("json utility", () => {
  it("serializes payload into a JSON Response", async () => {
    const payload = { id: 1, pair: "EUR/USD", price: 1.08 };
    const response = json(payload);

    expect(response.status).toBe(200);
    expect(response.headers.get("Content-Type")).toBe("application/json");
    expect(response.headers.get("Access-Control-Allow-Origin")).toBeNull();
    await expect(response.json()).resolves.toEqual(payload);
  });

  it("allows overriding the status code", async () => {
    const response = json({ error: "Not Found" }, 404);

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual({ error: "Not Found" });
  });
});

describe("JSON codec", () => {
  it("parses integers as bigint without losing digits", () => {
    expect(parseJson('{"id":18446744073709551615,"small":7}')).toEqual({
      id: 18446744073709551615n,
      small: 7n,
    });
  });

  it("parses fractional and exponent numbers as numbers", () => {
    expect(parseJson("[1.08,-0.5,1e3,1e400]")).toEqual([1.08, -0.5, 1000, Infinity]);
  });

  it("rejects malformed text", () => {
    expect(() => parseJson("{")).toThrow();
  });

  it("writes bigint values as plain digits", () => {
    expect(stringifyJson({ id: 9007199254740993n, pair: "EUR/USD", price: 1.08 })).toBe(
      '{"id":9007199254740993,"pair":"EUR/USD","price":1.08}'
    );
  });
});

describe("empty utility", () => {
  it("returns a response without a body", async () => {
    const response = empty(404);

    expect(response.status).toBe(404);
    expect(response.body).toBeNull();
    expect(await response.text()).toBe("");
  });

  it("carries CORS headers for an allowed origin", () => {
    const response = empty(200, withOrigin("http://localhost:3000"));

    expect(response.headers.get("Access-Control-Allow-Origin")).toBe("http://localhost:3000");
  });
});

describe("CORS headers", () => {
  it("allows any localhost origin and the null origin", () => {
    expect(isAllowedOrigin("http://localhost")).toBe(true);
    expect(isAllowedOrigin("http://localhost:5173")).toBe(true);
    expect(isAllowedOrigin("null")).toBe(true);
  });

  it("rejects other origins", () => {
    expect(isAllowedOrigin("https://localhost:5173")).toBe(false);
    expect(isAllowedOrigin("http://127.0.0.1:5173")).toBe(false);
    expect(isAllowedOrigin("https://example.com")).toBe(false);
  });

  it("echoes an allowed origin", () => {
    expect(getCorsHeaders(withOrigin("http://localhost:3000"))).toEqual({
      "Access-Control-Allow-Origin": "http://localhost:3000",
      "Access-Control-Allow-Credentials": "true",
      Vary: "Origin",
    });
  });

  it("returns no headers without an origin or for a disallowed one", () => {
    expect(getCorsHeaders(new Request("http://localhost:8080/forex_pairs"))).toEqual({});
    expect(getCorsHeaders(withOrigin("https://example.com"))).toEqual({});
  });
});

describe("preflight", () => {
  const preflight = (origin: string, method: string, headers?: string): Request => {
    const requestHeaders: Record<string, string> = { "Access-Control-Request-Method": method };
    if (headers !== undefined) {
      requestHeaders["Access-Control-Request-Headers"] = headers;
    }
    return withOrigin(origin, "OPTIONS", requestHeaders);
  };

  it("recognizes a preflight only when origin and requested method are present", () => {
    expect(isPreflightRequest(preflight("http://localhost", "GET"))).toBe(true);
    expect(isPreflightRequest(new Request("http://localhost:8080/forex_pairs", { method: "OPTIONS" }))).toBe(false);
    expect(isPreflightRequest(withOrigin("http://localhost", "OPTIONS"))).toBe(false);
  });

  it("accepts allowed headers in any case and spacing", () => {
    const result = checkPreflight(preflight("http://localhost:3000", "POST", " Content-Type ,ACCEPT,"));

    expect(result).toEqual({
      ok: true,
      headers: {
        "Access-Control-Allow-Origin": "http://localhost:3000",
        "Access-Control-Allow-Credentials": "true",
        "Access-Control-Allow-Methods": "GET, POST, PUT, DELETE",
        "Access-Control-Allow-Headers": "authorization, accept, content-type",
        "Access-Control-Max-Age": "3600",
        Vary: "Origin, Access-Control-Request-Method, Access-Control-Request-Headers",
      },
    });
  });

  it("rejects a disallowed origin first", () => {
    expect(checkPreflight(preflight("https://example.com", "PATCH", "x-api-key"))).toEqual({
      ok: false,
      code: "CORS_ORIGIN_NOT_ALLOWED",
      message: "Origin is not allowed to make this request",
    });
  });

  it("matches the requested method exactly", () => {
    expect(checkPreflight(preflight("null", "get"))).toEqual({
      ok: false,
      code: "CORS_METHOD_NOT_ALLOWED",
      message: "Request method is not allowed",
    });
  });

  it("rejects headers outside the policy", () => {
    expect(checkPreflight(preflight("null", "PUT", "content-type, x-api-key"))).toEqual({
      ok: false,
      code: "CORS_HEADERS_NOT_ALLOWED",
      message: "Requested headers are not allowed",
    });
  });
});
