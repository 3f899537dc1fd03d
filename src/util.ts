import { isInteger, parse, stringify } from "lossless-json";

export const ALLOWED_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;
export const ALLOWED_HEADERS = ["authorization", "accept", "content-type"] as const;
export const CORS_MAX_AGE_SECONDS = 3600;

const LOCALHOST_ORIGIN_PREFIX = "http://localhost";

/**
 * Browser origins allowed to call the API: anything served from
 * http://localhost (any port) and the opaque "null" origin of file:// pages.
 */
export function isAllowedOrigin(origin: string): boolean {
  return origin.startsWith(LOCALHOST_ORIGIN_PREFIX) || origin === "null";
}

/**
 * CORS headers for a regular (non-preflight) request.
 * Empty when the request carries no Origin or a disallowed one.
 */
export function getCorsHeaders(request: Request): Record<string, string> {
  const origin = request.headers.get("Origin");
  if (origin === null || !isAllowedOrigin(origin)) {
    return {};
  }

  return {
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Credentials": "true",
    Vary: "Origin",
  };
}

export function isPreflightRequest(request: Request): boolean {
  return (
    request.method === "OPTIONS" &&
    request.headers.has("Origin") &&
    request.headers.has("Access-Control-Request-Method")
  );
}

export type PreflightResult =
  | { ok: true; headers: Record<string, string> }
  | {
      ok: false;
      code: "CORS_ORIGIN_NOT_ALLOWED" | "CORS_METHOD_NOT_ALLOWED" | "CORS_HEADERS_NOT_ALLOWED";
      message: string;
    };

/**
 * Validate a preflight request against the CORS policy and build the
 * headers for a successful answer.
 */
export function checkPreflight(request: Request): PreflightResult {
  const origin = request.headers.get("Origin");
  if (origin === null || !isAllowedOrigin(origin)) {
    return { ok: false, code: "CORS_ORIGIN_NOT_ALLOWED", message: "Origin is not allowed to make this request" };
  }

  const requestedMethod = request.headers.get("Access-Control-Request-Method") ?? "";
  if (!ALLOWED_METHODS.some((method) => method === requestedMethod)) {
    return { ok: false, code: "CORS_METHOD_NOT_ALLOWED", message: "Request method is not allowed" };
  }

  const requestedHeaders = (request.headers.get("Access-Control-Request-Headers") ?? "")
    .split(",")
    .map((header) => header.trim().toLowerCase())
    .filter((header) => header.length > 0);
  const disallowed = requestedHeaders.filter(
    (header) => !ALLOWED_HEADERS.some((allowed) => allowed === header)
  );
  if (disallowed.length > 0) {
    return { ok: false, code: "CORS_HEADERS_NOT_ALLOWED", message: "Requested headers are not allowed" };
  }

  return {
    ok: true,
    headers: {
      "Access-Control-Allow-Origin": origin,
      "Access-Control-Allow-Credentials": "true",
      "Access-Control-Allow-Methods": ALLOWED_METHODS.join(", "),
      "Access-Control-Allow-Headers": ALLOWED_HEADERS.join(", "),
      "Access-Control-Max-Age": String(CORS_MAX_AGE_SECONDS),
      Vary: "Origin, Access-Control-Request-Method, Access-Control-Request-Headers",
    },
  };
}

export const json = (data: unknown, status = 200, request?: Request): Response => {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };

  if (request) {
    Object.assign(headers, getCorsHeaders(request));
  }

  return new Response(stringifyJson(data), {
    status,
    headers,
  });
};

/**
 * Response without a body (mutations and the not-found read).
 */
export const empty = (status = 200, request?: Request): Response => {
  return new Response(null, {
    status,
    headers: request ? getCorsHeaders(request) : {},
  });
};

/**
 * JSON.parse that keeps integers exact: integral numbers become bigint,
 * everything else a double. Throws SyntaxError on malformed input.
 */
export function parseJson(text: string): unknown {
  return parse(text, null, (value) => (isInteger(value) ? BigInt(value) : parseFloat(value)));
}

/**
 * JSON.stringify that writes bigint values as plain JSON numbers.
 */
export function stringifyJson(value: unknown): string {
  return stringify(value) ?? "null";
}
