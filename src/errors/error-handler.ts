/**
 * Standardized Error Responses
 *
 * Every error body has the shape { "error": { code, message, details? } }.
 */

import { getCorsHeaders } from "../util";

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export type ApiErrorCode =
  | "INVALID_INPUT"
  | "PERSISTENCE_FAILED"
  | "INTERNAL_ERROR"
  | "CORS_ORIGIN_NOT_ALLOWED"
  | "CORS_METHOD_NOT_ALLOWED"
  | "CORS_HEADERS_NOT_ALLOWED";

const ERROR_STATUS_MAP: Record<ApiErrorCode, number> = {
  INVALID_INPUT: 400,
  PERSISTENCE_FAILED: 500,
  INTERNAL_ERROR: 500,
  CORS_ORIGIN_NOT_ALLOWED: 400,
  CORS_METHOD_NOT_ALLOWED: 400,
  CORS_HEADERS_NOT_ALLOWED: 400,
};

export function getErrorStatus(code: ApiErrorCode): number {
  return ERROR_STATUS_MAP[code] || 400;
}

/**
 * Create standardized error response
 * @param details - extra debugging data (validation issues and the like)
 * @param status - overrides the status mapped from the code
 * @param request - when given, CORS headers for its origin are added
 */
export function createErrorResponse(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
  status?: number,
  request?: Request
): { response: Response; error: ApiError } {
  const httpStatus = status || getErrorStatus(code);
  const error: ApiError = {
    code,
    message,
    ...(details && { details }),
  };

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };

  if (request) {
    Object.assign(headers, getCorsHeaders(request));
  }

  return {
    response: new Response(JSON.stringify({ error }), {
      status: httpStatus,
      headers,
    }),
    error,
  };
}
