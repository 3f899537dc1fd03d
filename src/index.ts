import { randomUUID } from "node:crypto";
import { json, checkPreflight, isAllowedOrigin, isPreflightRequest } from "./util";
import { createForexPairsService } from "./factories/createForexPairsService";
import { ForexPairsController } from "./controllers/forex-pairs.controller";
import { healthCheck } from "./api/health";
import { createErrorResponse } from "./errors/error-handler";
import { Logger } from "./logging/logger";
import { sendLogsToLoki } from "./logging/loki-shipper";
import type { IForexDatabase } from "./infrastructure/database/IForexDatabase";
import type { ExclusiveLock } from "./infrastructure/lock/ExclusiveLock";
import type { ExecutionContext } from "./runtime/execution-context";
import { MAX_FOREX_PAIR_ID } from "./models/ForexPair";

export interface Env {
  forex: IForexDatabase; // shared store, created once at startup
  forexLock: ExclusiveLock; // guards forex memory and file together
  SERVICE_NAME: string;
  LOKI_URL?: string; // Grafana Loki endpoint; log shipping is off when unset
  LOKI_USERNAME?: string;
  LOKI_PASSWORD?: string;
}

const FOREX_PAIR_ID_PATTERN = /^\/forex_pair\/(\d+)$/;

/**
 * Parse the {id} path segment. Digits only, within the unsigned 64-bit
 * range; anything else does not match the route.
 */
export function parseForexPairId(pathname: string): bigint | null {
  const match = FOREX_PAIR_ID_PATTERN.exec(pathname);
  if (!match) {
    return null;
  }
  const id = BigInt(match[1]);
  return id <= MAX_FOREX_PAIR_ID ? id : null;
}

export default {
  async fetch(request: Request, env: Env, ctx: ExecutionContext): Promise<Response> {
    const url = new URL(request.url);
    const pathname = url.pathname;

    const logger = new Logger({
      traceId: randomUUID(),
      path: pathname,
      method: request.method,
      service: env.SERVICE_NAME,
    });

    let response: Response;

    try {
      const origin = request.headers.get("Origin");

      if (isPreflightRequest(request)) {
        const preflight = checkPreflight(request);
        if (preflight.ok) {
          response = new Response(null, { status: 200, headers: preflight.headers });
        } else {
          logger.warn("Rejected CORS preflight", { origin, reason: preflight.code });
          response = createErrorResponse(preflight.code, preflight.message, undefined, 400).response;
        }
      } else if (origin !== null && !isAllowedOrigin(origin)) {
        logger.warn("Rejected request from disallowed origin", { origin });
        response = createErrorResponse(
          "CORS_ORIGIN_NOT_ALLOWED",
          "Origin is not allowed to make this request",
          undefined,
          400
        ).response;
      } else if (pathname === "/health" && request.method === "GET") {
        response = await healthCheck(request);
      } else if (pathname === "/forex_pairs" && request.method === "GET") {
        const controller = new ForexPairsController(createForexPairsService(env, logger), logger);
        response = await controller.listForexPairs(request);
      } else if (pathname === "/forex_pair" && request.method === "POST") {
        const controller = new ForexPairsController(createForexPairsService(env, logger), logger);
        response = await controller.createForexPair(request);
      } else if (pathname === "/forex_pair" && request.method === "PUT") {
        const controller = new ForexPairsController(createForexPairsService(env, logger), logger);
        response = await controller.updateForexPair(request);
      } else if (pathname.startsWith("/forex_pair/") && request.method === "GET") {
        const id = parseForexPairId(pathname);
        if (id === null) {
          response = json({ error: "Not Found" }, 404, request);
        } else {
          const controller = new ForexPairsController(createForexPairsService(env, logger), logger);
          response = await controller.getForexPair(request, id);
        }
      } else if (pathname.startsWith("/forex_pair/") && request.method === "DELETE") {
        const id = parseForexPairId(pathname);
        if (id === null) {
          response = json({ error: "Not Found" }, 404, request);
        } else {
          const controller = new ForexPairsController(createForexPairsService(env, logger), logger);
          response = await controller.deleteForexPair(request, id);
        }
      } else {
        logger.warn("Route not found", { pathname, method: request.method });
        response = json({ error: "Not Found" }, 404, request);
      }
    } catch (error) {
      logger.error("Unhandled error in fetch handler", error, {
        pathname,
        method: request.method,
      });
      response = json({ error: "Internal Server Error" }, 500, request);
    }

    // Ship logs in the background once the response is ready
    if (env.LOKI_URL) {
      ctx.waitUntil(
        sendLogsToLoki(logger.getLogs(), {
          url: env.LOKI_URL,
          username: env.LOKI_USERNAME,
          password: env.LOKI_PASSWORD,
          labels: { service: env.SERVICE_NAME },
        })
      );
    }

    return response;
  },
};
