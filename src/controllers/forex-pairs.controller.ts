/**
 * Forex Pairs Controller
 * Handles HTTP requests for forex pair endpoints
 */

import type { ForexPairsService } from '../services/forex-pairs.service';
import { empty, json, parseJson } from '../util';
import type { Logger } from '../logging/logger';
import { createErrorResponse } from '../errors/error-handler';
import { PersistenceError } from '../infrastructure/database/PersistenceError';
import { ForexPairListSchema, ForexPairSchema, type ForexPair } from '../models/ForexPair';

type ParsedBody = { ok: true; pair: ForexPair } | { ok: false; response: Response };

export class ForexPairsController {
  constructor(
    private forexPairsService: ForexPairsService,
    private logger: Logger
  ) {}

  async createForexPair(request: Request): Promise<Response> {
    const body = await this.parseForexPair(request);
    if (!body.ok) {
      return body.response;
    }

    try {
      const previous = await this.forexPairsService.createForexPair(body.pair);
      this.logger.info('Forex pair created', { id: body.pair.id.toString(), replaced: previous !== null });
      return empty(200, request);
    } catch (error) {
      return this.failure('Failed to create forex pair', error, request, { id: body.pair.id.toString() });
    }
  }

  async getForexPair(request: Request, id: bigint): Promise<Response> {
    try {
      const pair = await this.forexPairsService.getForexPair(id);
      if (!pair) {
        return empty(404, request);
      }
      return json(ForexPairSchema.parse(pair), 200, request);
    } catch (error) {
      return this.failure('Failed to get forex pair', error, request, { id: id.toString() });
    }
  }

  async listForexPairs(request: Request): Promise<Response> {
    try {
      const pairs = await this.forexPairsService.listForexPairs();
      return json(ForexPairListSchema.parse(pairs), 200, request);
    } catch (error) {
      return this.failure('Failed to list forex pairs', error, request);
    }
  }

  async updateForexPair(request: Request): Promise<Response> {
    const body = await this.parseForexPair(request);
    if (!body.ok) {
      return body.response;
    }

    try {
      await this.forexPairsService.updateForexPair(body.pair);
      this.logger.info('Forex pair updated', { id: body.pair.id.toString() });
      return empty(200, request);
    } catch (error) {
      return this.failure('Failed to update forex pair', error, request, { id: body.pair.id.toString() });
    }
  }

  async deleteForexPair(request: Request, id: bigint): Promise<Response> {
    try {
      await this.forexPairsService.deleteForexPair(id);
      this.logger.info('Forex pair deleted', { id: id.toString() });
      return empty(200, request);
    } catch (error) {
      return this.failure('Failed to delete forex pair', error, request, { id: id.toString() });
    }
  }

  private async parseForexPair(request: Request): Promise<ParsedBody> {
    let payload: unknown;
    try {
      payload = parseJson(await request.text());
    } catch (error) {
      this.logger.warn('Rejected request body that is not JSON', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return {
        ok: false,
        response: createErrorResponse('INVALID_INPUT', 'Request body must be valid JSON', undefined, 400, request)
          .response,
      };
    }

    const result = ForexPairSchema.safeParse(payload);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      this.logger.warn('Rejected invalid forex pair', { issues });
      return {
        ok: false,
        response: createErrorResponse('INVALID_INPUT', 'Invalid forex pair', { issues }, 400, request).response,
      };
    }

    return { ok: true, pair: result.data };
  }

  private failure(
    message: string,
    error: unknown,
    request: Request,
    extra?: Record<string, unknown>
  ): Response {
    this.logger.error(message, error, extra);
    if (error instanceof PersistenceError) {
      return createErrorResponse('PERSISTENCE_FAILED', 'Failed to persist forex pairs', undefined, 500, request)
        .response;
    }
    return createErrorResponse('INTERNAL_ERROR', message, undefined, 500, request).response;
  }
}
