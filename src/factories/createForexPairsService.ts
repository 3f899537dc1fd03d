/**
 * Factory function for creating ForexPairsService with dependencies
 * Wraps the shared store with per-request logging and the shared lock
 */

import type { Env } from '../index';
import type { Logger } from '../logging/logger';
import { LoggedForexDatabase } from '../logging/database-wrapper';
import { ForexPairRepository } from '../repositories/file/ForexPairRepository';
import { ForexPairsService } from '../services/forex-pairs.service';

export function createForexPairsService(env: Env, logger: Logger): ForexPairsService {
  const db = new LoggedForexDatabase(env.forex, logger);
  const forexPairRepo = new ForexPairRepository(db, env.forexLock);
  return new ForexPairsService(forexPairRepo);
}
