/**
 * Forex Pair Repository Interface
 * Defines the contract for forex pair data access operations
 */

import type { ForexPair } from '../../models/ForexPair';

export interface IForexPairRepository {
  create(pair: ForexPair): Promise<ForexPair | null>;
  findById(id: bigint): Promise<ForexPair | null>;
  findAll(): Promise<ForexPair[]>;
  update(pair: ForexPair): Promise<void>;
  delete(id: bigint): Promise<void>;
}
