/**
 * Forex Pairs Service
 * Business logic layer for forex pair operations
 */

import type { IForexPairRepository } from '../repositories/interfaces/IForexPairRepository';
import type { ForexPair } from '../models/ForexPair';

export class ForexPairsService {
  constructor(private forexPairRepo: IForexPairRepository) {}

  /**
   * Store a pair under its id, replacing any pair already there.
   * @returns the replaced pair, or null when the id was free
   */
  async createForexPair(pair: ForexPair): Promise<ForexPair | null> {
    return this.forexPairRepo.create(pair);
  }

  async getForexPair(id: bigint): Promise<ForexPair | null> {
    return this.forexPairRepo.findById(id);
  }

  async listForexPairs(): Promise<ForexPair[]> {
    return this.forexPairRepo.findAll();
  }

  // Full replacement; an id that does not exist yet is created.
  async updateForexPair(pair: ForexPair): Promise<void> {
    await this.forexPairRepo.update(pair);
  }

  // Deleting an unknown id is not an error.
  async deleteForexPair(id: bigint): Promise<void> {
    await this.forexPairRepo.delete(id);
  }
}
