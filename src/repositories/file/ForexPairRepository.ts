/**
 * Forex Pair Repository Implementation using the file-backed store
 * Implements IForexPairRepository interface using IForexDatabase abstraction
 *
 * Runs every store access under the shared lock. Mutations hold the lock
 * across the file write too, so no two writes interleave and no reader
 * sees memory that is ahead of a write still in flight.
 */

import type { IForexPairRepository } from '../interfaces/IForexPairRepository';
import type { IForexDatabase } from '../../infrastructure/database/IForexDatabase';
import type { ExclusiveLock } from '../../infrastructure/lock/ExclusiveLock';
import type { ForexPair } from '../../models/ForexPair';

export class ForexPairRepository implements IForexPairRepository {
  constructor(
    private db: IForexDatabase,
    private lock: ExclusiveLock
  ) {}

  async create(pair: ForexPair): Promise<ForexPair | null> {
    return this.lock.runExclusive(async () => {
      const previous = this.db.insert(pair);
      await this.db.saveToFile();
      return previous ?? null;
    });
  }

  async findById(id: bigint): Promise<ForexPair | null> {
    return this.lock.runExclusive(() => this.db.get(id) ?? null);
  }

  async findAll(): Promise<ForexPair[]> {
    return this.lock.runExclusive(() => this.db.getAll());
  }

  async update(pair: ForexPair): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.db.update(pair);
      await this.db.saveToFile();
    });
  }

  async delete(id: bigint): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.db.delete(id);
      await this.db.saveToFile();
    });
  }
}
