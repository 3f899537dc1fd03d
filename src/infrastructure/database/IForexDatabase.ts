/**
 * Forex pair store interface for dependency inversion
 * Lets repositories work against the plain store or its logging wrapper
 */

import type { ForexPair } from '../../models/ForexPair';

export interface IForexDatabase {
  insert(pair: ForexPair): ForexPair | undefined;
  get(id: bigint): ForexPair | undefined;
  getAll(): ForexPair[];
  delete(id: bigint): void;
  update(pair: ForexPair): void;
  saveToFile(): Promise<void>;
}
