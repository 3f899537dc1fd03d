/**
 * Forex Database
 * In-memory forex pair store with whole-file JSON persistence
 *
 * The store itself does no locking; callers serialize access through
 * ExclusiveLock (see ForexPairRepository).
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from '../../logging/logger';
import { parseJson, stringifyJson } from '../../util';
import {
  PersistedDatabaseSchema,
  type ForexPair,
  type PersistedDatabase,
} from '../../models/ForexPair';
import type { IForexDatabase } from './IForexDatabase';
import { PersistenceError } from './PersistenceError';

export const DEFAULT_DATABASE_FILE = 'database.json';

const copyPair = (pair: ForexPair): ForexPair => ({
  id: pair.id,
  pair: pair.pair,
  price: pair.price,
});

export class ForexDatabase implements IForexDatabase {
  private readonly forexPairs = new Map<bigint, ForexPair>();

  constructor(
    readonly filePath: string = DEFAULT_DATABASE_FILE,
    pairs: Iterable<ForexPair> = []
  ) {
    for (const pair of pairs) {
      this.forexPairs.set(pair.id, copyPair(pair));
    }
  }

  get size(): number {
    return this.forexPairs.size;
  }

  /**
   * Insert or replace the pair stored under `pair.id`.
   * @returns the replaced pair, if there was one
   */
  insert(pair: ForexPair): ForexPair | undefined {
    const previous = this.forexPairs.get(pair.id);
    this.forexPairs.set(pair.id, copyPair(pair));
    return previous;
  }

  get(id: bigint): ForexPair | undefined {
    const pair = this.forexPairs.get(id);
    return pair ? copyPair(pair) : undefined;
  }

  getAll(): ForexPair[] {
    return Array.from(this.forexPairs.values(), copyPair);
  }

  delete(id: bigint): void {
    this.forexPairs.delete(id);
  }

  // Same mechanics as insert: an unknown id is created.
  update(pair: ForexPair): void {
    this.forexPairs.set(pair.id, copyPair(pair));
  }

  toJSON(): PersistedDatabase {
    const forexPairs: Record<string, ForexPair> = {};
    for (const [id, pair] of this.forexPairs) {
      forexPairs[id.toString()] = copyPair(pair);
    }
    return { forex_pairs: forexPairs };
  }

  /**
   * Overwrite the file with the whole store. The document is written to a
   * temporary sibling and renamed over the target, so a crash mid-write
   * leaves the previous file intact. Memory is not rolled back on failure.
   */
  async saveToFile(): Promise<void> {
    const data = stringifyJson(this.toJSON());
    const tmpPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, data, 'utf8');
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await rm(tmpPath, { force: true }).catch(() => undefined);
      throw new PersistenceError(`Failed to save forex pairs to ${this.filePath}`, this.filePath, {
        cause: error,
      });
    }
  }

  /**
   * Read a store from disk. Rejects with PersistenceError when the file is
   * missing, unreadable, not JSON, or not shaped like a saved store.
   */
  static async loadFromFile(filePath: string = DEFAULT_DATABASE_FILE): Promise<ForexDatabase> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      throw new PersistenceError(`Failed to read ${filePath}`, filePath, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = parseJson(raw);
    } catch (error) {
      throw new PersistenceError(`${filePath} is not valid JSON`, filePath, { cause: error });
    }

    const result = PersistedDatabaseSchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(`${filePath} does not contain saved forex pairs`, filePath, {
        cause: result.error,
      });
    }

    return new ForexDatabase(filePath, Object.values(result.data.forex_pairs));
  }

  /**
   * Startup path: load the file, or start empty when it is absent or broken.
   */
  static async open(filePath: string, logger: Logger): Promise<ForexDatabase> {
    try {
      const database = await ForexDatabase.loadFromFile(filePath);
      logger.info('Loaded forex pairs from file', { file: filePath, count: database.size });
      return database;
    } catch (error) {
      logger.warn('Starting with an empty forex pair store', {
        file: filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return new ForexDatabase(filePath);
    }
  }
}
