/**
 * Forex Store Wrapper with Logging
 *
 * Wraps store operations to log each one with its latency.
 */

import type { IForexDatabase } from "../infrastructure/database/IForexDatabase";
import type { ForexPair } from "../models/ForexPair";
import type { Logger } from "./logger";

export class LoggedForexDatabase implements IForexDatabase {
  constructor(
    private db: IForexDatabase,
    private logger: Logger
  ) {}

  insert(pair: ForexPair): ForexPair | undefined {
    return this.measure("insert", String(pair.id), () => this.db.insert(pair));
  }

  get(id: bigint): ForexPair | undefined {
    return this.measure("get", String(id), () => this.db.get(id));
  }

  getAll(): ForexPair[] {
    return this.measure("getAll", undefined, () => this.db.getAll());
  }

  delete(id: bigint): void {
    this.measure("delete", String(id), () => this.db.delete(id));
  }

  update(pair: ForexPair): void {
    this.measure("update", String(pair.id), () => this.db.update(pair));
  }

  async saveToFile(): Promise<void> {
    const startTime = Date.now();
    try {
      await this.db.saveToFile();
      this.logger.logDataOperation("File write: forex pairs", {
        operation: "file",
        latencyMs: Date.now() - startTime,
      });
    } catch (error) {
      this.logger.logDataOperation("File write failed: forex pairs", {
        operation: "file",
        latencyMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private measure<T>(name: string, key: string | undefined, run: () => T): T {
    const startTime = Date.now();
    try {
      const result = run();
      this.logger.logDataOperation(`Memory ${name}`, {
        operation: "memory",
        key,
        latencyMs: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.logger.logDataOperation(`Memory ${name} failed`, {
        operation: "memory",
        key,
        latencyMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
