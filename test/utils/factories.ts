/**
 * Test Data Factories
 *
 * Builders for forex pairs, requests and handler environments
 */

import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import type { Env } from "../../src/index";
import type { IForexDatabase } from "../../src/infrastructure/database/IForexDatabase";
import { ExclusiveLock } from "../../src/infrastructure/lock/ExclusiveLock";
import type { ForexPair } from "../../src/models/ForexPair";
import { parseJson, stringifyJson } from "../../src/util";

export const TEST_BASE_URL = "http://localhost:8080";

export function createForexPair(overrides: Partial<ForexPair> = {}): ForexPair {
  return {
    id: 1n,
    pair: "EUR/USD",
    price: 1.08,
    ...overrides,
  };
}

export function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "forex-pairs-"));
}

export function createTestEnv(forex: IForexDatabase, overrides: Partial<Env> = {}): Env {
  return {
    forex,
    forexLock: new ExclusiveLock(),
    SERVICE_NAME: "forex-pairs-api-test",
    ...overrides,
  };
}

/**
 * Build a request against the API. Objects are sent as JSON; strings are
 * sent as-is so tests can post malformed bodies.
 */
export function forexRequest(
  method: string,
  path: string,
  body?: unknown,
  headers: Record<string, string> = {}
): Request {
  if (body === undefined) {
    return new Request(`${TEST_BASE_URL}${path}`, { method, headers });
  }
  return new Request(`${TEST_BASE_URL}${path}`, {
    method,
    headers: { "Content-Type": "application/json", ...headers },
    body: typeof body === "string" ? body : stringifyJson(body),
  });
}

export function byId(a: ForexPair, b: ForexPair): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function sortById(pairs: ForexPair[]): ForexPair[] {
  return [...pairs].sort(byId);
}

/**
 * Read a JSON body the way the service writes it: integers as bigint.
 */
export async function readJson(response: Response): Promise<unknown> {
  return parseJson(await response.text());
}

/**
 * The logger writes every entry to the console; keep test output quiet.
 */
export function silenceConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}
