import { serve } from "@hono/node-server";
import type { AddressInfo, Server } from "node:net";
import app, { type Env } from "./index";
import type { AppConfig } from "./config";
import { ForexDatabase } from "./infrastructure/database/ForexDatabase";
import { ExclusiveLock } from "./infrastructure/lock/ExclusiveLock";
import type { Logger } from "./logging/logger";
import { BackgroundTasks } from "./runtime/execution-context";

export interface RunningServer {
  address: AddressInfo;
  close(): Promise<void>;
}

export function createEnv(config: AppConfig, forex: ForexDatabase): Env {
  return {
    forex,
    forexLock: new ExclusiveLock(),
    SERVICE_NAME: config.serviceName,
    LOKI_URL: config.loki?.url,
    LOKI_USERNAME: config.loki?.username,
    LOKI_PASSWORD: config.loki?.password,
  };
}

/**
 * Load the store, then serve the fetch handler on Node's HTTP server.
 * The store and its lock are created here once and shared by every request.
 * Resolves once the server is listening.
 */
export async function startServer(config: AppConfig, logger: Logger): Promise<RunningServer> {
  const forex = await ForexDatabase.open(config.databaseFile, logger);
  const env = createEnv(config, forex);
  const tasks = new BackgroundTasks();

  const { server, address } = await new Promise<{ server: Server; address: AddressInfo }>((resolve, reject) => {
    // http, http2 and https servers all share net.Server's listen events
    const server: Server = serve(
      {
        fetch: (request: Request) => app.fetch(request, env, tasks),
        hostname: config.host,
        port: config.port,
      },
      (info) => resolve({ server, address: info })
    );
    server.once("error", reject);
  });

  return {
    address,
    // Stop accepting connections, then wait for background log shipping
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error?: Error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }).then(() => tasks.drain()),
  };
}
