import { z } from "zod";
import type { LokiConfig } from "./logging/loki-shipper";

export interface AppConfig {
  host: string;
  port: number;
  databaseFile: string;
  serviceName: string;
  loki?: LokiConfig;
}

const EnvSchema = z.object({
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  DATABASE_FILE: z.string().min(1).default("database.json"),
  SERVICE_NAME: z.string().min(1).default("forex-pairs-api"),
  LOKI_URL: z.string().url().optional(),
  LOKI_USERNAME: z.string().optional(),
  LOKI_PASSWORD: z.string().optional(),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Read startup configuration from environment variables.
 * Unset and empty variables take their defaults.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const defined = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = EnvSchema.safeParse(defined);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const env = result.data;
  const config: AppConfig = {
    host: env.HOST,
    port: env.PORT,
    databaseFile: env.DATABASE_FILE,
    serviceName: env.SERVICE_NAME,
  };

  if (env.LOKI_URL) {
    config.loki = {
      url: env.LOKI_URL,
      username: env.LOKI_USERNAME,
      password: env.LOKI_PASSWORD,
      labels: { service: env.SERVICE_NAME },
    };
  }

  return config;
}
