/**
 * Grafana Loki Log Shipper
 *
 * Formats and ships structured JSON logs to Grafana Loki via HTTP API.
 * Meant to run in the background after the response is ready.
 */

import type { LogEntry } from "./logger";

export interface LokiConfig {
  url: string;
  labels?: Record<string, string>;
  username?: string;
  password?: string;
}

/**
 * Loki push payload:
 * {
 *   "streams": [
 *     { "stream": { "label": "value" }, "values": [[ "<ns timestamp>", "<line>" ]] }
 *   ]
 * }
 */
export function formatLogsForLoki(logs: LogEntry[], config: LokiConfig): string {
  const labels = {
    service: logs[0]?.service ?? "forex-pairs-api",
    ...config.labels,
  };

  const values = logs.map((log) => {
    const timestampNs = BigInt(new Date(log.timestamp).getTime()) * BigInt(1_000_000);
    return [timestampNs.toString(), JSON.stringify(log)];
  });

  return JSON.stringify({
    streams: [
      {
        stream: labels,
        values,
      },
    ],
  });
}

export function getLokiPushUrl(baseUrl: string): string {
  return baseUrl.endsWith("/") ? `${baseUrl}loki/api/v1/push` : `${baseUrl}/loki/api/v1/push`;
}

/**
 * Ship logs to Grafana Loki.
 *
 * Never rejects: a failed push is reported on the console and the
 * entries are dropped.
 */
export async function sendLogsToLoki(logs: LogEntry[], config: LokiConfig): Promise<void> {
  if (logs.length === 0) {
    return;
  }

  if (!config.url) {
    console.warn("[Loki Shipper] LOKI_URL not configured, skipping log shipping");
    return;
  }

  try {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (config.username && config.password) {
      headers["Authorization"] = `Basic ${btoa(`${config.username}:${config.password}`)}`;
    }

    const response = await fetch(getLokiPushUrl(config.url), {
      method: "POST",
      headers,
      body: formatLogsForLoki(logs, config),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      throw new Error(`Loki API returned ${response.status} ${response.statusText}: ${errorText}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.warn(
      `[Loki Shipper] Failed to ship logs: ${errorMessage}. Dropping ${logs.length} log entries.`
    );
  }
}
